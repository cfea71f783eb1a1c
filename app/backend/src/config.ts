import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { logger } from './logger';

const settingsSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8080),
    })
    .default({}),
  qr: z
    .object({
      defaultSize: z.number().int().positive().default(512),
      maxSize: z.number().int().positive().default(2048),
      margin: z.number().int().min(0).default(4),
    })
    .default({}),
  logo: z
    .object({
      fetchTimeoutMs: z.number().int().positive().default(5000),
      maxBytes: z.number().int().positive().default(2 * 1024 * 1024),
      backdropMargin: z.number().int().min(0).default(4),
    })
    .default({}),
  cache: z
    .object({
      ttlSeconds: z.number().positive().default(3600),
      idleSeconds: z.number().positive().default(1800),
      maxEntries: z.number().int().positive().default(1000),
      coalesceMisses: z.boolean().default(true),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;

export function parseSettings(raw: unknown): Settings {
  return settingsSchema.parse(raw);
}

export class SettingsService {
  private static instance: SettingsService;
  private config?: Settings;

  private constructor() {}

  static getInstance() {
    if (!SettingsService.instance) {
      SettingsService.instance = new SettingsService();
    }
    return SettingsService.instance;
  }

  async load(): Promise<Settings> {
    if (this.config) {
      return this.config;
    }
    const settingsPath =
      process.env.QR_SETTINGS ?? path.resolve(process.cwd(), 'app/config/settings.json');
    let raw: unknown = {};
    try {
      raw = JSON.parse(await readFile(settingsPath, 'utf-8'));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
      logger.warn(`[Config] Missing ${settingsPath}, using defaults`);
    }
    const settings = parseSettings(raw);
    if (process.env.PORT) {
      settings.server.port = Number(process.env.PORT);
    }
    this.config = settings;
    return this.config;
  }
}
