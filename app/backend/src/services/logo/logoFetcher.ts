import sharp from 'sharp';

import { logger } from '../../logger';
import type { LogoImage, SoftResult } from '../qr/types';

export interface LogoFetcherOptions {
  fetchTimeoutMs: number;
  maxBytes: number;
  fetchImpl?: typeof fetch;
}

/** Edge length of the logo footprint for a QR of the given size. */
export function logoFootprint(size: number) {
  return Math.floor(size / 4);
}

/**
 * Downloads a logo and scales it to fit a quarter of the QR. A single attempt
 * is made; every failure resolves to `ok: false` so the render can continue
 * without a logo.
 */
export class LogoFetcher {
  constructor(private readonly options: LogoFetcherOptions) {}

  async fetch(url: string, size: number): Promise<SoftResult<LogoImage>> {
    try {
      const footprint = logoFootprint(size);
      if (footprint < 1) {
        throw new Error(`QR size ${size} leaves no room for a logo`);
      }
      const bytes = await this.download(url);
      const { data, info } = await sharp(bytes)
        .ensureAlpha()
        .resize(footprint, footprint, { fit: 'inside', kernel: 'lanczos3' })
        .raw()
        .toBuffer({ resolveWithObject: true });
      return { ok: true, value: { width: info.width, height: info.height, data } };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`[Logo] Skipping logo ${url}: ${reason}`);
      return { ok: false, reason };
    }
  }

  private async download(url: string): Promise<Buffer> {
    const protocol = new URL(url).protocol;
    if (protocol !== 'http:' && protocol !== 'https:') {
      throw new Error(`Unsupported logo protocol ${protocol}`);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.fetchTimeoutMs);
    const fetchImpl = this.options.fetchImpl ?? fetch;

    try {
      const response = await fetchImpl(url, { signal: controller.signal });
      if (!response.ok) {
        throw new Error(`Failed to fetch logo: ${response.status}`);
      }

      const contentLength = response.headers.get('content-length');
      if (contentLength) {
        const declared = parseInt(contentLength, 10);
        if (!Number.isNaN(declared) && declared > this.options.maxBytes) {
          throw new Error(`Logo too large: ${declared} bytes (max ${this.options.maxBytes})`);
        }
      }

      const body = Buffer.from(await response.arrayBuffer());
      if (body.byteLength > this.options.maxBytes) {
        throw new Error(`Logo too large: ${body.byteLength} bytes (max ${this.options.maxBytes})`);
      }
      return body;
    } finally {
      clearTimeout(timeout);
    }
  }
}
