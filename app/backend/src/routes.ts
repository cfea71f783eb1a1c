import express from 'express';
import { z } from 'zod';

import type { Settings } from './config';
import type { QrRenderService } from './services/qr/qrRenderer';
import type { RenderRequest } from './services/qr/types';

export function buildRenderQuerySchema(qr: Settings['qr']) {
  return z
    .object({
      content: z.string().min(1, 'content is required'),
      size: z.coerce.number().int().positive().max(qr.maxSize).default(qr.defaultSize),
      fg_color: z.string().optional(),
      bg_color: z.string().optional(),
      logo_url: z.string().optional(),
    })
    .transform(
      (query): RenderRequest => ({
        content: query.content,
        size: query.size,
        fgColor: query.fg_color,
        bgColor: query.bg_color,
        logoUrl: query.logo_url || undefined,
      })
    );
}

export function createQrRouter(renderer: QrRenderService, settings: Settings) {
  const querySchema = buildRenderQuerySchema(settings.qr);
  const router = express.Router();

  router.get('/generate-qr', async (req, res, next) => {
    try {
      const request = querySchema.parse(req.query);
      const result = await renderer.render(request);
      res
        .status(200)
        .type(result.contentType)
        .set('X-Cache', result.cacheHit ? 'HIT' : 'MISS')
        .send(result.bytes);
    } catch (error) {
      next(error);
    }
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  return router;
}
