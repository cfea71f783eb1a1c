import cors from 'cors';
import express from 'express';
import { createServer } from 'http';
import { ZodError } from 'zod';

import { SettingsService } from './config';
import { QrServiceError } from './errors';
import { logger } from './logger';
import { createQrRouter } from './routes';
import { FingerprintCache } from './services/cache/fingerprintCache';
import { LogoCompositor } from './services/logo/logoCompositor';
import { LogoFetcher } from './services/logo/logoFetcher';
import { PngEncoder } from './services/qr/imageEncoder';
import { QrRenderService } from './services/qr/qrRenderer';

async function bootstrap() {
  const settings = await SettingsService.getInstance().load();

  const cache = new FingerprintCache({
    ttlMs: settings.cache.ttlSeconds * 1000,
    idleMs: settings.cache.idleSeconds * 1000,
    maxEntries: settings.cache.maxEntries,
  });

  const renderer = new QrRenderService({
    cache,
    logoFetcher: new LogoFetcher({
      fetchTimeoutMs: settings.logo.fetchTimeoutMs,
      maxBytes: settings.logo.maxBytes,
    }),
    compositor: new LogoCompositor({ backdropMargin: settings.logo.backdropMargin }),
    encoder: new PngEncoder(),
    margin: settings.qr.margin,
    coalesceMisses: settings.cache.coalesceMisses,
  });

  const app = express();
  app.use(cors({ origin: true }));

  app.get('/status', (_req, res) => {
    res.json({
      cache: cache.stats(),
      pendingRenders: renderer.getPendingRenders(),
      timestamp: Date.now(),
    });
  });

  app.use(createQrRouter(renderer, settings));

  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (err instanceof ZodError) {
        const message = err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        logger.warn(`[API] Rejected request: ${message}`);
        res.status(400).json({ message });
        return;
      }
      if (err instanceof QrServiceError && err.status < 500) {
        logger.warn(`[API] ${err.message}`);
        res.status(err.status).json({ message: err.message });
        return;
      }
      logger.error(`[API] ${err.message}`);
      res.status(500).json({ message: 'Internal Server Error' });
    }
  );

  const server = createServer(app);
  const port = settings.server.port;
  server.listen(port, () => {
    logger.info(`QR service listening on http://localhost:${port}`);
  });

  const gracefulShutdown = () => {
    logger.info('Shutting down QR service...');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', gracefulShutdown);
  process.on('SIGTERM', gracefulShutdown);
}

bootstrap().catch((error) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
