import { InvalidRequestError } from '../../errors';
import { logger } from '../../logger';
import { computeFingerprint, type Fingerprint } from '../cache/fingerprint';
import type { FingerprintCache } from '../cache/fingerprintCache';
import type { LogoCompositor } from '../logo/logoCompositor';
import type { LogoFetcher } from '../logo/logoFetcher';
import { mapColors } from './colorMapper';
import type { ImageEncoder } from './imageEncoder';
import { generateQrBitmap } from './qrBitmap';
import { calculateSafeZone } from './safeZone';
import type { RenderRequest, RenderResult } from './types';

interface QrRenderServiceOptions {
  cache: FingerprintCache;
  logoFetcher: LogoFetcher;
  compositor: LogoCompositor;
  encoder: ImageEncoder;
  /** Quiet-zone modules around the symbol. */
  margin: number;
  /** Let concurrent misses for one fingerprint share a single render. */
  coalesceMisses: boolean;
}

export class QrRenderService {
  private readonly inFlight = new Map<Fingerprint, Promise<Buffer>>();

  constructor(private readonly options: QrRenderServiceOptions) {}

  async render(request: RenderRequest): Promise<RenderResult> {
    if (!request.content) {
      throw new InvalidRequestError('QR content must not be empty');
    }
    if (!Number.isInteger(request.size) || request.size <= 0) {
      throw new InvalidRequestError(`QR size must be a positive integer, got ${request.size}`);
    }

    const fingerprint = computeFingerprint(request);
    const cached = this.options.cache.lookup(fingerprint);
    if (cached) {
      logger.debug(`[QR] Cache hit ${fingerprint.slice(0, 12)}`);
      return { bytes: cached, contentType: this.options.encoder.contentType, cacheHit: true };
    }

    const bytes = this.options.coalesceMisses
      ? Buffer.from(await this.renderOnce(fingerprint, request))
      : await this.renderAndStore(fingerprint, request);
    return { bytes, contentType: this.options.encoder.contentType, cacheHit: false };
  }

  getPendingRenders() {
    return this.inFlight.size;
  }

  private renderOnce(fingerprint: Fingerprint, request: RenderRequest): Promise<Buffer> {
    const pending = this.inFlight.get(fingerprint);
    if (pending) {
      return pending;
    }
    const job = this.renderAndStore(fingerprint, request).finally(() => {
      this.inFlight.delete(fingerprint);
    });
    this.inFlight.set(fingerprint, job);
    return job;
  }

  private async renderAndStore(fingerprint: Fingerprint, request: RenderRequest): Promise<Buffer> {
    const startedAt = Date.now();
    const bytes = await this.compose(request);
    this.options.cache.insert(fingerprint, bytes);
    logger.info(
      `[QR] Rendered ${request.size}px QR ${fingerprint.slice(0, 12)} in ${Date.now() - startedAt}ms (${bytes.length} bytes)`
    );
    return bytes;
  }

  private async compose(request: RenderRequest): Promise<Buffer> {
    const bitmap = generateQrBitmap(request.content, request.size, this.options.margin);
    const buffer = mapColors(bitmap, request.fgColor, request.bgColor);

    if (request.logoUrl) {
      const logo = await this.options.logoFetcher.fetch(request.logoUrl, request.size);
      if (logo.ok) {
        try {
          await this.options.compositor.composite(buffer, calculateSafeZone(request.size), logo.value);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          logger.warn(`[QR] Logo overlay failed, rendering without it: ${reason}`);
        }
      }
    }

    return this.options.encoder.encode(buffer);
  }
}
