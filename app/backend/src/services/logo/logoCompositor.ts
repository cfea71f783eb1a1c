import sharp from 'sharp';

import { logger } from '../../logger';
import type { PixelBuffer } from '../qr/pixelBuffer';
import { type LogoImage, type SafeZone, WHITE } from '../qr/types';

interface LogoCompositorOptions {
  /** White padding, in pixels, between the logo and the QR modules. */
  backdropMargin: number;
}

export async function fitLogoToZone(logo: LogoImage, zone: SafeZone): Promise<LogoImage> {
  if (logo.width === zone.width && logo.height === zone.height) {
    return logo;
  }
  const { data, info } = await sharp(logo.data, {
    raw: { width: logo.width, height: logo.height, channels: 4 },
  })
    .resize(zone.width, zone.height, { fit: 'fill', kernel: 'lanczos3' })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, data };
}

export function paintBackdrop(buffer: PixelBuffer, zone: SafeZone, margin: number) {
  buffer.fillRect(
    zone.x - margin,
    zone.y - margin,
    zone.width + margin * 2,
    zone.height + margin * 2,
    WHITE
  );
}

/**
 * Alpha-blends `logo` onto the buffer with its top-left corner at the zone
 * origin. Fully transparent pixels are left untouched and out-of-range
 * targets are skipped.
 */
export function blendLogo(buffer: PixelBuffer, zone: SafeZone, logo: LogoImage) {
  for (let ly = 0; ly < logo.height; ly += 1) {
    for (let lx = 0; lx < logo.width; lx += 1) {
      const idx = (ly * logo.width + lx) * 4;
      const alphaByte = logo.data[idx + 3];
      const tx = zone.x + lx;
      const ty = zone.y + ly;
      if (alphaByte === 0 || !buffer.contains(tx, ty)) {
        continue;
      }
      const alpha = alphaByte / 255;
      const [r, g, b] = buffer.getPixel(tx, ty);
      buffer.setPixel(tx, ty, [
        Math.round((1 - alpha) * r + alpha * logo.data[idx]),
        Math.round((1 - alpha) * g + alpha * logo.data[idx + 1]),
        Math.round((1 - alpha) * b + alpha * logo.data[idx + 2]),
        255,
      ]);
    }
  }
}

export class LogoCompositor {
  constructor(private readonly options: LogoCompositorOptions) {}

  async composite(buffer: PixelBuffer, zone: SafeZone, logo: LogoImage): Promise<void> {
    if (zone.width < 1 || zone.height < 1) {
      logger.debug(`[Logo] Safe zone is empty for a ${buffer.size}px QR, skipping overlay`);
      return;
    }
    const fitted = await fitLogoToZone(logo, zone);
    paintBackdrop(buffer, zone, this.options.backdropMargin);
    blendLogo(buffer, zone, fitted);
  }
}
