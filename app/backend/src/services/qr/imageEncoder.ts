import sharp from 'sharp';

import { EncodingError } from '../../errors';
import type { PixelBuffer } from './pixelBuffer';

export interface ImageEncoder {
  readonly contentType: 'image/png';
  encode(buffer: PixelBuffer): Promise<Buffer>;
}

export class PngEncoder implements ImageEncoder {
  readonly contentType = 'image/png';

  async encode(buffer: PixelBuffer): Promise<Buffer> {
    try {
      return await sharp(buffer.data, {
        raw: { width: buffer.size, height: buffer.size, channels: 4 },
      })
        .png()
        .toBuffer();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new EncodingError(`PNG encoding failed: ${reason}`, error);
    }
  }
}
