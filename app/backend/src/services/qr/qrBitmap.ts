import QRCode from 'qrcode';

import { InvalidRequestError } from '../../errors';

export interface QrBitmap {
  size: number;
  /** 1 for a dark module, 0 for a light one; row-major. */
  cells: Uint8Array;
}

export function isDark(bitmap: QrBitmap, x: number, y: number): boolean {
  return bitmap.cells[y * bitmap.size + x] === 1;
}

/**
 * Encodes `content` and scales the module matrix, plus `margin` quiet-zone
 * modules per side, onto exactly `size × size` cells.
 */
export function generateQrBitmap(content: string, size: number, margin = 4): QrBitmap {
  if (!content) {
    throw new InvalidRequestError('QR content must not be empty');
  }
  let symbol: ReturnType<typeof QRCode.create>;
  try {
    symbol = QRCode.create(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidRequestError(`QR content cannot be encoded: ${reason}`, error);
  }
  const { modules } = symbol;
  const total = modules.size + margin * 2;
  const cells = new Uint8Array(size * size);

  for (let y = 0; y < size; y += 1) {
    const row = Math.floor((y * total) / size) - margin;
    for (let x = 0; x < size; x += 1) {
      const col = Math.floor((x * total) / size) - margin;
      const inside = row >= 0 && col >= 0 && row < modules.size && col < modules.size;
      if (inside && modules.data[row * modules.size + col]) {
        cells[y * size + x] = 1;
      }
    }
  }

  return { size, cells };
}
