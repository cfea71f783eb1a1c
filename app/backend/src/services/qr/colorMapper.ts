import { PixelBuffer } from './pixelBuffer';
import type { QrBitmap } from './qrBitmap';
import { BLACK, type Rgba, type SoftResult, WHITE } from './types';

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

export function parseHexColor(value: string | undefined): SoftResult<Rgba> {
  if (value === undefined) {
    return { ok: false, reason: 'not provided' };
  }
  if (value.length !== 7 || !HEX_COLOR.test(value)) {
    return { ok: false, reason: `invalid hex color "${value}"` };
  }
  return {
    ok: true,
    value: [
      parseInt(value.slice(1, 3), 16),
      parseInt(value.slice(3, 5), 16),
      parseInt(value.slice(5, 7), 16),
      255,
    ],
  };
}

export function colorOrDefault(result: SoftResult<Rgba>, fallback: Rgba): Rgba {
  return result.ok ? result.value : fallback;
}

/** Dark modules take the foreground color, light ones the background. */
export function mapColors(bitmap: QrBitmap, fgColor?: string, bgColor?: string): PixelBuffer {
  const fg = colorOrDefault(parseHexColor(fgColor), BLACK);
  const bg = colorOrDefault(parseHexColor(bgColor), WHITE);
  const buffer = new PixelBuffer(bitmap.size);

  for (let i = 0; i < bitmap.cells.length; i += 1) {
    const color = bitmap.cells[i] === 1 ? fg : bg;
    buffer.data[i * 4] = color[0];
    buffer.data[i * 4 + 1] = color[1];
    buffer.data[i * 4 + 2] = color[2];
    buffer.data[i * 4 + 3] = color[3];
  }
  return buffer;
}
