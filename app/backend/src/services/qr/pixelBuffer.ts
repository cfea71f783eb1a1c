import type { Rgba } from './types';

/**
 * Square RGBA raster owned by a single render. Every write is bounds-checked,
 * so callers may pass coordinates that fall outside the image.
 */
export class PixelBuffer {
  readonly data: Buffer;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Pixel buffer size must be a positive integer, got ${size}`);
    }
    this.data = Buffer.alloc(size * size * 4);
  }

  contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.size && y < this.size;
  }

  getPixel(x: number, y: number): Rgba {
    if (!this.contains(x, y)) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside a ${this.size}px buffer`);
    }
    const idx = (y * this.size + x) * 4;
    return [this.data[idx], this.data[idx + 1], this.data[idx + 2], this.data[idx + 3]];
  }

  /** Returns false, without writing, when the pixel lies outside the buffer. */
  setPixel(x: number, y: number, color: Rgba): boolean {
    if (!this.contains(x, y)) {
      return false;
    }
    const idx = (y * this.size + x) * 4;
    this.data[idx] = color[0];
    this.data[idx + 1] = color[1];
    this.data[idx + 2] = color[2];
    this.data[idx + 3] = color[3];
    return true;
  }

  /** Fills the intersection of the rectangle with the buffer. */
  fillRect(x: number, y: number, width: number, height: number, color: Rgba) {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this.size, x + width);
    const y1 = Math.min(this.size, y + height);
    for (let py = y0; py < y1; py += 1) {
      for (let px = x0; px < x1; px += 1) {
        this.setPixel(px, py, color);
      }
    }
  }
}
