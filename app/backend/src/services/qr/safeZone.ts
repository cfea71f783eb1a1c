import type { SafeZone } from './types';

/**
 * Centered square spanning a quarter of the QR's width. An obstruction of
 * this size stays inside what QR error correction can recover.
 */
export function calculateSafeZone(size: number): SafeZone {
  const side = Math.floor(size / 4);
  const start = Math.floor((size - side) / 2);
  return { x: start, y: start, width: side, height: side };
}
