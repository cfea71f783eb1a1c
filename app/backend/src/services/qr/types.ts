export type Rgba = readonly [number, number, number, number];

export interface RenderRequest {
  readonly content: string;
  readonly size: number;
  readonly fgColor?: string;
  readonly bgColor?: string;
  readonly logoUrl?: string;
}

export interface RenderResult {
  bytes: Buffer;
  contentType: 'image/png';
  cacheHit: boolean;
}

export interface SafeZone {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Decoded RGBA raster, 4 bytes per pixel, row-major. */
export interface LogoImage {
  width: number;
  height: number;
  data: Buffer;
}

/**
 * Outcome of a step that is allowed to fail without aborting the render.
 * Callers substitute their default on `ok: false`.
 */
export type SoftResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export const BLACK: Rgba = [0, 0, 0, 255];
export const WHITE: Rgba = [255, 255, 255, 255];
