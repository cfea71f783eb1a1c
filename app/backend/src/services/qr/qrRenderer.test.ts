import sharp from 'sharp';
import { describe, expect, it } from 'vitest';

import { EncodingError, InvalidRequestError } from '../../errors';
import { FingerprintCache } from '../cache/fingerprintCache';
import { LogoCompositor } from '../logo/logoCompositor';
import { LogoFetcher } from '../logo/logoFetcher';
import { type ImageEncoder, PngEncoder } from './imageEncoder';
import type { PixelBuffer } from './pixelBuffer';
import { QrRenderService } from './qrRenderer';

interface Harness {
  service: QrRenderService;
  cache: FingerprintCache;
  fetchedUrls: string[];
  encodeCalls: () => number;
}

function createHarness(
  options: {
    logo?: () => Promise<Response>;
    encoder?: ImageEncoder;
    compositor?: LogoCompositor;
    coalesceMisses?: boolean;
  } = {}
): Harness {
  const cache = new FingerprintCache({ ttlMs: 3_600_000, idleMs: 1_800_000, maxEntries: 1000 });
  const fetchedUrls: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    fetchedUrls.push(String(input));
    if (!options.logo) throw new Error('unexpected fetch');
    return options.logo();
  };
  const inner = options.encoder ?? new PngEncoder();
  let calls = 0;
  const encoder: ImageEncoder = {
    contentType: 'image/png',
    encode: (buffer: PixelBuffer) => {
      calls += 1;
      return inner.encode(buffer);
    },
  };
  const service = new QrRenderService({
    cache,
    logoFetcher: new LogoFetcher({ fetchTimeoutMs: 1000, maxBytes: 1024 * 1024, fetchImpl }),
    compositor: options.compositor ?? new LogoCompositor({ backdropMargin: 4 }),
    encoder,
    margin: 4,
    coalesceMisses: options.coalesceMisses ?? true,
  });
  return { service, cache, fetchedUrls, encodeCalls: () => calls };
}

async function decode(png: Buffer) {
  const { data, info } = await sharp(png).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  const colors = new Set<string>();
  for (let i = 0; i < data.length; i += 4) {
    colors.add(`${data[i]},${data[i + 1]},${data[i + 2]},${data[i + 3]}`);
  }
  const pixel = (x: number, y: number) => {
    const idx = (y * info.width + x) * 4;
    return [data[idx], data[idx + 1], data[idx + 2], data[idx + 3]];
  };
  return { data, info, colors, pixel };
}

async function bluePngResponse() {
  const png = await sharp({
    create: { width: 64, height: 64, channels: 4, background: { r: 0, g: 0, b: 255, alpha: 1 } },
  })
    .png()
    .toBuffer();
  return new Response(new Uint8Array(png), { status: 200, headers: { 'content-type': 'image/png' } });
}

describe('QrRenderService', () => {
  it('renders a black-on-white PNG of the requested size', async () => {
    const { service } = createHarness();
    const result = await service.render({ content: 'https://example.com', size: 256 });

    expect(result.contentType).toBe('image/png');
    expect(result.cacheHit).toBe(false);
    const { info, colors } = await decode(result.bytes);
    expect(info.width).toBe(256);
    expect(info.height).toBe(256);
    expect([...colors].sort()).toEqual(['0,0,0,255', '255,255,255,255']);
  });

  it('uses only the requested foreground and background colors', async () => {
    const { service } = createHarness();
    const result = await service.render({
      content: 'https://example.com',
      size: 256,
      fgColor: '#FF0000',
      bgColor: '#00FF00',
    });

    const { colors } = await decode(result.bytes);
    expect([...colors].sort()).toEqual(['0,255,0,255', '255,0,0,255']);
  });

  it('falls back to the defaults for malformed colors', async () => {
    const { service } = createHarness();
    const result = await service.render({
      content: 'https://example.com',
      size: 128,
      fgColor: 'FF0000',
      bgColor: '#GGGGGG',
    });

    const { colors } = await decode(result.bytes);
    expect([...colors].sort()).toEqual(['0,0,0,255', '255,255,255,255']);
  });

  it('serves repeated requests from the cache', async () => {
    const { service, encodeCalls } = createHarness();
    const first = await service.render({ content: 'cache me', size: 64 });
    const second = await service.render({ content: 'cache me', size: 64 });

    expect(second.cacheHit).toBe(true);
    expect(second.bytes).toEqual(first.bytes);
    expect(encodeCalls()).toBe(1);
  });

  it('answers a logo request from a cached plain render with the same parameters', async () => {
    const { service, fetchedUrls } = createHarness({ logo: bluePngResponse });
    const plain = await service.render({ content: 'shared key', size: 128 });
    const withLogo = await service.render({
      content: 'shared key',
      size: 128,
      logoUrl: 'https://example.com/logo.png',
    });

    expect(withLogo.cacheHit).toBe(true);
    expect(withLogo.bytes).toEqual(plain.bytes);
    expect(fetchedUrls).toEqual([]);
  });

  it('overlays a fetched logo on a white backdrop in the safe zone', async () => {
    const { service, fetchedUrls } = createHarness({ logo: bluePngResponse });
    const result = await service.render({
      content: 'https://example.com',
      size: 256,
      logoUrl: 'https://example.com/logo.png',
    });

    expect(fetchedUrls).toEqual(['https://example.com/logo.png']);
    const { pixel } = await decode(result.bytes);
    // safe zone is (96, 96, 64, 64) with a 4px backdrop
    expect(pixel(93, 128)).toEqual([255, 255, 255, 255]);
    expect(pixel(128, 163)).toEqual([255, 255, 255, 255]);
    const [r, g, b, a] = pixel(128, 128);
    expect(r).toBeLessThanOrEqual(5);
    expect(g).toBeLessThanOrEqual(5);
    expect(b).toBeGreaterThanOrEqual(250);
    expect(a).toBe(255);
  });

  it('renders without the logo when the fetch fails', async () => {
    const failing = createHarness({ logo: async () => new Response('nope', { status: 500 }) });
    const plain = createHarness();

    const withLogo = await failing.service.render({
      content: 'https://example.com',
      size: 128,
      logoUrl: 'https://example.com/logo.png',
    });
    const without = await plain.service.render({ content: 'https://example.com', size: 128 });

    const a = await decode(withLogo.bytes);
    const b = await decode(without.bytes);
    expect(a.data.equals(b.data)).toBe(true);
  });

  it('renders without the logo when the overlay throws a non-Error value', async () => {
    class ThrowingCompositor extends LogoCompositor {
      override async composite(): Promise<void> {
        throw 'overlay exploded';
      }
    }
    const broken = createHarness({
      logo: bluePngResponse,
      compositor: new ThrowingCompositor({ backdropMargin: 4 }),
    });
    const plain = createHarness();

    const withLogo = await broken.service.render({
      content: 'https://example.com',
      size: 128,
      logoUrl: 'https://example.com/logo.png',
    });
    const without = await plain.service.render({ content: 'https://example.com', size: 128 });

    expect((await decode(withLogo.bytes)).data.equals((await decode(without.bytes)).data)).toBe(true);
  });

  it('refuses empty content before composing', async () => {
    const { service, encodeCalls } = createHarness();
    await expect(service.render({ content: '', size: 64 })).rejects.toBeInstanceOf(InvalidRequestError);
    expect(encodeCalls()).toBe(0);
  });

  it('refuses content too long for any QR version and caches nothing', async () => {
    const { service, cache, encodeCalls } = createHarness();
    await expect(service.render({ content: 'x'.repeat(8000), size: 64 })).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    expect(encodeCalls()).toBe(0);
    expect(cache.size).toBe(0);
  });

  it('does not let callers corrupt the cached image', async () => {
    const { service } = createHarness();
    const first = await service.render({ content: 'immutable', size: 64 });
    const original = Buffer.from(first.bytes);
    first.bytes.fill(0);

    const second = await service.render({ content: 'immutable', size: 64 });
    expect(second.cacheHit).toBe(true);
    expect(second.bytes).toEqual(original);
  });

  it('refuses a non-positive size', async () => {
    const { service } = createHarness();
    await expect(service.render({ content: 'x', size: 0 })).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it('surfaces encoding failures and caches nothing', async () => {
    const { service, cache } = createHarness({
      encoder: {
        contentType: 'image/png',
        encode: async () => {
          throw new EncodingError('encoder exploded');
        },
      },
    });

    await expect(service.render({ content: 'https://example.com', size: 64 })).rejects.toThrow(
      'encoder exploded'
    );
    expect(cache.size).toBe(0);
  });

  it('shares one render between concurrent misses for the same fingerprint', async () => {
    const { service, encodeCalls } = createHarness();
    const [first, second] = await Promise.all([
      service.render({ content: 'concurrent', size: 64 }),
      service.render({ content: 'concurrent', size: 64 }),
    ]);

    expect(encodeCalls()).toBe(1);
    expect(second.bytes).toEqual(first.bytes);
    expect(second.bytes).not.toBe(first.bytes);
    expect(service.getPendingRenders()).toBe(0);
  });

  it('renders each concurrent miss independently when coalescing is off', async () => {
    const { service, encodeCalls } = createHarness({ coalesceMisses: false });
    await Promise.all([
      service.render({ content: 'concurrent', size: 64 }),
      service.render({ content: 'concurrent', size: 64 }),
    ]);

    expect(encodeCalls()).toBe(2);
  });
});
