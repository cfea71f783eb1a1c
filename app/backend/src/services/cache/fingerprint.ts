import { createHash } from 'crypto';

import type { RenderRequest } from '../qr/types';

export type Fingerprint = string;

/**
 * Cache key for a render. `logoUrl` is deliberately not part of it, so a
 * request with a logo can be answered from an entry rendered without one and
 * vice versa.
 */
export function computeFingerprint(request: RenderRequest): Fingerprint {
  const canonical = JSON.stringify([
    request.content,
    request.size,
    request.fgColor ?? null,
    request.bgColor ?? null,
  ]);
  return createHash('sha256').update(canonical).digest('hex');
}
