import type { Fingerprint } from './fingerprint';

interface CachedEntry {
  bytes: Buffer;
  insertedAt: number;
  lastAccessedAt: number;
}

export interface FingerprintCacheOptions {
  ttlMs: number;
  idleMs: number;
  maxEntries: number;
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
}

/**
 * In-memory map from fingerprint to encoded image bytes. Entries expire a
 * fixed time after insertion or after sitting idle, whichever comes first;
 * a full cache evicts its least recently used entry.
 *
 * Stored bytes are private copies; `insert` and `lookup` never hand out the
 * cached buffer itself.
 *
 * Map iteration order doubles as the recency list: every hit re-inserts the
 * key at the end. No method awaits, so calls never interleave.
 */
export class FingerprintCache {
  private readonly entries = new Map<Fingerprint, CachedEntry>();
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly options: FingerprintCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  lookup(fingerprint: Fingerprint): Buffer | undefined {
    const entry = this.entries.get(fingerprint);
    const now = this.now();
    if (!entry || this.isExpired(entry, now)) {
      if (entry) {
        this.entries.delete(fingerprint);
      }
      this.misses += 1;
      return undefined;
    }
    entry.lastAccessedAt = now;
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    this.hits += 1;
    return Buffer.from(entry.bytes);
  }

  insert(fingerprint: Fingerprint, bytes: Buffer) {
    const now = this.now();
    this.entries.delete(fingerprint);
    if (this.entries.size >= this.options.maxEntries) {
      this.purgeExpired(now);
    }
    while (this.entries.size >= this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions += 1;
    }
    this.entries.set(fingerprint, { bytes: Buffer.from(bytes), insertedAt: now, lastAccessedAt: now });
  }

  get size() {
    this.purgeExpired(this.now());
    return this.entries.size;
  }

  clear() {
    this.entries.clear();
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, evictions: this.evictions, size: this.size };
  }

  private isExpired(entry: CachedEntry, now: number) {
    return (
      now - entry.insertedAt >= this.options.ttlMs || now - entry.lastAccessedAt >= this.options.idleMs
    );
  }

  private purgeExpired(now: number) {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        this.evictions += 1;
      }
    }
  }
}
