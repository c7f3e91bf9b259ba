import { LRUCache } from "lru-cache";
import type { CacheStore } from "../types.js";

/** Accounted on top of every entry's bytes for keys and bookkeeping. */
export const ENTRY_OVERHEAD_BYTES = 350;
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

export interface LocalCacheOptions {
  maxSizeMiB: number;
  ttlMs?: number;
}

/** In-memory CacheStore bounded by total size, evicting least recently used entries. */
export class LocalCache implements CacheStore {
  private readonly lru: LRUCache<string, Uint8Array>;

  constructor(opts: LocalCacheOptions) {
    if (!(opts.maxSizeMiB > 0)) throw new Error(`maxSizeMiB must be > 0 (got ${opts.maxSizeMiB})`);
    this.lru = new LRUCache<string, Uint8Array>({
      maxSize: Math.floor(opts.maxSizeMiB * 1024 * 1024),
      sizeCalculation: (value) => value.byteLength + ENTRY_OVERHEAD_BYTES,
      ttl: opts.ttlMs ?? DEFAULT_CACHE_TTL_MS,
    });
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    return this.lru.get(key);
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    this.lru.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.lru.delete(key);
  }

  get size(): number {
    return this.lru.size;
  }

  /** Bytes currently accounted, overhead included. */
  get calculatedSize(): number {
    return this.lru.calculatedSize;
  }

  close(): void {
    this.lru.clear();
  }
}
