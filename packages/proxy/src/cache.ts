import { createHash } from "node:crypto";
import type { ChatRequest } from "@schema";
import { errorMessage } from "./util";

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options?: { ttl?: number }): Promise<void>;
}

// Always misses.
export const NOOP_CACHE: Cache = {
  get: async () => null,
  set: async () => {},
};

export interface InMemoryCacheOptions {
  maxSize?: number;
  // Expired entries are swept on `set` at most this often.
  pruneIntervalMs?: number;
}

/**
 * A process-local cache. Expired entries are dropped when read and swept on
 * writes; past `maxSize` the oldest entries are evicted first.
 */
export class InMemoryCache implements Cache {
  private store: Map<string, { value: string; expiresAt?: number }> =
    new Map();
  private readonly maxSize: number;
  private readonly pruneIntervalMs: number;
  private lastPrunedAt: number;

  constructor(
    private readonly now: () => number = Date.now,
    { maxSize = 10_000, pruneIntervalMs = 1_000 }: InMemoryCacheOptions = {},
  ) {
    this.maxSize = Math.max(1, maxSize);
    this.pruneIntervalMs = pruneIntervalMs;
    this.lastPrunedAt = now();
  }

  async get(key: string): Promise<string | null> {
    const item = this.store.get(key);
    if (!item) return null;

    if (item.expiresAt !== undefined && item.expiresAt <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return item.value;
  }

  async set(
    key: string,
    value: string,
    options?: { ttl?: number },
  ): Promise<void> {
    const now = this.now();
    if (now - this.lastPrunedAt >= this.pruneIntervalMs) {
      this.prune();
    }
    const expiresAt = options?.ttl ? now + options.ttl * 1000 : undefined;
    // Re-inserting moves the key to the back of the eviction order.
    this.store.delete(key);
    this._evict(this.maxSize - 1);
    this.store.set(key, { value, expiresAt });
  }

  // Drops expired entries.
  prune() {
    const now = this.now();
    this.lastPrunedAt = now;
    for (const [key, item] of this.store) {
      if (item.expiresAt !== undefined && item.expiresAt <= now) {
        this.store.delete(key);
      }
    }
  }

  get size() {
    return this.store.size;
  }

  private _evict(limit: number) {
    for (const key of this.store.keys()) {
      if (this.store.size <= limit) {
        break;
      }
      this.store.delete(key);
    }
  }
}

export const CACHE_KEY_PREFIX = "linegate/chat/v1:";
export const DEFAULT_RESPONSE_CACHE_TTL_SECONDS = 300;

// Streaming and non-streaming requests share a fingerprint.
export function requestFingerprint(request: ChatRequest): string {
  const canonical = JSON.stringify({
    model: request.model,
    messages: request.messages.map(({ role, content }) => ({ role, content })),
    stream: false,
  });
  return (
    CACHE_KEY_PREFIX + createHash("sha256").update(canonical).digest("base64")
  );
}

// Stores serialized response bodies, so a hit replays the exact bytes.
// Cache failures are logged and treated as misses.
export class ResponseCache {
  constructor(
    private readonly cache: Cache = NOOP_CACHE,
    private readonly ttlSeconds: number = DEFAULT_RESPONSE_CACHE_TTL_SECONDS,
  ) {}

  async get(request: ChatRequest): Promise<string | null> {
    try {
      return await this.cache.get(requestFingerprint(request));
    } catch (e) {
      console.warn(`Response cache lookup failed: ${errorMessage(e)}`);
      return null;
    }
  }

  async set(request: ChatRequest, body: string): Promise<void> {
    try {
      await this.cache.set(requestFingerprint(request), body, {
        ttl: this.ttlSeconds,
      });
    } catch (e) {
      console.warn(`Response cache write failed: ${errorMessage(e)}`);
    }
  }
}
