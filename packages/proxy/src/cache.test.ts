import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CACHE_KEY_PREFIX,
  InMemoryCache,
  NOOP_CACHE,
  ResponseCache,
  requestFingerprint,
} from "./cache";

const request = {
  model: "gpt-4o",
  stream: false,
  messages: [{ role: "user", content: "Hi" }],
};

describe("InMemoryCache", () => {
  it("expires entries after their ttl", async () => {
    let now = 0;
    const cache = new InMemoryCache(() => now);
    await cache.set("k", "v", { ttl: 10 });

    now = 9_999;
    expect(await cache.get("k")).toBe("v");
    now = 10_000;
    expect(await cache.get("k")).toBeNull();
    expect(cache.size).toBe(0);
  });

  it("keeps entries without a ttl", async () => {
    let now = 0;
    const cache = new InMemoryCache(() => now);
    await cache.set("k", "v");
    now = Number.MAX_SAFE_INTEGER;
    expect(await cache.get("k")).toBe("v");
  });

  it("prunes expired entries", async () => {
    let now = 0;
    const cache = new InMemoryCache(() => now);
    await cache.set("old", "1", { ttl: 1 });
    await cache.set("new", "2", { ttl: 100 });
    now = 5_000;
    cache.prune();
    expect(cache.size).toBe(1);
    expect(await cache.get("new")).toBe("2");
  });

  it("sweeps expired entries on write", async () => {
    let now = 0;
    const cache = new InMemoryCache(() => now);
    for (let i = 0; i < 1000; i++) {
      await cache.set(`key-${i}`, "v", { ttl: 1 });
    }
    expect(cache.size).toBe(1000);

    now = 10_000;
    await cache.set("fresh", "v", { ttl: 1 });

    expect(cache.size).toBe(1);
    expect(await cache.get("fresh")).toBe("v");
  });

  it("evicts the oldest entries past its size limit", async () => {
    const cache = new InMemoryCache(() => 0, { maxSize: 2 });
    await cache.set("a", "1");
    await cache.set("b", "2");
    await cache.set("a", "3");
    await cache.set("c", "4");

    expect(cache.size).toBe(2);
    expect(await cache.get("b")).toBeNull();
    expect(await cache.get("a")).toBe("3");
    expect(await cache.get("c")).toBe("4");
  });
});

describe("requestFingerprint", () => {
  it("depends only on model and messages", () => {
    const key = requestFingerprint(request);
    expect(key.startsWith(CACHE_KEY_PREFIX)).toBe(true);
    expect(requestFingerprint({ ...request, stream: true })).toBe(key);
    const withExtraField = { role: "user", content: "Hi", name: "extra" };
    expect(
      requestFingerprint({ ...request, messages: [withExtraField] }),
    ).toBe(key);
    expect(requestFingerprint({ ...request, model: "gpt-4.1-mini" })).not.toBe(
      key,
    );
    expect(
      requestFingerprint({
        ...request,
        messages: [{ role: "user", content: "Hi!" }],
      }),
    ).not.toBe(key);
  });
});

describe("ResponseCache", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("round-trips a response body with the configured ttl", async () => {
    const cache = new InMemoryCache();
    const set = vi.spyOn(cache, "set");
    const responses = new ResponseCache(cache, 42);

    expect(await responses.get(request)).toBeNull();
    await responses.set(request, '{"id":"chatcmpl-1"}');

    expect(await responses.get(request)).toBe('{"id":"chatcmpl-1"}');
    expect(set).toHaveBeenCalledWith(
      requestFingerprint(request),
      '{"id":"chatcmpl-1"}',
      { ttl: 42 },
    );
  });

  it("treats backend failures as misses", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const responses = new ResponseCache({
      get: async () => {
        throw new Error("redis down");
      },
      set: async () => {
        throw new Error("redis down");
      },
    });

    expect(await responses.get(request)).toBeNull();
    await responses.set(request, "{}");
    expect(warn).toHaveBeenCalledWith(
      "Response cache lookup failed: redis down",
    );
    expect(warn).toHaveBeenCalledWith("Response cache write failed: redis down");
  });

  it("never hits with the no-op cache", async () => {
    const responses = new ResponseCache(NOOP_CACHE);
    await responses.set(request, "{}");
    expect(await responses.get(request)).toBeNull();
  });
});
