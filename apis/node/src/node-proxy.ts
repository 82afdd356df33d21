import { Readable, type Writable } from "node:stream";

import {
  ChatProxy,
  type ChatProxyOptions,
  FetchTransport,
  InMemoryCache,
  TokenBucketRateLimiter,
} from "@linegate/proxy";
import { StaticModelMapper } from "@linegate/proxy/schema";
import type { MeterProvider } from "@opentelemetry/api";

import { RedisCache, getRedis } from "./cache";
import type { Env } from "./env";
import { StaticProxyPool } from "./proxy-pool";

function makeCache(env: Env): ChatProxyOptions["cache"] {
  if (!env.cacheEnabled) {
    return undefined;
  }
  if (env.redisUrl || env.redisHost) {
    return new RedisCache(getRedis);
  }
  return new InMemoryCache();
}

export function makeChatProxy(
  env: Env,
  { meterProvider }: { meterProvider?: MeterProvider } = {},
): ChatProxy {
  return new ChatProxy({
    backendBaseUrl: env.backendBaseUrl,
    backendPath: env.backendPath,
    timezone: env.timezone,
    availableModels: env.models,
    callerIds: env.callerIds,
    fallbackCallerId: env.fallbackCallerId,
    attempts: env.attempts,
    backoff: env.backoff,
    transport: new FetchTransport({
      connections: env.connections,
      keepAliveTimeoutMs: env.keepAliveTimeoutMs,
      timeoutMs: env.clientTimeoutMs,
      proxyManager:
        env.proxies.length > 0 ? new StaticProxyPool(env.proxies) : undefined,
    }),
    modelMapper: new StaticModelMapper(env.modelMapping),
    cache: makeCache(env),
    cacheTtlSeconds: env.cacheTtlSeconds,
    rateLimiter: env.rateLimit
      ? new TokenBucketRateLimiter(env.rateLimit)
      : undefined,
    meterProvider,
    heartbeatIntervalMs: env.heartbeatIntervalMs,
  });
}

export async function nodeChatCompletions({
  proxy,
  body,
  setHeader,
  setStatusCode,
  getRes,
  signal,
  onStreamError,
}: {
  proxy: ChatProxy;
  body: string;
  setHeader: (name: string, value: string) => void;
  setStatusCode: (code: number) => void;
  getRes: () => Writable;
  signal: AbortSignal;
  // Called when the proxy abandons the response without finishing it.
  onStreamError: (err: unknown) => void;
}): Promise<void> {
  const { readable, writable } = new TransformStream<Uint8Array, Uint8Array>();

  // Note: we must resolve the proxy after forwarding the stream to `res`,
  // because the proxy promise resolves after its internal stream has finished
  // writing.
  const proxyPromise = proxy.chatCompletions({
    body,
    setHeader,
    setStatusCode,
    res: writable,
    signal,
  });

  const res = getRes();
  const readableNode = Readable.fromWeb(readable);
  readableNode.on("error", onStreamError);
  // Once the socket closes nothing pulls from `readable`; cancelling it
  // releases writes still waiting there.
  res.once("close", () => readableNode.destroy());
  readableNode.pipe(res, { end: true });
  await proxyPromise;
}
