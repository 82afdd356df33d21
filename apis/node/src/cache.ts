import type { Cache } from "@linegate/proxy";
import { createClient } from "redis";

import { getEnv } from "./env";

type RedisClient = ReturnType<typeof createClient>;

let redisClient: RedisClient | null = null;
export async function getRedis(): Promise<RedisClient | null> {
  const env = getEnv();
  if (redisClient === null && (env.redisHost || env.redisUrl)) {
    if (env.redisUrl) {
      redisClient = createClient({
        url: env.redisUrl,
      });
    } else {
      redisClient = createClient({
        socket: {
          host: env.redisHost,
          port: env.redisPort,
        },
      });
    }
    redisClient.on("error", (err) => console.error("Redis error", err));
    await redisClient.connect();
  }
  return redisClient;
}

export class RedisCache implements Cache {
  constructor(private readonly client: () => Promise<RedisClient | null>) {}

  async get(key: string): Promise<string | null> {
    const redis = await this.client();
    if (!redis) {
      return null;
    }
    return await redis.get(key);
  }

  async set(
    key: string,
    value: string,
    options?: { ttl?: number },
  ): Promise<void> {
    const redis = await this.client();
    if (!redis) {
      return;
    }
    await redis.set(key, value, options?.ttl ? { EX: options.ttl } : {});
  }
}
