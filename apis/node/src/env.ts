import {
  DEFAULT_MODELS,
  type ModelMapping,
  modelMappingSchema,
} from "@linegate/proxy/schema";
import { z } from "zod";

const list = z
  .string()
  .optional()
  .transform((s) =>
    (s ?? "")
      .split(",")
      .map((x) => x.trim())
      .filter((x) => x !== ""),
  );

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((s) =>
      s === undefined || s.trim() === ""
        ? fallback
        : ["1", "true", "yes", "on"].includes(s.trim().toLowerCase()),
    );

const int = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const mapping = z
  .string()
  .optional()
  .transform((s, ctx): ModelMapping => {
    if (!s) {
      return {};
    }
    let data: unknown;
    try {
      data = JSON.parse(s);
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "MODEL_MAPPING must be a JSON object",
      });
      return z.NEVER;
    }
    const parsed = modelMappingSchema.safeParse(data);
    if (!parsed.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "MODEL_MAPPING must map model names to model names",
      });
      return z.NEVER;
    }
    return parsed.data;
  });

const envSchema = z.object({
  PORT: int(8080),
  API_KEY: z.string().optional(),
  CALLER_IDS: list,
  FALLBACK_CALLER_ID: z.string().min(1).default("default_user"),
  BACKEND_BASE_URL: z.string().url(),
  BACKEND_PATH: z.string().default("/api/search"),
  BACKEND_TIMEZONE: z.string().default("Asia/Shanghai"),
  CLIENT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  RETRY_ATTEMPTS: z.coerce.number().int().positive().default(1),
  RETRY_BASE_DELAY_MS: int(500),
  RETRY_MAX_DELAY_MS: int(5000),
  MODELS: list,
  MODEL_MAPPING: mapping,
  CACHE_ENABLED: flag(true),
  RESPONSE_CACHE_TTL_SECONDS: int(300),
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: int(6379),
  RATE_LIMIT_ENABLED: flag(true),
  REQUESTS_PER_SECOND: z.coerce.number().positive().default(1),
  RATE_LIMIT_BURST: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_MAX_WAIT_MS: int(30_000),
  HTTP_PROXY: z.string().optional(),
  PROXY_POOL: list,
  CONN_POOL_CONNECTIONS: z.coerce.number().int().positive().default(10),
  CONN_POOL_KEEPALIVE_MS: int(90_000),
  HEARTBEAT_INTERVAL_MS: int(15_000),
  METRICS_EXPORT_INTERVAL_MS: z.coerce.number().int().positive().optional(),
});

export function reloadEnv(source: NodeJS.ProcessEnv = process.env) {
  const e = envSchema.parse(source);
  return {
    port: e.PORT,
    apiKey: e.API_KEY || undefined,
    callerIds: e.CALLER_IDS,
    fallbackCallerId: e.FALLBACK_CALLER_ID,
    backendBaseUrl: e.BACKEND_BASE_URL,
    backendPath: e.BACKEND_PATH,
    timezone: e.BACKEND_TIMEZONE,
    clientTimeoutMs: e.CLIENT_TIMEOUT_SECONDS * 1000,
    attempts: e.RETRY_ATTEMPTS,
    backoff: {
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    models: e.MODELS.length > 0 ? e.MODELS : [...DEFAULT_MODELS],
    modelMapping: e.MODEL_MAPPING,
    cacheEnabled: e.CACHE_ENABLED,
    cacheTtlSeconds: e.RESPONSE_CACHE_TTL_SECONDS,
    redisUrl: e.REDIS_URL,
    redisHost: e.REDIS_HOST,
    redisPort: e.REDIS_PORT,
    rateLimit: e.RATE_LIMIT_ENABLED
      ? {
          requests_per_second: e.REQUESTS_PER_SECOND,
          burst: e.RATE_LIMIT_BURST,
          max_wait_ms: e.RATE_LIMIT_MAX_WAIT_MS,
        }
      : null,
    // PROXY_POOL takes precedence over a single HTTP_PROXY.
    proxies:
      e.PROXY_POOL.length > 0 ? e.PROXY_POOL : e.HTTP_PROXY ? [e.HTTP_PROXY] : [],
    connections: e.CONN_POOL_CONNECTIONS,
    keepAliveTimeoutMs: e.CONN_POOL_KEEPALIVE_MS,
    heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS,
    metricsExportIntervalMs: e.METRICS_EXPORT_INTERVAL_MS,
  };
}

export type Env = ReturnType<typeof reloadEnv>;

let current: Env | null = null;

// Read lazily so tests and tools can import the server without a full env.
export function getEnv(): Env {
  if (current === null) {
    current = reloadEnv();
  }
  return current;
}

export function resetEnv(source?: NodeJS.ProcessEnv) {
  current = reloadEnv(source);
}
