import {
  type RateLimitConfig,
  type RateLimitResponse,
  rateLimitConfigSchema,
} from "@schema";
import { sleep } from "./util";

export interface RateLimiter {
  // Waits for admission. Resolves "exceeded" rather than waiting past the
  // limiter's budget or the request's cancellation.
  wait(signal: AbortSignal): Promise<RateLimitResponse>;
}

export const UNLIMITED_RATE_LIMITER: RateLimiter = {
  wait: async () => ({ type: "ok" }),
};

// A single global token bucket.
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly config: RateLimitConfig;
  private tokens: number;
  private lastRefill: number;

  constructor(
    config: RateLimitConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.config = rateLimitConfigSchema.parse(config);
    this.tokens = this.config.burst;
    this.lastRefill = now();
  }

  private refill() {
    const t = this.now();
    const elapsedSeconds = Math.max(0, t - this.lastRefill) / 1000;
    this.tokens = Math.min(
      this.config.burst,
      this.tokens + elapsedSeconds * this.config.requests_per_second,
    );
    this.lastRefill = t;
  }

  async wait(signal: AbortSignal): Promise<RateLimitResponse> {
    const deadline = this.now() + this.config.max_wait_ms;
    while (true) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return { type: "ok", remaining: Math.floor(this.tokens) };
      }

      const untilNextToken =
        ((1 - this.tokens) / this.config.requests_per_second) * 1000;
      const exceeded: RateLimitResponse = {
        type: "exceeded",
        try_again_seconds: Math.max(1, Math.ceil(untilNextToken / 1000)),
      };
      if (signal.aborted || this.now() + untilNextToken > deadline) {
        return exceeded;
      }
      try {
        await sleep(Math.ceil(untilNextToken), signal);
      } catch {
        return exceeded;
      }
    }
  }
}
