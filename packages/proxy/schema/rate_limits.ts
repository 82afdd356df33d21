import { z } from "zod";

export const rateLimitResponseSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("ok"),
    remaining: z.number().optional(),
  }),
  z.object({
    type: z.literal("exceeded"),
    try_again_seconds: z.number(),
  }),
]);
export type RateLimitResponse = z.infer<typeof rateLimitResponseSchema>;

export const rateLimitConfigSchema = z.object({
  requests_per_second: z.number().positive(),
  burst: z.number().int().positive(),
  max_wait_ms: z.number().int().nonnegative(),
});
export type RateLimitConfig = z.infer<typeof rateLimitConfigSchema>;
