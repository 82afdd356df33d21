import { z } from "zod";

export * from "./models";
export * from "./rate_limits";

export const chatMessageSchema = z.object({
  role: z.string().min(1, "message role is required"),
  content: z.string().min(1, "message content is required"),
});
export type ChatMessage = z.infer<typeof chatMessageSchema>;

export const chatRequestSchema = z.object({
  model: z.string().min(1, "model is required"),
  messages: z.array(chatMessageSchema).min(1, "messages must not be empty"),
  stream: z
    .boolean()
    .nullish()
    .transform((x) => x ?? false),
});
export type ChatRequest = z.infer<typeof chatRequestSchema>;

// Backend payloads are loosely typed: a field of the wrong type is treated as
// absent rather than failing the whole line.
const tokenCount = z.number().finite().optional().catch(undefined);

export const promptTokensDetailsSchema = z.object({
  cached_tokens: tokenCount,
  audio_tokens: tokenCount,
});

export const completionTokensDetailsSchema = z.object({
  reasoning_tokens: tokenCount,
  audio_tokens: tokenCount,
  accepted_prediction_tokens: tokenCount,
  rejected_prediction_tokens: tokenCount,
});

export const backendUsageSchema = z.object({
  prompt_tokens: tokenCount,
  input_tokens: tokenCount,
  completion_tokens: tokenCount,
  output_tokens: tokenCount,
  total_tokens: tokenCount,
  prompt_tokens_details: promptTokensDetailsSchema.optional().catch(undefined),
  input_tokens_details: promptTokensDetailsSchema.optional().catch(undefined),
  completion_tokens_details: completionTokensDetailsSchema
    .optional()
    .catch(undefined),
  output_tokens_details: completionTokensDetailsSchema
    .optional()
    .catch(undefined),
});
export type BackendUsage = z.infer<typeof backendUsageSchema>;

export const usagePayloadSchema = z.object({
  usage: backendUsageSchema.optional().catch(undefined),
});

export const finishPayloadSchema = z.object({
  finishReason: z.string().optional().catch(undefined),
});

export const backendMessageSchema = z.object({
  role: z.string(),
  content: z.string(),
  parts: z.array(z.object({ type: z.literal("text"), text: z.string() })),
});

export const backendRequestSchema = z.object({
  id: z.string(),
  group: z.literal("chat"),
  messages: z.array(backendMessageSchema),
  model: z.string(),
  timezone: z.string(),
  user_id: z.string(),
});
export type BackendRequest = z.infer<typeof backendRequestSchema>;
