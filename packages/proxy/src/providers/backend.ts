import {
  type BackendRequest,
  type BackendUsage,
  type ChatRequest,
  finishPayloadSchema,
  usagePayloadSchema,
} from "@schema";
import type { Usage } from "../../types/openai";
import type { Identity } from "../identity";
import { isObject } from "../util";

export const DEFAULT_TIMEZONE = "Asia/Shanghai";
export const DEFAULT_BACKEND_PATH = "/api/search";
export const BACKEND_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

export type UpstreamEvent =
  | { type: "content"; text: string }
  | { type: "reasoning"; text: string }
  | { type: "finish"; finishReason?: string }
  | { type: "usage"; usage: Usage }
  | { type: "ignored" };

const IGNORED: UpstreamEvent = { type: "ignored" };

const ESCAPES: Record<string, string> = {
  "\\": "\\",
  '"': '"',
  n: "\n",
  t: "\t",
  r: "\r",
};

function unescapeManually(payload: string): string {
  let s = payload;
  if (s.startsWith('"')) {
    s = s.slice(1);
  }
  if (s.endsWith('"')) {
    s = s.slice(0, -1);
  }
  return s.replace(/\\(\\|"|n|t|r)/g, (_, c: string) => ESCAPES[c] ?? c);
}

// Text payloads are JSON string literals, but the backend sometimes drops the
// surrounding quotes or emits escapes JSON does not accept.
export function decodeTextPayload(payload: string): string {
  const quoted =
    payload.length >= 2 && payload.startsWith('"') && payload.endsWith('"')
      ? payload
      : `"${payload}"`;
  let decoded: unknown;
  try {
    decoded = JSON.parse(quoted);
  } catch {
    return unescapeManually(payload);
  }
  return typeof decoded === "string" ? decoded : unescapeManually(payload);
}

function parseObjectPayload(
  kind: string,
  payload: string,
): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (e) {
    console.warn(`Failed to parse ${kind} data`, e);
    return null;
  }
  if (!isObject(parsed)) {
    console.warn(`Ignoring ${kind} data that is not an object`);
    return null;
  }
  return parsed;
}

function pickCounts<K extends string>(
  source: Partial<Record<K, number | undefined>>,
  keys: readonly K[],
): Partial<Record<K, number>> | undefined {
  const out: Partial<Record<K, number>> = {};
  let found = false;
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined) {
      out[key] = Math.trunc(value);
      found = true;
    }
  }
  return found ? out : undefined;
}

// Accepts both the prompt/completion and the input/output naming schemes.
// total_tokens is passed through as reported; consumers reconcile it.
export function backendUsageToUsage(u: BackendUsage): Usage {
  const prompt = Math.trunc(u.prompt_tokens ?? u.input_tokens ?? 0);
  const completion = Math.trunc(u.completion_tokens ?? u.output_tokens ?? 0);
  const usage: Usage = {
    prompt_tokens: prompt,
    completion_tokens: completion,
    total_tokens:
      u.total_tokens !== undefined
        ? Math.trunc(u.total_tokens)
        : prompt + completion,
  };

  const promptDetails = u.prompt_tokens_details
    ? pickCounts(u.prompt_tokens_details, ["cached_tokens", "audio_tokens"])
    : u.input_tokens_details &&
      pickCounts(u.input_tokens_details, ["cached_tokens"]);
  if (promptDetails) {
    usage.prompt_tokens_details = promptDetails;
  }

  const completionDetails = u.completion_tokens_details
    ? pickCounts(u.completion_tokens_details, [
        "reasoning_tokens",
        "audio_tokens",
        "accepted_prediction_tokens",
        "rejected_prediction_tokens",
      ])
    : u.output_tokens_details &&
      pickCounts(u.output_tokens_details, ["reasoning_tokens"]);
  if (completionDetails) {
    usage.completion_tokens_details = completionDetails;
  }

  return usage;
}

export function translateLine(raw: string): UpstreamEvent {
  const line = raw.trim();
  if (line.length < 2 || line[1] !== ":") {
    return IGNORED;
  }

  const payload = line.slice(2);
  switch (line[0]) {
    case "0":
      return { type: "content", text: decodeTextPayload(payload) };
    case "g":
      return { type: "reasoning", text: decodeTextPayload(payload) };
    case "e": {
      const data = parseObjectPayload("finish", payload);
      if (!data) {
        return IGNORED;
      }
      return {
        type: "finish",
        finishReason: finishPayloadSchema.parse(data).finishReason,
      };
    }
    case "d": {
      const data = parseObjectPayload("usage", payload);
      const usage = data && usagePayloadSchema.parse(data).usage;
      if (!usage) {
        return IGNORED;
      }
      return { type: "usage", usage: backendUsageToUsage(usage) };
    }
    default:
      return IGNORED;
  }
}

export function toBackendRequest(
  request: ChatRequest,
  identity: Identity,
  backendModel: string,
  timezone: string = DEFAULT_TIMEZONE,
): BackendRequest {
  return {
    id: identity.conversationId,
    group: "chat",
    messages: request.messages.map(({ role, content }) => ({
      role,
      content,
      parts: [{ type: "text", text: content }],
    })),
    model: backendModel,
    timezone,
    user_id: identity.callerId,
  };
}

export function backendHeaders(baseUrl: string): Record<string, string> {
  const origin = new URL(baseUrl).origin;
  return {
    "Content-Type": "application/json",
    Accept: "*/*",
    Origin: origin,
    Referer: `${origin}/`,
    "User-Agent": BACKEND_USER_AGENT,
  };
}
