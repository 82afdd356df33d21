import { StaticModelMapper } from "@schema";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { LinegateChatCompletionChunk } from "../types/openai";
import {
  FakeTransport,
  TEST_PROXY_OPTIONS,
  callChatProxy,
  parseSse,
  testIds,
  upstreamBody,
} from "../utils/tests";
import { InMemoryCache } from "./cache";
import { CACHED_HEADER, ChatProxy, type ChatProxyOptions } from "./proxy";
import type { BackendCall } from "./transport";

const RESPONSE_ID = "chatcmpl-20240102030405aaaaaaaaaa";
const CREATED = 1704164645;

const messages = [{ role: "user", content: "Hello world" }];

function replying(lines: string[]) {
  return async () => new Response(upstreamBody(lines));
}

function makeProxy(
  transport: FakeTransport,
  overrides: Partial<ChatProxyOptions> = {},
) {
  return new ChatProxy({
    ...TEST_PROXY_OPTIONS,
    transport,
    ids: testIds(),
    ...overrides,
  });
}

function sentBody(call: BackendCall): unknown {
  return JSON.parse(call.body);
}

describe("ChatProxy", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("translates a non-streaming completion", async () => {
    const transport = new FakeTransport([
      replying(['0:"Hello"', '0:" world"', 'e:{"finishReason":"stop"}']),
    ]);
    const proxy = makeProxy(transport);

    const result = await callChatProxy(proxy, { model: "gpt-4o", messages });

    expect(result.statusCode).toBe(200);
    expect(result.headers["Content-Type"]).toBe("application/json");
    expect(result.headers[CACHED_HEADER]).toBe("MISS");
    expect(result.json()).toEqual({
      id: RESPONSE_ID,
      object: "chat.completion",
      created: CREATED,
      model: "gpt-4o",
      choices: [
        {
          index: 0,
          message: { role: "assistant", content: "Hello world" },
          finish_reason: "stop",
          logprobs: null,
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 2, total_tokens: 12 },
    });

    expect(transport.calls).toHaveLength(1);
    const { call } = transport.calls[0];
    expect(call.url).toBe("http://backend.test/api/search");
    expect(call.headers.Origin).toBe("http://backend.test");
    expect(sentBody(call)).toEqual({
      id: "1704164645-00000000-0000-4000-8000-000000000001",
      group: "chat",
      messages: [
        {
          role: "user",
          content: "Hello world",
          parts: [{ type: "text", text: "Hello world" }],
        },
      ],
      model: "gpt-4o",
      timezone: "Asia/Shanghai",
      user_id: "caller-b",
    });
  });

  it("replays identical non-streaming requests from the cache", async () => {
    const transport = new FakeTransport([replying(['0:"Hi"'])]);
    const proxy = makeProxy(transport, { cache: new InMemoryCache() });
    const body = { model: "gpt-4o", messages };

    const first = await callChatProxy(proxy, body);
    const second = await callChatProxy(proxy, { ...body, stream: false });

    expect(first.headers[CACHED_HEADER]).toBe("MISS");
    expect(second.headers[CACHED_HEADER]).toBe("HIT");
    expect(second.statusCode).toBe(200);
    expect(second.responseText).toBe(first.responseText);
    expect(transport.calls).toHaveLength(1);

    const streamed = await callChatProxy(proxy, { ...body, stream: true });
    expect(streamed.headers[CACHED_HEADER]).toBeUndefined();
    expect(transport.calls).toHaveLength(2);
  });

  it("streams chunks and ends with a usage frame", async () => {
    const transport = new FakeTransport([
      replying(['0:"Hi"', 'e:{"finishReason":"stop"}']),
    ]);
    const proxy = makeProxy(transport);

    const result = await callChatProxy(proxy, {
      model: "gpt-4o",
      messages,
      stream: true,
    });

    expect(result.statusCode).toBe(200);
    expect(result.headers["Content-Type"]).toBe("text/event-stream");
    const { events, done } = parseSse<LinegateChatCompletionChunk>(
      result.responseText,
    );
    expect(done).toBe(true);
    expect(events.map((e) => e.choices[0].delta)).toEqual([
      { role: "assistant", content: "" },
      { content: "Hi" },
      {},
    ]);
    expect(events.map((e) => e.choices[0].finish_reason)).toEqual([
      null,
      null,
      "stop",
    ]);
    expect(events.every((e) => e.id === RESPONSE_ID)).toBe(true);
    expect(events[2].usage).toEqual({
      prompt_tokens: 10,
      completion_tokens: 1,
      total_tokens: 11,
    });
    expect(result.sink.closed).toBe(true);
  });

  it("rejects malformed JSON", async () => {
    const transport = new FakeTransport([replying([])]);
    const result = await callChatProxy(makeProxy(transport), "{");

    expect(result.statusCode).toBe(400);
    expect(result.json()).toMatchObject({
      error: { type: "invalid_request_error", param: null, code: null },
    });
    expect(transport.calls).toHaveLength(0);
  });

  it("rejects an empty message list", async () => {
    const transport = new FakeTransport([replying([])]);
    const result = await callChatProxy(makeProxy(transport), {
      model: "gpt-4o",
      messages: [],
    });

    expect(result.statusCode).toBe(400);
    expect(result.json()).toEqual({
      error: {
        message: "messages: messages must not be empty",
        type: "invalid_request_error",
        param: null,
        code: null,
      },
    });
  });

  it("rejects a model that is not available", async () => {
    const transport = new FakeTransport([replying([])]);
    const result = await callChatProxy(makeProxy(transport), {
      model: "unknown",
      messages,
    });

    expect(result.statusCode).toBe(400);
    expect(result.json()).toEqual({
      error: {
        message:
          "model 'unknown' is not supported. Available models: gpt-4o, gpt-4.1-mini",
        type: "invalid_request_error",
        param: null,
        code: "model_not_found",
      },
    });
    expect(transport.calls).toHaveLength(0);
  });

  it("answers 429 when the rate limiter rejects", async () => {
    const transport = new FakeTransport([replying([])]);
    const proxy = makeProxy(transport, {
      rateLimiter: {
        wait: async () => ({ type: "exceeded", try_again_seconds: 3 }),
      },
    });

    const result = await callChatProxy(proxy, { model: "gpt-4o", messages });

    expect(result.statusCode).toBe(429);
    expect(result.headers["Retry-After"]).toBe("3");
    expect(result.json()).toEqual({
      error: {
        message: "Too many requests, try again in 3 seconds",
        type: "rate_limit_error",
        param: null,
        code: "rate_limit_exceeded",
      },
    });
    expect(transport.calls).toHaveLength(0);
  });

  it("answers 503 once every attempt has failed", async () => {
    const transport = new FakeTransport([
      async () => new Response("busy", { status: 500 }),
    ]);
    const proxy = makeProxy(transport, {
      attempts: 2,
      backoff: { baseDelayMs: 0, maxDelayMs: 0 },
    });

    const result = await callChatProxy(proxy, { model: "gpt-4o", messages });

    expect(result.statusCode).toBe(503);
    expect(result.json()).toEqual({
      error: {
        message:
          "Service unavailable: all 2 attempts failed: backend returned status 500: busy",
        type: "service_unavailable",
        param: null,
        code: null,
      },
    });
    expect(
      transport.calls.map(({ call }) => {
        const body = sentBody(call);
        return typeof body === "object" && body !== null && "user_id" in body
          ? body.user_id
          : null;
      }),
    ).toEqual(["caller-b", "caller-a"]);
  });

  it("writes nothing when the client is already gone", async () => {
    const transport = new FakeTransport([replying(['0:"Hi"'])]);
    const controller = new AbortController();
    controller.abort();

    const result = await callChatProxy(
      makeProxy(transport),
      { model: "gpt-4o", messages },
      { signal: controller.signal },
    );

    expect(result.statusCode).toBe(-1);
    expect(result.sink.writes).toEqual([]);
    expect(result.sink.aborted).toBe(true);
    expect(transport.calls).toHaveLength(0);
  });

  it("lists and accepts models under their external names", async () => {
    const transport = new FakeTransport([replying(['0:"Hi"'])]);
    const proxy = makeProxy(transport, {
      availableModels: ["backend-4o", "gpt-4.1-mini"],
      modelMapper: new StaticModelMapper({ "gpt-4o": "backend-4o" }),
    });

    expect(proxy.models(1700000000)).toEqual({
      object: "list",
      data: [
        {
          id: "gpt-4o",
          object: "model",
          created: 1700000000,
          owned_by: "linegate",
        },
        {
          id: "gpt-4.1-mini",
          object: "model",
          created: 1700000000,
          owned_by: "linegate",
        },
      ],
    });

    const external = await callChatProxy(proxy, { model: "gpt-4o", messages });
    const backendName = await callChatProxy(proxy, {
      model: "backend-4o",
      messages,
    });

    expect(external.json()).toMatchObject({ model: "gpt-4o" });
    expect(backendName.json()).toMatchObject({ model: "gpt-4o" });
    expect(sentBody(transport.calls[0].call)).toMatchObject({
      model: "backend-4o",
    });
  });
});
