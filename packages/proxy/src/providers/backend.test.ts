import { afterEach, describe, expect, it, vi } from "vitest";
import {
  backendHeaders,
  decodeTextPayload,
  toBackendRequest,
  translateLine,
} from "./backend";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("decodeTextPayload", () => {
  it("decodes a JSON string literal", () => {
    expect(decodeTextPayload('"Hello"')).toBe("Hello");
    expect(decodeTextPayload('"say \\"hi\\"\\n"')).toBe('say "hi"\n');
    expect(decodeTextPayload('"\\u4f60\\u597d"')).toBe("你好");
  });

  it("adds missing quotes", () => {
    expect(decodeTextPayload("Hello")).toBe("Hello");
    expect(decodeTextPayload("tab\\there")).toBe("tab\there");
  });

  it("falls back to manual unescaping for invalid escapes", () => {
    expect(decodeTextPayload('"a\\qb\\nc"')).toBe("a\\qb\nc");
    expect(decodeTextPayload('"bad \\x"')).toBe("bad \\x");
  });
});

describe("translateLine", () => {
  it("translates content and reasoning deltas", () => {
    expect(translateLine('0:"Hello"')).toEqual({
      type: "content",
      text: "Hello",
    });
    expect(translateLine('g:"thinking"\r')).toEqual({
      type: "reasoning",
      text: "thinking",
    });
  });

  it("ignores blank and unknown lines", () => {
    expect(translateLine("")).toEqual({ type: "ignored" });
    expect(translateLine("   ")).toEqual({ type: "ignored" });
    expect(translateLine('f:{"messageId":"m-1"}')).toEqual({
      type: "ignored",
    });
    expect(translateLine("hello")).toEqual({ type: "ignored" });
  });

  it("reads the finish reason", () => {
    expect(translateLine('e:{"finishReason":"stop"}')).toEqual({
      type: "finish",
      finishReason: "stop",
    });
    expect(translateLine('e:{"isContinued":false}')).toEqual({
      type: "finish",
      finishReason: undefined,
    });
  });

  it("reads usage under either naming scheme", () => {
    expect(
      translateLine('d:{"usage":{"prompt_tokens":5,"completion_tokens":2}}'),
    ).toEqual({
      type: "usage",
      usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
    });
    expect(
      translateLine(
        'd:{"usage":{"input_tokens":8,"output_tokens":3,"input_tokens_details":{"cached_tokens":2,"audio_tokens":9},"output_tokens_details":{"reasoning_tokens":1}}}',
      ),
    ).toEqual({
      type: "usage",
      usage: {
        prompt_tokens: 8,
        completion_tokens: 3,
        total_tokens: 11,
        prompt_tokens_details: { cached_tokens: 2 },
        completion_tokens_details: { reasoning_tokens: 1 },
      },
    });
  });

  it("keeps the reported total verbatim", () => {
    expect(
      translateLine(
        'd:{"usage":{"prompt_tokens":5,"completion_tokens":2,"total_tokens":40}}',
      ),
    ).toEqual({
      type: "usage",
      usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 40 },
    });
  });

  it("prefers the prompt/completion names and keeps every detail count", () => {
    expect(
      translateLine(
        'd:{"usage":{"prompt_tokens":5,"input_tokens":50,"completion_tokens":2,"completion_tokens_details":{"reasoning_tokens":1,"accepted_prediction_tokens":0}}}',
      ),
    ).toEqual({
      type: "usage",
      usage: {
        prompt_tokens: 5,
        completion_tokens: 2,
        total_tokens: 7,
        completion_tokens_details: {
          reasoning_tokens: 1,
          accepted_prediction_tokens: 0,
        },
      },
    });
  });

  it("treats non-numeric counts as absent", () => {
    expect(
      translateLine(
        'd:{"usage":{"prompt_tokens":"many","input_tokens":4,"completion_tokens":1}}',
      ),
    ).toEqual({
      type: "usage",
      usage: { prompt_tokens: 4, completion_tokens: 1, total_tokens: 5 },
    });
  });

  it("logs and ignores malformed payloads", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(translateLine("e:{not json")).toEqual({ type: "ignored" });
    expect(translateLine('d:{"usage":')).toEqual({ type: "ignored" });
    expect(translateLine('d:"just a string"')).toEqual({ type: "ignored" });
    expect(translateLine('d:{"other":1}')).toEqual({ type: "ignored" });
    expect(warn).toHaveBeenCalledTimes(3);
  });
});

describe("toBackendRequest", () => {
  it("builds the backend body", () => {
    expect(
      toBackendRequest(
        {
          model: "gpt-4.1-mini",
          stream: false,
          messages: [
            { role: "system", content: "Be brief." },
            { role: "user", content: "Hi" },
          ],
        },
        { callerId: "caller-1", conversationId: "conv-1" },
        "backend-mini",
      ),
    ).toEqual({
      id: "conv-1",
      group: "chat",
      messages: [
        {
          role: "system",
          content: "Be brief.",
          parts: [{ type: "text", text: "Be brief." }],
        },
        { role: "user", content: "Hi", parts: [{ type: "text", text: "Hi" }] },
      ],
      model: "backend-mini",
      timezone: "Asia/Shanghai",
      user_id: "caller-1",
    });
  });

  it("derives origin headers from the base URL", () => {
    expect(backendHeaders("http://backend.test:3000/base/")).toMatchObject({
      Origin: "http://backend.test:3000",
      Referer: "http://backend.test:3000/",
    });
  });
});
