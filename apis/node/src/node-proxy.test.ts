import { describe, expect, it } from "vitest";
import { reloadEnv } from "./env";
import { makeChatProxy } from "./node-proxy";

describe("makeChatProxy", () => {
  it("lists the configured models under their external names", () => {
    const proxy = makeChatProxy(
      reloadEnv({
        BACKEND_BASE_URL: "http://backend.test",
        MODELS: "backend-4o,grok-3-mini",
        MODEL_MAPPING: '{"gpt-4o":"backend-4o"}',
      }),
    );

    expect(proxy.models(1700000000).data.map((m) => m.id)).toEqual([
      "gpt-4o",
      "grok-3-mini",
    ]);
  });
});
