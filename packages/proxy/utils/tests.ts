import { createParser } from "eventsource-parser";
import type { IdGenerator } from "../src/identity";
import type { ChatProxy, ChatProxyOptions } from "../src/proxy";
import type { BackendCall, Transport, UpstreamResponse } from "../src/transport";

// Collects every write as text. An aborted response is recorded, not thrown.
export function createCollectingSink() {
  const decoder = new TextDecoder();
  const ref = {
    writes: [] as string[],
    closed: false,
    aborted: false,
    text() {
      return ref.writes.join("");
    },
    res: new WritableStream<Uint8Array>({
      write(chunk) {
        ref.writes.push(decoder.decode(chunk));
      },
      close() {
        ref.closed = true;
      },
      abort() {
        ref.aborted = true;
      },
    }),
  };
  return ref;
}

export function createHeaderHandlers() {
  const ref = {
    headers: {} as Record<string, string>,
    statusCode: -1,
    setHeader(name: string, value: string) {
      ref.headers[name] = value;
    },
    setStatusCode(code: number) {
      ref.statusCode = code;
    },
  };
  return ref;
}

export function upstreamBody(lines: string[]): string {
  return lines.map((line) => line + "\n").join("");
}

// An upstream body the test feeds by hand.
export function controlledUpstream() {
  const encoder = new TextEncoder();
  let controller: ReadableStreamDefaultController<Uint8Array> | null = null;
  const body = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
    },
  });
  return {
    response: new Response(body),
    push(line: string) {
      controller?.enqueue(encoder.encode(line + "\n"));
    },
    end() {
      controller?.close();
    },
  };
}

type TransportStep =
  | UpstreamResponse
  | Error
  | ((call: BackendCall, signal: AbortSignal) => Promise<UpstreamResponse>);

// Replays `steps` in order; the last step repeats once the list runs out.
export class FakeTransport implements Transport {
  calls: { call: BackendCall; signal: AbortSignal }[] = [];

  constructor(private readonly steps: TransportStep[]) {}

  async send(call: BackendCall, signal: AbortSignal): Promise<UpstreamResponse> {
    this.calls.push({ call, signal });
    const step = this.steps[Math.min(this.calls.length, this.steps.length) - 1];
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === "function") {
      return await step(call, signal);
    }
    return step;
  }
}

export function testIds(
  now: Date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
): IdGenerator {
  let n = 0;
  return {
    randomInt: () => 0,
    uuid: () => `00000000-0000-4000-8000-${String(++n).padStart(12, "0")}`,
    now: () => now,
  };
}

export async function waitFor(
  condition: () => boolean,
  timeoutMs = 2000,
): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error(`condition not met after ${timeoutMs}ms`);
    }
    await new Promise((r) => setTimeout(r, 5));
  }
}

export interface SseParseResult<T> {
  events: T[];
  done: boolean;
}

export function parseSse<T>(text: string): SseParseResult<T> {
  const result: SseParseResult<T> = { events: [], done: false };
  const parser = createParser((event) => {
    if (event.type !== "event") {
      return;
    }
    if (event.data === "[DONE]") {
      result.done = true;
    } else {
      result.events.push(JSON.parse(event.data));
    }
  });
  parser.feed(text);
  return result;
}

export const TEST_PROXY_OPTIONS: Pick<
  ChatProxyOptions,
  "backendBaseUrl" | "availableModels" | "callerIds" | "heartbeatIntervalMs"
> = {
  backendBaseUrl: "http://backend.test",
  availableModels: ["gpt-4o", "gpt-4.1-mini"],
  callerIds: ["caller-a", "caller-b"],
  heartbeatIntervalMs: 0,
};

export async function callChatProxy(
  proxy: ChatProxy,
  body: unknown,
  { signal = new AbortController().signal }: { signal?: AbortSignal } = {},
) {
  const sink = createCollectingSink();
  const ref = createHeaderHandlers();
  await proxy.chatCompletions({
    body: typeof body === "string" ? body : JSON.stringify(body),
    setHeader: ref.setHeader,
    setStatusCode: ref.setStatusCode,
    res: sink.res,
    signal,
  });
  const responseText = sink.text();
  return {
    ...ref,
    sink,
    responseText,
    json: (): unknown => JSON.parse(responseText),
  };
}
