import type {
  LinegateChatCompletionChunk,
  LinegateChunkDelta,
  Usage,
} from "../types/openai";
import { DEFAULT_MAX_LINE_LENGTH, readLines } from "./lines";
import { translateLine } from "./providers/backend";
import type { TokenCounter } from "./tokens";
import type { UpstreamResponse } from "./transport";
import { ProxyTimeoutError, errorMessage } from "./util";

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 15_000;
export const DEFAULT_FLUSH_INTERVAL_MS = 100;
export const MAX_CONSECUTIVE_WRITE_FAILURES = 5;

export const SSE_HEADERS: Record<string, string> = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
};

const DONE_LINE = "data: [DONE]\n\n";

/**
 * Buffers SSE text and hands it to the response in batches, at most once per
 * `flushIntervalMs` unless a flush is forced. All writes go through one queue,
 * so data reaches the client in the order it was sent.
 *
 * Aborting `signal` aborts the response: writes still waiting on a stalled
 * client resolve as failed and later ones are dropped.
 */
export class SseWriter {
  consecutiveFailures = 0;
  lastError: unknown = null;

  private pending = "";
  private lastFlushAt = Number.NEGATIVE_INFINITY;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly encoder = new TextEncoder();
  private aborted = false;
  private readonly whenAborted: Promise<"aborted">;
  private resolveAborted: () => void = () => {};

  constructor(
    private readonly writer: WritableStreamDefaultWriter<Uint8Array>,
    private readonly flushIntervalMs: number = DEFAULT_FLUSH_INTERVAL_MS,
    private readonly now: () => number = Date.now,
    signal?: AbortSignal,
  ) {
    this.whenAborted = new Promise((resolve) => {
      this.resolveAborted = () => resolve("aborted");
    });
    if (signal?.aborted) {
      this.abort(signal.reason);
    } else {
      signal?.addEventListener("abort", () => this.abort(signal.reason), {
        once: true,
      });
    }
  }

  async send(text: string, { immediate = false } = {}): Promise<void> {
    if (this.aborted) {
      return;
    }
    this.pending += text;
    const wait = this.lastFlushAt + this.flushIntervalMs - this.now();
    if (immediate || wait <= 0) {
      await this.flush();
    } else if (this.timer === null) {
      this.timer = setTimeout(() => {
        this.timer = null;
        void this.flush();
      }, wait);
    }
  }

  async comment(text: string): Promise<void> {
    await this.send(`: ${text}\n\n`, { immediate: true });
  }

  recordFailure(e: unknown) {
    this.consecutiveFailures++;
    this.lastError = e;
  }

  // Resolves false when the write failed or the response was aborted; a
  // failure is counted instead of thrown.
  async flush(): Promise<boolean> {
    this.clearTimer();
    if (this.aborted) {
      this.pending = "";
      return false;
    }
    if (this.pending === "") {
      return true;
    }
    const data = this.encoder.encode(this.pending);
    this.pending = "";
    this.lastFlushAt = this.now();

    const write = this.queue.then(() => this.writer.write(data));
    // Errors surface through `write`; the queue only keeps order.
    this.queue = write.then(
      () => undefined,
      () => undefined,
    );
    try {
      const outcome = await Promise.race([
        write.then(() => "written" as const),
        this.whenAborted,
      ]);
      if (outcome === "aborted") {
        return false;
      }
      this.consecutiveFailures = 0;
      return true;
    } catch (e) {
      if (this.aborted) {
        return false;
      }
      console.warn(`Failed to write to the client: ${errorMessage(e)}`);
      this.recordFailure(e);
      return false;
    }
  }

  async close(): Promise<void> {
    this.clearTimer();
    await Promise.race([this.queue, this.whenAborted]);
    if (this.aborted) {
      return;
    }
    try {
      await this.writer.close();
    } catch (e) {
      console.warn(`Failed to close the response: ${errorMessage(e)}`);
    }
  }

  // Drops anything not yet written. The writer's own abort settles only once
  // a write the sink already holds does, so it is not awaited.
  abort(reason: unknown): void {
    if (this.aborted) {
      return;
    }
    this.aborted = true;
    this.clearTimer();
    this.pending = "";
    this.resolveAborted();
    void this.writer
      .abort(reason)
      .catch((e) =>
        console.warn(`Failed to abort the response: ${errorMessage(e)}`),
      );
  }

  private clearTimer() {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

export class Heartbeat {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inflight: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(
    private readonly sse: SseWriter,
    private readonly intervalMs: number = DEFAULT_HEARTBEAT_INTERVAL_MS,
  ) {}

  start() {
    if (this.intervalMs <= 0 || this.stopped) {
      return;
    }
    this.timer = setInterval(() => this.beat(), this.intervalMs);
  }

  private beat() {
    if (this.stopped) {
      return;
    }
    this.inflight = this.inflight.then(() => this.sse.comment("heartbeat"));
  }

  // After this resolves no heartbeat is in flight and none will be written.
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.inflight;
  }
}

export type StreamSessionResult =
  | { state: "finished"; finishReason: string; usage: Usage }
  | { state: "error"; message: string; usage: Usage }
  | { state: "client_gone" };

export interface StreamSessionOptions {
  upstream: UpstreamResponse;
  res: WritableStream<Uint8Array>;
  setHeader: (name: string, value: string) => void;
  // Aborted when the client leaves, or with a ProxyTimeoutError when the
  // request runs out of time.
  signal: AbortSignal;
  counter: TokenCounter;
  id: string;
  created: number;
  // Client-facing model name.
  model: string;
  heartbeatIntervalMs?: number;
  flushIntervalMs?: number;
  maxLineLength?: number;
  maxConsecutiveWriteFailures?: number;
  now?: () => number;
}

export function makeChunk(
  { id, created, model }: { id: string; created: number; model: string },
  delta: LinegateChunkDelta,
  finishReason: string | null,
  usage: Usage,
): LinegateChatCompletionChunk {
  return {
    id,
    object: "chat.completion.chunk",
    created,
    model,
    choices: [{ index: 0, delta, finish_reason: finishReason }],
    usage,
  };
}

export function streamErrorContent(message: string) {
  return `\n\n[Stream Error: ${message}]`;
}

export function internalErrorContent(detail: string) {
  return `\n\n[Internal Error: ${detail}]`;
}

export async function runStreamSession({
  upstream,
  res,
  setHeader,
  signal,
  counter,
  id,
  created,
  model,
  heartbeatIntervalMs = DEFAULT_HEARTBEAT_INTERVAL_MS,
  flushIntervalMs = DEFAULT_FLUSH_INTERVAL_MS,
  maxLineLength = DEFAULT_MAX_LINE_LENGTH,
  maxConsecutiveWriteFailures = MAX_CONSECUTIVE_WRITE_FAILURES,
  now = Date.now,
}: StreamSessionOptions): Promise<StreamSessionResult> {
  const meta = { id, created, model };
  // Only a departed client aborts the response; a timeout still gets the
  // error frame.
  const timedOut = () => signal.reason instanceof ProxyTimeoutError;
  const disconnect = new AbortController();
  const onAbort = () => {
    if (!timedOut()) {
      disconnect.abort(signal.reason);
    }
  };
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener("abort", onAbort, { once: true });
  }

  const sse = new SseWriter(
    res.getWriter(),
    flushIntervalMs,
    now,
    disconnect.signal,
  );
  const heartbeat = new Heartbeat(sse, heartbeatIntervalMs);
  const lines = upstream.body
    ? readLines(upstream.body, { signal, maxLineLength })
    : null;
  let terminated = false;

  const serialize = (chunk: LinegateChatCompletionChunk): string | null => {
    try {
      return `data: ${JSON.stringify(chunk)}\n\n`;
    } catch (e) {
      console.warn(`Failed to serialize frame: ${errorMessage(e)}`);
      sse.recordFailure(e);
      return null;
    }
  };

  const emit = async (delta: LinegateChunkDelta) => {
    const frame = serialize(makeChunk(meta, delta, null, counter.snapshot()));
    if (frame !== null) {
      await sse.send(frame);
    }
  };

  // Every terminal path stops the heartbeat before its last write.
  const finish = async (
    delta: LinegateChunkDelta,
    finishReason: string,
    usage: Usage,
  ) => {
    terminated = true;
    await heartbeat.stop();
    const frame = serialize(makeChunk(meta, delta, finishReason, usage));
    await sse.send((frame ?? "") + DONE_LINE, { immediate: true });
    await sse.close();
  };

  const fail = async (
    content: string,
    message: string,
  ): Promise<StreamSessionResult> => {
    const usage = counter.snapshot();
    await finish({ content }, "error", usage);
    return { state: "error", message, usage };
  };

  const clientGone = async (): Promise<StreamSessionResult> => {
    terminated = true;
    sse.abort(signal.reason);
    await heartbeat.stop();
    return { state: "client_gone" };
  };

  // Ends an aborted session: an error frame on timeout, nothing otherwise.
  const interrupted = async (): Promise<StreamSessionResult> => {
    if (timedOut() && !terminated) {
      const message = errorMessage(signal.reason);
      console.warn(`Ending stream: ${message}`);
      return await fail(streamErrorContent(message), message);
    }
    return await clientGone();
  };

  try {
    for (const [name, value] of Object.entries(SSE_HEADERS)) {
      setHeader(name, value);
    }
    heartbeat.start();

    const initial = serialize(
      makeChunk(
        meta,
        { role: "assistant", content: "" },
        null,
        counter.snapshot(),
      ),
    );
    if (initial !== null) {
      await sse.send(initial, { immediate: true });
    }

    let finishReason = "stop";
    while (lines) {
      let next: IteratorResult<string, void>;
      try {
        next = await lines.next();
      } catch (e) {
        if (signal.aborted) {
          return await interrupted();
        }
        const message = errorMessage(e);
        console.error(`Failed to read the upstream stream: ${message}`);
        return await fail(streamErrorContent(message), message);
      }
      if (next.done || signal.aborted) {
        break;
      }

      const event = translateLine(next.value);
      switch (event.type) {
        case "content":
          counter.countOutput(event.text);
          await emit({ content: event.text });
          break;
        case "reasoning":
          counter.countOutput(event.text);
          await emit({ reasoning_content: event.text });
          break;
        case "finish":
          if (event.finishReason) {
            finishReason = event.finishReason;
          }
          break;
        case "usage":
          counter.serverUsage = event.usage;
          break;
        case "ignored":
          break;
      }

      if (sse.consecutiveFailures >= maxConsecutiveWriteFailures) {
        const message = `${sse.consecutiveFailures} consecutive write failures: ${errorMessage(sse.lastError)}`;
        console.error(`Ending stream: ${message}`);
        return await fail(streamErrorContent(message), message);
      }
    }

    if (signal.aborted) {
      return await interrupted();
    }

    const usage = counter.finalUsage();
    await finish({}, finishReason, usage);
    return { state: "finished", finishReason, usage };
  } catch (e) {
    const detail = errorMessage(e);
    console.error("Stream session failed", e);
    if (disconnect.signal.aborted) {
      return await clientGone();
    }
    if (terminated) {
      return { state: "error", message: detail, usage: counter.snapshot() };
    }
    if (timedOut()) {
      return await interrupted();
    }
    return await fail(internalErrorContent(detail), detail);
  } finally {
    signal.removeEventListener("abort", onAbort);
    await heartbeat.stop();
    await lines?.return(undefined);
  }
}
