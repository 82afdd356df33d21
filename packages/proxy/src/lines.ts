import { errorMessage } from "./util";

export const DEFAULT_MAX_LINE_LENGTH = 2 * 1024 * 1024;

export class LineTooLongError extends Error {
  constructor(public readonly maxLineLength: number) {
    super(`upstream line exceeds ${maxLineLength} characters`);
    this.name = "LineTooLongError";
  }
}

// Yields the body's lines without their terminators. Aborting `signal` cancels
// the body, which ends iteration.
export async function* readLines(
  body: ReadableStream<Uint8Array>,
  {
    signal,
    maxLineLength = DEFAULT_MAX_LINE_LENGTH,
  }: { signal?: AbortSignal; maxLineLength?: number } = {},
): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let finished = false;

  const cancel = (reason: unknown) =>
    reader
      .cancel(reason)
      .catch((e) =>
        console.warn(`Failed to cancel upstream body: ${errorMessage(e)}`),
      );
  const onAbort = () => {
    void cancel(signal?.reason);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  const assertLength = (text: string) => {
    if (text.length > maxLineLength) {
      throw new LineTooLongError(maxLineLength);
    }
  };
  const checked = (line: string) => {
    assertLength(line);
    return line.endsWith("\r") ? line.slice(0, -1) : line;
  };

  try {
    let buffer = "";
    while (!signal?.aborted) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      // Only the new text is scanned; `buffer` holds a partial line.
      const text = decoder.decode(value, { stream: true });
      let start = 0;
      let newline = text.indexOf("\n");
      while (newline !== -1) {
        const line = buffer + text.slice(start, newline);
        buffer = "";
        yield checked(line);
        start = newline + 1;
        newline = text.indexOf("\n", start);
      }
      buffer += text.slice(start);
      // a partial line still counts toward the limit
      assertLength(buffer);
    }
    if (signal?.aborted) {
      return;
    }
    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield checked(buffer);
    }
    finished = true;
  } finally {
    signal?.removeEventListener("abort", onAbort);
    if (!finished && !signal?.aborted) {
      await cancel("line reader closed early");
    }
    reader.releaseLock();
  }
}
