import { describe, expect, it } from "vitest";
import { LineTooLongError, readLines } from "./lines";

function bodyOf(...chunks: string[]) {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

async function collect(lines: AsyncIterable<string>) {
  const out: string[] = [];
  for await (const line of lines) {
    out.push(line);
  }
  return out;
}

describe("readLines", () => {
  it("splits across chunk boundaries and strips CR", async () => {
    const lines = await collect(
      readLines(bodyOf('0:"He', 'llo"\r\n0:', '" world"\n', "e:{}")),
    );
    expect(lines).toEqual(['0:"Hello"', '0:" world"', "e:{}"]);
  });

  it("decodes multibyte characters split between chunks", async () => {
    const bytes = new TextEncoder().encode('0:"你好"\n');
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes.slice(0, 4));
        controller.enqueue(bytes.slice(4));
        controller.close();
      },
    });
    expect(await collect(readLines(body))).toEqual(['0:"你好"']);
  });

  it("joins a line delivered in many small chunks", async () => {
    const chunks = Array.from({ length: 1000 }, () => "ab");
    const long = "ab".repeat(1000);

    expect(
      await collect(
        readLines(bodyOf(...chunks, "\ncd\nef"), { maxLineLength: 2000 }),
      ),
    ).toEqual([long, "cd", "ef"]);
    await expect(
      collect(readLines(bodyOf(...chunks, "\n"), { maxLineLength: 1999 })),
    ).rejects.toThrow("upstream line exceeds 1999 characters");
  });

  it("fails on a line longer than the limit", async () => {
    await expect(
      collect(readLines(bodyOf("abcdef\n"), { maxLineLength: 5 })),
    ).rejects.toBeInstanceOf(LineTooLongError);
  });

  it("fails on an unterminated line that outgrows the limit", async () => {
    await expect(
      collect(readLines(bodyOf("abc", "def"), { maxLineLength: 5 })),
    ).rejects.toThrow("upstream line exceeds 5 characters");
  });

  it("stops once the signal aborts", async () => {
    const controller = new AbortController();
    const seen: string[] = [];
    for await (const line of readLines(bodyOf("a\n", "b\n", "c\n"), {
      signal: controller.signal,
    })) {
      seen.push(line);
      controller.abort();
    }
    expect(seen).toEqual(["a"]);
  });
});
