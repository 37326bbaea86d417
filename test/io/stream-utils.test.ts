/**
 * Tests for line splitting over byte streams
 */

import { describe, expect, test } from "vitest";
import { readLines } from "../../src/io/stream-utils";

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
}

async function collect(stream: ReadableStream<Uint8Array>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of readLines(stream)) lines.push(line);
  return lines;
}

describe("readLines", () => {
  test("splits lines across chunk boundaries", async () => {
    expect(await collect(streamOf(">ch", "r1\nAC", "GT\n>chr2\n", "TT\n"))).toEqual([
      ">chr1",
      "ACGT",
      ">chr2",
      "TT",
    ]);
  });

  test("strips CRLF endings, including a CR split from its LF", async () => {
    expect(await collect(streamOf("a\r", "\nb\r\n"))).toEqual(["a", "b"]);
  });

  test("yields a final line without a newline", async () => {
    expect(await collect(streamOf("a\nb"))).toEqual(["a", "b"]);
  });

  test("keeps blank lines in the middle", async () => {
    expect(await collect(streamOf("a\n\nb\n"))).toEqual(["a", "", "b"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const bytes = new TextEncoder().encode(">é\n");
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes.subarray(0, 2));
        controller.enqueue(bytes.subarray(2));
        controller.close();
      },
    });

    expect(await collect(stream)).toEqual([">é"]);
  });

  test("cancels the stream when iteration stops early", async () => {
    let cancelled = false;
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(new TextEncoder().encode("line\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    for await (const line of readLines(stream)) {
      expect(line).toBe("line");
      break;
    }

    expect(cancelled).toBe(true);
  });
});
