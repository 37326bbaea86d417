/**
 * Tests for gzip compression and streaming decompression
 */

import { gunzipSync, gzipSync } from "node:zlib";
import { describe, expect, test } from "vitest";
import { compress, detectFromExtension, wrapStream } from "../../src/compression";
import { CompressionError } from "../../src/errors";
import { readLines } from "../../src/io/stream-utils";

function streamOf(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk);
      controller.close();
    },
  });
}

async function linesOf(stream: ReadableStream<Uint8Array>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of readLines(stream)) lines.push(line);
  return lines;
}

describe("gzip", () => {
  test("compresses data into a gzip member", async () => {
    const compressed = await compress(new TextEncoder().encode(">chr1\nACGT\n"));

    expect([compressed[0], compressed[1]]).toEqual([0x1f, 0x8b]);
    expect(gunzipSync(compressed).toString("utf8")).toBe(">chr1\nACGT\n");
  });

  test("compresses empty input into a valid member", async () => {
    const compressed = await compress(new Uint8Array(0));

    expect(gunzipSync(compressed).length).toBe(0);
  });

  test("streams multi-member input as one text", async () => {
    const stream = wrapStream(
      streamOf(gzipSync(Buffer.from(">a\nAC\n")), gzipSync(Buffer.from(">b\nGT\n")))
    );

    expect(await linesOf(stream)).toEqual([">a", "AC", ">b", "GT"]);
  });

  test("fails the stream on corrupt input", async () => {
    const valid = gzipSync(Buffer.from(">a\nACGT\n".repeat(20)));
    const corrupt = valid.subarray(0, valid.length - 12);

    await expect(linesOf(wrapStream(streamOf(corrupt)))).rejects.toThrow(CompressionError);
  });
});

describe("detectFromExtension", () => {
  test("recognizes gzip suffixes case-insensitively", () => {
    expect(detectFromExtension("dm6.fa.gz")).toBe("gzip");
    expect(detectFromExtension("dm6.FA.GZIP")).toBe("gzip");
    expect(detectFromExtension("dm6.fa")).toBe("none");
    expect(detectFromExtension("dm6.fa.gz.0.tmp")).toBe("none");
  });
});
