/**
 * Gzip compression for reference files
 *
 * Buffer-based compression for writes, and a streaming decompressor that
 * accepts multi-member gzip input so files assembled from several
 * downloads (or written in batches) read back as one stream.
 */

import { createGunzip, gzip } from "node:zlib";
import { promisify } from "node:util";
import { CompressionError } from "../errors";

const gzipAsync = promisify(gzip);

/**
 * Compress a buffer into a single gzip member
 *
 * Empty input yields a valid, empty gzip member.
 *
 * @throws {CompressionError} When compression fails
 */
export async function compress(data: Uint8Array): Promise<Uint8Array> {
  try {
    return new Uint8Array(await gzipAsync(data));
  } catch (err) {
    throw CompressionError.fromSystemError("compress", err);
  }
}

/**
 * Create gzip decompression transform stream
 *
 * @example
 * ```typescript
 * const lines = readLines(compressedStream.pipeThrough(createStream()));
 * ```
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  const gunzipper = createGunzip();

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      gunzipper.on("data", (chunk: Buffer) => {
        controller.enqueue(new Uint8Array(chunk));
      });
      gunzipper.on("error", (error: Error) => {
        controller.error(CompressionError.fromSystemError("stream", error));
      });
    },
    transform(chunk) {
      return new Promise<void>((resolve, reject) => {
        gunzipper.write(chunk, (error) => {
          if (error) {
            reject(CompressionError.fromSystemError("stream", error));
          } else {
            resolve();
          }
        });
      });
    },
    flush() {
      return new Promise<void>((resolve, reject) => {
        gunzipper.once("end", resolve);
        gunzipper.once("error", (error: Error) => {
          reject(CompressionError.fromSystemError("stream", error));
        });
        gunzipper.end();
      });
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream());
}
