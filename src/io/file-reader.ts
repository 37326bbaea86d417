/**
 * File reading on the Effect platform
 *
 * Promise-based functions over @effect/platform's FileSystem service, with
 * gzip decompression applied to the byte stream when the file calls for it.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { detectFromExtension, wrapStream } from "../compression";
import { FileError } from "../errors";
import type { FileReaderOptions } from "../types";
import { getPlatform, runPromise } from "./runtime";
import { readLines } from "./stream-utils";

const DEFAULT_BUFFER_SIZE = 65536;

/**
 * Open a file as a byte stream, decompressing gzip input
 *
 * Compression is detected from the file extension unless
 * `compressionFormat` says otherwise.
 *
 * @throws {FileError} When the path does not exist or is not a regular file
 *
 * @example
 * ```typescript
 * const stream = await createStream("genome.fa.gz");
 * for await (const line of readLines(stream)) { ... }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs
      .stat(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));

    if (info.type !== "File") {
      return yield* Effect.fail(new FileError(`Not a regular file: ${path}`, path, "read"));
    }

    const bytes = fs
      .stream(path, { bufferSize: options.bufferSize ?? DEFAULT_BUFFER_SIZE })
      .pipe(Stream.mapError((error) => FileError.fromSystemError("read", path, error)));
    return Stream.toReadableStream(bytes);
  });

  const stream = await runPromise(program.pipe(Effect.provide(getPlatform())));

  if (options.autoDecompress === false) {
    return stream;
  }
  const format = options.compressionFormat ?? detectFromExtension(path);
  return format === "gzip" ? wrapStream(stream) : stream;
}

/**
 * Stream the lines of a (possibly gzip-compressed) text file
 */
export async function* readLinesFromFile(
  path: string,
  options: FileReaderOptions = {}
): AsyncIterable<string> {
  yield* readLines(await createStream(path, options));
}

/**
 * Check whether a path is an existing regular file
 *
 * @throws {FileError} When the path cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return false;
    const info = yield* fs.stat(path);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));

  return runPromise(program.pipe(Effect.provide(getPlatform())));
}
