/**
 * File writing operations using Effect Platform
 *
 * All Effect complexity is hidden behind Promise-based APIs. Output whose
 * name ends in `.gz` is gzip-compressed unless the caller opts out.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { compress, detectFromExtension } from "../compression";
import { FileError } from "../errors";
import type { WriteOptions } from "../types";
import { getPlatform, runPromise } from "./runtime";

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Apply compression to data if needed based on options and file extension
 *
 * Each call produces a complete gzip member; consecutive members form a
 * valid multi-member gzip file.
 */
async function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions = {}
): Promise<Uint8Array> {
  if (options.autoCompress === false) {
    return data;
  }

  const compressionFormat = options.compressionFormat ?? detectFromExtension(filePath);
  if (compressionFormat === "none") {
    return data;
  }

  return compress(data);
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is automatically closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  writeString(content: string): Promise<void>;
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is closed via Effect's scoped resource management when the
 * callback settles. Errors thrown by the callback propagate unchanged.
 *
 * @example Streaming with automatic gzip compression
 * ```typescript
 * await openForWriting("sequences.fasta.gz", async (handle) => {
 *   for (const batch of batches) {
 *     await handle.writeString(batch);
 *   }
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options?: WriteOptions
): Promise<T> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));

    const writeAll = async (data: Uint8Array): Promise<void> => {
      await runPromise(
        file
          .writeAll(data)
          .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)))
      );
    };

    const handle: FileWriteHandle = {
      writeString: async (content) =>
        writeAll(await applyCompression(new TextEncoder().encode(content), path, options)),
      writeBytes: async (content) => writeAll(await applyCompression(content, path, options)),
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runPromise(program.pipe(Effect.scoped, Effect.provide(getPlatform())));
}

/**
 * Rename a file, replacing the destination
 *
 * @throws {FileError} When the source is missing or the rename fails
 */
export async function moveFile(from: string, to: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .rename(from, to)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("move", from, error)));
  });

  await runPromise(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Delete a file if it exists
 *
 * @returns Whether a file was removed
 * @throws {FileError} When the file exists but cannot be removed
 *
 * @example
 * ```typescript
 * await removeIfExists("/tmp/genome.fa.gz.0.tmp");
 * ```
 */
export async function removeIfExists(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) {
      return false;
    }
    yield* fs.remove(path);
    return true;
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("remove", path, error)));

  return runPromise(program.pipe(Effect.provide(getPlatform())));
}
