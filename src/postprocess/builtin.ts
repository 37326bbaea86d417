/**
 * Postprocessors shipped with the library
 *
 * Registered at module load under `refsmith.postprocess`, so configurations
 * can name them as `refsmith.postprocess.cat` and
 * `refsmith.postprocess.filter_fastas`.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { FileError, ValidationError } from "../errors";
import { FastaParser, FastaWriter } from "../formats/fasta";
import { moveFile, openForWriting } from "../io/file-writer";
import { getPlatform, runPromise } from "../io/runtime";
import { backTranscribe } from "../operations/sequence";
import type { FastaSequence } from "../types";
import { registerPostprocessors } from "./registry";

/** Module path the built-in postprocessors are registered under */
export const BUILTIN_MODULE = "refsmith.postprocess";

/**
 * Postprocess used when a reference block declares none: the single
 * downloaded file becomes the output
 *
 * @throws {ValidationError} When there is not exactly one input
 */
export async function defaultPostprocess(
  inputs: readonly string[],
  outfile: string
): Promise<void> {
  const [input] = inputs;
  if (input === undefined || inputs.length > 1) {
    throw new ValidationError(
      `Default postprocess expects exactly one input, got ${inputs.length}`,
      "Declare a postprocess function such as refsmith.postprocess.cat for multi-url references"
    );
  }
  await moveFile(input, outfile);
}

/**
 * Concatenate the bytes of every input, in order, into `outfile`
 *
 * No decompression happens: gzip inputs yield a multi-member gzip output.
 *
 * @throws {FileError} When an input cannot be read or the output written
 */
export async function cat(inputs: readonly string[], outfile: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    yield* Stream.fromIterable(inputs).pipe(
      Stream.flatMap((input) =>
        fs
          .stream(input)
          .pipe(Stream.mapError((error) => FileError.fromSystemError("read", input, error)))
      ),
      Stream.run(fs.sink(outfile)),
      Effect.mapError((error) =>
        error instanceof FileError ? error : FileError.fromSystemError("write", outfile, error)
      )
    );
  });

  await runPromise(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Keep the FASTA records whose header line contains `pattern`
 *
 * Inputs are read as gzip regardless of their names. Kept sequences are
 * back-transcribed and written under their bare identifier to a gzip
 * `outfile`, wrapped at 60 columns.
 *
 * @returns Number of records written
 *
 * @example
 * ```typescript
 * // keep the primary chromosomes of a UCSC download
 * await filterFastas(["dm6.fa.gz.0.tmp"], "dm6_primary.fasta", "chr2L");
 * ```
 */
export async function filterFastas(
  inputs: readonly string[],
  outfile: string,
  pattern: string
): Promise<number> {
  const parser = new FastaParser();
  const writer = new FastaWriter({ lineWidth: 60 });

  async function* matching(): AsyncIterable<Pick<FastaSequence, "id" | "sequence">> {
    for (const input of inputs) {
      for await (const record of parser.parseFile(input, { compressionFormat: "gzip" })) {
        if (record.title.includes(pattern)) {
          yield { id: record.id, sequence: backTranscribe(record.sequence) };
        }
      }
    }
  }

  return openForWriting(
    outfile,
    async (handle) => {
      const written = await writer.writeToHandle(matching(), handle);
      if (written === 0) {
        // An empty gzip member keeps the output a readable gzip file
        await handle.writeString("");
      }
      return written;
    },
    { compressionFormat: "gzip" }
  );
}

registerPostprocessors(BUILTIN_MODULE, {
  cat,
  filter_fastas: async (inputs, outfile, ...args) => {
    const [pattern] = args;
    if (pattern === undefined) {
      throw new ValidationError(
        "filter_fastas requires a pattern argument",
        "Declare it as postprocess: { function: refsmith.postprocess.filter_fastas, args: <pattern> }"
      );
    }
    await filterFastas(inputs, outfile, pattern);
  },
});
