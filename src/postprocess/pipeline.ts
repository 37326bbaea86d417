/**
 * Download-then-postprocess pipeline
 *
 * Materializes one reference file: the block's URLs are fetched into
 * temporary files beside `outfile`, handed to the block's postprocess
 * function, and cleaned up whatever happens.
 *
 * ```
 * outfile.0.tmp, outfile.1.tmp, ...   one per URL, removed on exit
 * outfile.log                         one line per fetch
 * ```
 *
 * The directory of `outfile` is created when missing.
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect, type Layer } from "effect";
import { indexReferences, normalizePostprocess, referenceKey, urlsOf } from "../config/blocks";
import { ConfigurationError, FetchError, FileError } from "../errors";
import { type FetchOutcome, Fetcher } from "../io/fetcher";
import { removeIfExists } from "../io/file-writer";
import { getPlatform, runPromise } from "../io/runtime";
import type { PostprocessFunction, ReferenceBlock, ReferencesConfig } from "../types";
import { defaultPostprocess } from "./builtin";
import { type PostprocessRegistry, postprocessRegistry } from "./registry";

export interface MaterializeOptions {
  /** Registry to resolve postprocess names in (default: the process-wide registry) */
  readonly registry?: PostprocessRegistry;
  /** Fetcher implementation (default: Fetcher.Live) */
  readonly fetcher?: Layer.Layer<Fetcher, never, FileSystem.FileSystem | Path.Path>;
  /** Raise FetchError on the first failed download instead of continuing */
  readonly failOnFetchError?: boolean;
  readonly onWarning?: (message: string) => void;
}

interface ResolvedStep {
  readonly fn: PostprocessFunction;
  readonly args: readonly string[];
}

/**
 * Fetch a reference and run its postprocess function to create `outfile`
 *
 * The block is found by (assembly, tag) among all of the configuration's
 * references. Failed downloads are logged and reported through `onWarning`,
 * and the postprocess function runs on whatever was retrieved, unless
 * `failOnFetchError` is set. Errors from the postprocess function propagate
 * unchanged.
 *
 * @throws {ConfigurationError} On a duplicate (assembly, tag), a missing
 * reference or a block without a url
 * @throws {ResolutionError} When the postprocess name is not registered
 *
 * @example
 * ```typescript
 * const config = await loadConfig("config/config.yaml");
 * const paths = resolvePaths(config);
 * await materialize(paths.dm6["r6-11"].fasta, config, "dm6", "r6-11");
 * ```
 */
export async function materialize(
  outfile: string,
  config: ReferencesConfig,
  assembly: string,
  tag: string,
  options: MaterializeOptions = {}
): Promise<void> {
  const block = selectBlock(config, assembly, tag);
  const step = resolveStep(block, options.registry ?? postprocessRegistry);
  const urls = urlsOf(block);
  const warn = options.onWarning ?? console.warn;
  const logPath = `${outfile}.log`;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const fetcher = yield* Fetcher;

    yield* fs
      .makeDirectory(pathService.dirname(outfile), { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", outfile, error)));

    const appendLog = (line: string, flag: "w" | "a"): Effect.Effect<void, FileError> =>
      fs
        .writeFileString(logPath, line, { flag })
        .pipe(Effect.mapError((error) => FileError.fromSystemError("write", logPath, error)));

    yield* appendLog("", "w");

    const tmpfiles: string[] = [];
    for (const [i, url] of urls.entries()) {
      const tmpfile = yield* Effect.acquireRelease(Effect.succeed(`${outfile}.${i}.tmp`), (path) =>
        removeTemporary(path, warn)
      );
      tmpfiles.push(tmpfile);

      const outcome = yield* fetcher.download(url, tmpfile);
      yield* appendLog(`${formatLogLine(outcome, tmpfile)}\n`, "a");

      if (!outcome.ok) {
        if (options.failOnFetchError === true) {
          return yield* Effect.fail(
            new FetchError(`Failed to fetch ${url}: ${outcome.reason}`, url, `See ${logPath}`)
          );
        }
        warn(`Failed to fetch ${url}: ${outcome.reason}`);
      }
    }

    yield* Effect.tryPromise({
      try: () => step.fn(tmpfiles, outfile, ...step.args),
      catch: (error) => error,
    });
  });

  await runPromise(
    program.pipe(
      Effect.scoped,
      Effect.provide(options.fetcher ?? Fetcher.Live),
      Effect.provide(getPlatform())
    )
  );
}

function selectBlock(config: ReferencesConfig, assembly: string, tag: string): ReferenceBlock {
  const block = indexReferences(config.references).get(referenceKey(assembly, tag));
  if (block === undefined) {
    throw new ConfigurationError(
      `key not found: (${assembly}, ${tag})`,
      "MISSING_REFERENCE",
      `${assembly}/${tag}`
    );
  }
  return block;
}

function resolveStep(block: ReferenceBlock, registry: PostprocessRegistry): ResolvedStep {
  const spec = normalizePostprocess(block.postprocess);
  switch (spec.kind) {
    case "none":
      return { fn: defaultPostprocess, args: [] };
    case "named":
      return { fn: registry.resolve(spec.name), args: [] };
    case "namedWithArgs":
      return { fn: registry.resolve(spec.name), args: spec.args };
  }
}

function formatLogLine(outcome: FetchOutcome, tmpfile: string): string {
  return outcome.ok
    ? `ok ${outcome.url} -> ${tmpfile} (${outcome.bytes} bytes)`
    : `failed ${outcome.url} -> ${tmpfile}: ${outcome.reason}`;
}

// Cleanup problems are reported, never raised over the pipeline's own outcome
function removeTemporary(path: string, warn: (message: string) => void): Effect.Effect<void> {
  return Effect.tryPromise({
    try: () => removeIfExists(path),
    catch: (error) => error,
  }).pipe(
    Effect.asVoid,
    Effect.catchAll((error) =>
      Effect.sync(() => {
        const reason = error instanceof Error ? error.message : String(error);
        warn(`Could not remove temporary file ${path}: ${reason}`);
      })
    )
  );
}
