/**
 * Download collaborator for the materialization pipeline
 *
 * The fetcher is an Effect service so the pipeline can run against an
 * in-process stand-in. Like a shell redirect, a download never fails at
 * this boundary: the destination file always exists afterwards, holding
 * whatever bytes arrived, and the outcome says whether the transfer worked.
 *
 * ## Supported URLs
 *
 * - `http:` / `https:` through the global `fetch`, streamed into the file
 * - `file:` copied from the local file system
 *
 * @example Running a download
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const fetcher = yield* Fetcher;
 *   return yield* fetcher.download("https://example.org/dm6.fa.gz", "/tmp/dm6.fa.gz.0.tmp");
 * });
 *
 * await runPromise(program.pipe(Effect.provide(Fetcher.Live), Effect.provide(getPlatform())));
 * ```
 */

import { FileSystem, Path } from "@effect/platform";
import { Context, Effect, Layer, Stream } from "effect";

/**
 * Result of one download
 */
export type FetchOutcome =
  | { readonly ok: true; readonly url: string; readonly bytes: number }
  | { readonly ok: false; readonly url: string; readonly reason: string };

export interface FetcherShape {
  /**
   * Retrieve `url` into `destination`, overwriting it
   */
  readonly download: (url: string, destination: string) => Effect.Effect<FetchOutcome>;
}

export class Fetcher extends Context.Tag("refsmith/Fetcher")<Fetcher, FetcherShape>() {
  /**
   * Network and local-file fetcher backed by the platform FileSystem
   */
  static readonly Live: Layer.Layer<Fetcher, never, FileSystem.FileSystem | Path.Path> =
    Layer.effect(
      Fetcher,
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const path = yield* Path.Path;
        return createLiveFetcher(fs, path);
      })
    );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function createLiveFetcher(fs: FileSystem.FileSystem, path: Path.Path): FetcherShape {
  const fromFile = (url: URL, destination: string): Effect.Effect<void, string> =>
    Effect.gen(function* () {
      const source = yield* path.fromFileUrl(url);
      yield* fs.copyFile(source, destination);
    }).pipe(Effect.mapError(describe));

  const fromHttp = (url: URL, destination: string): Effect.Effect<void, string> =>
    Effect.gen(function* () {
      const response = yield* Effect.tryPromise({
        try: () => fetch(url),
        catch: describe,
      });
      const body = response.body;
      if (!response.ok) {
        // Release the connection held by the unread body
        if (body !== null) {
          yield* Effect.tryPromise(() => body.cancel()).pipe(Effect.ignore);
        }
        return yield* Effect.fail(`HTTP ${response.status} ${response.statusText}`.trim());
      }

      if (body === null) {
        yield* fs.writeFile(destination, new Uint8Array(0)).pipe(Effect.mapError(describe));
        return;
      }

      yield* Stream.fromReadableStream(() => body, describe).pipe(
        Stream.run(fs.sink(destination)),
        Effect.mapError(describe)
      );
    });

  const transfer = (url: string, destination: string): Effect.Effect<number, string> =>
    Effect.gen(function* () {
      const parsed = yield* Effect.try({
        try: () => new URL(url),
        catch: () => `invalid URL '${url}'`,
      });

      switch (parsed.protocol) {
        case "file:":
          yield* fromFile(parsed, destination);
          break;
        case "http:":
        case "https:":
          yield* fromHttp(parsed, destination);
          break;
        default:
          return yield* Effect.fail(`unsupported protocol '${parsed.protocol}'`);
      }

      const info = yield* fs.stat(destination).pipe(Effect.mapError(describe));
      return Number(info.size);
    });

  // The destination must exist after a failed transfer too
  const ensureExists = (destination: string, reason: string): Effect.Effect<string> =>
    Effect.gen(function* () {
      if (!(yield* fs.exists(destination))) {
        yield* fs.writeFile(destination, new Uint8Array(0));
      }
    }).pipe(
      Effect.match({
        onFailure: (error) => `${reason}; could not create ${destination}: ${error.message}`,
        onSuccess: () => reason,
      })
    );

  return {
    download: (url, destination) =>
      transfer(url, destination).pipe(
        Effect.map((bytes): FetchOutcome => ({ ok: true, url, bytes })),
        Effect.catchAll((reason) =>
          ensureExists(destination, reason).pipe(
            Effect.map((detail): FetchOutcome => ({ ok: false, url, reason: detail }))
          )
        )
      ),
  };
}
