/**
 * In-process Fetcher layers for pipeline tests
 *
 * Serve downloads from a map of URL to bytes instead of the network:
 *
 * ```typescript
 * const served = createServedFetcher({ "https://example.org/a.fa": ">a\nACGT\n" });
 * await materialize(outfile, config, "dm6", "r6-11", { fetcher: served.layer });
 * expect(served.requests).toEqual([...]);
 * ```
 */

import { FileSystem } from "@effect/platform";
import { Effect, Layer } from "effect";
import { Fetcher, type FetchOutcome } from "../../src/io/fetcher";

export interface FetchRequest {
  readonly url: string;
  readonly destination: string;
}

export interface ServedFetcher {
  readonly layer: Layer.Layer<Fetcher, never, FileSystem.FileSystem>;
  /** Every download the pipeline asked for, in order */
  readonly requests: FetchRequest[];
}

/**
 * Fetcher that writes the mapped content for known URLs and reports
 * anything else as a 404, leaving an empty destination like the live one
 */
export function createServedFetcher(
  files: Readonly<Record<string, string | Uint8Array>>
): ServedFetcher {
  const requests: FetchRequest[] = [];

  const layer = Layer.effect(
    Fetcher,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return {
        download: (url: string, destination: string): Effect.Effect<FetchOutcome> =>
          Effect.gen(function* () {
            requests.push({ url, destination });
            const content = Object.hasOwn(files, url) ? files[url] : undefined;

            if (content === undefined) {
              yield* fs.writeFile(destination, new Uint8Array(0));
              return { ok: false, url, reason: "HTTP 404 Not Found" } satisfies FetchOutcome;
            }

            const bytes = typeof content === "string" ? new TextEncoder().encode(content) : content;
            yield* fs.writeFile(destination, bytes);
            return { ok: true, url, bytes: bytes.length } satisfies FetchOutcome;
          }).pipe(Effect.orDie),
      };
    })
  );

  return { layer, requests };
}
