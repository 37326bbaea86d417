/**
 * Configuration loading
 *
 * Reads YAML configuration documents, validates them with arktype and
 * follows `include_references` so that shared reference definitions can
 * live in their own files:
 *
 * ```yaml
 * references_dir: "references_data"
 * include_references:
 *   - "../../include/reference_configs/dmel.yaml"
 * references:
 *   - assembly: dm6
 *     tag: r6-11
 *     type: fasta
 *     url: "https://example.org/dm6.fa.gz"
 *     indexes: [bowtie2, hisat2]
 * ```
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { parse as parseYaml } from "yaml";
import { FileError, ValidationError } from "../errors";
import { getPlatform, runPromise } from "../io/runtime";
import type { ReferenceBlock, ReferencesConfig, ReferencesDocument } from "../types";
import { ReferencesDocumentSchema } from "../types";

/**
 * Validate an already-parsed configuration object
 *
 * `include_references` is kept as given but not followed; use loadConfig
 * for documents with includes.
 *
 * @throws {ValidationError} When the object does not match the schema
 */
export function parseConfig(raw: unknown, source = "configuration"): ReferencesConfig {
  const document = validateDocument(raw, source);
  return {
    ...document,
    references: document.references ?? [],
  };
}

export interface LoadConfigOptions {
  /**
   * Directory include paths are resolved against (default: the current
   * working directory, where the workflow runs)
   */
  readonly baseDir?: string;
}

/**
 * Load a YAML configuration file and every file it includes
 *
 * Included paths are relative to `baseDir`, not to the including file, so
 * `workflows/rnaseq/config/config.yaml` run from `workflows/rnaseq` reaches
 * the shared `../../include/reference_configs/` directory. References are
 * appended in order: the file's own list first, then each include in turn.
 * Only the top-level file's `references_dir` is used. A file reached a
 * second time is skipped.
 *
 * @throws {FileError} When a file cannot be read
 * @throws {ValidationError} When a file is not valid YAML or fails validation
 *
 * @example
 * ```typescript
 * const config = await loadConfig("config/config.yaml");
 * const paths = resolvePaths(config);
 * ```
 */
export async function loadConfig(
  filePath: string,
  options: LoadConfigOptions = {}
): Promise<ReferencesConfig> {
  const program = Effect.gen(function* () {
    const pathService = yield* Path.Path;
    const root = pathService.resolve(filePath);
    const baseDir = pathService.resolve(options.baseDir ?? process.cwd());
    const visited = new Set<string>();

    const document = yield* readDocument(root);
    visited.add(root);
    const references = [
      ...(document.references ?? []),
      ...(yield* collectIncludes(baseDir, document, visited)),
    ];

    const config: ReferencesConfig = { ...document, references };
    return config;
  });

  return runPromise(program.pipe(Effect.provide(getPlatform())));
}

function collectIncludes(
  baseDir: string,
  document: ReferencesDocument,
  visited: Set<string>
): Effect.Effect<ReferenceBlock[], FileError | ValidationError, FileSystem.FileSystem | Path.Path> {
  return Effect.gen(function* () {
    const pathService = yield* Path.Path;
    const collected: ReferenceBlock[] = [];

    for (const include of document.include_references ?? []) {
      const target = pathService.resolve(baseDir, include);
      if (visited.has(target)) continue;
      visited.add(target);

      const included = yield* readDocument(target);
      collected.push(...(included.references ?? []));
      collected.push(...(yield* collectIncludes(baseDir, included, visited)));
    }

    return collected;
  });
}

function readDocument(
  filePath: string
): Effect.Effect<ReferencesDocument, FileError | ValidationError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* fs
      .readFileString(filePath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", filePath, error)));

    const raw = yield* Effect.try({
      try: (): unknown => parseYaml(text),
      catch: (error) =>
        new ValidationError(
          `Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
          filePath
        ),
    });

    return yield* Effect.try({
      try: () => validateDocument(raw, filePath),
      catch: (error) =>
        error instanceof ValidationError ? error : new ValidationError(String(error), filePath),
    });
  });
}

function validateDocument(raw: unknown, source: string): ReferencesDocument {
  const result = ReferencesDocumentSchema(raw);
  if (result instanceof type.errors) {
    throw new ValidationError(
      `Invalid reference configuration in ${source}: ${result.summary}`,
      source
    );
  }
  return result;
}
