/**
 * Compile a reference configuration into a lookup table of artifact paths
 *
 * Every reference block contributes its own file plus any derived artifacts:
 *
 * ```
 * {dir}/{assembly}/{type}/{assembly}_{tag}.{type}          the block itself
 * {dir}/{assembly}/gtf/{assembly}_{tag}{suffix}            gtf conversions
 * {dir}/{assembly}/{index}/{assembly}_{tag}{suffix}        fasta indexes
 * {dir}/{assembly}/fasta/{assembly}_{tag}.chromsizes       every fasta block
 * ```
 *
 * Rules that produce these files elsewhere must build the same strings.
 */

import { Config, ConfigProvider, Effect, Option } from "effect";
import { tagOf } from "../config/blocks";
import { CONVERSION_EXTENSIONS, INDEX_EXTENSIONS, lookupExtension } from "../config/extensions";
import { ConfigurationError } from "../errors";
import { runSync } from "../io/runtime";
import type { PathTable, ReferenceBlock, ReferencesConfig } from "../types";

export interface ResolveOptions {
  /** Environment to read REFERENCES_DIR from (default: process.env) */
  readonly env?: Readonly<Record<string, string | undefined>>;
}

const ReferencesDirOverride = Config.option(Config.string("REFERENCES_DIR"));

type MutableTable = Map<string, Map<string, Map<string, string>>>;

/**
 * Determine the references directory
 *
 * REFERENCES_DIR wins over the configuration's `references_dir`.
 *
 * @throws {ConfigurationError} When neither is set
 */
export function resolveReferencesDir(config: ReferencesConfig, options: ResolveOptions = {}): string {
  const provider =
    options.env === undefined
      ? ConfigProvider.fromEnv()
      : ConfigProvider.fromMap(
          new Map(
            Object.entries(options.env).filter(
              (entry): entry is [string, string] => entry[1] !== undefined
            )
          )
        );

  const override = runSync(
    Effect.gen(function* () {
      return yield* ReferencesDirOverride;
    }).pipe(Effect.withConfigProvider(provider))
  );

  const referencesDir = Option.getOrUndefined(override) ?? config.references_dir;
  if (referencesDir === undefined) {
    throw new ConfigurationError(
      "references directory not set",
      "MISSING_REFERENCES_DIR",
      "references_dir",
      "Set references_dir in the configuration or the REFERENCES_DIR environment variable"
    );
  }
  return referencesDir;
}

/**
 * Build the path table for every reference block
 *
 * Pure and deterministic: the same configuration and environment always
 * yield an equal table. The returned table is deeply frozen.
 *
 * @throws {ConfigurationError} On a duplicate (assembly, tag, type), an
 * unknown index or conversion kind, or a missing references directory
 *
 * @example
 * ```typescript
 * const paths = resolvePaths({
 *   references_dir: "/data",
 *   references: [{ assembly: "dm6", tag: "r6-11", type: "fasta", indexes: ["bowtie2"] }],
 * });
 * paths.dm6["r6-11"].bowtie2; // "/data/dm6/bowtie2/dm6_r6-11.1.bt2"
 * ```
 */
export function resolvePaths(config: ReferencesConfig, options: ResolveOptions = {}): PathTable {
  const referencesDir = resolveReferencesDir(config, options);
  const table: MutableTable = new Map();

  for (const block of config.references) {
    addBlock(table, referencesDir, block);
  }

  return freezeTable(table);
}

/**
 * Fetch a single path from a resolved table
 *
 * @throws {ConfigurationError} When the assembly, tag or kind is absent
 */
export function lookupPath(
  table: PathTable,
  assembly: string,
  tag: string,
  kind: string
): string {
  const tags = Object.hasOwn(table, assembly) ? table[assembly] : undefined;
  const kinds = tags !== undefined && Object.hasOwn(tags, tag) ? tags[tag] : undefined;
  const path = kinds !== undefined && Object.hasOwn(kinds, kind) ? kinds[kind] : undefined;

  if (path === undefined) {
    throw new ConfigurationError(
      `key not found: no '${kind}' for assembly '${assembly}' with tag '${tag}'`,
      "MISSING_REFERENCE",
      `${assembly}/${tag}/${kind}`
    );
  }
  return path;
}

function addBlock(table: MutableTable, referencesDir: string, block: ReferenceBlock): void {
  const { assembly, type: kind } = block;
  const tag = tagOf(block);

  let tags = table.get(assembly);
  if (tags === undefined) {
    tags = new Map();
    table.set(assembly, tags);
  }
  let entry = tags.get(tag);
  if (entry === undefined) {
    entry = new Map();
    tags.set(tag, entry);
  }

  const cell = entry;
  // A kind is set once per cell, by whichever block claims it first
  const claim = (artifact: string, path: string): void => {
    if (cell.has(artifact)) {
      throw new ConfigurationError(
        `tag '${tag}' already exists for type '${artifact}' in assembly '${assembly}'`,
        "DUPLICATE_TYPE",
        `${assembly}/${tag}/${artifact}`
      );
    }
    cell.set(artifact, path);
  };

  const stem = `${referencesDir}/${assembly}`;
  const basename = `${assembly}_${tag}`;
  claim(kind, `${stem}/${kind}/${basename}.${kind}`);

  if (kind === "gtf") {
    for (const conversion of new Set(block.conversions ?? [])) {
      const ext = lookupExtension(CONVERSION_EXTENSIONS, conversion);
      if (ext === undefined) {
        throw new ConfigurationError(
          `unknown conversion '${conversion}' requested for assembly '${assembly}' with tag '${tag}'`,
          "UNKNOWN_CONVERSION",
          conversion,
          `Known conversions: ${Object.keys(CONVERSION_EXTENSIONS).join(", ")}`
        );
      }
      claim(conversion, `${stem}/${kind}/${basename}${ext}`);
    }
  }

  if (kind === "fasta") {
    for (const index of new Set(block.indexes ?? [])) {
      const ext = lookupExtension(INDEX_EXTENSIONS, index);
      if (ext === undefined) {
        throw new ConfigurationError(
          `unknown index '${index}' requested for assembly '${assembly}' with tag '${tag}'`,
          "UNKNOWN_INDEX",
          index,
          `Known indexes: ${Object.keys(INDEX_EXTENSIONS).join(", ")}`
        );
      }
      claim(index, `${stem}/${index}/${basename}${ext}`);
    }

    claim("chromsizes", `${stem}/${kind}/${basename}.chromsizes`);
  }
}

function freezeTable(table: MutableTable): PathTable {
  return Object.freeze(
    Object.fromEntries(
      Array.from(table, ([assembly, tags]) => [
        assembly,
        Object.freeze(
          Object.fromEntries(
            Array.from(tags, ([tag, kinds]) => [tag, Object.freeze(Object.fromEntries(kinds))])
          )
        ),
      ])
    )
  );
}
