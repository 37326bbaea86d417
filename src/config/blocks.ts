/**
 * Helpers that normalize reference blocks once, at the parsing boundary
 */

import { ConfigurationError } from "../errors";
import type { PostprocessSpec, ReferenceBlock } from "../types";

/** Tag used for blocks that do not declare one */
export const DEFAULT_TAG = "default";

export function tagOf(block: ReferenceBlock): string {
  return block.tag ?? DEFAULT_TAG;
}

/**
 * Lookup key for an (assembly, tag) pair
 *
 * A tab cannot appear in a YAML plain scalar, so it keeps the pair unambiguous.
 */
export function referenceKey(assembly: string, tag: string): string {
  return `${assembly}\t${tag}`;
}

/**
 * Index blocks by (assembly, tag), rejecting pairs that appear twice
 *
 * Stricter than the path table's uniqueness rule: the block type is not
 * part of the key, so a fasta and a gtf block sharing a tag collide here.
 */
export function indexReferences(
  references: readonly ReferenceBlock[]
): ReadonlyMap<string, ReferenceBlock> {
  const index = new Map<string, ReferenceBlock>();

  for (const block of references) {
    const tag = tagOf(block);
    const key = referenceKey(block.assembly, tag);
    if (index.has(key)) {
      throw new ConfigurationError(
        `key (${block.assembly}, ${tag}) already exists`,
        "DUPLICATE_REFERENCE",
        `${block.assembly}/${tag}`,
        "Each assembly/tag pair can be downloaded by only one reference block"
      );
    }
    index.set(key, block);
  }

  return index;
}

/**
 * Collapse the three accepted postprocess spellings into one variant
 *
 * @example
 * ```typescript
 * normalizePostprocess(undefined); // { kind: "none" }
 * normalizePostprocess("mod.fn"); // { kind: "named", name: "mod.fn" }
 * normalizePostprocess({ function: "mod.fn", args: "FOO" });
 * // { kind: "namedWithArgs", name: "mod.fn", args: ["FOO"] }
 * ```
 */
export function normalizePostprocess(declaration: ReferenceBlock["postprocess"]): PostprocessSpec {
  if (declaration === undefined || declaration === null) {
    return { kind: "none" };
  }
  if (typeof declaration === "string") {
    return { kind: "named", name: declaration };
  }
  return {
    kind: "namedWithArgs",
    name: declaration.function,
    args: toList(declaration.args),
  };
}

/**
 * URLs of a block in download order
 */
export function urlsOf(block: ReferenceBlock): readonly string[] {
  const urls = toList(block.url);
  if (urls.length === 0) {
    throw new ConfigurationError(
      `reference (${block.assembly}, ${tagOf(block)}) has no url to download`,
      "MISSING_URL",
      `${block.assembly}/${tagOf(block)}`
    );
  }
  return urls;
}

function toList(value: string | readonly string[] | undefined): readonly string[] {
  if (value === undefined) return [];
  return typeof value === "string" ? [value] : [...value];
}
