/**
 * Core type definitions for reference configuration and materialization
 *
 * Interfaces describe the shapes the library works with; the arktype
 * schemas below them validate untrusted documents at the parsing boundary.
 */

import { type } from "arktype";

// =============================================================================
// REFERENCE CONFIGURATION
// =============================================================================

/**
 * Postprocess declaration as written in a configuration document
 *
 * Either the dotted name of a registered function, or a mapping naming the
 * function and the extra positional arguments it receives.
 */
export type PostprocessDeclaration =
  | string
  | {
      readonly function: string;
      readonly args?: string | readonly string[];
    };

/**
 * One entry of the configuration's `references` list
 */
export interface ReferenceBlock {
  /** Reference genome build, e.g. "dm6" */
  readonly assembly: string;
  /** Release or variant label (default: "default") */
  readonly tag?: string;
  /** Artifact kind of the block itself, e.g. "fasta" or "gtf" */
  readonly type: string;
  /** One URL, or several whose downloads are handed to the postprocess function together */
  readonly url?: string | readonly string[];
  /** Aligner indexes to derive from a fasta block */
  readonly indexes?: readonly string[];
  /** Alternate formats to derive from a gtf block */
  readonly conversions?: readonly string[];
  readonly postprocess?: PostprocessDeclaration | null;
}

/**
 * Reference configuration after loading and include resolution
 */
export interface ReferencesConfig {
  /** Root of all reference artifacts; REFERENCES_DIR takes precedence */
  readonly references_dir?: string;
  readonly references: readonly ReferenceBlock[];
  /** Further configuration files whose references are appended */
  readonly include_references?: readonly string[];
}

/**
 * Normalized postprocess choice, decided once at the parsing boundary
 */
export type PostprocessSpec =
  | { readonly kind: "none" }
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "namedWithArgs"; readonly name: string; readonly args: readonly string[] };

/**
 * Resolved artifact paths: assembly -> tag -> artifact kind -> path
 */
export type PathTable = Readonly<Record<string, Readonly<Record<string, Readonly<Record<string, string>>>>>>;

/**
 * Contract every postprocess function satisfies
 *
 * Receives the downloaded temporary files in URL order, the destination path
 * and the extra arguments from the configuration. It must create `outfile`.
 */
export type PostprocessFunction = (
  inputs: readonly string[],
  outfile: string,
  ...args: string[]
) => Promise<void>;

// =============================================================================
// SEQUENCES
// =============================================================================

/**
 * FASTA record as produced by the streaming parser
 */
export interface FastaSequence {
  readonly format: "fasta";
  /** First whitespace-delimited word of the header */
  readonly id: string;
  /** Header text after the identifier, when present */
  readonly description?: string;
  /** Full header line without the leading ">" */
  readonly title: string;
  readonly sequence: string;
  readonly length: number;
  /** Line number of the header */
  readonly lineNumber?: number;
}

// =============================================================================
// FILE I/O
// =============================================================================

export type CompressionFormat = "gzip" | "none";

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Whether to decompress gzip input (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression detection (default: auto-detect from extension) */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * File writing options
 *
 * Mirrors FileReaderOptions for symmetric read/write API design.
 */
export interface WriteOptions {
  /** Automatically compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression format detection (default: auto-detect from extension) */
  readonly compressionFormat?: CompressionFormat;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Dotted `<module-path>.<identifier>` name of a registered function
 */
export const FunctionNameSchema = type(/^[A-Za-z_][\w-]*(\.[A-Za-z_][\w-]*)+$/);

export const IdentifierSchema = type(/^[A-Za-z_][\w-]*$/);

/**
 * Module path under which postprocess functions are registered
 */
export const ModulePathSchema = type(/^[A-Za-z_][\w-]*(\.[A-Za-z_][\w-]*)*$/);

export const PostprocessDeclarationSchema = type("string>0 | null").or({
  function: "string>0",
  "args?": "string | string[]",
});

export const ReferenceBlockSchema = type({
  assembly: "string>0",
  "tag?": "string>0",
  type: "string>0",
  "url?": "string | string[]",
  "indexes?": "string[]",
  "conversions?": "string[]",
  "postprocess?": PostprocessDeclarationSchema,
});

/**
 * Schema for one configuration document, before includes are resolved
 *
 * Keys other than the ones below belong to the surrounding workflow and
 * are ignored.
 */
export const ReferencesDocumentSchema = type({
  "references_dir?": "string>0",
  "references?": ReferenceBlockSchema.array(),
  "include_references?": "string[]",
});

export type ReferencesDocument = typeof ReferencesDocumentSchema.infer;
