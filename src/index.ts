/**
 * refsmith - reference genome paths and downloads from one configuration
 *
 * Resolves a declarative list of reference blocks into the file paths every
 * workflow rule agrees on, and materializes those files by downloading their
 * URLs and running a named postprocess function over the result.
 *
 * @example
 * ```typescript
 * import { loadConfig, materialize, resolvePaths } from "refsmith";
 *
 * const config = await loadConfig("config/config.yaml");
 * const paths = resolvePaths(config);
 * await materialize(paths.dm6["r6-11"].fasta, config, "dm6", "r6-11");
 * ```
 */

// Configuration
export { DEFAULT_TAG, normalizePostprocess, tagOf } from './config/blocks';
export { CONVERSION_EXTENSIONS, INDEX_EXTENSIONS } from './config/extensions';
export { loadConfig, parseConfig } from './config/loader';
// Path resolution
export { lookupPath, resolvePaths, resolveReferencesDir } from './paths/resolver';
export type { ResolveOptions } from './paths/resolver';
// Materialization
export { materialize } from './postprocess/pipeline';
export type { MaterializeOptions } from './postprocess/pipeline';
export {
  BUILTIN_MODULE,
  cat,
  defaultPostprocess,
  filterFastas,
} from './postprocess/builtin';
export {
  PostprocessRegistry,
  postprocessRegistry,
  registerPostprocessors,
  resolvePostprocessor,
} from './postprocess/registry';
export { Fetcher } from './io/fetcher';
export { exists } from './io/file-reader';
export type { FetchOutcome, FetcherShape } from './io/fetcher';
// Error types
export {
  CompressionError,
  ConfigurationError,
  FetchError,
  FileError,
  RefsmithError,
  ResolutionError,
  ValidationError,
} from './errors';
export type { ConfigurationErrorCode } from './errors';
// FASTA format
export { FastaParser, FastaWriter } from './formats/fasta';
export type { FastaWriterOptions } from './formats/fasta';
export { backTranscribe } from './operations/sequence';
// Core types
export type {
  CompressionFormat,
  FastaSequence,
  FileReaderOptions,
  PathTable,
  PostprocessDeclaration,
  PostprocessFunction,
  PostprocessSpec,
  ReferenceBlock,
  ReferencesConfig,
  WriteOptions,
} from './types';
