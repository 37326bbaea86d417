/**
 * Compression detection and gzip codec
 *
 * @example
 * ```typescript
 * import { detectFromExtension, wrapStream } from './compression';
 *
 * if (detectFromExtension('genome.fa.gz') === 'gzip') {
 *   stream = wrapStream(stream);
 * }
 * ```
 */

import type { CompressionFormat } from '../types';

export { compress, createStream, wrapStream } from './gzip';

const GZIP_EXTENSIONS = ['.gz', '.gzip'] as const;

/**
 * Detect compression from a file name
 */
export function detectFromExtension(filePath: string): CompressionFormat {
  const lower = filePath.toLowerCase();
  return GZIP_EXTENSIONS.some((ext) => lower.endsWith(ext)) ? 'gzip' : 'none';
}

