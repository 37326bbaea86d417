/**
 * Sequence-level transformations applied while post-processing references
 */

/**
 * Convert an RNA sequence to DNA by replacing U with T
 *
 * Case is preserved and every other character passes through unchanged.
 * This is not a reverse complement.
 *
 * @example
 * ```typescript
 * backTranscribe("AUGgcu"); // "ATGgct"
 * ```
 */
export function backTranscribe(sequence: string): string {
  return sequence.replace(/[Uu]/g, (match) => (match === "U" ? "T" : "t"));
}
