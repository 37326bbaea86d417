/**
 * File suffixes of derived reference artifacts
 *
 * Index suffixes name the first file an aligner writes for a prefix, so
 * the path doubles as a marker that the whole index exists.
 */

export const INDEX_EXTENSIONS: Readonly<Record<string, string>> = Object.freeze({
  bowtie2: ".1.bt2",
  hisat2: ".1.ht2",
  kallisto: ".idx",
});

export const CONVERSION_EXTENSIONS: Readonly<Record<string, string>> = Object.freeze({
  intergenic: ".intergenic.gtf",
  refflat: ".refflat",
});

/**
 * Look up a known suffix without falling through to Object.prototype
 */
export function lookupExtension(
  table: Readonly<Record<string, string>>,
  kind: string
): string | undefined {
  return Object.hasOwn(table, kind) ? table[kind] : undefined;
}
