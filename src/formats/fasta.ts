/**
 * FASTA format parser and writer
 *
 * Handles the messiness of real-world reference FASTA files:
 * - Wrapped and unwrapped sequences
 * - Text before the first header (skipped)
 * - Blank lines and Windows line endings
 * - Mixed case sequences (preserved)
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { FileWriteHandle } from "../io/file-writer";
import { readLinesFromFile } from "../io/file-reader";
import type { FastaSequence, FileReaderOptions } from "../types";

/**
 * Options for formatting FASTA output
 */
interface FastaWriterOptions {
  /** Residues per sequence line; 0 disables wrapping (default: 60) */
  lineWidth?: number;
  /** Append the description to the identifier in headers (default: true) */
  includeDescription?: boolean;
  /** Formatted text accumulated before each write (default: 64KB) */
  batchSize?: number;
}

const FastaWriterOptionsSchema = type({
  "lineWidth?": "number>=0",
  "includeDescription?": "boolean",
  "batchSize?": "number>0",
});

/**
 * Split a `>` header line into identifier, description and title
 */
function parseFastaHeader(headerLine: string): Pick<FastaSequence, "id" | "description" | "title"> {
  const title = headerLine.slice(1).trimEnd();
  const firstSpace = title.search(/\s/);
  if (firstSpace === -1) {
    return { id: title, title };
  }

  const description = title.slice(firstSpace + 1).trim();
  return description.length > 0
    ? { id: title.slice(0, firstSpace), description, title }
    : { id: title.slice(0, firstSpace), title };
}

/**
 * Streaming FASTA parser
 *
 * Processes records one at a time without loading whole files into memory.
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const sequence of parser.parseFile("genome.fa.gz")) {
 *   console.log(`${sequence.id}: ${sequence.length} bp`);
 * }
 * ```
 */
class FastaParser {
  /**
   * Parse FASTA sequences from a string
   */
  async *parseString(data: string): AsyncIterable<FastaSequence> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse FASTA sequences from a file, decompressing gzip input
   *
   * @throws {FileError} When the file cannot be read
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<FastaSequence> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    yield* this.parseLines(readLinesFromFile(filePath, options));
  }

  /**
   * Parse FASTA sequences from lines
   *
   * Whitespace inside sequence lines is dropped; case is preserved.
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<FastaSequence> {
    let header: Pick<FastaSequence, "id" | "description" | "title"> | null = null;
    let headerLine = 0;
    let sequenceBuffer: string[] = [];
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;

      if (line.startsWith(">")) {
        if (header !== null) {
          yield buildFastaRecord(header, sequenceBuffer, headerLine);
        }
        header = parseFastaHeader(line);
        headerLine = lineNumber;
        sequenceBuffer = [];
        continue;
      }

      // Anything before the first header is not part of a record
      if (header === null) continue;

      const residues = line.replace(/\s/g, "");
      if (residues.length > 0) {
        sequenceBuffer.push(residues);
      }
    }

    if (header !== null) {
      yield buildFastaRecord(header, sequenceBuffer, headerLine);
    }
  }
}

function buildFastaRecord(
  header: Pick<FastaSequence, "id" | "description" | "title">,
  sequenceBuffer: readonly string[],
  lineNumber: number
): FastaSequence {
  const sequence = sequenceBuffer.join("");
  return {
    format: "fasta",
    ...header,
    sequence,
    length: sequence.length,
    lineNumber,
  };
}

/**
 * FASTA writer for outputting sequences
 */
class FastaWriter {
  private readonly lineWidth: number;
  private readonly includeDescription: boolean;
  private readonly batchSize: number;

  constructor(options: FastaWriterOptions = {}) {
    const validation = FastaWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA writer options: ${validation.summary}`);
    }

    this.lineWidth = options.lineWidth ?? 60;
    this.includeDescription = options.includeDescription ?? true;
    this.batchSize = options.batchSize ?? 65536;
  }

  /**
   * Format a single FASTA sequence, newline-terminated
   *
   * @example
   * ```typescript
   * new FastaWriter({ lineWidth: 4 }).formatSequence(record);
   * // ">chr2L\nACGT\nAC\n"
   * ```
   */
  formatSequence(sequence: Pick<FastaSequence, "id" | "description" | "sequence">): string {
    let header = `>${sequence.id}`;
    if (this.includeDescription && sequence.description !== undefined && sequence.description !== "") {
      header += ` ${sequence.description}`;
    }

    return `${header}\n${this.wrapText(sequence.sequence)}`;
  }

  /**
   * Write sequences through a file handle in batches
   *
   * @returns Number of sequences written
   */
  async writeToHandle(
    sequences: AsyncIterable<Pick<FastaSequence, "id" | "description" | "sequence">>,
    handle: FileWriteHandle
  ): Promise<number> {
    let pending = "";
    let count = 0;

    for await (const sequence of sequences) {
      pending += this.formatSequence(sequence);
      count++;
      if (pending.length >= this.batchSize) {
        await handle.writeString(pending);
        pending = "";
      }
    }

    if (pending.length > 0) {
      await handle.writeString(pending);
    }
    return count;
  }

  private wrapText(text: string): string {
    if (text.length === 0) return "";
    if (this.lineWidth <= 0) return `${text}\n`;

    let wrapped = "";
    for (let i = 0; i < text.length; i += this.lineWidth) {
      wrapped += `${text.slice(i, i + this.lineWidth)}\n`;
    }
    return wrapped;
  }
}

// Exports - grouped at end per project style guide
export { FastaParser, FastaWriter, parseFastaHeader, buildFastaRecord };
export type { FastaWriterOptions };
