/**
 * FASTA format writer
 *
 * Symmetric to FastaParser: whatever the writer produces parses back to the
 * same headers and sequences.
 */

import { openForWriting } from "../../io/file-writer";
import type { FastaEntries, FastaRecord, ProgressHandler, WriterOptions } from "../../types";
import { DEFAULT_PROGRESS_HANDLER, FASTA_DEFAULTS } from "./constants";
import { chunkSequence, resolveLineLength } from "./primitives";
import { validateWriterOptions } from "./validation";

const LINE_ENDING = "\n";

/**
 * FASTA writer with configurable line wrapping
 *
 * Each record is written as a header line, the sequence wrapped at
 * `lineLength` residues, then one blank separator line.
 *
 * @example
 * ```typescript
 * const writer = new FastaWriter({ lineLength: 2 });
 * writer.formatRecord("P1", "ABCDE"); // ">P1\nAB\nCD\nE\n\n"
 * ```
 */
export class FastaWriter {
  private readonly lineLength: number;
  private readonly verbose: boolean;
  private readonly onProgress: ProgressHandler;

  /**
   * @param options Writer configuration; lineLength defaults to 60
   * @throws {ValidationError} When an option is malformed
   */
  constructor(options: WriterOptions = {}) {
    validateWriterOptions(options);

    this.lineLength = resolveLineLength(
      options.lineLength === undefined ? FASTA_DEFAULTS.LINE_LENGTH : options.lineLength
    );
    this.verbose = options.verbose ?? FASTA_DEFAULTS.VERBOSE;
    this.onProgress = options.onProgress ?? DEFAULT_PROGRESS_HANDLER;
  }

  /**
   * Format a single record
   */
  formatRecord(header: string, sequence: string): string {
    const lines = chunkSequence(sequence, this.lineLength);

    // Exactly one blank line follows every record, whether or not the last
    // sequence line was full.
    return `>${header}${LINE_ENDING}${lines.join(LINE_ENDING)}${LINE_ENDING}${LINE_ENDING}`;
  }

  /**
   * Format every entry in iteration order
   */
  formatRecords(entries: FastaEntries): string {
    let output = "";
    for (const [header, sequence] of entryPairs(entries)) {
      output += this.formatRecord(header, sequence);
    }
    return output;
  }

  /**
   * Write every entry to a file, replacing its contents
   *
   * The file handle is opened right before the first record is written and
   * closed on every exit path.
   *
   * @throws {FileError} When the file cannot be opened or written
   */
  async writeFile(entries: FastaEntries, filePath: string): Promise<void> {
    const written = await openForWriting(filePath, async (handle) => {
      let count = 0;
      for (const [header, sequence] of entryPairs(entries)) {
        await handle.writeString(this.formatRecord(header, sequence));
        count++;
      }
      return count;
    });

    if (this.verbose) {
      this.onProgress(`Wrote ${written} records to ${filePath}`);
    }
  }
}

/**
 * Iterate header/sequence pairs of a Map or record list
 */
function* entryPairs(entries: FastaEntries): Iterable<readonly [string, string]> {
  if (isRecordList(entries)) {
    for (const record of entries) {
      yield [record.header, record.sequence];
    }
    return;
  }
  yield* entries.entries();
}

function isRecordList(entries: FastaEntries): entries is readonly FastaRecord[] {
  return Array.isArray(entries);
}
