/**
 * writeFasta - write protein records to a FASTA file
 *
 * @since v0.1.0
 */

import { FastaWriter } from "../formats/fasta/writer";
import type { FastaEntries, WriterOptions } from "../types";

/**
 * Write records to a FASTA file, replacing any existing content
 *
 * Entries are written in iteration order: Map insertion order or list order.
 *
 * @param entries - Header → sequence Map or record list
 * @param filePath - Destination file
 * @param options - lineLength (default 60; 0, false or null for one line per sequence)
 * @throws {ValidationError} When an option is malformed
 * @throws {FileError} When the file cannot be written
 *
 * @example
 * ```typescript
 * await writeFasta(new Map([["P1", "MKVLAAGIVG"]]), "out.fasta", { lineLength: 4 });
 * // >P1
 * // MKVL
 * // AAGI
 * // VG
 * //
 * ```
 */
export async function writeFasta(
  entries: FastaEntries,
  filePath: string,
  options: WriterOptions = {}
): Promise<void> {
  await new FastaWriter(options).writeFile(entries, filePath);
}
