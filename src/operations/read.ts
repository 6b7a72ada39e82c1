/**
 * readFasta - the full protein FASTA read pipeline
 *
 * Validates options, parses the file, applies the duplicate-record,
 * duplicate-sequence and invalid-sequence policies in that order, then
 * returns a record list or a header → sequence Map (optionally also
 * writing the result back out).
 *
 * @version v0.1.0
 * @since v0.1.0
 */

import { RecordMappingCollector } from "../formats/fasta/collection";
import { DEFAULT_PROGRESS_HANDLER, FASTA_DEFAULTS } from "../formats/fasta/constants";
import { FastaParser } from "../formats/fasta/parser";
import type { ReadFastaOptions } from "../formats/fasta/types";
import { validateReadOptionTypes } from "../formats/fasta/validation";
import type { FastaMapping, FastaRecord } from "../types";
import { deduplicateRecords, deduplicateSequences } from "./core/record-deduplicator";
import { ProteinValidator } from "./core/sequence-validation";
import { applyInvalidSequenceAction } from "./validate";
import { writeFasta } from "./write";

/**
 * Read a protein FASTA file
 *
 * @param filePath - FASTA file to read
 * @param options - Header handling, record policies and output shape
 * @returns Records as a list when `returnList` is true, otherwise a Map
 * @throws {ValidationError} When an option is malformed (before the file is opened)
 * @throws {FileNotFoundError} When the file does not exist
 * @throws {DuplicateHeaderError} When headers repeat where they must not
 * @throws {DuplicateRecordError} When records repeat under 'fail'
 * @throws {DuplicateSequenceError} When sequences repeat under 'fail'
 * @throws {SequenceError} When residues are invalid under 'fail' or after 'convert'
 *
 * @example
 * ```typescript
 * const proteins = await readFasta("human.fasta", {
 *   headerTransform: (header) => header.split("|")[1] ?? header,
 *   duplicateSequenceAction: "remove",
 *   invalidSequenceAction: "convert",
 * });
 * for (const [accession, sequence] of proteins) {
 *   console.log(accession, sequence.length);
 * }
 * ```
 */
export function readFasta(
  filePath: string,
  options: ReadFastaOptions & { returnList: true }
): Promise<FastaRecord[]>;
export function readFasta(
  filePath: string,
  options?: ReadFastaOptions & { returnList?: false }
): Promise<FastaMapping>;
export function readFasta(
  filePath: string,
  options?: ReadFastaOptions
): Promise<FastaRecord[] | FastaMapping>;
export async function readFasta(
  filePath: string,
  options: ReadFastaOptions = {}
): Promise<FastaRecord[] | FastaMapping> {
  const resolved = {
    ...options,
    uniqueHeaders: options.uniqueHeaders ?? FASTA_DEFAULTS.UNIQUE_HEADERS,
    duplicateRecordAction: options.duplicateRecordAction ?? FASTA_DEFAULTS.DUPLICATE_RECORD_ACTION,
    duplicateSequenceAction:
      options.duplicateSequenceAction ?? FASTA_DEFAULTS.DUPLICATE_SEQUENCE_ACTION,
    invalidSequenceAction: options.invalidSequenceAction ?? FASTA_DEFAULTS.INVALID_SEQUENCE_ACTION,
    alignment: options.alignment ?? FASTA_DEFAULTS.ALIGNMENT,
    returnList: options.returnList ?? FASTA_DEFAULTS.RETURN_LIST,
    verbose: options.verbose ?? FASTA_DEFAULTS.VERBOSE,
  };
  validateReadOptionTypes(resolved);

  // The parser constructor runs the header transform check
  const parser = new FastaParser({
    uniqueHeaders: resolved.uniqueHeaders,
    headerTransform: resolved.headerTransform,
    verbose: resolved.verbose,
    onProgress: resolved.onProgress,
    onWarning: resolved.onWarning,
  });

  const onProgress = resolved.onProgress ?? DEFAULT_PROGRESS_HANDLER;
  const progress = (message: string): void => {
    if (resolved.verbose) onProgress(message);
  };

  const validator = new ProteinValidator({
    alignment: resolved.alignment,
    correctionTable: resolved.correctionTable,
  });

  const parsed = await parser.parseFile(filePath);

  const uniqueRecords = deduplicateRecords(parsed, resolved.duplicateRecordAction);
  if (uniqueRecords.removed > 0) {
    progress(`Removed ${uniqueRecords.removed} duplicate records`);
  }

  const uniqueSequences = deduplicateSequences(
    uniqueRecords.records,
    resolved.duplicateSequenceAction
  );
  if (uniqueSequences.removed > 0) {
    progress(`Removed ${uniqueSequences.removed} duplicate sequences`);
  }

  const screened = applyInvalidSequenceAction(
    uniqueSequences.records,
    resolved.invalidSequenceAction,
    validator
  );
  if (screened.removed > 0) {
    progress(`Removed ${screened.removed} invalid sequences`);
  }
  if (screened.converted > 0) {
    progress(`Converted ${screened.converted} sequences`);
  }

  const result = resolved.returnList ? screened.records : toMapping(screened.records);

  if (resolved.outputPath !== undefined) {
    await writeFasta(result, resolved.outputPath, {
      verbose: resolved.verbose,
      onProgress,
    });
  }

  return result;
}

/**
 * Build a header → sequence Map, refusing repeated headers
 *
 * @throws {DuplicateHeaderError} When a header occurs twice
 */
function toMapping(records: readonly FastaRecord[]): FastaMapping {
  const collector = new RecordMappingCollector();
  for (const record of records) {
    collector.checkDuplicate(record.header);
    collector.commit(record.header, record.sequence);
  }
  return collector.result();
}
