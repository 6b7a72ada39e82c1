/**
 * Exact duplicate detection for parsed FASTA records
 *
 * Two flavours of duplicate are recognised:
 * - duplicate record: same header and same sequence
 * - duplicate sequence: same sequence, whatever the header
 *
 * Each is handled by a DuplicateAction: 'ignore' keeps everything, 'fail'
 * throws on the first repeat, 'remove' keeps the first occurrence.
 */

import { DuplicateRecordError, DuplicateSequenceError } from "../../errors";
import type { DuplicateAction, FastaRecord } from "../../types";

/**
 * Outcome of a deduplication pass
 */
export interface DeduplicationResult {
  readonly records: FastaRecord[];
  readonly removed: number;
}

/**
 * Apply a duplicate-record policy
 *
 * @throws {DuplicateRecordError} Under 'fail' when a header+sequence pair repeats
 *
 * @example
 * ```typescript
 * const { records, removed } = deduplicateRecords(
 *   [{ header: "A", sequence: "MKV" }, { header: "A", sequence: "MKV" }],
 *   "remove"
 * );
 * // records: [{ header: "A", sequence: "MKV" }], removed: 1
 * ```
 */
export function deduplicateRecords(
  records: readonly FastaRecord[],
  action: DuplicateAction
): DeduplicationResult {
  if (action === "ignore") {
    return { records: [...records], removed: 0 };
  }

  // Keyed by header, then the sequences already seen under that header
  const seen = new Map<string, Set<string>>();
  const kept: FastaRecord[] = [];

  for (const record of records) {
    const sequences = seen.get(record.header) ?? new Set<string>();
    if (sequences.has(record.sequence)) {
      if (action === "fail") {
        throw new DuplicateRecordError(record.header);
      }
      continue;
    }
    sequences.add(record.sequence);
    seen.set(record.header, sequences);
    kept.push(record);
  }

  return { records: kept, removed: records.length - kept.length };
}

/**
 * Apply a duplicate-sequence policy
 *
 * @throws {DuplicateSequenceError} Under 'fail' when a sequence repeats
 */
export function deduplicateSequences(
  records: readonly FastaRecord[],
  action: DuplicateAction
): DeduplicationResult {
  if (action === "ignore") {
    return { records: [...records], removed: 0 };
  }

  // sequence → header of its first occurrence
  const firstHeaders = new Map<string, string>();
  const kept: FastaRecord[] = [];

  for (const record of records) {
    const firstHeader = firstHeaders.get(record.sequence);
    if (firstHeader !== undefined) {
      if (action === "fail") {
        throw new DuplicateSequenceError(record.header, firstHeader);
      }
      continue;
    }
    firstHeaders.set(record.sequence, record.header);
    kept.push(record);
  }

  return { records: kept, removed: records.length - kept.length };
}
