/**
 * Record-level operations on parsed protein FASTA data
 *
 * readFasta and writeFasta are the file-level entry points; the policy
 * functions underneath are exported for callers that parse on their own.
 *
 * @version v0.1.0
 * @since v0.1.0
 */

export {
  type DeduplicationResult,
  deduplicateRecords,
  deduplicateSequences,
} from "./core/record-deduplicator";
export { CorrectionTableSchema, ProteinValidator } from "./core/sequence-validation";
export { readFasta } from "./read";
export { applyInvalidSequenceAction, type InvalidSequenceResult } from "./validate";
export { writeFasta } from "./write";
