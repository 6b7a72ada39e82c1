/**
 * aminofasta - Protein FASTA parsing and writing for TypeScript
 *
 * Reads messy real-world protein FASTA files into ordered records or a
 * header → sequence Map, applies duplicate and invalid-residue policies,
 * and writes records back out with configurable line wrapping.
 */

// Error types
export {
  AminoFastaError,
  DuplicateHeaderError,
  DuplicateRecordError,
  DuplicateSequenceError,
  FileError,
  FileNotFoundError,
  ParseError,
  SequenceError,
  ValidationError,
} from "./errors";
// FASTA format
export {
  assembleRecords,
  chunkSequence,
  classifyLine,
  FASTA_DEFAULTS,
  FastaParser,
  FastaWriter,
  finishSequence,
  isFastaHeader,
  RecordListCollector,
  RecordMappingCollector,
  resolveLineLength,
  STANDARD_AMINO_ACIDS,
  STANDARD_CONVERSION,
  STANDARD_CONVERSION_WITH_GAP,
  validateHeaderTransform,
} from "./formats/fasta";
export type { ReadFastaOptions, RecordCollector } from "./formats/fasta";
// File I/O
export { exists, FileReader, readLines, readToString, splitLines } from "./io/file-reader";
export { type FileWriteHandle, openForWriting, writeString } from "./io/file-writer";
// Record operations
export {
  applyInvalidSequenceAction,
  deduplicateRecords,
  deduplicateSequences,
  ProteinValidator,
  readFasta,
  writeFasta,
} from "./operations";
export type { DeduplicationResult, InvalidSequenceResult } from "./operations";
// Core types
export type {
  DuplicateAction,
  FastaEntries,
  FastaMapping,
  FastaRecord,
  HeaderTransform,
  InvalidSequenceAction,
  ParserOptions,
  ProgressHandler,
  WarningHandler,
  WriterOptions,
} from "./types";
