/**
 * Type definitions for FASTA parsing and writing
 *
 * Separated from the implementation modules to prevent circular imports.
 */

import type {
  DuplicateAction,
  InvalidSequenceAction,
  ParserOptions,
  ProgressHandler,
  WarningHandler,
} from "../../types";

/**
 * Result of classifying one raw input line
 */
export type ClassifiedLine =
  | { readonly kind: "blank" }
  | { readonly kind: "header"; readonly header: string }
  | { readonly kind: "sequence"; readonly fragment: string };

/**
 * Record assembler state
 *
 * - idle: no header seen yet
 * - building: a header is open and fragments are accumulating
 */
export type AssemblerState =
  | { readonly kind: "idle" }
  | {
      readonly kind: "building";
      readonly header: string;
      readonly headerLine: number;
      readonly fragments: string[];
    };

/**
 * Accumulator the state machine commits finished records into
 *
 * One strategy per output shape; chosen once per parse call.
 */
export interface RecordCollector<TResult> {
  /** Throw if committing this header would violate the collector's policy */
  checkDuplicate(header: string, lineNumber?: number): void;
  /** Store a finished record; the sequence is already upper-cased */
  commit(header: string, sequence: string): void;
  /** Number of records committed so far */
  readonly size: number;
  /** Hand the finished collection to the caller */
  result(): TResult;
}

/**
 * Options consumed by the record assembler
 */
export interface AssemblerOptions {
  headerTransform?: (header: string) => string;
  onWarning?: WarningHandler;
}

/**
 * FASTA parser options with every default resolved
 */
export interface ResolvedParserOptions {
  uniqueHeaders: boolean;
  headerTransform: ((header: string) => string) | undefined;
  verbose: boolean;
  onProgress: ProgressHandler;
  onWarning: WarningHandler;
}

/**
 * Full option set accepted by readFasta
 */
export interface ReadFastaOptions extends ParserOptions {
  /** Policy for identical header+sequence records (default: 'fail') */
  duplicateRecordAction?: DuplicateAction;
  /** Policy for the same sequence under several headers (default: 'ignore') */
  duplicateSequenceAction?: DuplicateAction;
  /** Policy for non-standard residues (default: 'fail') */
  invalidSequenceAction?: InvalidSequenceAction;
  /** Treat '-' as a valid residue (default: false) */
  alignment?: boolean;
  /** Replacement table for the 'convert' policy */
  correctionTable?: Readonly<Record<string, string>>;
  /** Return records as a list instead of a header → sequence Map (default: false) */
  returnList?: boolean;
  /** Also write the final records to this path */
  outputPath?: string;
}
