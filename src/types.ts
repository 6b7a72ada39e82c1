/**
 * Core type definitions for protein FASTA data
 */

import { type } from "arktype";

/**
 * One parsed FASTA record
 * Format: >header\nSEQUENCE
 */
export interface FastaRecord {
  /** Header text with the leading '>' removed (after any header transform) */
  readonly header: string;
  /** Upper-cased residues */
  readonly sequence: string;
}

/**
 * Header → sequence mapping, iterated in insertion order
 */
export type FastaMapping = Map<string, string>;

/**
 * Anything the writer can serialize
 */
export type FastaEntries = ReadonlyMap<string, string> | readonly FastaRecord[];

/**
 * Single-argument header rewrite applied to every header as it is read
 */
export type HeaderTransform = (header: string) => string;

/**
 * Sink for verbose progress notices
 */
export type ProgressHandler = (message: string) => void;

/**
 * Sink for recoverable oddities in the input
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * What to do when the same record or sequence turns up twice
 */
export type DuplicateAction = "ignore" | "fail" | "remove";

/**
 * What to do with sequences containing non-standard residues
 */
export type InvalidSequenceAction = "ignore" | "fail" | "remove" | "convert";

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Fail when a header is committed twice in list mode (default: true) */
  uniqueHeaders?: boolean;
  /** Rewrite each header before it is stored */
  headerTransform?: HeaderTransform;
  /** Emit line and record counts through onProgress (default: false) */
  verbose?: boolean;
  /** Progress sink (default: console.error) */
  onProgress?: ProgressHandler;
  /** Warning sink (default: console.warn) */
  onWarning?: WarningHandler;
}

/**
 * Writer configuration options
 */
export interface WriterOptions {
  /** Residues per sequence line; 0, false or null disable wrapping (default: 60) */
  lineLength?: number | false | null;
  /** Emit a notice after writing files (default: false) */
  verbose?: boolean;
  /** Progress sink (default: console.error) */
  onProgress?: ProgressHandler;
}

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File paths must be non-empty and free of NUL bytes
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => !path.includes("\0") || ctx.mustBe("a path without NUL bytes"))
  .pipe((path): FilePath => path as FilePath);
