/**
 * Constants for protein FASTA parsing, writing and sequence policies
 *
 * Central location for defaults and residue tables shared by the parser,
 * the writer and the read pipeline.
 */

import type { ProgressHandler, WarningHandler } from "../../types";

// ============================================================================
// DEFAULTS
// ============================================================================

/**
 * Default option values
 */
export const FASTA_DEFAULTS = {
  /** Headers must be unique unless the caller opts out */
  UNIQUE_HEADERS: true,
  /** Residues per output line (UniProt convention) */
  LINE_LENGTH: 60,
  DUPLICATE_RECORD_ACTION: "fail" as const,
  DUPLICATE_SEQUENCE_ACTION: "ignore" as const,
  INVALID_SEQUENCE_ACTION: "fail" as const,
  RETURN_LIST: false,
  ALIGNMENT: false,
  VERBOSE: false,
} as const;

// ============================================================================
// DEFAULT HOOKS
// ============================================================================

/** Progress notices go to stderr unless the caller supplies onProgress */
export const DEFAULT_PROGRESS_HANDLER: ProgressHandler = (message) => {
  console.error(message);
};

/** Input warnings go to console.warn unless the caller supplies onWarning */
export const DEFAULT_WARNING_HANDLER: WarningHandler = (warning, lineNumber) => {
  console.warn(`FASTA Warning (line ${lineNumber}): ${warning}`);
};

/** Header passed to a header transform before parsing starts */
export const HEADER_TRANSFORM_TEST_HEADER = "this test string should work";

// ============================================================================
// RESIDUES
// ============================================================================

/** The 20 standard amino acids */
export const STANDARD_AMINO_ACIDS = "ACDEFGHIKLMNPQRSTVWY";

/** Alignment gap character */
export const GAP_CHARACTER = "-";

/**
 * Default replacements applied under the 'convert' policy
 *
 * Ambiguity codes map to a representative residue, selenocysteine to
 * cysteine; stop and gap symbols are dropped.
 */
export const STANDARD_CONVERSION: Readonly<Record<string, string>> = {
  B: "N",
  U: "C",
  X: "G",
  Z: "Q",
  "*": "",
  "-": "",
};

/**
 * Conversion used when parsing alignments: gaps are kept
 */
export const STANDARD_CONVERSION_WITH_GAP: Readonly<Record<string, string>> = {
  B: "N",
  U: "C",
  X: "G",
  Z: "Q",
  "*": "",
};
