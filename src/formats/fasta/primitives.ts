/**
 * FASTA Parsing Primitives - Minimal, composable operations
 *
 * Pure functions shared by the record assembler and the writer.
 */

import type { ClassifiedLine } from "./types";

// ============================================================================
// LINE CLASSIFICATION
// ============================================================================

/**
 * Classify one raw line as blank, header or sequence fragment
 *
 * Surrounding whitespace (including the line terminator) is trimmed first.
 * Header text keeps everything after the '>' marker; fragments keep their
 * case, which is normalized when the record is finished.
 *
 * @example
 * ```typescript
 * classifyLine("  >sp|P69905 HBA_HUMAN \n"); // { kind: "header", header: "sp|P69905 HBA_HUMAN" }
 * classifyLine("mvlspad");                 // { kind: "sequence", fragment: "mvlspad" }
 * classifyLine("   ");                     // { kind: "blank" }
 * ```
 */
export function classifyLine(raw: string): ClassifiedLine {
  const trimmed = raw.trim();

  if (trimmed.length === 0) {
    return { kind: "blank" };
  }
  if (isFastaHeader(trimmed)) {
    return { kind: "header", header: trimmed.slice(1) };
  }
  return { kind: "sequence", fragment: trimmed };
}

/**
 * Check if a trimmed line is a FASTA header
 */
export function isFastaHeader(line: string): boolean {
  return line.startsWith(">");
}

// ============================================================================
// SEQUENCE ASSEMBLY
// ============================================================================

/**
 * Join sequence fragments and normalize to upper case
 */
export function finishSequence(fragments: readonly string[]): string {
  return fragments.join("").toUpperCase();
}

// ============================================================================
// WRITING
// ============================================================================

/**
 * Resolve a caller-supplied line length
 *
 * Falsy values and values below 1 disable wrapping (returns 0); anything
 * else is truncated to an integer.
 */
export function resolveLineLength(lineLength: number | false | null | undefined): number {
  if (!lineLength || lineLength < 1) {
    return 0;
  }
  return Math.trunc(lineLength);
}

/**
 * Split a sequence into lines of at most `width` characters
 *
 * @param width Line width; 0 keeps the whole sequence on one line
 */
export function chunkSequence(sequence: string, width: number): string[] {
  if (width <= 0 || sequence.length <= width) {
    return [sequence];
  }

  const lines: string[] = [];
  for (let i = 0; i < sequence.length; i += width) {
    lines.push(sequence.slice(i, i + width));
  }
  return lines;
}
