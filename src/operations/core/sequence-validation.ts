/**
 * Protein sequence validation and residue conversion
 *
 * A sequence is valid when every residue is one of the 20 standard amino
 * acids; in alignment mode the gap character '-' is accepted as well.
 * Conversion rewrites non-standard residues through a correction table
 * (ambiguity codes to a representative residue, stop and gap symbols
 * dropped) so that otherwise usable sequences can be kept.
 *
 * @since v0.1.0
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import {
  GAP_CHARACTER,
  STANDARD_AMINO_ACIDS,
  STANDARD_CONVERSION,
  STANDARD_CONVERSION_WITH_GAP,
} from "../../formats/fasta/constants";

/**
 * Correction table schema: single-character keys, any replacement string
 */
export const CorrectionTableSchema = type("Record<string, string>").narrow(
  (table, ctx) =>
    Object.keys(table).every((key) => key.length === 1) ||
    ctx.mustBe("a table keyed by single characters")
);

/**
 * Validator for protein sequences
 *
 * @example
 * ```typescript
 * const validator = new ProteinValidator();
 * validator.validate("MKVLA");          // true
 * validator.invalidResidues("MKXB*");   // ["X", "B", "*"]
 * validator.convert("MKXB*");           // "MKGN"
 *
 * const aligned = new ProteinValidator({ alignment: true });
 * aligned.validate("MK--VL");           // true
 * ```
 */
export class ProteinValidator {
  public readonly alignment: boolean;
  private readonly validResidues: ReadonlySet<string>;
  private readonly correctionTable: Readonly<Record<string, string>>;

  constructor(
    options: { alignment?: boolean; correctionTable?: Readonly<Record<string, string>> } = {}
  ) {
    if (options.correctionTable !== undefined) {
      const validationResult = CorrectionTableSchema(options.correctionTable);
      if (validationResult instanceof type.errors) {
        throw new ValidationError(`Invalid correction table: ${validationResult.summary}`);
      }
    }

    this.alignment = options.alignment ?? false;

    const residues = this.alignment ? STANDARD_AMINO_ACIDS + GAP_CHARACTER : STANDARD_AMINO_ACIDS;
    this.validResidues = new Set(residues);

    this.correctionTable =
      options.correctionTable ??
      (this.alignment ? STANDARD_CONVERSION_WITH_GAP : STANDARD_CONVERSION);
  }

  /**
   * Check that every residue is allowed
   */
  validate(sequence: string): boolean {
    for (const residue of sequence) {
      if (!this.validResidues.has(residue)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Distinct disallowed residues in order of first appearance
   */
  invalidResidues(sequence: string): string[] {
    const found: string[] = [];
    for (const residue of sequence) {
      if (!this.validResidues.has(residue) && !found.includes(residue)) {
        found.push(residue);
      }
    }
    return found;
  }

  /**
   * Rewrite residues listed in the correction table; others are kept as-is
   */
  convert(sequence: string): string {
    let converted = "";
    for (const residue of sequence) {
      const replacement = this.correctionTable[residue];
      converted += replacement === undefined ? residue : replacement;
    }
    return converted;
  }
}
