/**
 * Invalid-sequence policy for parsed protein records
 *
 * - ignore: keep every record untouched
 * - fail: throw on the first record with a non-standard residue
 * - remove: drop records with non-standard residues
 * - convert: rewrite residues through the correction table, then fail if
 *   anything non-standard is left
 *
 * @since v0.1.0
 */

import { SequenceError } from "../errors";
import type { FastaRecord, InvalidSequenceAction } from "../types";
import { ProteinValidator } from "./core/sequence-validation";

/**
 * Outcome of applying an invalid-sequence policy
 */
export interface InvalidSequenceResult {
  readonly records: FastaRecord[];
  /** Records dropped under 'remove' */
  readonly removed: number;
  /** Records whose sequence changed under 'convert' */
  readonly converted: number;
}

/**
 * Apply an invalid-sequence policy to a list of records
 *
 * @throws {SequenceError} Under 'fail', or under 'convert' when conversion leaves invalid residues
 *
 * @example
 * ```typescript
 * const { records } = applyInvalidSequenceAction(
 *   [{ header: "P1", sequence: "MKXV" }],
 *   "convert",
 *   new ProteinValidator()
 * );
 * // records: [{ header: "P1", sequence: "MKGV" }]
 * ```
 */
export function applyInvalidSequenceAction(
  records: readonly FastaRecord[],
  action: InvalidSequenceAction,
  validator: ProteinValidator
): InvalidSequenceResult {
  switch (action) {
    case "ignore":
      return { records: [...records], removed: 0, converted: 0 };

    case "fail":
      for (const record of records) {
        assertValid(record, validator);
      }
      return { records: [...records], removed: 0, converted: 0 };

    case "remove": {
      const kept = records.filter((record) => validator.validate(record.sequence));
      return { records: kept, removed: records.length - kept.length, converted: 0 };
    }

    case "convert": {
      let converted = 0;
      const rewritten = records.map((record) => {
        const sequence = validator.convert(record.sequence);
        if (sequence !== record.sequence) {
          converted++;
        }
        const result = { header: record.header, sequence };
        assertValid(result, validator);
        return result;
      });
      return { records: rewritten, removed: 0, converted };
    }
  }
}

function assertValid(record: FastaRecord, validator: ProteinValidator): void {
  const invalid = validator.invalidResidues(record.sequence);
  if (invalid.length > 0) {
    throw new SequenceError(
      `Invalid amino acid residue(s) ${invalid.map((residue) => `'${residue}'`).join(", ")}`,
      record.header,
      undefined,
      validator.alignment
        ? "Allowed residues: 20 standard amino acids and '-'"
        : "Allowed residues: 20 standard amino acids"
    );
  }
}
