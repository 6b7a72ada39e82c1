/**
 * Option validation for FASTA reading and writing
 *
 * Every public entry point validates its options here before touching any
 * input. Failures raise ValidationError describing one violated constraint.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { HeaderTransform, WriterOptions } from "../../types";
import { HEADER_TRANSFORM_TEST_HEADER } from "./constants";
import type { ReadFastaOptions } from "./types";

// ============================================================================
// ARKTYPE VALIDATION SCHEMAS
// ============================================================================

/**
 * Parser options: flags must be booleans, hooks must be functions
 *
 * Optional keys also take an explicit undefined, which means "not provided".
 */
const ParserOptionsSchema = type({
  "uniqueHeaders?": "boolean | undefined",
  "headerTransform?": "Function | undefined",
  "verbose?": "boolean | undefined",
  "onProgress?": "Function | undefined",
  "onWarning?": "Function | undefined",
});

/**
 * Full read option set, checked after defaults are merged in
 *
 * Ignoring duplicate records contradicts requiring unique headers, so that
 * combination is rejected.
 */
const ReadFastaOptionsSchema = type({
  uniqueHeaders: "boolean",
  "headerTransform?": "Function | undefined",
  duplicateRecordAction: "'ignore' | 'fail' | 'remove'",
  duplicateSequenceAction: "'ignore' | 'fail' | 'remove'",
  invalidSequenceAction: "'ignore' | 'fail' | 'remove' | 'convert'",
  alignment: "boolean",
  "correctionTable?": "Record<string, string> | undefined",
  returnList: "boolean",
  "outputPath?": "string | undefined",
  verbose: "boolean",
  "onProgress?": "Function | undefined",
  "onWarning?": "Function | undefined",
}).narrow((options, ctx) => {
  if (options.duplicateRecordAction === "ignore" && options.uniqueHeaders) {
    return ctx.reject({
      path: ["duplicateRecordAction"],
      expected: "'fail' or 'remove' when uniqueHeaders is true",
      actual: "'ignore'",
    });
  }
  return true;
});

/**
 * Writer options: lineLength may be a number or a disabling false/null
 */
const WriterOptionsSchema = type({
  "lineLength?": "number | false | null | undefined",
  "verbose?": "boolean | undefined",
  "onProgress?": "Function | undefined",
});

// ============================================================================
// VALIDATORS
// ============================================================================

/**
 * Validate parser options
 *
 * @throws {ValidationError} On the first malformed option
 */
export function validateParserOptions(options: object): void {
  const validationResult = ParserOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid FASTA parser options: ${firstLine(validationResult.summary)}`,
      undefined,
      "FASTA parser configuration"
    );
  }
}

/**
 * Validate the full read option set, defaults already applied
 *
 * Runs the header transform once on a test header so a broken transform
 * fails before any file is opened.
 *
 * @throws {ValidationError} On the first violated constraint
 */
export function validateReadOptions(options: ReadFastaOptions): void {
  validateReadOptionTypes(options);

  if (options.headerTransform !== undefined) {
    validateHeaderTransform(options.headerTransform);
  }
}

/**
 * Check types, allowed values and the cross-option constraint of the full
 * read option set without calling the header transform
 *
 * For callers that hand the transform to a FastaParser, whose constructor
 * checks it.
 *
 * @throws {ValidationError} On the first violated constraint
 */
export function validateReadOptionTypes(options: ReadFastaOptions): void {
  const validationResult = ReadFastaOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid FASTA read options: ${firstLine(validationResult.summary)}`,
      undefined,
      "readFasta configuration"
    );
  }
}

/**
 * Validate writer options
 *
 * @throws {ValidationError} On the first malformed option
 */
export function validateWriterOptions(options: WriterOptions): void {
  const validationResult = WriterOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid FASTA writer options: ${firstLine(validationResult.summary)}`,
      undefined,
      "FASTA writer configuration"
    );
  }
}

/**
 * Check that a header transform returns a string for a test header
 *
 * @throws {ValidationError} If the transform throws or returns a non-string
 */
export function validateHeaderTransform(headerTransform: HeaderTransform): void {
  let result: unknown;
  try {
    result = headerTransform(HEADER_TRANSFORM_TEST_HEADER);
  } catch (error) {
    throw new ValidationError(
      `headerTransform threw when tested on '${HEADER_TRANSFORM_TEST_HEADER}': ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      "headerTransform must take one string and return a string"
    );
  }

  if (typeof result !== "string") {
    throw new ValidationError(
      `headerTransform must return a string (returned ${result === null ? "null" : typeof result})`,
      undefined,
      "headerTransform must take one string and return a string"
    );
  }
}

function firstLine(summary: string): string {
  return summary.split("\n")[0] ?? summary;
}
