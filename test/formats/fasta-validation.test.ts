/**
 * Tests for FASTA option validation
 */

import { describe, expect, test } from "vitest";
import {
  validateHeaderTransform,
  validateParserOptions,
  validateReadOptions,
  validateReadOptionTypes,
  validateWriterOptions,
} from "../../src/formats/fasta/validation";
import { ValidationError } from "../../src";
import type { ReadFastaOptions } from "../../src";

const defaults = {
  uniqueHeaders: true,
  duplicateRecordAction: "fail",
  duplicateSequenceAction: "ignore",
  invalidSequenceAction: "fail",
  alignment: false,
  returnList: false,
  verbose: false,
} satisfies ReadFastaOptions;

function withDefaults(overrides: string): ReadFastaOptions {
  return { ...defaults, ...JSON.parse(overrides) };
}

describe("validateReadOptions", () => {
  test("accepts the default option set", () => {
    expect(() => validateReadOptions(defaults)).not.toThrow();
  });

  test("accepts every valid policy combination with unique headers off", () => {
    for (const duplicateRecordAction of ["ignore", "fail", "remove"] as const) {
      for (const invalidSequenceAction of ["ignore", "fail", "remove", "convert"] as const) {
        expect(() =>
          validateReadOptions({
            ...defaults,
            uniqueHeaders: false,
            duplicateRecordAction,
            invalidSequenceAction,
          })
        ).not.toThrow();
      }
    }
  });

  test("accepts optional hooks, paths and correction tables", () => {
    expect(() =>
      validateReadOptions({
        ...defaults,
        headerTransform: (header) => header.trim(),
        outputPath: "out.fasta",
        correctionTable: { X: "A" },
        onProgress: () => undefined,
        onWarning: () => undefined,
      })
    ).not.toThrow();
  });

  test("accepts optional options passed as undefined", () => {
    expect(() =>
      validateReadOptions({
        ...defaults,
        headerTransform: undefined,
        correctionTable: undefined,
        outputPath: undefined,
        onProgress: undefined,
        onWarning: undefined,
      })
    ).not.toThrow();
  });

  test("checks types without calling the header transform", () => {
    let calls = 0;
    const transform = (header: string): string => {
      calls++;
      return header;
    };

    validateReadOptionTypes({ ...defaults, headerTransform: transform });
    expect(calls).toBe(0);

    validateReadOptions({ ...defaults, headerTransform: transform });
    expect(calls).toBe(1);
  });

  test.each([
    ['{"uniqueHeaders":"true"}', "uniqueHeaders"],
    ['{"duplicateRecordAction":"drop"}', "duplicateRecordAction"],
    ['{"duplicateSequenceAction":null}', "duplicateSequenceAction"],
    ['{"invalidSequenceAction":"convert-all"}', "invalidSequenceAction"],
    ['{"alignment":1}', "alignment"],
    ['{"returnList":"no"}', "returnList"],
    ['{"outputPath":42}', "outputPath"],
    ['{"verbose":"loud"}', "verbose"],
    ['{"headerTransform":"split"}', "headerTransform"],
  ])("rejects %s", (overrides, option) => {
    let caught: unknown;
    try {
      validateReadOptions(withDefaults(overrides));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.message.startsWith(`Invalid FASTA read options: ${option}`)).toBe(true);
      expect(caught.code).toBe("VALIDATION_ERROR");
    }
  });

  test("rejects ignoring duplicate records while requiring unique headers", () => {
    expect(() => validateReadOptions({ ...defaults, duplicateRecordAction: "ignore" })).toThrow(
      "'fail' or 'remove' when uniqueHeaders is true"
    );
  });

  test("runs the header transform check", () => {
    expect(() =>
      validateReadOptions({
        ...defaults,
        headerTransform: () => {
          throw new Error("no pipe in header");
        },
      })
    ).toThrow(
      "headerTransform threw when tested on 'this test string should work': no pipe in header"
    );
  });
});

describe("validateParserOptions", () => {
  test("accepts an empty option object", () => {
    expect(() => validateParserOptions({})).not.toThrow();
  });

  test("rejects a non-function hook", () => {
    expect(() => validateParserOptions({ onWarning: "console" })).toThrow(
      /^Invalid FASTA parser options: onWarning/
    );
  });
});

describe("validateWriterOptions", () => {
  test("accepts numbers and the disabling values", () => {
    for (const lineLength of [60, 0, -1, 2.5, false, null] as const) {
      expect(() => validateWriterOptions({ lineLength })).not.toThrow();
    }
  });

  test("accepts an undefined line length", () => {
    expect(() => validateWriterOptions({ lineLength: undefined, onProgress: undefined })).not.toThrow();
  });

  test("rejects true as a line length", () => {
    expect(() => validateWriterOptions(JSON.parse('{"lineLength":true}'))).toThrow(
      ValidationError
    );
  });
});

describe("validateHeaderTransform", () => {
  test("accepts a transform returning a string", () => {
    expect(() => validateHeaderTransform((header) => header.toUpperCase())).not.toThrow();
  });

  test("reports a non-Error throw", () => {
    expect(() =>
      validateHeaderTransform(() => {
        throw "bad header";
      })
    ).toThrow("headerTransform threw when tested on 'this test string should work': bad header");
  });

  test("reports the type of a non-string result", () => {
    expect(() => validateHeaderTransform(() => JSON.parse("{}"))).toThrow(
      "headerTransform must return a string (returned object)"
    );
  });
});
