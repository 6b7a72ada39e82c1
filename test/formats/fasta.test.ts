/**
 * Tests for FASTA parsing: line classification, record assembly and the parser
 */

import { describe, expect, test, vi } from "vitest";
import {
  assembleRecords,
  classifyLine,
  DuplicateHeaderError,
  FastaParser,
  finishSequence,
  ParseError,
  RecordListCollector,
  RecordMappingCollector,
  ValidationError,
} from "../../src";

describe("classifyLine", () => {
  test("classifies blank and whitespace-only lines", () => {
    expect(classifyLine("")).toEqual({ kind: "blank" });
    expect(classifyLine("   \t")).toEqual({ kind: "blank" });
    expect(classifyLine("\r")).toEqual({ kind: "blank" });
  });

  test("strips the marker and surrounding whitespace from headers", () => {
    expect(classifyLine("  >sp|P1 alpha chain  \n")).toEqual({
      kind: "header",
      header: "sp|P1 alpha chain",
    });
  });

  test("keeps whitespace between the marker and the header text", () => {
    expect(classifyLine("> P1")).toEqual({ kind: "header", header: " P1" });
  });

  test("keeps the case of sequence fragments", () => {
    expect(classifyLine("  mkVla ")).toEqual({ kind: "sequence", fragment: "mkVla" });
  });

  test("treats a bare marker as an empty header", () => {
    expect(classifyLine(">")).toEqual({ kind: "header", header: "" });
  });
});

describe("finishSequence", () => {
  test("joins fragments without separators and upper-cases", () => {
    expect(finishSequence(["mk", "Vl", "a"])).toBe("MKVLA");
  });
});

describe("assembleRecords", () => {
  test("commits records into a list collector in source order", () => {
    const records = assembleRecords([">A", "MK", "V", ">B", "QRS"], new RecordListCollector(true));

    expect(records).toEqual([
      { header: "A", sequence: "MKV" },
      { header: "B", sequence: "QRS" },
    ]);
  });

  test("commits records into a mapping collector", () => {
    const mapping = assembleRecords([">A", "MKV", ">B", "QRS"], new RecordMappingCollector());

    expect([...mapping.entries()]).toEqual([
      ["A", "MKV"],
      ["B", "QRS"],
    ]);
  });

  test("reports the header line of a duplicate", () => {
    let caught: unknown;
    try {
      assembleRecords([">A", "MKV", "", ">A", "QRS"], new RecordMappingCollector());
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DuplicateHeaderError);
    expect(caught).toBeInstanceOf(ParseError);
    if (caught instanceof DuplicateHeaderError) {
      expect(caught.header).toBe("A");
      expect(caught.lineNumber).toBe(4);
      expect(caught.message).toBe("Found non-unique FASTA header [A]");
    }
  });

  test("warns about and discards sequence data before the first header", () => {
    const onWarning = vi.fn();
    const records = assembleRecords(["MKV", "", "QQ", ">A", "RS"], new RecordListCollector(true), {
      onWarning,
    });

    expect(records).toEqual([{ header: "A", sequence: "RS" }]);
    expect(onWarning).toHaveBeenCalledTimes(2);
    expect(onWarning).toHaveBeenNthCalledWith(
      1,
      "Sequence data found before the first header; line ignored",
      1
    );
    expect(onWarning).toHaveBeenNthCalledWith(
      2,
      "Sequence data found before the first header; line ignored",
      3
    );
  });

  test("applies the header transform before the duplicate check", () => {
    const transform = (header: string): string => header.slice(0, 2);

    expect(() =>
      assembleRecords([">P1 first", "MKV", ">P1 second", "QRS"], new RecordListCollector(true), {
        headerTransform: transform,
      })
    ).toThrow("Found non-unique FASTA header [P1]");
  });
});

describe("FastaParser", () => {
  const parser = new FastaParser();

  test("parses well-formed input into records in source order", () => {
    const records = parser.parseString(">P1\nmkv\nla\n>P2\nQRS\n>P3\nTwY\n");

    expect(records).toEqual([
      { header: "P1", sequence: "MKVLA" },
      { header: "P2", sequence: "QRS" },
      { header: "P3", sequence: "TWY" },
    ]);
  });

  test("parses into a Map preserving insertion order", () => {
    const mapping = parser.parseStringToMap(">Z\nMKV\n>A\nQRS\n");

    expect([...mapping.keys()]).toEqual(["Z", "A"]);
    expect(mapping.get("Z")).toBe("MKV");
    expect(mapping.get("A")).toBe("QRS");
  });

  test("ignores blank lines inside a sequence", () => {
    expect(parser.parseString(">A\nMK\n\n\nV\n")).toEqual([{ header: "A", sequence: "MKV" }]);
  });

  test("handles CRLF line endings and surrounding whitespace", () => {
    expect(parser.parseString("  >sp|P1 desc  \r\n  mkv  \r\nla\r\n")).toEqual([
      { header: "sp|P1 desc", sequence: "MKVLA" },
    ]);
  });

  test("drops a dangling header at end of input", () => {
    expect(parser.parseString(">A\n")).toEqual([]);
    expect(parser.parseString(">A\nMKV\n>B\n")).toEqual([{ header: "A", sequence: "MKV" }]);
  });

  test("drops a header immediately followed by another header", () => {
    expect(parser.parseString(">A\n>B\nMKV\n")).toEqual([{ header: "B", sequence: "MKV" }]);
  });

  test("a dropped header does not count towards uniqueness", () => {
    expect(parser.parseString(">A\n>A\nMKV\n")).toEqual([{ header: "A", sequence: "MKV" }]);
  });

  test("returns an empty collection for empty input", () => {
    expect(parser.parseString("")).toEqual([]);
    expect(parser.parseStringToMap("\n\n").size).toBe(0);
  });

  describe("duplicate headers", () => {
    const input = ">A\nXYZ\n>A\nQRS\n";

    test("fail when headers must be unique", () => {
      expect(() => parser.parseString(input)).toThrow(DuplicateHeaderError);
    });

    test("are kept in list mode when uniqueness is off", () => {
      const lenient = new FastaParser({ uniqueHeaders: false });

      expect(lenient.parseString(input)).toEqual([
        { header: "A", sequence: "XYZ" },
        { header: "A", sequence: "QRS" },
      ]);
    });

    test("always fail in mapping mode", () => {
      const lenient = new FastaParser({ uniqueHeaders: false });

      expect(() => lenient.parseStringToMap(input)).toThrow("Found non-unique FASTA header [A]");
    });

    test("are compared case-sensitively", () => {
      expect(parser.parseStringToMap(">a\nMKV\n>A\nQRS\n").size).toBe(2);
    });
  });

  describe("header transform", () => {
    test("keeps the first whitespace-separated token", () => {
      const accessionOnly = new FastaParser({
        headerTransform: (header) => header.split(/\s+/)[0] ?? header,
      });

      expect(accessionOnly.parseString(">id123 extra text\nMKV\n")).toEqual([
        { header: "id123", sequence: "MKV" },
      ]);
    });

    test("rejects a transform that throws on the test header", () => {
      expect(() => new FastaParser({ headerTransform: JSON.parse })).toThrow(
        /^headerTransform threw when tested on 'this test string should work': /
      );
    });

    test("rejects a transform that returns a non-string", () => {
      expect(() => new FastaParser({ headerTransform: () => JSON.parse("null") })).toThrow(
        "headerTransform must return a string (returned null)"
      );
      expect(() => new FastaParser({ headerTransform: () => JSON.parse("42") })).toThrow(
        "headerTransform must return a string (returned number)"
      );
    });

    test("is checked once at construction, not per record", () => {
      const transform = vi.fn((header: string) => header.toLowerCase());
      const lowered = new FastaParser({ headerTransform: transform });

      expect(transform).toHaveBeenCalledTimes(1);
      expect(transform).toHaveBeenCalledWith("this test string should work");

      lowered.parseString(">A\nMKV\n>B\nQRS\n");
      expect(transform).toHaveBeenCalledTimes(3);
    });
  });

  describe("options", () => {
    test("rejects malformed options", () => {
      expect(() => new FastaParser(JSON.parse('{"uniqueHeaders":"yes"}'))).toThrow(
        ValidationError
      );
      expect(() => new FastaParser(JSON.parse('{"verbose":1}'))).toThrow(
        /^Invalid FASTA parser options: verbose/
      );
    });

    test("reports progress only when verbose", () => {
      const onProgress = vi.fn();

      new FastaParser({ onProgress }).parseString(">A\nMKV\n");
      expect(onProgress).not.toHaveBeenCalled();

      new FastaParser({ verbose: true, onProgress }).parseString(">A\nMKV\n>B\nQRS\n");
      expect(onProgress).toHaveBeenCalledTimes(1);
      expect(onProgress).toHaveBeenCalledWith("Parsed 2 records");
    });

    test("sends orphan sequence warnings to the warning hook", () => {
      const onWarning = vi.fn();
      const records = new FastaParser({ onWarning }).parseString("MKV\n>A\nQRS\n");

      expect(records).toEqual([{ header: "A", sequence: "QRS" }]);
      expect(onWarning).toHaveBeenCalledWith(
        "Sequence data found before the first header; line ignored",
        1
      );
    });

    test("treats options passed as undefined as not provided", () => {
      const defaulted = new FastaParser({
        uniqueHeaders: undefined,
        headerTransform: undefined,
        onWarning: undefined,
      });

      expect(() => defaulted.parseString(">A\nMKV\n>A\nQRS\n")).toThrow(DuplicateHeaderError);
      expect(defaulted.parseString(">A\nMKV\n")).toEqual([{ header: "A", sequence: "MKV" }]);
    });

    test("parses into a custom collector", () => {
      const headers: string[] = [];
      let committed = 0;
      const count = new FastaParser().parseWith([">A", "MKV", ">B", "QRS"], {
        get size() {
          return committed;
        },
        checkDuplicate: () => undefined,
        commit: (header: string) => {
          headers.push(header);
          committed++;
        },
        result: () => committed,
      });

      expect(count).toBe(2);
      expect(headers).toEqual(["A", "B"]);
    });
  });
});
