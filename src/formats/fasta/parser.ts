/**
 * FASTA parser for protein sequence files
 *
 * Turns FASTA text into either an ordered list of records or a header →
 * sequence Map. The whole input is consumed in one synchronous pass; file
 * entry points only add an async read in front of it.
 */

import { readLines, splitLines } from "../../io/file-reader";
import type { FastaMapping, FastaRecord, ParserOptions } from "../../types";
import { RecordListCollector, RecordMappingCollector } from "./collection";
import { DEFAULT_PROGRESS_HANDLER, DEFAULT_WARNING_HANDLER, FASTA_DEFAULTS } from "./constants";
import { assembleRecords } from "./state-machine";
import type { RecordCollector, ResolvedParserOptions } from "./types";
import { validateHeaderTransform, validateParserOptions } from "./validation";

/**
 * FASTA parser with configurable header handling
 *
 * @example Basic usage
 * ```typescript
 * const parser = new FastaParser();
 * const records = parser.parseString(">P1\nMKV\n>P2\nQRS\n");
 * // [{ header: "P1", sequence: "MKV" }, { header: "P2", sequence: "QRS" }]
 * ```
 *
 * @example Keep only the accession from each header
 * ```typescript
 * const parser = new FastaParser({
 *   headerTransform: (header) => header.split(/\s+/)[0] ?? header,
 * });
 * const proteins = await parser.parseFileToMap("uniprot.fasta");
 * ```
 */
export class FastaParser {
  private readonly options: ResolvedParserOptions;

  /**
   * Create a new FASTA parser
   * @param options Parser configuration
   * @throws {ValidationError} When an option is malformed or the header transform fails its check
   */
  constructor(options: ParserOptions = {}) {
    validateParserOptions(options);
    if (options.headerTransform !== undefined) {
      validateHeaderTransform(options.headerTransform);
    }

    this.options = {
      uniqueHeaders: options.uniqueHeaders ?? FASTA_DEFAULTS.UNIQUE_HEADERS,
      headerTransform: options.headerTransform,
      verbose: options.verbose ?? FASTA_DEFAULTS.VERBOSE,
      onProgress: options.onProgress ?? DEFAULT_PROGRESS_HANDLER,
      onWarning: options.onWarning ?? DEFAULT_WARNING_HANDLER,
    };
  }

  /**
   * Parse FASTA text into a list of records
   * @throws {DuplicateHeaderError} When uniqueHeaders is set and a header repeats
   */
  parseString(data: string): FastaRecord[] {
    return this.parseLines(splitLines(data));
  }

  /**
   * Parse FASTA text into a header → sequence Map
   * @throws {DuplicateHeaderError} When any header repeats
   */
  parseStringToMap(data: string): FastaMapping {
    return this.parseLinesToMap(splitLines(data));
  }

  /**
   * Parse raw lines into a list of records
   */
  parseLines(lines: Iterable<string>): FastaRecord[] {
    return this.parseWith(lines, new RecordListCollector(this.options.uniqueHeaders));
  }

  /**
   * Parse raw lines into a header → sequence Map
   */
  parseLinesToMap(lines: Iterable<string>): FastaMapping {
    return this.parseWith(lines, new RecordMappingCollector());
  }

  /**
   * Parse raw lines into a caller-supplied collection strategy
   */
  parseWith<TResult>(lines: Iterable<string>, collector: RecordCollector<TResult>): TResult {
    const result = assembleRecords(lines, collector, {
      headerTransform: this.options.headerTransform,
      onWarning: this.options.onWarning,
    });

    this.progress(`Parsed ${collector.size} records`);
    return result;
  }

  /**
   * Parse a FASTA file into a list of records
   * @throws {FileNotFoundError} When the file does not exist
   * @throws {FileError} When the file cannot be read
   * @throws {DuplicateHeaderError} When uniqueHeaders is set and a header repeats
   */
  async parseFile(filePath: string): Promise<FastaRecord[]> {
    return this.parseLines(await this.readFileLines(filePath));
  }

  /**
   * Parse a FASTA file into a header → sequence Map
   * @throws {FileNotFoundError} When the file does not exist
   * @throws {DuplicateHeaderError} When any header repeats
   */
  async parseFileToMap(filePath: string): Promise<FastaMapping> {
    return this.parseLinesToMap(await this.readFileLines(filePath));
  }

  private async readFileLines(filePath: string): Promise<string[]> {
    const lines = await readLines(filePath);
    this.progress(`Read ${lines.length} lines from ${filePath}`);
    return lines;
  }

  private progress(message: string): void {
    if (this.options.verbose) {
      this.options.onProgress(message);
    }
  }
}
