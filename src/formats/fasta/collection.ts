/**
 * Record collection strategies
 *
 * The record assembler commits finished records into one of these. Each
 * strategy owns its duplicate-header rule, so the state machine never has
 * to know which output shape the caller asked for.
 */

import { DuplicateHeaderError } from "../../errors";
import type { FastaMapping, FastaRecord } from "../../types";
import type { RecordCollector } from "./types";

/**
 * Ordered list of records
 *
 * Repeated headers are allowed unless `uniqueHeaders` is set.
 *
 * @example
 * ```typescript
 * const collector = new RecordListCollector(false);
 * collector.commit("A", "MKV");
 * collector.commit("A", "QRS");
 * collector.result(); // [{ header: "A", sequence: "MKV" }, { header: "A", sequence: "QRS" }]
 * ```
 */
export class RecordListCollector implements RecordCollector<FastaRecord[]> {
  private readonly records: FastaRecord[] = [];
  private readonly seenHeaders = new Set<string>();

  constructor(private readonly uniqueHeaders: boolean) {}

  get size(): number {
    return this.records.length;
  }

  checkDuplicate(header: string, lineNumber?: number): void {
    if (this.uniqueHeaders && this.seenHeaders.has(header)) {
      throw new DuplicateHeaderError(header, lineNumber);
    }
  }

  commit(header: string, sequence: string): void {
    this.records.push({ header, sequence });
    this.seenHeaders.add(header);
  }

  result(): FastaRecord[] {
    return this.records;
  }
}

/**
 * Header → sequence mapping
 *
 * A mapping never overwrites silently: every repeated header is a duplicate.
 */
export class RecordMappingCollector implements RecordCollector<FastaMapping> {
  private readonly mapping: FastaMapping = new Map();

  get size(): number {
    return this.mapping.size;
  }

  checkDuplicate(header: string, lineNumber?: number): void {
    if (this.mapping.has(header)) {
      throw new DuplicateHeaderError(header, lineNumber);
    }
  }

  commit(header: string, sequence: string): void {
    this.mapping.set(header, sequence);
  }

  result(): FastaMapping {
    return this.mapping;
  }
}
