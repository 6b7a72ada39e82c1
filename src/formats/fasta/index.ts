/**
 * FASTA Format Module
 *
 * Parsing and writing of protein FASTA files:
 * - Multi-line sequences with blank lines anywhere in the file
 * - Headers kept verbatim (minus '>') or rewritten by a header transform
 * - List output that preserves repeats, or a Map that refuses them
 * - Writer with configurable line wrapping whose output parses back unchanged
 *
 * @module fasta
 * @since v0.1.0
 *
 * @example Parse a file into a Map
 * ```typescript
 * import { FastaParser } from './formats/fasta';
 *
 * const parser = new FastaParser();
 * const proteins = await parser.parseFileToMap('proteome.fasta');
 * console.log(`${proteins.size} proteins`);
 * ```
 *
 * @example Re-wrap a file at 80 residues per line
 * ```typescript
 * import { FastaParser, FastaWriter } from './formats/fasta';
 *
 * const records = await new FastaParser({ uniqueHeaders: false }).parseFile('in.fasta');
 * await new FastaWriter({ lineLength: 80 }).writeFile(records, 'out.fasta');
 * ```
 */

// ============================================================================
// EXPORTS
// ============================================================================

// Core Classes
/**
 * Primary FASTA parser
 * @group Core
 */
export { FastaParser } from "./parser";
/**
 * FASTA writer with line wrapping
 * @group Core
 */
export { FastaWriter } from "./writer";

// Collection Strategies
/**
 * Output shapes the record assembler can commit into
 * @group Advanced
 */
export { RecordListCollector, RecordMappingCollector } from "./collection";

// Advanced Exports
/**
 * Low-level record assembler
 * Used internally but exposed for custom collectors
 * @group Advanced
 */
export { assembleRecords } from "./state-machine";

// Primitives
/**
 * @group Utilities
 */
export {
  chunkSequence,
  classifyLine,
  finishSequence,
  isFastaHeader,
  resolveLineLength,
} from "./primitives";

// Validation
/**
 * Option validators shared by the parser, the writer and readFasta
 * @group Validation
 */
export {
  validateHeaderTransform,
  validateParserOptions,
  validateReadOptions,
  validateReadOptionTypes,
  validateWriterOptions,
} from "./validation";

// Constants
/**
 * @group Constants
 */
export {
  FASTA_DEFAULTS,
  GAP_CHARACTER,
  HEADER_TRANSFORM_TEST_HEADER,
  STANDARD_AMINO_ACIDS,
  STANDARD_CONVERSION,
  STANDARD_CONVERSION_WITH_GAP,
} from "./constants";

// Type Exports
/**
 * @group Types
 */
export type {
  AssemblerOptions,
  AssemblerState,
  ClassifiedLine,
  ReadFastaOptions,
  RecordCollector,
  ResolvedParserOptions,
} from "./types";
