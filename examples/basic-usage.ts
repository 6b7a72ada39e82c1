/**
 * Basic aminofasta usage
 *
 * Writes a small messy protein FASTA file, cleans it with readFasta and
 * prints what survived.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AminoFastaError, FastaParser, readFasta, writeString } from "../src";

// ============================================================================
// Example 1: Parsing text directly
// ============================================================================

function example1_parseString() {
  console.log("\n=== Example 1: Parsing text ===\n");

  const parser = new FastaParser({
    headerTransform: (header) => header.split(/\s+/)[0] ?? header,
  });
  const records = parser.parseString(
    ">sp|P1|ALPHA alpha chain\nmkvlaagivg\nqrs\n\n>sp|P2|BETA beta chain\nTWYACDEF\n"
  );

  for (const record of records) {
    console.log(`  ${record.header}: ${record.sequence} (${record.sequence.length} aa)`);
  }
}

// ============================================================================
// Example 2: Cleaning a file
// ============================================================================

async function example2_cleanFile(workDir: string) {
  console.log("\n=== Example 2: Cleaning a file ===\n");

  const input = join(workDir, "messy.fasta");
  const output = join(workDir, "clean.fasta");

  await writeString(
    input,
    [">P1", "MKVLA", ">P1", "MKVLA", ">P2", "MKVLA", ">P3", "QRSX*", ">P4", "TWY", ""].join("\n")
  );

  const proteins = await readFasta(input, {
    uniqueHeaders: false,
    duplicateRecordAction: "remove",
    duplicateSequenceAction: "remove",
    invalidSequenceAction: "convert",
    outputPath: output,
    verbose: true,
    onProgress: (message) => console.log(`  [progress] ${message}`),
  });

  for (const [header, sequence] of proteins) {
    console.log(`  ${header}: ${sequence}`);
  }
}

// ============================================================================
// Example 3: Handling errors
// ============================================================================

async function example3_errors(workDir: string) {
  console.log("\n=== Example 3: Handling errors ===\n");

  try {
    await readFasta(join(workDir, "does-not-exist.fasta"));
  } catch (error) {
    if (error instanceof AminoFastaError) {
      console.log(`  ${error.toString()}`);
    } else {
      throw error;
    }
  }
}

async function main() {
  const workDir = mkdtempSync(join(tmpdir(), "aminofasta-example-"));
  try {
    example1_parseString();
    await example2_cleanFile(workDir);
    await example3_errors(workDir);
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
