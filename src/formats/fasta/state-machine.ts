/**
 * Record assembly state machine for FASTA parsing
 *
 * Consumes raw lines in order and commits finished records into a
 * RecordCollector. Sequences may wrap over any number of lines and blank
 * lines may appear anywhere; neither affects record boundaries.
 */

import { classifyLine, finishSequence } from "./primitives";
import type { AssemblerOptions, AssemblerState, RecordCollector } from "./types";

/**
 * Assemble FASTA records from lines
 *
 * @param lines - Raw lines, with or without terminators
 * @param collector - Strategy receiving finished records
 * @param options - Header transform and warning hook
 * @returns The collector's result
 * @throws {DuplicateHeaderError} When the collector rejects a header
 *
 * @remarks
 * The state machine transitions:
 * idle → building (header) → building (fragments) → building (next header) …
 *
 * A header only becomes a record once at least one sequence fragment follows
 * it. A header followed directly by another header, or by the end of input,
 * is dropped without a record. Fragments seen before any header are reported
 * through `onWarning` and discarded.
 */
export function assembleRecords<TResult>(
  lines: Iterable<string>,
  collector: RecordCollector<TResult>,
  options: AssemblerOptions = {}
): TResult {
  const { headerTransform, onWarning } = options;
  let state: AssemblerState = { kind: "idle" };
  let lineNumber = 0;

  const finalize = (current: AssemblerState): void => {
    if (current.kind !== "building" || current.fragments.length === 0) {
      return;
    }
    collector.checkDuplicate(current.header, current.headerLine);
    collector.commit(current.header, finishSequence(current.fragments));
  };

  for (const raw of lines) {
    lineNumber++;
    const line = classifyLine(raw);

    switch (line.kind) {
      case "blank":
        break;

      case "header":
        finalize(state);
        state = {
          kind: "building",
          header: headerTransform ? headerTransform(line.header) : line.header,
          headerLine: lineNumber,
          fragments: [],
        };
        break;

      case "sequence":
        if (state.kind === "building") {
          state.fragments.push(line.fragment);
        } else {
          onWarning?.("Sequence data found before the first header; line ignored", lineNumber);
        }
        break;
    }
  }

  finalize(state);
  return collector.result();
}
