/**
 * File writing operations using Effect Platform
 *
 * All Effect complexity is hidden behind Promise-based APIs.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect, Either } from "effect";
import { FileError } from "../errors";
import { runWithPlatform } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is automatically closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file
   */
  writeString(content: string): Promise<void>;
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @param path - File path to write to
 * @param content - String content to write
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await writeString("out.fasta", ">P1\nMKV\n\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, data);
  });

  try {
    await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is opened immediately before the callback runs and closed by the
 * Effect scope when the callback resolves, rejects, or a write fails. Errors
 * thrown by the callback reach the caller unchanged; platform failures are
 * wrapped in FileError.
 *
 * @param path - File path to open (creates if not exists, truncates if exists)
 * @param callback - Function that receives write handle and returns result
 * @returns Promise resolving to callback's return value
 *
 * @example
 * ```typescript
 * await openForWriting("out.fasta", async (handle) => {
 *   for (const [header, sequence] of proteins) {
 *     await handle.writeString(`>${header}\n${sequence}\n\n`);
 *   }
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const encoder = new TextEncoder();

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const handle: FileWriteHandle = {
      writeString: (content: string): Promise<void> =>
        Effect.runPromise(
          file
            .writeAll(encoder.encode(content))
            .pipe(
              Effect.mapError((error) => FileError.fromSystemError("write", path, error)),
              Effect.either
            )
        ).then((result) => {
          if (Either.isLeft(result)) {
            throw result.left;
          }
        }),
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runWithPlatform(program.pipe(Effect.scoped));
}
