/**
 * File reading utilities built on the Effect platform FileSystem service
 *
 * FASTA files are read whole and handed to the synchronous parser; the
 * Effect runtime hides every platform detail behind Promise-based helpers.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError, FileNotFoundError } from "../errors";
import type { FilePath } from "../types";
import { FilePathSchema } from "../types";
import { runWithPlatform } from "./runtime";

/**
 * Check if a regular file exists at the path
 *
 * @param path File path to check
 * @returns Promise resolving to true if the path is an existing file
 * @throws {FileError} If path validation or the stat call fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Read entire file to string
 *
 * @param path File path to read
 * @returns Promise resolving to the file content decoded as UTF-8
 * @throws {FileNotFoundError} If nothing exists at the path
 * @throws {FileError} If the path is a directory or the file cannot be read
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    if (!(yield* fs.exists(validatedPath))) {
      return yield* Effect.fail(new FileNotFoundError(validatedPath));
    }
    const info = yield* fs.stat(validatedPath);
    if (info.type === "Directory") {
      return yield* Effect.fail(
        FileError.fromSystemError("read", validatedPath, "path is a directory")
      );
    }

    return yield* fs.readFileString(validatedPath);
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    if (error instanceof FileError) {
      throw error;
    }
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Split text into lines, dropping the empty remainder after a final newline
 *
 * @example
 * ```typescript
 * splitLines(">A\nMKV\n"); // [">A", "MKV"]
 * ```
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Read a file and return its lines
 *
 * @param path File path to read
 * @throws {FileNotFoundError} If nothing exists at the path
 * @throws {FileError} If the file cannot be read
 */
export async function readLines(path: string): Promise<string[]> {
  return splitLines(await readToString(path));
}

export const FileReader = {
  exists,
  readToString,
  readLines,
} as const;

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
