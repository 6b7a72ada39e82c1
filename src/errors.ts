/**
 * Error handling for protein FASTA parsing and writing
 *
 * Every error raised by the library derives from AminoFastaError so callers
 * can catch a single family and branch on the subclass or message.
 */

/**
 * Base error class for all aminofasta errors
 */
export class AminoFastaError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "AminoFastaError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Configuration errors: a caller-supplied option failed validation
 */
export class ValidationError extends AminoFastaError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Residue-level errors for sequences that break the protein alphabet
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly header: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Sequence '${header}': ${message}`, lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * Structural errors raised while assembling records
 */
export class ParseError extends AminoFastaError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * A header was committed twice under a policy that forbids it
 */
export class DuplicateHeaderError extends ParseError {
  constructor(
    public readonly header: string,
    lineNumber?: number
  ) {
    super(`Found non-unique FASTA header [${header}]`, "FASTA", lineNumber);
    this.name = "DuplicateHeaderError";
  }
}

/**
 * The same header and sequence pair appeared more than once
 */
export class DuplicateRecordError extends ParseError {
  constructor(public readonly header: string) {
    super(`Found duplicate FASTA record [${header}]`, "FASTA");
    this.name = "DuplicateRecordError";
  }
}

/**
 * The same sequence appeared under more than one record
 */
export class DuplicateSequenceError extends ParseError {
  constructor(
    public readonly header: string,
    public readonly firstHeader: string
  ) {
    super(
      `Found duplicate sequence in record [${header}], first seen in [${firstHeader}]`,
      "FASTA"
    );
    this.name = "DuplicateSequenceError";
  }
}

/**
 * File I/O errors with the path and failing operation attached
 */
export class FileError extends AminoFastaError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * The named input file does not exist
 */
export class FileNotFoundError extends FileError {
  constructor(filePath: string) {
    super(`Unable to find file: ${filePath}`, filePath, "open");
    this.name = "FileNotFoundError";
  }
}
