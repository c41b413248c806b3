/**
 * Error handling for sequence file parsing
 *
 * Malformed FASTA content is never an error here: the parser accepts whatever
 * it is given. Errors describe the source (a path that cannot be opened or
 * read), bad options, and interrupted parses.
 */

/**
 * Base error class for all seqsift errors
 */
export class SeqsiftError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SeqsiftError";
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
 * Invalid options or arguments
 */
export class ValidationError extends SeqsiftError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends SeqsiftError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string,
    code = "PARSE_ERROR"
  ) {
    super(message, code, lineNumber, context);
    this.name = "ParseError";
  }
}

export type FileOperation = "read" | "stat" | "open";

/**
 * File I/O errors with the failing path and the underlying system error
 */
export class FileError extends SeqsiftError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: FileOperation,
    public readonly systemError?: unknown,
    context?: string,
    code = "FILE_ERROR"
  ) {
    super(message, code, undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileOperation,
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  static getSuggestionForSystemError(errorMessage: string): string | undefined {
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
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }

    return undefined;
  }

  override toString(): string {
    let msg = `${super.toString()}\nPath: ${this.filePath}`;

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * The source to parse does not exist or is not a regular file
 */
export class SourceNotFoundError extends FileError {
  constructor(filePath: string, systemError?: unknown) {
    super(
      `File not found: ${filePath}. Check that the file path is correct and the file exists`,
      filePath,
      "open",
      systemError,
      undefined,
      "SOURCE_NOT_FOUND"
    );
    this.name = "SourceNotFoundError";
  }
}
