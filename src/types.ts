/**
 * Core type definitions and arktype schemas
 *
 * Option objects are described twice: as an interface for callers and as an
 * arktype schema that checks values arriving at runtime.
 */

import { type } from "arktype";

/** Largest streaming buffer a reader accepts (1 MiB) */
export const MAX_BUFFER_SIZE = 1_048_576;

// =============================================================================
// ALPHABET
// =============================================================================

/**
 * Alphabet classification labels, from certain to undecided
 */
export const AlphabetSchema = type(
  "'nucleotide' | 'protein' | 'likely nucleotide' | 'likely protein' | 'unknown'"
);

export type Alphabet = typeof AlphabetSchema.infer;

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// FILE I/O
// =============================================================================

export type TextEncoding = "utf8" | "latin1";

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64 KiB) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: TextEncoding;
}

/**
 * Basic facts about a file on disk
 */
export interface FileMetadata {
  readonly path: string;
  /** File size in bytes */
  readonly size: number;
  /** Last modification time, when the platform reports one */
  readonly lastModified?: Date;
  /** Extension including the dot, or empty string */
  readonly extension: string;
}

/**
 * File path validation: non-empty and free of NUL bytes
 */
export const FilePathSchema = type("string>0").narrow(
  (path, ctx) => !path.includes("\0") || ctx.mustBe("a path without null characters")
);

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "encoding?": "'utf8' | 'latin1'",
}).narrow((options, ctx) => {
  if (
    options.bufferSize !== undefined &&
    (!Number.isInteger(options.bufferSize) || options.bufferSize > MAX_BUFFER_SIZE)
  ) {
    return ctx.mustBe(`an integer bufferSize no larger than ${MAX_BUFFER_SIZE}`);
  }
  return true;
});

// =============================================================================
// WRITING
// =============================================================================

/**
 * FASTA output options
 */
export interface FastaWriterOptions {
  /** Sequence characters per line; 0 disables wrapping (default: 80) */
  readonly lineWidth?: number;
  /** Line terminator (default: '\n') */
  readonly lineEnding?: "\n" | "\r\n";
}

export const FastaWriterOptionsSchema = type({
  "lineWidth?": "number>=0",
  "lineEnding?": "string",
}).narrow((options, ctx) => {
  if (options.lineWidth !== undefined && !Number.isInteger(options.lineWidth)) {
    return ctx.mustBe("an integer lineWidth");
  }
  if (
    options.lineEnding !== undefined &&
    options.lineEnding !== "\n" &&
    options.lineEnding !== "\r\n"
  ) {
    return ctx.mustBe("a lineEnding of \\n or \\r\\n");
  }
  return true;
});
