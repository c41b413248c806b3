/**
 * Abstract base parser with shared option handling and interrupt support
 *
 * Gives format parsers consistent AbortSignal support and a warning channel
 * without imposing parsing implementation details.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Parser options after defaults have been applied
 */
export type ResolvedParserOptions<TOptions extends ParserOptions> = TOptions & {
  onWarning: WarningHandler;
};

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseWarningHandler: WarningHandler = (warning, lineNumber) => {
      console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
    };
    const formatDefaults = this.getDefaultOptions();
    // An explicit undefined falls through to the next default
    const onWarning: WarningHandler =
      options.onWarning ?? formatDefaults.onWarning ?? baseWarningHandler;

    // Merge in order: base -> format-specific -> user options
    this.options = { ...formatDefaults, ...options, onWarning };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops so a caller's AbortController can stop them
   */
  protected checkAborted(lineNumber?: number): void {
    this.interruptHandler.throwIfAborted(this.getFormatName(), lineNumber);
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier for messages (e.g. "FASTA")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal adapter for format parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the signal has been aborted
   */
  throwIfAborted(format: string, lineNumber?: number): void {
    if (this.signal?.aborted) {
      throw new ParseError(
        `${format} parsing was aborted`,
        format,
        lineNumber,
        undefined,
        "ABORTED"
      );
    }
  }
}
