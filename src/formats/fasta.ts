/**
 * FASTA format parser, reader and writer
 *
 * Parsing is permissive: blank lines are skipped anywhere, sequence lines are
 * joined without separators, a header with no sequence lines still makes a
 * record, and text before the first header is dropped. The only failures come
 * from the source itself.
 */

import { type } from "arktype";
import { FileError, SeqsiftError, ValidationError } from "../errors";
import { createStream, mergeOptions, readHead } from "../io/file-reader";
import { readLines, splitLines } from "../io/stream-utils";
import { Sequence } from "../sequence";
import type { FastaWriterOptions, FileReaderOptions, ParserOptions, TextEncoding } from "../types";
import { FastaWriterOptionsSchema } from "../types";
import { AbstractParser } from "./abstract-parser";

const HEADER_PREFIX = ">";

/**
 * FASTA-specific parser options
 */
interface FastaParserOptions extends ParserOptions {}

/**
 * Options for a path-bound reader: parser behaviour plus file reading
 */
interface FastaReaderOptions extends FastaParserOptions, FileReaderOptions {}

/**
 * Streaming FASTA parser
 *
 * Records are produced one at a time, each as soon as the next header or the
 * end of input closes it.
 *
 * @example Basic usage
 * ```typescript
 * const parser = new FastaParser();
 * for await (const record of parser.parseString(">s1\nACGT\n>s2\nMKV")) {
 *   console.log(`${record.header}: ${record.length} (${record.alphabet()})`);
 * }
 * ```
 */
class FastaParser extends AbstractParser<Sequence, FastaParserOptions> {
  // Nothing beyond the base defaults yet
  protected getDefaultOptions(): Partial<FastaParserOptions> {
    return {};
  }

  constructor(options: FastaParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * Parse FASTA records from a string
   */
  async *parseString(data: string): AsyncIterable<Sequence> {
    yield* this.assembleRecords(splitLines(data));
  }

  /**
   * Parse FASTA records from a file using streaming I/O
   *
   * @throws {SourceNotFoundError} When the file does not exist
   * @throws {FileError} When the file cannot be read
   */
  async *parseFile(filePath: string, options: FileReaderOptions = {}): AsyncIterable<Sequence> {
    const stream = await createStream(filePath, options);

    try {
      yield* this.parse(stream, mergeOptions(options).encoding);
    } catch (error) {
      // Our own errors (aborts, FileError) pass through unchanged
      if (error instanceof SeqsiftError) {
        throw error;
      }
      throw FileError.fromSystemError("read", filePath, error);
    }
  }

  /**
   * Parse FASTA records from a ReadableStream
   *
   * Leaving the loop early cancels the stream.
   */
  async *parse(
    stream: ReadableStream<Uint8Array>,
    encoding: TextEncoding = "utf8"
  ): AsyncIterable<Sequence> {
    yield* this.assembleRecords(readLines(stream, encoding));
  }

  /**
   * Line-assembly state machine shared by every input source
   */
  private async *assembleRecords(
    lines: AsyncIterable<string> | Iterable<string>
  ): AsyncIterable<Sequence> {
    let currentHeader: string | null = null;
    let sequenceBuffer: string[] = [];
    let lineNumber = 0;
    let warnedOrphanData = false;

    for await (const rawLine of lines) {
      lineNumber++;
      this.checkAborted(lineNumber);

      const line = rawLine.trim();
      if (shouldSkipFastaLine(line)) continue;

      if (isFastaHeader(line)) {
        if (currentHeader !== null) {
          yield buildFastaRecord(currentHeader, sequenceBuffer);
        }
        currentHeader = line.slice(HEADER_PREFIX.length);
        sequenceBuffer = [];
      } else {
        if (currentHeader === null && !warnedOrphanData) {
          this.options.onWarning("Sequence data found before header; ignoring it", lineNumber);
          warnedOrphanData = true;
        }
        sequenceBuffer.push(line);
      }
    }

    if (currentHeader !== null) {
      yield buildFastaRecord(currentHeader, sequenceBuffer);
    }
  }
}

/**
 * FASTA file reader bound to one path
 *
 * The file is opened afresh by each operation and closed when it finishes,
 * fails, or the caller stops iterating.
 *
 * @example
 * ```typescript
 * const reader = new FastaReader("example.fasta");
 * if (await reader.isFasta()) {
 *   for await (const record of reader.records()) {
 *     console.log(record.render());
 *   }
 * }
 * ```
 */
class FastaReader {
  private readonly parser: FastaParser;
  private readonly fileOptions: FileReaderOptions;

  constructor(
    readonly filePath: string,
    options: FastaReaderOptions = {}
  ) {
    const { bufferSize, encoding, ...parserOptions } = options;
    this.parser = new FastaParser(parserOptions);
    this.fileOptions = {
      ...(bufferSize !== undefined && { bufferSize }),
      ...(encoding !== undefined && { encoding }),
    };
  }

  /**
   * Whether the file's first character is '>'
   *
   * Resolves false, rather than rejecting, when the file is missing,
   * unreadable, or empty.
   */
  async isFasta(): Promise<boolean> {
    try {
      const head = await readHead(this.filePath, HEADER_PREFIX.length);
      return new TextDecoder().decode(head) === HEADER_PREFIX;
    } catch (error) {
      if (error instanceof FileError) return false;
      throw error;
    }
  }

  /**
   * Iterate the file's records from the start
   *
   * @throws {SourceNotFoundError} When the file does not exist
   * @throws {FileError} When the file cannot be read
   */
  records(): AsyncIterable<Sequence> {
    return this.parser.parseFile(this.filePath, this.fileOptions);
  }
}

/**
 * FASTA writer for outputting sequences
 */
class FastaWriter {
  private readonly lineWidth: number;
  private readonly lineEnding: string;

  /**
   * @throws {ValidationError} When the options are out of range
   */
  constructor(options: FastaWriterOptions = {}) {
    const validationResult = FastaWriterOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA writer options: ${validationResult.summary}`);
    }

    this.lineWidth = options.lineWidth ?? 80;
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Format a single record, wrapping the sequence to the configured width
   */
  formatSequence(record: Sequence): string {
    const header = `${HEADER_PREFIX}${record.header}`;
    if (record.sequence.length === 0) return header;

    return `${header}${this.lineEnding}${this.wrapText(record.sequence)}`;
  }

  /**
   * Format multiple records as one string
   */
  formatSequences(records: Sequence[]): string {
    return records.map((record) => this.formatSequence(record)).join(this.lineEnding);
  }

  /**
   * Write records to a WritableStream, each followed by a line ending
   */
  async writeToStream(
    records: AsyncIterable<Sequence> | Iterable<Sequence>,
    stream: WritableStream<Uint8Array>
  ): Promise<void> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();

    try {
      for await (const record of records) {
        await writer.write(encoder.encode(this.formatSequence(record) + this.lineEnding));
      }
    } finally {
      writer.releaseLock();
    }
  }

  private wrapText(text: string): string {
    if (this.lineWidth === 0) return text;

    const lines: string[] = [];
    for (let i = 0; i < text.length; i += this.lineWidth) {
      lines.push(text.slice(i, i + this.lineWidth));
    }
    return lines.join(this.lineEnding);
  }
}

/**
 * Utility functions for FASTA text held in memory
 */
const FastaUtils = {
  /**
   * Whether the text opens with a FASTA header marker
   */
  detectFormat: detectFastaFormat,

  /**
   * Count header lines without building records
   */
  countSequences: countFastaSequences,

  /**
   * Headers in file order, without building records
   */
  extractHeaders: extractFastaHeaders,
};

/**
 * Same test as FastaReader.isFasta, applied to a string
 */
function detectFastaFormat(data: string): boolean {
  return data.startsWith(HEADER_PREFIX);
}

function countFastaSequences(data: string): number {
  return splitLines(data).filter((line) => isFastaHeader(line.trim())).length;
}

function extractFastaHeaders(data: string): string[] {
  return splitLines(data)
    .map((line) => line.trim())
    .filter(isFastaHeader)
    .map((line) => line.slice(HEADER_PREFIX.length).trim());
}

/**
 * Blank lines carry nothing and never end a record
 * @param line Trimmed line
 */
function shouldSkipFastaLine(line: string): boolean {
  return line.length === 0;
}

/**
 * @param line Trimmed line
 */
function isFastaHeader(line: string): boolean {
  return line.startsWith(HEADER_PREFIX);
}

/**
 * Join buffered sequence lines and build the record
 */
function buildFastaRecord(header: string, sequenceBuffer: readonly string[]): Sequence {
  return new Sequence(header, sequenceBuffer.join(""));
}

export {
  FastaParser,
  FastaReader,
  FastaWriter,
  FastaUtils,
  type FastaParserOptions,
  type FastaReaderOptions,
};
