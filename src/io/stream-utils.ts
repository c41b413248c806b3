/**
 * Stream processing utilities for line-oriented text
 *
 * Turns a byte stream into lines without holding more than one chunk plus an
 * unfinished line in memory.
 */

import type { TextEncoding } from "../types";

/**
 * Incremental line splitter
 *
 * Each character of input is scanned once, however many chunks a line is
 * spread over. Lines end at `\n`, `\r\n` or a lone `\r`; a `\n` that
 * directly follows a `\r` is swallowed even when the two arrive in separate
 * chunks.
 */
export class LineSplitter {
  private pieces: string[] = [];
  private afterCarriageReturn = false;

  /**
   * Feed more text and take the lines it completes
   */
  push(text: string): string[] {
    const lines: string[] = [];
    let lineStart = 0;

    for (let position = 0; position < text.length; position++) {
      const char = text[position];

      if (char === "\n" && this.afterCarriageReturn) {
        // Second half of \r\n
        lineStart = position + 1;
        this.afterCarriageReturn = false;
      } else if (char === "\n" || char === "\r") {
        lines.push(this.takeLine(text.slice(lineStart, position)));
        lineStart = position + 1;
        this.afterCarriageReturn = char === "\r";
      } else {
        this.afterCarriageReturn = false;
      }
    }

    if (lineStart < text.length) {
      this.pieces.push(text.slice(lineStart));
    }
    return lines;
  }

  /**
   * Take the unterminated last line, if there is one
   */
  flush(): string[] {
    const tail = this.takeLine("");
    this.afterCarriageReturn = false;
    return tail.length > 0 ? [tail] : [];
  }

  private takeLine(last: string): string {
    if (this.pieces.length === 0) return last;

    this.pieces.push(last);
    const line = this.pieces.join("");
    this.pieces = [];
    return line;
  }
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Terminators are not included. If the consumer stops before the stream
 * ends, the stream is cancelled so its source can be released.
 *
 * @example Line-by-line processing
 * ```typescript
 * const stream = await createStream('/path/to/genome.fasta');
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith('>')) {
 *     console.log('Found header:', line);
 *   }
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: TextEncoding = "utf8"
): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "latin1" ? "latin1" : "utf-8");
  const splitter = new LineSplitter();
  let exhausted = false;

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        exhausted = true;
        break;
      }

      yield* splitter.push(decoder.decode(value, { stream: true }));
    }

    yield* splitter.push(decoder.decode());
    yield* splitter.flush();
  } finally {
    if (!exhausted) await reader.cancel();
    reader.releaseLock();
  }
}

/**
 * Split a complete in-memory text into lines
 */
export function splitLines(text: string): string[] {
  const splitter = new LineSplitter();
  return [...splitter.push(text), ...splitter.flush()];
}

export const StreamUtils = {
  readLines,
  splitLines,
  LineSplitter,
} as const;
