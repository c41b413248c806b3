/**
 * A single header-plus-sequence record
 */

import { classifyAlphabet } from "./operations/core/alphabet";
import type { Alphabet } from "./types";

/**
 * Normalized biological sequence with its header.
 *
 * The header is trimmed; the sequence is trimmed and uppercased. Nothing else
 * is checked, so any characters from the source survive into `sequence`.
 *
 * @example
 * ```typescript
 * const record = new Sequence(" chr1 ", "acgt\n");
 * record.sequence;   // "ACGT"
 * record.length;     // 4
 * record.alphabet(); // "nucleotide"
 * record.render();   // ">chr1\nACGT"
 * ```
 */
export class Sequence {
  readonly header: string;
  readonly sequence: string;
  /** Character count of the normalized sequence, in code points */
  readonly length: number;

  constructor(header: string, sequence: string) {
    this.header = header.trim();
    this.sequence = sequence.trim().toUpperCase();
    this.length = Array.from(this.sequence).length;
  }

  /**
   * Classify the sequence as nucleotide, protein, or a hedged variant
   */
  alphabet(): Alphabet {
    return classifyAlphabet(this.sequence);
  }

  /**
   * Single-record FASTA text with the sequence on one unwrapped line
   */
  render(): string {
    return `>${this.header}\n${this.sequence}`;
  }

  toString(): string {
    return this.render();
  }
}
