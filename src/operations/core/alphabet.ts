/**
 * Alphabet classification for biological sequences
 *
 * Decides whether a sequence reads as nucleotides or amino acids. A sequence
 * drawn entirely from one reference alphabet gets a definite label; anything
 * with foreign characters falls back to counting members of each alphabet.
 *
 * @module alphabet
 *
 * @example
 * ```typescript
 * classifyAlphabet("ACGU");  // "nucleotide"
 * classifyAlphabet("MKVL");  // "protein"
 * classifyAlphabet("ACGTX"); // "unknown" (4 vs 4)
 * ```
 */

import { type } from "arktype";
import { type Alphabet, AlphabetSchema } from "../../types";

/**
 * Standard DNA and RNA bases
 */
export const NUCLEOTIDE_CODES: ReadonlySet<string> = new Set("ACGTU");

/**
 * The 20 standard single-letter amino acid codes. Shares A, C, G and T with
 * the nucleotide codes.
 */
export const AMINO_ACID_CODES: ReadonlySet<string> = new Set("ACDEFGHIKLMNPQRSTVWY");

/**
 * Per-alphabet membership counts, with repetition
 */
export interface AlphabetMemberCounts {
  readonly nucleotide: number;
  readonly protein: number;
}

function isSubsetOf(candidate: ReadonlySet<string>, reference: ReadonlySet<string>): boolean {
  for (const char of candidate) {
    if (!reference.has(char)) return false;
  }
  return true;
}

/**
 * Count characters belonging to each reference alphabet.
 *
 * A character present in both alphabets counts toward both.
 */
export function countAlphabetMembers(sequence: string): AlphabetMemberCounts {
  let nucleotide = 0;
  let protein = 0;

  for (const char of sequence) {
    if (NUCLEOTIDE_CODES.has(char)) nucleotide++;
    if (AMINO_ACID_CODES.has(char)) protein++;
  }

  return { nucleotide, protein };
}

/**
 * Classify the alphabet of an uppercase sequence.
 *
 * The subset checks run first and in this order, so the empty sequence is
 * "nucleotide". Ties in the counting fallback, including zero against zero,
 * are "unknown".
 */
export function classifyAlphabet(sequence: string): Alphabet {
  const distinct = new Set(sequence);

  if (isSubsetOf(distinct, NUCLEOTIDE_CODES)) return "nucleotide";
  if (isSubsetOf(distinct, AMINO_ACID_CODES)) return "protein";

  const counts = countAlphabetMembers(sequence);
  if (counts.nucleotide > counts.protein) return "likely nucleotide";
  if (counts.protein > counts.nucleotide) return "likely protein";
  return "unknown";
}

/**
 * Type guard for alphabet labels read from untyped input
 */
export function isAlphabet(value: unknown): value is Alphabet {
  return !(AlphabetSchema(value) instanceof type.errors);
}
