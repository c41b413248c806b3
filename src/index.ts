/**
 * seqsift - streaming FASTA parsing with alphabet classification
 */

// Error types
export {
  FileError,
  ParseError,
  SeqsiftError,
  SourceNotFoundError,
  ValidationError,
} from "./errors";
// FASTA format
export {
  type FastaParserOptions,
  FastaParser,
  FastaReader,
  type FastaReaderOptions,
  FastaUtils,
  FastaWriter,
} from "./formats/fasta";
// File I/O infrastructure
export { FileReader } from "./io/file-reader";
export { StreamUtils } from "./io/stream-utils";
// Alphabet classification
export {
  AMINO_ACID_CODES,
  type AlphabetMemberCounts,
  classifyAlphabet,
  countAlphabetMembers,
  isAlphabet,
  NUCLEOTIDE_CODES,
} from "./operations/core/alphabet";
// Records
export { Sequence } from "./sequence";
// Core types
export type {
  Alphabet,
  FastaWriterOptions,
  FileMetadata,
  FileReaderOptions,
  ParserOptions,
  TextEncoding,
} from "./types";
export {
  AlphabetSchema,
  FastaWriterOptionsSchema,
  FilePathSchema,
  FileReaderOptionsSchema,
} from "./types";
