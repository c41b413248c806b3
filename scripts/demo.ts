/**
 * Print every record of a FASTA file with its length and alphabet
 *
 * Usage: npm run demo -- [path/to/file.fasta]
 */

import { FastaReader } from "../src/index";

async function main() {
  const fastaPath = process.argv[2] ?? "example.fasta";
  const reader = new FastaReader(fastaPath);

  if (!(await reader.isFasta())) {
    console.log(`${fastaPath}: not a FASTA file, or not found`);
    return;
  }

  for await (const record of reader.records()) {
    console.log(record.render());
    console.log(`Length: ${record.length}`);
    console.log(`Alphabet: ${record.alphabet()}`);
    console.log("-".repeat(40));
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.toString() : error);
  process.exitCode = 1;
});
