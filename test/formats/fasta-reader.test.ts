/**
 * Tests for reading FASTA files from disk
 */

import { existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { FastaReader, FileError, Sequence, SourceNotFoundError } from "../../src/index";

const fixturesDir = join(tmpdir(), `seqsift-reader-${process.pid}-${Date.now()}`);
const files = {
  twoRecords: join(fixturesDir, "two-records.fasta"),
  singleLine: join(fixturesDir, "single-line.fasta"),
  headerFirst: join(fixturesDir, "header-first.txt"),
  noHeader: join(fixturesDir, "no-header.txt"),
  empty: join(fixturesDir, "empty.fasta"),
  leadingSpace: join(fixturesDir, "leading-space.fasta"),
  windows: join(fixturesDir, "windows.fasta"),
  large: join(fixturesDir, "large.fasta"),
  longLine: join(fixturesDir, "long-line.fasta"),
  bulky: join(fixturesDir, "bulky.fasta"),
  nonexistent: join(fixturesDir, "nonexistent.fasta"),
  directory: join(fixturesDir, "nested"),
};

beforeAll(() => {
  mkdirSync(fixturesDir, { recursive: true });

  writeFileSync(files.twoRecords, ">s1\nACGT\n\nACGT\n>s2\nMKV\n");
  writeFileSync(files.singleLine, ">only one line, no newline");
  writeFileSync(files.headerFirst, ">x\nthis is not really a sequence at all\n");
  writeFileSync(files.noHeader, "ACGT\nTTGA\n");
  writeFileSync(files.empty, "");
  writeFileSync(files.leadingSpace, " >s1\nACGT\n");
  writeFileSync(files.windows, ">win1 desc\r\nacgu\r\nacgu\r\n\r\n>win2\r\nmkvl\r\n");
  writeFileSync(
    files.large,
    Array.from({ length: 300 }, (_, i) => `>seq${i}\n${"ACGT".repeat(100)}\n${"GG".repeat(60)}`).join(
      "\n"
    )
  );
  writeFileSync(files.longLine, `>long\n${"ACGT".repeat(1 << 20)}\n`);
  writeFileSync(files.bulky, `>s0\nACGT\n>s1\n${`${"ACGT".repeat(16)}\n`.repeat(512 * 1024)}`);
  mkdirSync(files.directory);
});

afterAll(() => {
  rmSync(fixturesDir, { recursive: true, force: true });
});

const FD_DIR = "/proc/self/fd";

function openDescriptorCount(): number {
  return readdirSync(FD_DIR).length;
}

async function collect(reader: FastaReader): Promise<Sequence[]> {
  const records: Sequence[] = [];
  for await (const record of reader.records()) {
    records.push(record);
  }
  return records;
}

describe("FastaReader", () => {
  describe("isFasta", () => {
    test("is true when the first character is '>'", async () => {
      expect(await new FastaReader(files.twoRecords).isFasta()).toBe(true);
      expect(await new FastaReader(files.singleLine).isFasta()).toBe(true);
    });

    test("ignores what follows the first character", async () => {
      expect(await new FastaReader(files.headerFirst).isFasta()).toBe(true);
    });

    test("is false when the first character is anything else", async () => {
      expect(await new FastaReader(files.noHeader).isFasta()).toBe(false);
      expect(await new FastaReader(files.leadingSpace).isFasta()).toBe(false);
    });

    test("is false for an empty file", async () => {
      expect(await new FastaReader(files.empty).isFasta()).toBe(false);
    });

    test("is false instead of failing when the file does not exist", async () => {
      expect(await new FastaReader(files.nonexistent).isFasta()).toBe(false);
    });

    test("is false for a directory", async () => {
      expect(await new FastaReader(files.directory).isFasta()).toBe(false);
    });

    test("is false for an unusable path", async () => {
      expect(await new FastaReader("").isFasta()).toBe(false);
    });
  });

  describe("records", () => {
    test("assembles multi-line records and skips blank lines", async () => {
      const records = await collect(new FastaReader(files.twoRecords));

      expect(records.map((record) => [record.header, record.sequence])).toEqual([
        ["s1", "ACGTACGT"],
        ["s2", "MKV"],
      ]);
      expect(records.map((record) => record.alphabet())).toEqual(["nucleotide", "protein"]);
    });

    test("yields a record for a lone header", async () => {
      const records = await collect(new FastaReader(files.singleLine));

      expect(records).toHaveLength(1);
      expect(records[0]?.header).toBe("only one line, no newline");
      expect(records[0]?.sequence).toBe("");
    });

    test("yields nothing for an empty file", async () => {
      expect(await collect(new FastaReader(files.empty))).toEqual([]);
    });

    test("yields nothing for a file without headers", async () => {
      const reader = new FastaReader(files.noHeader, { onWarning: () => {} });

      expect(await collect(reader)).toEqual([]);
    });

    test("handles Windows line endings", async () => {
      const records = await collect(new FastaReader(files.windows));

      expect(records.map((record) => record.render())).toEqual([">win1 desc\nACGUACGU", ">win2\nMKVL"]);
    });

    test("streams files larger than one read buffer", async () => {
      const records = await collect(new FastaReader(files.large, { bufferSize: 1024 }));

      expect(records).toHaveLength(300);
      expect(records[299]?.header).toBe("seq299");
      expect(records.every((record) => record.length === 520)).toBe(true);
      expect(records.every((record) => record.alphabet() === "nucleotide")).toBe(true);
    });

    test("reads the file again from the start on every call", async () => {
      const reader = new FastaReader(files.twoRecords);

      const first = await collect(reader);
      const second = await collect(reader);

      expect(second.map(String)).toEqual(first.map(String));
    });

    test("can be abandoned part way and iterated again", async () => {
      const reader = new FastaReader(files.large, { bufferSize: 1024 });

      for await (const record of reader.records()) {
        expect(record.header).toBe("seq0");
        break;
      }

      expect(await collect(reader)).toHaveLength(300);
    });

    test("assembles a single sequence line spread over thousands of reads", async () => {
      const records = await collect(new FastaReader(files.longLine, { bufferSize: 1024 }));

      expect(records).toHaveLength(1);
      expect(records[0]?.header).toBe("long");
      expect(records[0]?.length).toBe(4 * (1 << 20));
      expect(records[0]?.sequence.endsWith("ACGTACGT")).toBe(true);
    }, 20_000);

    test("fails with SourceNotFoundError when the file does not exist", async () => {
      const reader = new FastaReader(files.nonexistent);

      await expect(collect(reader)).rejects.toBeInstanceOf(SourceNotFoundError);
      await expect(collect(reader)).rejects.toMatchObject({
        code: "SOURCE_NOT_FOUND",
        filePath: files.nonexistent,
        operation: "open",
      });
    });

    test("fails with SourceNotFoundError for a directory", async () => {
      await expect(collect(new FastaReader(files.directory))).rejects.toBeInstanceOf(
        SourceNotFoundError
      );
    });

    test("rejects invalid reader options as a FileError", async () => {
      const reader = new FastaReader(files.twoRecords, { bufferSize: 10 });

      await expect(collect(reader)).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("resource use", () => {
    test.skipIf(!existsSync(FD_DIR))("closes the file when iteration stops early", async () => {
      const before = openDescriptorCount();
      const reader = new FastaReader(files.large, { bufferSize: 1024 });

      for await (const record of reader.records()) {
        expect(record.header).toBe("seq0");
        expect(openDescriptorCount()).toBeGreaterThan(before);
        break;
      }

      await vi.waitFor(() => expect(openDescriptorCount()).toBe(before));
    });

    test.skipIf(!existsSync(FD_DIR))("closes the file after a full read", async () => {
      const before = openDescriptorCount();

      expect(await collect(new FastaReader(files.twoRecords))).toHaveLength(2);

      await vi.waitFor(() => expect(openDescriptorCount()).toBe(before));
    });

    test("does not read far ahead of the consumer", async () => {
      const reader = new FastaReader(files.bulky);
      const before = process.memoryUsage().arrayBuffers;

      for await (const record of reader.records()) {
        expect(record.header).toBe("s0");
        await new Promise((resolve) => setTimeout(resolve, 200));

        expect(process.memoryUsage().arrayBuffers - before).toBeLessThan(8 * 1024 * 1024);
        break;
      }
    });
  });
});
