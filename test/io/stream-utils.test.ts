import { describe, expect, test } from "vitest";
import { LineSplitter, readLines, splitLines } from "../../src/io/stream-utils";

function streamOf(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk);
      controller.close();
    },
  });
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const collected: string[] = [];
  for await (const line of lines) collected.push(line);
  return collected;
}

describe("LineSplitter", () => {
  test("splits on LF and CRLF and keeps the unfinished tail", () => {
    const splitter = new LineSplitter();

    expect(splitter.push("a\nb\r\nc")).toEqual(["a", "b"]);
    expect(splitter.flush()).toEqual(["c"]);
  });

  test("treats a lone CR as a line ending", () => {
    const splitter = new LineSplitter();

    expect(splitter.push("a\rb")).toEqual(["a"]);
    expect(splitter.flush()).toEqual(["b"]);
  });

  test("pairs a CR at the end of one chunk with an LF at the start of the next", () => {
    const splitter = new LineSplitter();

    expect(splitter.push("a\r")).toEqual(["a"]);
    expect(splitter.push("\nb")).toEqual([]);
    expect(splitter.flush()).toEqual(["b"]);
  });

  test("keeps the pairing across an empty chunk", () => {
    const splitter = new LineSplitter();

    expect(splitter.push("a\r")).toEqual(["a"]);
    expect(splitter.push("")).toEqual([]);
    expect(splitter.push("\nb\n")).toEqual(["b"]);
    expect(splitter.flush()).toEqual([]);
  });

  test("a CR followed by other text ends the line", () => {
    const splitter = new LineSplitter();

    expect(splitter.push("a\r")).toEqual(["a"]);
    expect(splitter.push("b")).toEqual([]);
    expect(splitter.flush()).toEqual(["b"]);
  });

  test("returns empty lines between consecutive endings", () => {
    expect(new LineSplitter().push("\n\n")).toEqual(["", ""]);
  });

  test("assembles one long line from many small chunks", () => {
    const splitter = new LineSplitter();
    const piece = "ACGT".repeat(16);

    for (let i = 0; i < 10_000; i++) {
      expect(splitter.push(piece)).toEqual([]);
    }
    const [line] = splitter.push("\n");

    expect(line?.length).toBe(640_000);
    expect(line?.startsWith("ACGTACGT")).toBe(true);
  });
});

describe("splitLines", () => {
  test("includes the last line without a terminator", () => {
    expect(splitLines("a\n\nb")).toEqual(["a", "", "b"]);
  });

  test("does not add an empty line after a final terminator", () => {
    expect(splitLines("a\n")).toEqual(["a"]);
    expect(splitLines("a\r\nb\r")).toEqual(["a", "b"]);
  });

  test("returns no lines for empty text", () => {
    expect(splitLines("")).toEqual([]);
  });
});

describe("readLines", () => {
  const encoder = new TextEncoder();

  test("joins lines split across chunks", async () => {
    const chunks = ["li", "ne1\r", "\nline2\n", "\n", "line3"].map((chunk) => encoder.encode(chunk));

    expect(await collect(readLines(streamOf(chunks)))).toEqual(["line1", "line2", "", "line3"]);
  });

  test("drops a trailing lone CR", async () => {
    expect(await collect(readLines(streamOf([encoder.encode("a\r")])))).toEqual(["a"]);
  });

  test("decodes latin1 when asked", async () => {
    const bytes = new Uint8Array([0x3e, 0xe9, 0x0a, 0x41]);

    expect(await collect(readLines(streamOf([bytes]), "latin1"))).toEqual([">é", "A"]);
  });

  test("pairs CR and LF split across chunks into one ending", async () => {
    const chunks = ["a\r", "\nb"].map((chunk) => encoder.encode(chunk));

    expect(await collect(readLines(streamOf(chunks)))).toEqual(["a", "b"]);
  });

  test("yields nothing for an empty stream", async () => {
    expect(await collect(readLines(streamOf([])))).toEqual([]);
  });
});
