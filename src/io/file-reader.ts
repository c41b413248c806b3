/**
 * File reading utilities on top of the Effect platform FileSystem
 *
 * Every helper runs a small Effect program against the Node.js platform
 * layer and turns platform failures into FileError.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { FileError, SourceNotFoundError } from "../errors";
import type { FileMetadata, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536, // 64KB
  encoding: "utf8",
};

/** Chunks the file stream may read ahead of the consumer */
const READ_AHEAD_CHUNKS = 4;

const platform = NodeContext.layer;

/**
 * Check if a path names an existing regular file
 *
 * @throws {FileError} If path validation fails or the file cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(platform)));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get size, modification time and extension of a file
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    const dot = validatedPath.lastIndexOf(".");
    const slash = validatedPath.lastIndexOf("/");

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrUndefined(info.mtime),
      extension: dot > slash ? validatedPath.substring(dot) : "",
    };
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(platform)));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * Reads `bufferSize` bytes at a time and holds at most a few reads ahead of
 * the consumer. Cancelling the returned stream stops the read and closes the
 * file.
 *
 * @throws {SourceNotFoundError} If the path is not an existing file
 * @throws {FileError} If the stream cannot be created
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new SourceNotFoundError(validatedPath);
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    // chunkSize is bytes per read; Effect's bufferSize counts chunks held ahead
    const effectStream = fs.stream(validatedPath, {
      chunkSize: mergedOptions.bufferSize,
      bufferSize: READ_AHEAD_CHUNKS,
    });
    return Stream.toReadableStream(effectStream);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(platform)));
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }
}

/**
 * Read up to `byteCount` bytes from the start of a file
 *
 * The file is opened in a scope and closed before this resolves, whether the
 * read succeeded or not. An empty file gives an empty array.
 *
 * @throws {FileError} If the file cannot be opened or read
 */
export async function readHead(path: string, byteCount: number): Promise<Uint8Array> {
  const validatedPath = validatePath(path);

  const program = Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(validatedPath, { flag: "r" });
      const head = yield* file.readAlloc(byteCount);
      return Option.getOrElse(head, () => new Uint8Array(0));
    })
  );

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(platform)));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Merge user options with defaults after arktype validation
 *
 * @throws {FileError} If the options are out of bounds
 */
export function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...options };
}

export const FileReader = {
  exists,
  getMetadata,
  createStream,
  readHead,
} as const;

/**
 * Validate file path using ArkType
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
