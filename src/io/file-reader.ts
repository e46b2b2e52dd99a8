/**
 * File reading through the Effect platform FileSystem
 *
 * Gzipped inputs are detected by magic bytes and inflated transparently,
 * so catalog snapshots may be stored either way.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { gunzipSync, strFromU8 } from "fflate";
import { FileError } from "../errors";
import { runWithPlatform } from "./runtime";

const FilePathSchema = type("string>0");

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export function isGzipped(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}

/**
 * Decode file contents as UTF-8, inflating gzip first when present
 */
export function decodeText(bytes: Uint8Array): string {
  return strFromU8(isGzipped(bytes) ? gunzipSync(bytes) : bytes);
}

function validatePath(path: string): Effect.Effect<string, FileError> {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    return Effect.fail(new FileError(`Invalid file path: ${result.summary}`, path, "read"));
  }
  return Effect.succeed(result);
}

/**
 * Read a text file, possibly gzipped
 */
export const readText = (path: string): Effect.Effect<string, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const validated = yield* validatePath(path);
    const fs = yield* FileSystem.FileSystem;
    const bytes = yield* fs
      .readFile(validated)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", validated, error)));
    return yield* Effect.try({
      try: () => decodeText(bytes),
      catch: (error) => FileError.fromSystemError("read", validated, error),
    });
  });

/**
 * Read an entire file into a string
 *
 * @throws {FileError} If the file cannot be read or inflated
 */
export async function readToString(path: string): Promise<string> {
  return runWithPlatform(readText(path));
}

export async function exists(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(path);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
  return runWithPlatform(program);
}
