/**
 * File writing through the Effect platform FileSystem
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { runWithPlatform } from "./runtime";

/**
 * Create a directory and its parents; an existing directory is fine
 */
export const ensureDirectory = (
  path: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (path === "") return;
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .makeDirectory(path, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path, error)));
  });

/**
 * Write a UTF-8 string, replacing any existing file
 */
export const writeText = (
  path: string,
  content: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFileString(path, content)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
  });

/**
 * @throws {FileError} When the write fails
 */
export async function writeString(path: string, content: string): Promise<void> {
  await runWithPlatform(writeText(path, content));
}
