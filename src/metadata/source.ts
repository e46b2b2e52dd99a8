/**
 * Metadata sources as an Effect service
 *
 * Synthesis only needs MetadataCollections; where they come from is a
 * layer choice. The snapshot layer reads saved catalog reports from disk;
 * tests provide collections directly.
 *
 * @module metadata/source
 */

import { FileSystem } from "@effect/platform";
import { Context, Effect, Layer } from "effect";
import type { ChipForgeError } from "../errors";
import { ParseError } from "../errors";
import type { SynthesisOptions } from "../config/synthesize";
import { synthesizeConfigurations } from "../config/synthesize";
import { readText } from "../io/file-reader";
import { runWithPlatform } from "../io/runtime";
import type { ExperimentRequest, MetadataCollections, SynthesisReport } from "../types";
import type { NormalizeOptions } from "./normalize";
import { normalizeSnapshot, parseSnapshot } from "./normalize";

export interface MetadataSourceShape {
  /**
   * Collections covering the given experiments, their controls, and the
   * files of both
   */
  readonly load: (
    accessions: readonly string[]
  ) => Effect.Effect<MetadataCollections, ChipForgeError>;
}

function restrictTo(
  collections: MetadataCollections,
  accessions: readonly string[]
): MetadataCollections {
  const wanted = new Set(accessions);
  return {
    ...collections,
    experiments: collections.experiments.filter((experiment) => wanted.has(experiment.accession)),
  };
}

/**
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const source = yield* MetadataSource;
 *   return yield* source.load(["ENCSR000AAA"]);
 * });
 *
 * await runWithPlatform(program.pipe(Effect.provide(MetadataSource.snapshot("batch.json.gz"))));
 * ```
 */
export class MetadataSource extends Context.Tag("@chipforge/MetadataSource")<
  MetadataSource,
  MetadataSourceShape
>() {
  /**
   * Fixed, already-normalized collections
   */
  static fromCollections(collections: MetadataCollections): Layer.Layer<MetadataSource> {
    return Layer.succeed(MetadataSource, {
      load: (accessions) => Effect.succeed(restrictTo(collections, accessions)),
    });
  }

  /**
   * Saved catalog reports, plain or gzipped JSON
   *
   * The file is read and normalized on each load.
   */
  static snapshot(
    path: string,
    options: NormalizeOptions = {}
  ): Layer.Layer<MetadataSource, never, FileSystem.FileSystem> {
    return Layer.effect(
      MetadataSource,
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        return {
          load: (accessions: readonly string[]) =>
            Effect.gen(function* () {
              const text = yield* readText(path);
              const snapshot = yield* Effect.try({
                try: () => parseSnapshot(text),
                catch: (error) =>
                  error instanceof ParseError ? error : new ParseError(String(error), "json"),
              });
              yield* Effect.logDebug(`Loaded catalog snapshot ${path}`);
              return restrictTo(normalizeSnapshot(snapshot, options), accessions);
            }).pipe(Effect.provideService(FileSystem.FileSystem, fs)),
        };
      })
    );
  }
}

/**
 * Load metadata for the requests from the provided source and synthesize
 */
export const synthesizeFromSource = (
  requests: readonly ExperimentRequest[],
  options: SynthesisOptions = {}
): Effect.Effect<SynthesisReport, ChipForgeError, MetadataSource> =>
  Effect.gen(function* () {
    const source = yield* MetadataSource;
    const metadata = yield* source.load(requests.map((request) => request.accession));
    return yield* synthesizeConfigurations(metadata, requests, options);
  });

/**
 * Synthesize configurations from a catalog snapshot on disk
 *
 * @throws {FileError} If the snapshot cannot be read
 * @throws {ParseError} If the snapshot is malformed
 * @throws {ValidationError} If options fail validation
 */
export async function generateFromSnapshot(
  snapshotPath: string,
  requests: readonly ExperimentRequest[],
  options: SynthesisOptions & NormalizeOptions = {}
): Promise<SynthesisReport> {
  const program = synthesizeFromSource(requests, options).pipe(
    Effect.provide(MetadataSource.snapshot(snapshotPath, options))
  );
  return runWithPlatform(program);
}
