/**
 * Run artifacts on disk
 *
 * Writes one `{description}.json` per configuration, with keys in
 * canonical order and four-space indentation, and the caper commands
 * script when there is at least one configuration.
 *
 * @module io/artifacts
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import type { FileError } from "../errors";
import { CONFIG_KEY_ORDER } from "../config/assembler";
import { buildCaperScript, commandsFileName } from "../launch/caper";
import type { ConfigurationRecord, ExperimentRequest, SynthesisReport } from "../types";
import { ensureDirectory, writeText } from "./file-writer";
import { runWithPlatform } from "./runtime";

export interface ArtifactOptions {
  /** Directory for all artifacts; empty means the working directory */
  readonly outputPath?: string;
  readonly wdlPath: string;
  readonly gcPath?: string;
  /** Appended to the commands file name */
  readonly commandsFileMessage?: string;
}

export interface WrittenArtifacts {
  readonly configurations: readonly string[];
  readonly commands?: string;
}

/**
 * Serialize a configuration with keys in canonical order
 */
export function serializeConfiguration(configuration: ConfigurationRecord): string {
  const ordered: Record<string, unknown> = {};
  for (const key of CONFIG_KEY_ORDER) {
    const value = configuration[key];
    if (value !== undefined) ordered[key] = value;
  }
  return JSON.stringify(ordered, null, 4);
}

export const writeArtifacts = (
  report: SynthesisReport,
  requests: readonly ExperimentRequest[],
  options: ArtifactOptions
): Effect.Effect<WrittenArtifacts, FileError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const path = yield* Path.Path;
    const outputPath = options.outputPath ?? "";
    yield* ensureDirectory(outputPath);

    const configurations: string[] = [];
    for (const configuration of Object.values(report.configurations)) {
      const file = path.join(outputPath, `${configuration["chip.description"]}.json`);
      yield* writeText(file, serializeConfiguration(configuration));
      configurations.push(file);
    }

    const script = buildCaperScript(report, requests, options);
    if (script === "") {
      return { configurations };
    }
    const commands = path.join(outputPath, commandsFileName(options.commandsFileMessage));
    yield* writeText(commands, script);
    yield* Effect.logInfo(`Wrote ${configurations.length} configurations and ${commands}`);
    return { configurations, commands };
  });

/**
 * @throws {FileError} When a directory or file cannot be written
 */
export async function writeRunArtifacts(
  report: SynthesisReport,
  requests: readonly ExperimentRequest[],
  options: ArtifactOptions
): Promise<WrittenArtifacts> {
  return runWithPlatform(writeArtifacts(report, requests, options));
}
