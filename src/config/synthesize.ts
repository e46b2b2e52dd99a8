/**
 * Batch synthesis of pipeline configurations
 *
 * Each requested experiment is resolved independently against the shared,
 * read-only metadata collections and produces its own outcome; outcomes
 * are merged into one report at the end. No experiment's failure affects
 * another's.
 *
 * @example
 * ```typescript
 * const report = await generateConfigurations(metadata, [
 *   { accession: "ENCSR000AAA", alignOnly: false },
 * ]);
 * for (const [accession, errors] of Object.entries(report.errors)) {
 *   console.error(accession, errors.map((e) => e.tag));
 * }
 * ```
 *
 * @module config/synthesize
 */

import { type } from "arktype";
import { Effect, Either } from "effect";
import type { StageFailure } from "../errors";
import { ErrorTag, ValidationError } from "../errors";
import { selectExperimentAssets } from "../resolve/assets";
import { matchControlBams } from "../resolve/control-bams";
import { resolveControls } from "../resolve/controls";
import { resolveReadProfile } from "../resolve/endedness";
import type { FileIndex } from "../resolve/file-index";
import { buildFileIndex, usableExperimentFastqs } from "../resolve/file-index";
import { classifyPipeline } from "../resolve/pipeline-type";
import { assignReplicateFastqs } from "../resolve/replicates";
import type {
  ConfigurationRecord,
  ErrorRecord,
  ExperimentRecord,
  ExperimentRequest,
  MetadataCollections,
  SynthesisReport,
  WarningHandler,
} from "../types";
import {
  DEFAULT_ALLOWED_STATUSES,
  ExperimentRequestSchema,
  MetadataCollectionsSchema,
} from "../types";
import { assembleConfiguration } from "./assembler";

export interface SynthesisOptions {
  /** File and replicate statuses considered usable */
  allowedStatuses?: readonly string[];
  /** Experiments resolved at once */
  concurrency?: number;
  onWarning?: WarningHandler;
}

const DEFAULT_OPTIONS = {
  allowedStatuses: DEFAULT_ALLOWED_STATUSES,
  concurrency: 8,
} as const;

export const SynthesisOptionsSchema = type({
  "allowedStatuses?": "string[]",
  "concurrency?": "number.integer",
  "onWarning?": "unknown",
}).narrow((options, ctx) => {
  if (options.concurrency !== undefined && options.concurrency < 1) {
    return ctx.reject({
      expected: "concurrency >= 1",
      actual: `concurrency=${options.concurrency}`,
      path: ["concurrency"],
    });
  }
  if (options.allowedStatuses !== undefined && options.allowedStatuses.length === 0) {
    return ctx.reject({
      expected: "at least one allowed status",
      actual: "an empty list",
      path: ["allowedStatuses"],
    });
  }
  return true;
});

/**
 * Shared, read-only inputs for resolving any experiment of a run
 */
export interface ResolutionContext {
  readonly experiments: ReadonlyMap<string, ExperimentRecord>;
  readonly index: FileIndex;
  readonly wildtypeControls: ReadonlySet<string>;
  readonly allowedStatuses: ReadonlySet<string>;
  readonly onWarning?: WarningHandler;
}

export type ExperimentOutcome =
  | {
      readonly accession: string;
      readonly success: true;
      readonly configuration: ConfigurationRecord;
    }
  | {
      readonly accession: string;
      readonly success: false;
      readonly failures: readonly StageFailure[];
    };

/**
 * Validate raw metadata collections before a run
 *
 * @throws {ValidationError} When the collections do not match the record schemas
 */
export function validateMetadata(raw: unknown): MetadataCollections {
  const result = MetadataCollectionsSchema(raw);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid metadata collections: ${result.summary}`);
  }
  return result;
}

function mergeOptions(options: SynthesisOptions): {
  allowedStatuses: readonly string[];
  concurrency: number;
  onWarning?: WarningHandler;
} {
  const validation = SynthesisOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid synthesis options: ${validation.summary}`);
  }
  return {
    allowedStatuses: options.allowedStatuses ?? DEFAULT_OPTIONS.allowedStatuses,
    concurrency: options.concurrency ?? DEFAULT_OPTIONS.concurrency,
    onWarning: options.onWarning,
  };
}

/**
 * Validate caller requests; optional fields left undefined are treated as unset
 *
 * @throws {ValidationError} On the first request that fails the schema
 */
export function validateRequests(requests: readonly ExperimentRequest[]): ExperimentRequest[] {
  return requests.map((request) => {
    const present = Object.fromEntries(
      Object.entries(request).filter(([, value]) => value !== undefined)
    );
    const result = ExperimentRequestSchema(present);
    if (result instanceof type.errors) {
      throw new ValidationError(
        `Invalid request for ${request.accession}: ${result.summary}`
      );
    }
    return result;
  });
}

export function createResolutionContext(
  metadata: MetadataCollections,
  options: Pick<SynthesisOptions, "allowedStatuses" | "onWarning"> = {}
): ResolutionContext {
  const experiments = new Map<string, ExperimentRecord>();
  for (const experiment of metadata.experiments) {
    if (!experiments.has(experiment.accession)) experiments.set(experiment.accession, experiment);
  }
  return {
    experiments,
    index: buildFileIndex(metadata.files),
    wildtypeControls: new Set(metadata.wildtypeControls),
    allowedStatuses: new Set(options.allowedStatuses ?? DEFAULT_OPTIONS.allowedStatuses),
    onWarning: options.onWarning,
  };
}

function failed(accession: string, failures: readonly StageFailure[]): ExperimentOutcome {
  return { accession, success: false, failures };
}

/**
 * Resolve one experiment through every stage
 *
 * The first failing stage ends resolution for this experiment; its
 * failures become the outcome.
 */
export function resolveExperiment(
  request: ExperimentRequest,
  context: ResolutionContext
): ExperimentOutcome {
  const { accession } = request;
  const experiment = context.experiments.get(accession);
  if (experiment === undefined) {
    return failed(accession, [
      {
        tag: ErrorTag.EXPERIMENT_NOT_FOUND,
        message: `Experiment ${accession} was not returned by the catalog`,
      },
    ]);
  }

  const classification = classifyPipeline(experiment);
  if (!classification.success) return failed(accession, classification.failures);

  const assets = selectExperimentAssets(experiment);
  if (!assets.success) return failed(accession, assets.failures);

  const fastqs = usableExperimentFastqs(experiment, context.index, context.allowedStatuses);
  const replicates = assignReplicateFastqs(fastqs, context.index, {
    accession,
    forceSingleEnd: request.forceSingleEnd,
    onWarning: context.onWarning,
  });
  if (!replicates.success) return failed(accession, replicates.failures);

  const profile = resolveReadProfile(fastqs, {
    accession,
    forceSingleEnd: request.forceSingleEnd,
    customCropLength: request.customCropLength,
  });
  if (!profile.success) return failed(accession, profile.failures);

  const { pipelineType } = classification.data;
  const controls = resolveControls({
    experiment,
    pipelineType,
    runType: profile.data.runType,
    minReadLength: profile.data.minReadLength,
    forceSingleEnd: request.forceSingleEnd,
    multipleControls: request.multipleControls,
    customCropLength: request.customCropLength,
    wildtypeControls: context.wildtypeControls,
    index: context.index,
    allowedStatuses: context.allowedStatuses,
  });
  if (!controls.success) return failed(accession, controls.failures);

  let controlBams: readonly string[] = [];
  if (pipelineType !== "control") {
    const bams = matchControlBams({
      accession,
      controls: controls.data.controls,
      pairedEnd: controls.data.pairedEnd,
      combinedMinReadLength: controls.data.combinedMinReadLength,
      index: context.index,
      allowedStatuses: context.allowedStatuses,
    });
    if (!bams.success) return failed(accession, bams.failures);
    controlBams = bams.data;
  }

  const configuration = assembleConfiguration({
    experiment,
    request,
    classification: classification.data,
    assets: assets.data,
    replicates: replicates.data,
    minReadLength: profile.data.minReadLength,
    runType: profile.data.runType,
    controls: controls.data.controls,
    pairedEnd: controls.data.pairedEnd,
    cropLength: controls.data.cropLength,
    combinedMinReadLength: controls.data.combinedMinReadLength,
    controlBams,
  });
  if (!configuration.success) return failed(accession, configuration.failures);

  return { accession, success: true, configuration: configuration.data };
}

/**
 * Merge per-experiment outcomes into one report ordered by accession
 *
 * Repeated tags on one experiment are kept once, with their first message.
 */
export function mergeOutcomes(outcomes: readonly ExperimentOutcome[]): SynthesisReport {
  const sorted = [...outcomes].sort((a, b) =>
    a.accession < b.accession ? -1 : a.accession > b.accession ? 1 : 0
  );
  const configurations: Record<string, ConfigurationRecord> = {};
  const errors: Record<string, ErrorRecord[]> = {};

  for (const outcome of sorted) {
    if (outcome.success) {
      configurations[outcome.accession] = outcome.configuration;
      continue;
    }
    const entries = errors[outcome.accession] ?? [];
    for (const failure of outcome.failures) {
      if (entries.some((entry) => entry.tag === failure.tag)) continue;
      entries.push({ accession: outcome.accession, tag: failure.tag, message: failure.message });
    }
    errors[outcome.accession] = entries;
  }

  return { configurations, errors };
}

/**
 * Requests sorted by accession with later duplicates dropped
 */
export function normalizeRequests(requests: readonly ExperimentRequest[]): ExperimentRequest[] {
  const seen = new Set<string>();
  const unique: ExperimentRequest[] = [];
  for (const request of requests) {
    if (seen.has(request.accession)) continue;
    seen.add(request.accession);
    unique.push(request);
  }
  return unique.sort((a, b) => (a.accession < b.accession ? -1 : a.accession > b.accession ? 1 : 0));
}

function resolveLogged(
  request: ExperimentRequest,
  context: ResolutionContext
): Effect.Effect<ExperimentOutcome> {
  return Effect.gen(function* () {
    const warnings: string[] = [];
    const outcome = resolveExperiment(request, {
      ...context,
      onWarning: (warning, accession) => {
        warnings.push(warning);
        context.onWarning?.(warning, accession);
      },
    });

    for (const warning of warnings) {
      yield* Effect.logWarning(warning);
    }
    if (outcome.success) {
      yield* Effect.logDebug(`Resolved ${outcome.configuration["chip.description"]}`);
    } else {
      for (const failure of outcome.failures) {
        yield* Effect.logWarning(`${failure.tag}: ${failure.message}`);
      }
    }
    return outcome;
  }).pipe(Effect.annotateLogs("accession", request.accession));
}

/**
 * Resolve every requested experiment and merge the outcomes
 *
 * Experiments are resolved concurrently; the report is ordered by
 * accession regardless of completion order.
 */
export function synthesizeConfigurations(
  metadata: MetadataCollections,
  requests: readonly ExperimentRequest[],
  options: SynthesisOptions = {}
): Effect.Effect<SynthesisReport, ValidationError> {
  return Effect.gen(function* () {
    const { merged, validated } = yield* Effect.try({
      try: () => ({ merged: mergeOptions(options), validated: validateRequests(requests) }),
      catch: (error) =>
        error instanceof ValidationError ? error : new ValidationError(String(error)),
    });
    const context = createResolutionContext(metadata, merged);

    const outcomes = yield* Effect.forEach(
      normalizeRequests(validated),
      (request) => resolveLogged(request, context),
      { concurrency: merged.concurrency }
    );

    const report = mergeOutcomes(outcomes);
    yield* Effect.logInfo(
      `Synthesized ${Object.keys(report.configurations).length} configurations; excluded ${Object.keys(report.errors).length} experiments`
    );
    return report;
  });
}

/**
 * Promise-based entry point for callers outside Effect
 *
 * @throws {ValidationError} When options, requests or metadata fail validation
 */
export async function generateConfigurations(
  metadata: unknown,
  requests: readonly ExperimentRequest[],
  options: SynthesisOptions = {}
): Promise<SynthesisReport> {
  const collections = validateMetadata(metadata);
  const result = await Effect.runPromise(
    Effect.either(synthesizeConfigurations(collections, requests, options))
  );
  if (Either.isLeft(result)) throw result.left;
  return result.right;
}
