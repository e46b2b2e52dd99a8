/**
 * chipforge - ChIP-seq pipeline input synthesis
 *
 * Resolves catalog metadata for a batch of experiments into pipeline
 * input configurations, one per valid experiment, plus a per-experiment
 * error report for everything that could not be resolved.
 */

// Error types
export {
  ChipForgeError,
  ErrorTag,
  FileError,
  ParseError,
  type StageFailure,
  type StageResult,
  ValidationError,
} from "./errors";

// Records and schemas
export {
  AssayTitle,
  type AssetBundle,
  type ConfigurationRecord,
  DEFAULT_ALLOWED_STATUSES,
  type ErrorRecord,
  type ExperimentRecord,
  type ExperimentRequest,
  ExperimentRequestSchema,
  type FileRecord,
  type MetadataCollections,
  type WildtypeControlSet,
  MetadataCollectionsSchema,
  type PipelineType,
  RunType,
  type SynthesisReport,
  type WarningHandler,
} from "./types";

// Synthesis
export {
  assembleConfiguration,
  buildDescription,
  CONFIG_KEY_ORDER,
} from "./config/assembler";
export {
  generateConfigurations,
  resolveExperiment,
  type SynthesisOptions,
  synthesizeConfigurations,
} from "./config/synthesize";

// Resolution stages
export * from "./resolve";

// Catalog metadata
export * from "./metadata";

// Requests and artifacts
export { parseRequestLists, parseRequestSheet, readRequestSheet, type RequestLists } from "./io/request-sheet";
export { type ArtifactOptions, serializeConfiguration, writeArtifacts, writeRunArtifacts } from "./io/artifacts";
export { buildCaperCommand, buildCaperScript, type CaperOptions, commandsFileName } from "./launch/caper";
