/**
 * Core type definitions for experiment metadata and pipeline configuration
 *
 * Metadata records are read-only views over what the catalog returned.
 * Every collection entering the synthesis run is validated against the
 * ArkType schemas at the bottom of this module.
 */

import { type } from "arktype";
import type { ErrorTag } from "./errors";

// =============================================================================
// VOCABULARY
// =============================================================================

/**
 * Assay titles the pipeline knows how to configure
 */
export const AssayTitle = {
  TF_CHIP: "TF ChIP-seq",
  HISTONE_CHIP: "Histone ChIP-seq",
  MINT_CHIP: "Mint-ChIP-seq",
  CONTROL_CHIP: "Control ChIP-seq",
  CONTROL_MINT_CHIP: "Control Mint-ChIP-seq",
} as const;

export type AssayTitle = (typeof AssayTitle)[keyof typeof AssayTitle];

export function isAssayTitle(value: string): value is AssayTitle {
  return Object.values<string>(AssayTitle).includes(value);
}

export function isMintAssay(assayTitle: string): boolean {
  return assayTitle === AssayTitle.MINT_CHIP || assayTitle === AssayTitle.CONTROL_MINT_CHIP;
}

export type PipelineType = "tf" | "histone" | "control";

export const RunType = {
  SINGLE_ENDED: "single-ended",
  PAIRED_ENDED: "paired-ended",
} as const;

export type RunType = (typeof RunType)[keyof typeof RunType];

export type FileFormat = "fastq" | "bam";

/** Highest biological replicate slot the pipeline accepts */
export const MAX_REPLICATES = 10;

/** Replicate slots are numbered 1..MAX_REPLICATES */
export type ReplicateNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10;

export const REPLICATE_NUMBERS: readonly ReplicateNumber[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

export function isReplicateNumber(value: number): value is ReplicateNumber {
  return Number.isInteger(value) && value >= 1 && value <= MAX_REPLICATES;
}

export const DEFAULT_ALLOWED_STATUSES: readonly string[] = ["released", "in progress"];

/** Catalog identifier of the eGFP tag target used by tagged TF experiments */
export const EGFP_TARGET_ID = "/targets/eGFP-avictoria/";

// =============================================================================
// METADATA RECORDS
// =============================================================================

/**
 * One replicate of an experiment as far as control resolution cares
 */
export interface ReplicateDescriptor {
  /** Antibody targets; absent when the replicate carries no antibody metadata */
  readonly antibodyTargets?: readonly string[];
  readonly organism?: string;
}

export interface ExperimentRecord {
  /** Catalog path, e.g. /experiments/ENCSR000AAA/ */
  readonly id: string;
  readonly accession: string;
  readonly assayTitle: string;
  /** Present only for control experiments */
  readonly controlType?: string;
  readonly replicates: readonly ReplicateDescriptor[];
  /** URIs of the experiment's files, in catalog order */
  readonly files: readonly string[];
  /** Catalog paths of candidate control experiments */
  readonly possibleControls: readonly string[];
}

export interface FileRecord {
  /** Download link or storage URI; unique key of the collection */
  readonly uri: string;
  /** Catalog path, the target of other files' pairedWith */
  readonly id: string;
  /** Catalog path of the parent experiment */
  readonly dataset: string;
  readonly format: FileFormat;
  readonly status: string;
  readonly replicateStatus?: string;
  readonly biologicalReplicate?: number;
  /** "1" or "2" for paired-end reads, absent for single-end */
  readonly pairedEnd?: string;
  /** Catalog path of the mate; set on mate 1 */
  readonly pairedWith?: string;
  readonly runType?: string;
  readonly readLength?: number;
  readonly mappedRunType?: string;
  readonly croppedReadLength?: number;
  readonly croppedReadLengthTolerance?: number;
}

/** Dataset ids of control experiments without applied genomic modifications */
export type WildtypeControlSet = readonly string[];

/**
 * Everything one synthesis run reads
 */
export interface MetadataCollections {
  readonly experiments: readonly ExperimentRecord[];
  readonly files: readonly FileRecord[];
  readonly wildtypeControls: WildtypeControlSet;
}

/**
 * Caller overrides for one experiment
 */
export interface ExperimentRequest {
  readonly accession: string;
  readonly alignOnly: boolean;
  readonly forceSingleEnd?: boolean;
  readonly customCropLength?: number;
  readonly multipleControls?: boolean;
  readonly redacted?: boolean;
  readonly customMessage?: string;
}

// =============================================================================
// RESOLUTION STATE AND OUTPUT
// =============================================================================

/**
 * Fastqs of one replicate slot
 */
export interface ReplicateFastqs {
  readonly r1: readonly string[];
  readonly r2: readonly string[];
}

/** Ten slots, index 0 holds replicate 1 */
export type ReplicateSlots = readonly ReplicateFastqs[];

export interface AssetBundle {
  readonly genomeTsv: string;
  readonly chromSizes: string;
  readonly referenceFasta: string;
  readonly blacklist?: string;
  readonly blacklist2?: string;
  readonly bowtie2Index?: string;
  readonly bwaIndex?: string;
}

/**
 * Mint-ChIP alignment parameters
 */
export interface AlignerParameters {
  readonly aligner: "bwa";
  readonly useBwaMemForPe: true;
  readonly bwaMemReadLenLimit: number;
}

export interface PipelineClassification {
  readonly pipelineType: PipelineType;
  readonly alignerParameters?: AlignerParameters;
}

/**
 * Per-experiment state, filled stage by stage
 */
export interface ResolvedExperimentState {
  readonly experiment: ExperimentRecord;
  readonly request: ExperimentRequest;
  readonly classification: PipelineClassification;
  readonly assets: AssetBundle;
  readonly replicates: ReplicateSlots;
  readonly minReadLength: number;
  readonly runType: RunType;
  readonly controls: readonly string[];
  readonly pairedEnd: boolean;
  /** Crop length written to the configuration */
  readonly cropLength: number;
  /** Read length used to find control alignments */
  readonly combinedMinReadLength: number;
  readonly controlBams: readonly string[];
}

export type FastqKey = `chip.fastqs_rep${ReplicateNumber}_R${1 | 2}`;

/**
 * Scalar and list fields of a pipeline input record
 */
export interface ConfigurationFields {
  "chip.title": string;
  "chip.description": string;
  "chip.pipeline_type": PipelineType;
  "chip.align_only": boolean;
  "chip.paired_end": boolean;
  "chip.crop_length"?: number;
  "chip.crop_length_tol"?: number;
  "chip.genome_tsv"?: string;
  "chip.ref_fa"?: string;
  "chip.bowtie2_idx_tar"?: string;
  "chip.bwa_idx_tar"?: string;
  "chip.chrsz"?: string;
  "chip.blacklist"?: string;
  "chip.blacklist2"?: string;
  "chip.ctl_nodup_bams"?: string[];
  "chip.redact_nodup_bam"?: boolean;
  "chip.always_use_pooled_ctl"?: boolean;
  "chip.aligner"?: string;
  "chip.use_bwa_mem_for_pe"?: boolean;
  "chip.bwa_mem_read_len_limit"?: number;
}

export type FastqFields = { [K in FastqKey]?: string[] };

/**
 * One pipeline input record
 *
 * Keys are emitted in canonical order; see CONFIG_KEY_ORDER.
 */
export type ConfigurationRecord = ConfigurationFields & FastqFields;

export interface ErrorRecord {
  readonly accession: string;
  readonly tag: ErrorTag;
  readonly message: string;
}

export interface SynthesisReport {
  /** Valid configurations, ordered by accession */
  readonly configurations: Readonly<Record<string, ConfigurationRecord>>;
  /** Excluded experiments, ordered by accession, one or more entries each */
  readonly errors: Readonly<Record<string, readonly ErrorRecord[]>>;
}

/**
 * Warning hook shared by the pure resolution stages
 */
export type WarningHandler = (warning: string, accession?: string) => void;

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

export const ReplicateDescriptorSchema = type({
  "antibodyTargets?": "string[]",
  "organism?": "string",
});

export const ExperimentRecordSchema = type({
  id: "string>0",
  accession: "string>0",
  assayTitle: "string",
  "controlType?": "string",
  replicates: ReplicateDescriptorSchema.array(),
  files: "string[]",
  possibleControls: "string[]",
});

export const FileRecordSchema = type({
  uri: "string>0",
  id: "string>0",
  dataset: "string>0",
  format: "'fastq' | 'bam'",
  status: "string",
  "replicateStatus?": "string",
  "biologicalReplicate?": "number.integer",
  "pairedEnd?": "string",
  "pairedWith?": "string",
  "runType?": "string",
  "readLength?": "number>0",
  "mappedRunType?": "string",
  "croppedReadLength?": "number>0",
  "croppedReadLengthTolerance?": "number>=0",
});

export const MetadataCollectionsSchema = type({
  experiments: ExperimentRecordSchema.array(),
  files: FileRecordSchema.array(),
  wildtypeControls: "string[]",
}).narrow((collections, ctx) => {
  const seen = new Set<string>();
  for (const file of collections.files) {
    if (seen.has(file.uri)) {
      return ctx.reject({
        expected: "unique file URIs",
        actual: `duplicate ${file.uri}`,
        path: ["files"],
      });
    }
    seen.add(file.uri);
  }
  return true;
});

export const ExperimentRequestSchema = type({
  accession: "string>0",
  alignOnly: "boolean",
  "forceSingleEnd?": "boolean",
  "customCropLength?": "number.integer",
  "multipleControls?": "boolean",
  "redacted?": "boolean",
  "customMessage?": "string",
}).narrow((request, ctx) => {
  if (request.customCropLength !== undefined && request.customCropLength <= 0) {
    return ctx.reject({
      expected: "a positive crop length",
      actual: String(request.customCropLength),
      path: ["customCropLength"],
    });
  }
  return true;
});
