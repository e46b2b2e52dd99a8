/**
 * Builders for metadata records used across resolution tests
 *
 * Defaults describe a released, single-ended, 50 bp human TF experiment;
 * each test overrides only what it exercises.
 */

import type {
  ExperimentRecord,
  ExperimentRequest,
  FileRecord,
  MetadataCollections,
} from "../../src/types";
import { DEFAULT_ALLOWED_STATUSES } from "../../src/types";

export const ALLOWED = new Set(DEFAULT_ALLOWED_STATUSES);

export const CTCF_TARGET = "/targets/CTCF-human/";

export function experimentId(accession: string): string {
  return `/experiments/${accession}/`;
}

export function fastqUri(name: string): string {
  return `s3://test-bucket/${name}.fastq.gz`;
}

export function bamUri(name: string): string {
  return `s3://test-bucket/${name}.bam`;
}

export function fastqFile(
  name: string,
  dataset: string,
  overrides: Partial<FileRecord> = {}
): FileRecord {
  return {
    uri: fastqUri(name),
    id: `/files/${name}/`,
    dataset,
    format: "fastq",
    status: "released",
    replicateStatus: "released",
    biologicalReplicate: 1,
    runType: "single-ended",
    readLength: 50,
    ...overrides,
  };
}

/**
 * Mate 1 and mate 2 of a paired-end run, linked through pairedWith
 */
export function pairedFastqs(
  mate1: string,
  mate2: string,
  dataset: string,
  overrides: Partial<FileRecord> = {}
): [FileRecord, FileRecord] {
  return [
    fastqFile(mate1, dataset, {
      runType: "paired-ended",
      pairedEnd: "1",
      pairedWith: `/files/${mate2}/`,
      ...overrides,
    }),
    fastqFile(mate2, dataset, {
      runType: "paired-ended",
      pairedEnd: "2",
      pairedWith: `/files/${mate1}/`,
      ...overrides,
    }),
  ];
}

export function bamFile(
  name: string,
  dataset: string,
  overrides: Partial<FileRecord> = {}
): FileRecord {
  return {
    uri: bamUri(name),
    id: `/files/${name}/`,
    dataset,
    format: "bam",
    status: "released",
    biologicalReplicate: 1,
    mappedRunType: "single-ended",
    croppedReadLength: 50,
    croppedReadLengthTolerance: 2,
    ...overrides,
  };
}

export function experiment(
  accession: string,
  overrides: Partial<ExperimentRecord> = {}
): ExperimentRecord {
  return {
    id: experimentId(accession),
    accession,
    assayTitle: "TF ChIP-seq",
    replicates: [{ antibodyTargets: [CTCF_TARGET], organism: "Homo sapiens" }],
    files: [],
    possibleControls: [],
    ...overrides,
  };
}

export function controlExperiment(
  accession: string,
  overrides: Partial<ExperimentRecord> = {}
): ExperimentRecord {
  return experiment(accession, {
    assayTitle: "Control ChIP-seq",
    controlType: "control",
    replicates: [{ organism: "Homo sapiens" }],
    ...overrides,
  });
}

export function request(accession: string, overrides: Partial<ExperimentRequest> = {}): ExperimentRequest {
  return { accession, alignOnly: false, ...overrides };
}

export function collections(
  experiments: readonly ExperimentRecord[],
  files: readonly FileRecord[],
  wildtypeControls: readonly string[] = []
): MetadataCollections {
  return { experiments, files, wildtypeControls };
}

/**
 * A TF experiment with one control, each single-ended at 50 bp, with a
 * matching control bam: the smallest batch that resolves cleanly
 */
export function resolvableBatch(accession = "ENCSR000EXP", control = "ENCSR000CTL"): MetadataCollections {
  const fastq = fastqFile(`${accession}R1`, experimentId(accession));
  return collections(
    [
      experiment(accession, {
        files: [fastq.uri],
        possibleControls: [experimentId(control)],
      }),
    ],
    [
      fastq,
      fastqFile(`${control}R1`, experimentId(control)),
      bamFile(`${control}BAM`, experimentId(control)),
    ]
  );
}
