/**
 * Catalog report normalization
 *
 * Converts the `@graph` rows of experiment and file reports into the
 * records resolution works on. Rows are validated with arktype first;
 * a malformed report is a ParseError, never a partial result.
 *
 * @module metadata/normalize
 */

import { type } from "arktype";
import { ParseError } from "../errors";
import type {
  ExperimentRecord,
  FileRecord,
  MetadataCollections,
  ReplicateDescriptor,
  WarningHandler,
} from "../types";
import { DEFAULT_SERVER, stripTrailingSlash } from "./queries";

// =============================================================================
// REPORT SCHEMAS
// =============================================================================

const FileLinkSchema = type({
  "href?": "string",
  "s3_uri?": "string",
});

const ReplicateRowSchema = type({
  "antibody?": {
    "targets?": "string[]",
  },
  "library?": {
    "biosample?": {
      "organism?": {
        "scientific_name?": "string",
      },
    },
  },
});

export const ExperimentRowSchema = type({
  "@id": "string>0",
  accession: "string>0",
  assay_title: "string",
  "control_type?": "string | null",
  "possible_controls?": type({ "@id": "string>0" }).array(),
  "replicates?": ReplicateRowSchema.array(),
  "files?": FileLinkSchema.array(),
});

export const FileRowSchema = type({
  "@id": "string>0",
  dataset: "string>0",
  file_format: "'fastq' | 'bam'",
  status: "string",
  "biological_replicates?": "number[]",
  "paired_end?": "string | null",
  "paired_with?": "string | null",
  "run_type?": "string | null",
  "mapped_run_type?": "string | null",
  "read_length?": "number | null",
  "cropped_read_length?": "number | null",
  "cropped_read_length_tolerance?": "number | null",
  "href?": "string",
  "s3_uri?": "string",
  "replicate?": {
    "status?": "string",
  },
});

export const ExperimentReportSchema = type({ "@graph": ExperimentRowSchema.array() });
export const FileReportSchema = type({ "@graph": FileRowSchema.array() });
export const SearchResultSchema = type({ "@graph": type({ "@id": "string>0" }).array() });

export type ExperimentRow = typeof ExperimentRowSchema.infer;
export type FileRow = typeof FileRowSchema.infer;
export type ExperimentReport = typeof ExperimentReportSchema.infer;
export type FileReport = typeof FileReportSchema.infer;
export type SearchResult = typeof SearchResultSchema.infer;

/**
 * A saved set of catalog responses for one batch
 */
export const CatalogSnapshotSchema = type({
  experimentReports: ExperimentReportSchema.array(),
  fileReports: FileReportSchema.array(),
  wildtypeControlSearch: SearchResultSchema,
});

export type CatalogSnapshot = typeof CatalogSnapshotSchema.infer;

// =============================================================================
// NORMALIZATION
// =============================================================================

export interface NormalizeOptions {
  /** Prefix for relative `href` links */
  readonly server?: string;
  /** Use storage URIs instead of download links */
  readonly useS3Uris?: boolean;
  readonly onWarning?: WarningHandler;
}

type FileLink = typeof FileLinkSchema.infer;

/**
 * Download link or storage URI of a file, if the row has one
 */
export function fileLink(link: FileLink, options: NormalizeOptions = {}): string | undefined {
  if (options.useS3Uris === true) return link.s3_uri;
  if (link.href === undefined) return undefined;
  return `${stripTrailingSlash(options.server ?? DEFAULT_SERVER)}${link.href}`;
}

function optional<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function normalizeReplicate(row: typeof ReplicateRowSchema.infer): ReplicateDescriptor {
  return {
    antibodyTargets:
      row.antibody === undefined ? undefined : (row.antibody.targets ?? []),
    organism: row.library?.biosample?.organism?.scientific_name,
  };
}

export function normalizeExperiment(
  row: ExperimentRow,
  options: NormalizeOptions = {}
): ExperimentRecord {
  const files: string[] = [];
  for (const link of row.files ?? []) {
    const uri = fileLink(link, options);
    if (uri !== undefined) files.push(uri);
  }
  return {
    id: row["@id"],
    accession: row.accession,
    assayTitle: row.assay_title,
    controlType: optional(row.control_type),
    replicates: (row.replicates ?? []).map(normalizeReplicate),
    files,
    possibleControls: (row.possible_controls ?? []).map((control) => control["@id"]),
  };
}

/**
 * Normalize one file row; rows without a usable link yield undefined
 */
export function normalizeFile(
  row: FileRow,
  options: NormalizeOptions = {}
): FileRecord | undefined {
  const uri = fileLink(row, options);
  if (uri === undefined) {
    options.onWarning?.(`File ${row["@id"]} has no ${options.useS3Uris === true ? "s3_uri" : "href"}; skipped`);
    return undefined;
  }
  return {
    uri,
    id: row["@id"],
    dataset: row.dataset,
    format: row.file_format,
    status: row.status,
    replicateStatus: row.replicate?.status,
    biologicalReplicate: row.biological_replicates?.[0],
    pairedEnd: optional(row.paired_end),
    pairedWith: optional(row.paired_with),
    runType: optional(row.run_type),
    readLength: optional(row.read_length),
    mappedRunType: optional(row.mapped_run_type),
    croppedReadLength: optional(row.cropped_read_length),
    croppedReadLengthTolerance: optional(row.cropped_read_length_tolerance),
  };
}

/**
 * Datasets whose files are needed: the experiments and all their
 * candidate controls, first occurrence kept
 */
export function datasetsToRetrieve(rows: readonly ExperimentRow[]): string[] {
  const datasets = new Set<string>();
  for (const row of rows) datasets.add(row["@id"]);
  for (const row of rows) {
    for (const control of row.possible_controls ?? []) datasets.add(control["@id"]);
  }
  return [...datasets];
}

/**
 * Build metadata collections from a catalog snapshot
 *
 * Experiments are ordered by accession. A file reported more than once
 * (shared controls appear in several dataset chunks) is kept once.
 */
export function normalizeSnapshot(
  snapshot: CatalogSnapshot,
  options: NormalizeOptions = {}
): MetadataCollections {
  const experiments = snapshot.experimentReports
    .flatMap((report) => report["@graph"])
    .map((row) => normalizeExperiment(row, options))
    .sort((a, b) => (a.accession < b.accession ? -1 : a.accession > b.accession ? 1 : 0));

  const files = new Map<string, FileRecord>();
  for (const report of snapshot.fileReports) {
    for (const row of report["@graph"]) {
      const file = normalizeFile(row, options);
      if (file !== undefined && !files.has(file.uri)) files.set(file.uri, file);
    }
  }

  return {
    experiments,
    files: [...files.values()],
    wildtypeControls: snapshot.wildtypeControlSearch["@graph"].map((hit) => hit["@id"]),
  };
}

const SnapshotJsonSchema = type("string.json.parse").pipe(CatalogSnapshotSchema);

/**
 * Parse snapshot JSON text
 *
 * @throws {ParseError} When the text is not JSON or does not match the report schemas
 */
export function parseSnapshot(text: string): CatalogSnapshot {
  const result = SnapshotJsonSchema(text);
  if (result instanceof type.errors) {
    throw new ParseError(`Invalid catalog snapshot: ${result.summary}`, "json");
  }
  return result;
}
