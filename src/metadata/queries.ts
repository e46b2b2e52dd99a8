/**
 * Catalog report queries
 *
 * The catalog limits URL length, so identifier lists are sent in chunks
 * of QUERY_CHUNK_SIZE.
 *
 * @module metadata/queries
 */

import type { FileFormat } from "../types";

export const DEFAULT_SERVER = "https://www.encodeproject.org";

export const QUERY_CHUNK_SIZE = 100;

const EXPERIMENT_FIELDS = [
  "@id",
  "accession",
  "assay_title",
  "control_type",
  "possible_controls",
  "replicates.antibody.targets",
  "files.s3_uri",
  "files.href",
  "replicates.library.biosample.organism.scientific_name",
] as const;

const FILE_FIELDS = [
  "@id",
  "dataset",
  "file_format",
  "biological_replicates",
  "paired_end",
  "paired_with",
  "run_type",
  "mapped_run_type",
  "read_length",
  "cropped_read_length",
  "cropped_read_length_tolerance",
  "status",
  "s3_uri",
  "href",
  "replicate.status",
] as const;

export function stripTrailingSlash(path: string): string {
  return path.replace(/\/+$/, "");
}

function fieldParameters(fields: readonly string[]): string {
  return fields.map((field) => `&field=${field}`).join("");
}

export function buildExperimentReportQuery(accessions: readonly string[], server: string): string {
  return (
    `${stripTrailingSlash(server)}/report/?type=Experiment` +
    `&accession=${accessions.join("&accession=")}` +
    fieldParameters(EXPERIMENT_FIELDS) +
    "&limit=all&format=json"
  );
}

/**
 * File report over a set of datasets
 *
 * Fastq reports return raw reads; bam reports return current-award
 * alignments, redacted or not. Legacy assemblies are excluded for both.
 */
export function buildFileReportQuery(
  datasets: readonly string[],
  server: string,
  format: FileFormat
): string {
  const filters =
    format === "fastq"
      ? "&file_format=fastq&output_type=reads"
      : "&award.rfa=ENCODE4&file_format=bam&output_type=alignments&output_type=redacted alignments";

  return (
    `${stripTrailingSlash(server)}/report/?type=File` +
    `&dataset=${datasets.join("&dataset=")}` +
    "&status=released&status=in+progress" +
    "&assembly!=hg19&assembly!=mm9" +
    filters +
    fieldParameters(FILE_FIELDS) +
    "&limit=all&format=json"
  );
}

/**
 * Control ChIP-seq experiments whose biosamples carry no genetic modification
 */
export function buildWildtypeControlQuery(server: string): string {
  return (
    `${stripTrailingSlash(server)}/search/?type=Experiment` +
    "&assay_title=Control+ChIP-seq" +
    "&replicates.library.biosample.applied_modifications%21=%2A" +
    "&limit=all"
  );
}

export function chunk<T>(items: readonly T[], size: number = QUERY_CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

/**
 * Every query URL needed for a batch of accessions, in request order
 *
 * File queries depend on the experiment report (control datasets are
 * only known after it), so they are built from its rows.
 */
export function buildFileReportQueries(datasets: readonly string[], server: string): string[] {
  const unique = [...new Set(datasets)];
  return chunk(unique).flatMap((group) => [
    buildFileReportQuery(group, server, "fastq"),
    buildFileReportQuery(group, server, "bam"),
  ]);
}

export function buildExperimentReportQueries(
  accessions: readonly string[],
  server: string
): string[] {
  return chunk(accessions).map((group) => buildExperimentReportQuery(group, server));
}
