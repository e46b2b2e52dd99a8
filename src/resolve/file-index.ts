/**
 * Lookup tables over the shared file collection
 *
 * Built once per run and only read afterwards, so experiments resolved
 * concurrently can share one index.
 */

import type { ExperimentRecord, FileRecord } from "../types";

export interface FileIndex {
  readonly byUri: ReadonlyMap<string, FileRecord>;
  readonly byId: ReadonlyMap<string, FileRecord>;
  /** Files per parent dataset, in collection order */
  readonly byDataset: ReadonlyMap<string, readonly FileRecord[]>;
}

export function buildFileIndex(files: readonly FileRecord[]): FileIndex {
  const byUri = new Map<string, FileRecord>();
  const byId = new Map<string, FileRecord>();
  const byDataset = new Map<string, FileRecord[]>();

  for (const file of files) {
    byUri.set(file.uri, file);
    if (!byId.has(file.id)) byId.set(file.id, file);

    const siblings = byDataset.get(file.dataset);
    if (siblings === undefined) {
      byDataset.set(file.dataset, [file]);
    } else {
      siblings.push(file);
    }
  }

  return { byUri, byId, byDataset };
}

/**
 * A file is usable when both its own status and its replicate's status
 * are allowed
 */
export function isUsableFile(file: FileRecord, allowedStatuses: ReadonlySet<string>): boolean {
  return (
    allowedStatuses.has(file.status) &&
    file.replicateStatus !== undefined &&
    allowedStatuses.has(file.replicateStatus)
  );
}

/**
 * Usable fastqs referenced by an experiment, in the experiment's file order
 *
 * References missing from the collection are skipped; the catalog only
 * returns files that passed its own status and assembly filters.
 */
export function usableExperimentFastqs(
  experiment: ExperimentRecord,
  index: FileIndex,
  allowedStatuses: ReadonlySet<string>
): FileRecord[] {
  const fastqs: FileRecord[] = [];
  for (const uri of experiment.files) {
    const file = index.byUri.get(uri);
    if (file !== undefined && file.format === "fastq" && isUsableFile(file, allowedStatuses)) {
      fastqs.push(file);
    }
  }
  return fastqs;
}

/**
 * Usable fastqs of a control dataset, in collection order
 */
export function usableDatasetFastqs(
  datasetId: string,
  index: FileIndex,
  allowedStatuses: ReadonlySet<string>
): FileRecord[] {
  return (index.byDataset.get(datasetId) ?? []).filter(
    (file) => file.format === "fastq" && isUsableFile(file, allowedStatuses)
  );
}
