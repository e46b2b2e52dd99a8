/**
 * Endedness and minimum read length of an experiment
 *
 * @module resolve/endedness
 */

import { ErrorTag, fail, succeed } from "../errors";
import type { StageResult } from "../errors";
import type { FileRecord } from "../types";
import { RunType } from "../types";

export interface ReadProfile {
  readonly minReadLength: number;
  readonly runType: RunType;
}

export interface ReadProfileOptions {
  readonly accession: string;
  readonly forceSingleEnd?: boolean;
  /** Caller-supplied crop length, used verbatim as the minimum read length */
  readonly customCropLength?: number;
}

/**
 * Distinct run-type labels reported by a set of fastqs
 *
 * Files without a run type contribute nothing.
 */
export function collectRunTypes(fastqs: readonly FileRecord[]): Set<string> {
  const runTypes = new Set<string>();
  for (const file of fastqs) {
    if (file.runType !== undefined) runTypes.add(file.runType);
  }
  return runTypes;
}

export function collectReadLengths(fastqs: readonly FileRecord[]): number[] {
  const lengths: number[] = [];
  for (const file of fastqs) {
    if (file.readLength !== undefined) lengths.push(file.readLength);
  }
  return lengths;
}

/**
 * Reduce a run-type label set to one endedness
 *
 * Any single-ended label wins. Otherwise the set must be exactly
 * {paired-ended}; an empty or mixed-unknown set has no answer.
 */
export function reduceRunTypes(runTypes: ReadonlySet<string>): RunType | undefined {
  if (runTypes.has(RunType.SINGLE_ENDED)) return RunType.SINGLE_ENDED;
  if (runTypes.size === 1 && runTypes.has(RunType.PAIRED_ENDED)) return RunType.PAIRED_ENDED;
  return undefined;
}

/**
 * Resolve run type and minimum read length from an experiment's usable fastqs
 *
 * Both mates of paired reads count: they are separate files with their
 * own read lengths.
 */
export function resolveReadProfile(
  fastqs: readonly FileRecord[],
  options: ReadProfileOptions
): StageResult<ReadProfile> {
  const runTypes = collectRunTypes(fastqs);

  let runType: RunType | undefined;
  if (options.forceSingleEnd === true) {
    runType = RunType.SINGLE_ENDED;
  } else {
    runType = reduceRunTypes(runTypes);
  }
  if (runType === undefined) {
    const labels = runTypes.size === 0 ? "none" : [...runTypes].sort().join(", ");
    return fail(
      ErrorTag.INDETERMINATE_ENDEDNESS,
      `Could not determine endedness of ${options.accession} from run types: ${labels}`
    );
  }

  if (options.customCropLength !== undefined) {
    return succeed({ minReadLength: options.customCropLength, runType });
  }

  const readLengths = collectReadLengths(fastqs);
  if (readLengths.length === 0) {
    return fail(
      ErrorTag.MISSING_READ_LENGTH,
      `No read length reported by any usable fastq of ${options.accession}`
    );
  }

  return succeed({ minReadLength: Math.min(...readLengths), runType });
}
