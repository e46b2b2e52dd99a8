/**
 * Control alignment matching
 *
 * Finds a pre-aligned control bam per control replicate whose endedness
 * matches and whose cropped read length lies within the tolerance window
 * around the combined minimum read length.
 *
 * @module resolve/control-bams
 */

import { ErrorTag, failAll, succeed } from "../errors";
import type { StageFailure, StageResult } from "../errors";
import type { FileRecord } from "../types";
import { REPLICATE_NUMBERS, RunType } from "../types";
import type { FileIndex } from "./file-index";

/** Control bams must have been cropped with exactly this tolerance */
export const CROP_LENGTH_TOLERANCE = 2;

export interface ControlBamQuery {
  readonly accession: string;
  readonly controls: readonly string[];
  readonly pairedEnd: boolean;
  readonly combinedMinReadLength: number;
  readonly index: FileIndex;
  readonly allowedStatuses: ReadonlySet<string>;
}

/**
 * One slot lookup; an untrusted match is a placeholder that still counts
 * as found for the per-control check
 */
type SlotMatch = { readonly trusted: true; readonly uri: string } | { readonly trusted: false };

export function isMatchingBam(
  file: FileRecord,
  replicate: number,
  runType: RunType,
  readLength: number,
  tolerance: number,
  allowedStatuses: ReadonlySet<string>
): boolean {
  return (
    file.format === "bam" &&
    allowedStatuses.has(file.status) &&
    file.biologicalReplicate === replicate &&
    file.mappedRunType === runType &&
    file.croppedReadLength !== undefined &&
    file.croppedReadLength <= readLength + tolerance &&
    file.croppedReadLength >= readLength - tolerance
  );
}

/**
 * Match control bams for every chosen control
 *
 * @returns Matched bam URIs in control order, then replicate order
 */
export function matchControlBams(query: ControlBamQuery): StageResult<readonly string[]> {
  const runType = query.pairedEnd ? RunType.PAIRED_ENDED : RunType.SINGLE_ENDED;
  const failures: StageFailure[] = [];
  const matches: SlotMatch[] = [];

  for (const control of query.controls) {
    const candidates = query.index.byDataset.get(control) ?? [];
    let found = false;

    for (const replicate of REPLICATE_NUMBERS) {
      const bam = candidates.find((file) =>
        isMatchingBam(
          file,
          replicate,
          runType,
          query.combinedMinReadLength,
          CROP_LENGTH_TOLERANCE,
          query.allowedStatuses
        )
      );
      if (bam === undefined) continue;

      found = true;
      if (bam.croppedReadLengthTolerance === CROP_LENGTH_TOLERANCE) {
        matches.push({ trusted: true, uri: bam.uri });
      } else {
        matches.push({ trusted: false });
        failures.push({
          tag: ErrorTag.UNTRUSTED_TOLERANCE,
          message: `Tolerance of control bam ${bam.id} is ${bam.croppedReadLengthTolerance ?? "unset"}, not ${CROP_LENGTH_TOLERANCE} bp`,
        });
      }
    }

    if (!found) {
      failures.push({
        tag: ErrorTag.NO_CONTROL_BAM_FOUND,
        message: `No ${runType} bams cropped near ${query.combinedMinReadLength} bp in control ${control} of ${query.accession}`,
      });
    }
  }

  const uris: string[] = [];
  let hasPlaceholder = false;
  for (const match of matches) {
    if (match.trusted) {
      uris.push(match.uri);
    } else {
      hasPlaceholder = true;
    }
  }

  if (uris.length === 0 || hasPlaceholder) {
    failures.push({
      tag: ErrorTag.CONTROL_BAM_MATCH_ERROR,
      message:
        uris.length === 0 && !hasPlaceholder
          ? `No control bams found for ${query.accession}`
          : `Control bams for ${query.accession} include unusable alignments`,
    });
  }

  if (failures.length > 0) {
    return failAll(failures);
  }
  return succeed(uris);
}
