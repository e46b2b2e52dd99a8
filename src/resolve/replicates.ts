/**
 * Replicate fastq assignment
 *
 * Places an experiment's usable fastqs into replicate slots 1..10, pairs
 * mate 1 reads with their mate 2, and squeezes out empty slots so the
 * pipeline sees consecutively numbered replicates.
 *
 * @module resolve/replicates
 */

import { ErrorTag, failAll, fail, succeed } from "../errors";
import type { StageFailure, StageResult } from "../errors";
import type { FileRecord, ReplicateFastqs, ReplicateSlots, WarningHandler } from "../types";
import { isReplicateNumber, MAX_REPLICATES } from "../types";
import type { FileIndex } from "./file-index";

export interface ReplicateAssignmentOptions {
  readonly accession: string;
  readonly forceSingleEnd?: boolean;
  readonly onWarning?: WarningHandler;
}

interface MutableSlot {
  r1: string[];
  r2: string[];
}

/**
 * Assign usable fastqs to replicate slots
 *
 * Mate 2 files are never placed directly: they follow their mate 1 via
 * its pairedWith link, unless the experiment is forced single-ended.
 *
 * @param fastqs - Usable fastqs of one experiment, in catalog order
 * @param index - Lookup over the whole file collection, used to find mates
 */
export function assignReplicateFastqs(
  fastqs: readonly FileRecord[],
  index: FileIndex,
  options: ReplicateAssignmentOptions
): StageResult<ReplicateSlots> {
  const slots: MutableSlot[] = Array.from({ length: MAX_REPLICATES }, () => ({ r1: [], r2: [] }));
  const failures: StageFailure[] = [];

  for (const file of fastqs) {
    const replicate = file.biologicalReplicate;
    if (replicate === undefined || !isReplicateNumber(replicate)) {
      options.onWarning?.(
        `Skipping ${file.uri}: biological replicate ${replicate ?? "(none)"} is outside 1..${MAX_REPLICATES}`,
        options.accession
      );
      continue;
    }
    const slot = slots[replicate - 1];
    if (slot === undefined) continue;

    if (file.pairedEnd === undefined) {
      slot.r1.push(file.uri);
    } else if (file.pairedEnd === "1") {
      slot.r1.push(file.uri);
      if (options.forceSingleEnd === true) continue;

      const mate = file.pairedWith === undefined ? undefined : index.byId.get(file.pairedWith);
      if (mate === undefined) {
        failures.push({
          tag: ErrorTag.MISSING_MATE_PAIR,
          message: `Missing expected read 2 fastq for ${file.uri} (paired with ${file.pairedWith ?? "nothing"})`,
        });
      } else {
        slot.r2.push(mate.uri);
      }
    }
  }

  if (failures.length > 0) {
    return failAll(failures);
  }

  if (slots.every((slot) => slot.r1.length === 0)) {
    return fail(ErrorTag.NO_USABLE_FASTQS, `No usable fastqs found for ${options.accession}`);
  }

  return succeed(compactReplicateSlots(slots));
}

/**
 * Move populated slots to the front, keeping their relative order
 *
 * R1 and R2 lists travel together. The result always has MAX_REPLICATES
 * slots, with every empty slot after the last populated one.
 */
export function compactReplicateSlots(slots: readonly ReplicateFastqs[]): ReplicateSlots {
  const populated = slots.filter((slot) => slot.r1.length > 0);
  const compacted: ReplicateFastqs[] = populated.map((slot) => ({
    r1: [...slot.r1],
    r2: [...slot.r2],
  }));
  while (compacted.length < MAX_REPLICATES) {
    compacted.push({ r1: [], r2: [] });
  }
  return compacted;
}

/**
 * Number of replicate slots holding at least one read 1 fastq
 */
export function countReplicates(slots: ReplicateSlots): number {
  return slots.filter((slot) => slot.r1.length > 0).length;
}
