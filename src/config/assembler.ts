/**
 * Configuration record assembly
 *
 * Turns a fully resolved experiment into one pipeline input record with
 * keys in canonical order. Consumers diff these records, so the order in
 * CONFIG_KEY_ORDER is a contract.
 *
 * @module config/assembler
 */

import { ErrorTag, fail, succeed } from "../errors";
import type { StageResult } from "../errors";
import { CROP_LENGTH_TOLERANCE } from "../resolve/control-bams";
import { countReplicates } from "../resolve/replicates";
import type {
  ConfigurationRecord,
  FastqKey,
  ReplicateNumber,
  ResolvedExperimentState,
} from "../types";
import { isMintAssay, REPLICATE_NUMBERS } from "../types";

export const CONFIG_KEY_ORDER: readonly (keyof ConfigurationRecord)[] = [
  "chip.title",
  "chip.description",
  "chip.pipeline_type",
  "chip.align_only",
  "chip.paired_end",
  "chip.crop_length",
  "chip.crop_length_tol",
  "chip.genome_tsv",
  "chip.ref_fa",
  "chip.bowtie2_idx_tar",
  "chip.bwa_idx_tar",
  "chip.chrsz",
  "chip.blacklist",
  "chip.blacklist2",
  "chip.ctl_nodup_bams",
  "chip.redact_nodup_bam",
  "chip.always_use_pooled_ctl",
  "chip.aligner",
  "chip.use_bwa_mem_for_pe",
  "chip.bwa_mem_read_len_limit",
  ...REPLICATE_NUMBERS.flatMap((replicate) => [fastqKey(replicate, 1), fastqKey(replicate, 2)]),
];

export function fastqKey(replicate: ReplicateNumber, read: 1 | 2): FastqKey {
  return `chip.fastqs_rep${replicate}_R${read}`;
}

export interface DescriptionParts {
  readonly accession: string;
  readonly pairedEnd: boolean;
  readonly cropLength: number;
  readonly assayTitle: string;
  readonly replicateCount: number;
  readonly pipelineType: string;
  readonly alignOnly: boolean;
}

/**
 * Run description, also used as the artifact file name
 *
 * e.g. ENCSR000AAA_PE_50_crop_2rep_tf_peakcall
 */
export function buildDescription(parts: DescriptionParts): string {
  return [
    parts.accession,
    parts.pairedEnd ? "PE" : "SE",
    isMintAssay(parts.assayTitle) ? "no_crop" : `${parts.cropLength}_crop`,
    `${parts.replicateCount}rep`,
    parts.pipelineType,
    parts.alignOnly ? "alignonly" : "peakcall",
  ].join("_");
}

/**
 * Values the pipeline treats as unset
 */
function isEmptyValue(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === "" ||
    (Array.isArray(value) && (value.length === 0 || value.includes(null)))
  );
}

function assign<K extends keyof ConfigurationRecord>(
  record: ConfigurationRecord,
  key: K,
  value: ConfigurationRecord[K]
): void {
  if (!isEmptyValue(value)) record[key] = value;
}

/**
 * Build the pipeline input record for a resolved experiment
 *
 * Control pipelines must be align-only; anything else is rejected here
 * even though every earlier stage succeeded.
 */
export function assembleConfiguration(
  state: ResolvedExperimentState
): StageResult<ConfigurationRecord> {
  const { experiment, request, classification, assets } = state;
  const { pipelineType, alignerParameters } = classification;

  if (pipelineType === "control" && !request.alignOnly) {
    return fail(
      ErrorTag.CONTROL_NOT_ALIGN_ONLY,
      `${experiment.accession} is a control but was not align_only`
    );
  }

  const mint = isMintAssay(experiment.assayTitle);
  const cropLength = Math.trunc(state.cropLength);
  const description = buildDescription({
    accession: experiment.accession,
    pairedEnd: state.pairedEnd,
    cropLength,
    assayTitle: experiment.assayTitle,
    replicateCount: countReplicates(state.replicates),
    pipelineType,
    alignOnly: request.alignOnly,
  });

  const record: ConfigurationRecord = {
    "chip.title": experiment.accession,
    "chip.description": description,
    "chip.pipeline_type": pipelineType,
    "chip.align_only": request.alignOnly,
    "chip.paired_end": state.pairedEnd,
  };

  if (!mint) {
    assign(record, "chip.crop_length", cropLength);
    assign(record, "chip.crop_length_tol", CROP_LENGTH_TOLERANCE);
  }
  assign(record, "chip.genome_tsv", assets.genomeTsv);
  assign(record, "chip.ref_fa", assets.referenceFasta);
  assign(record, "chip.bowtie2_idx_tar", assets.bowtie2Index);
  assign(record, "chip.bwa_idx_tar", assets.bwaIndex);
  assign(record, "chip.chrsz", assets.chromSizes);
  assign(record, "chip.blacklist", assets.blacklist);
  assign(record, "chip.blacklist2", assets.blacklist2);
  assign(record, "chip.ctl_nodup_bams", [...state.controlBams]);
  assign(record, "chip.redact_nodup_bam", request.redacted === true ? true : undefined);
  assign(record, "chip.always_use_pooled_ctl", pipelineType !== "control" ? true : undefined);
  assign(record, "chip.aligner", alignerParameters?.aligner);
  assign(record, "chip.use_bwa_mem_for_pe", alignerParameters?.useBwaMemForPe);
  assign(record, "chip.bwa_mem_read_len_limit", alignerParameters?.bwaMemReadLenLimit);

  REPLICATE_NUMBERS.forEach((replicate, slotIndex) => {
    const slot = state.replicates[slotIndex];
    if (slot === undefined) return;
    assign(record, fastqKey(replicate, 1), [...slot.r1]);
    if (state.pairedEnd) {
      assign(record, fastqKey(replicate, 2), [...slot.r2]);
    }
  });

  return succeed(record);
}
