/**
 * Pipeline-type classification from assay title and control type
 *
 * @module resolve/pipeline-type
 */

import { ErrorTag, fail, succeed } from "../errors";
import type { StageResult } from "../errors";
import type { AlignerParameters, ExperimentRecord, PipelineClassification } from "../types";
import { AssayTitle } from "../types";

/** Mint-ChIP reads are aligned with bwa mem regardless of read length */
export const MINT_ALIGNER_PARAMETERS: AlignerParameters = {
  aligner: "bwa",
  useBwaMemForPe: true,
  bwaMemReadLenLimit: 0,
};

export function classifyPipeline(experiment: ExperimentRecord): StageResult<PipelineClassification> {
  const isControl = experiment.controlType !== undefined && experiment.controlType !== "";

  switch (experiment.assayTitle) {
    case AssayTitle.CONTROL_CHIP:
      if (isControl) return succeed({ pipelineType: "control" });
      break;
    case AssayTitle.CONTROL_MINT_CHIP:
      if (isControl) {
        return succeed({ pipelineType: "control", alignerParameters: MINT_ALIGNER_PARAMETERS });
      }
      break;
    case AssayTitle.TF_CHIP:
      return succeed({ pipelineType: "tf" });
    case AssayTitle.HISTONE_CHIP:
      return succeed({ pipelineType: "histone" });
    case AssayTitle.MINT_CHIP:
      return succeed({ pipelineType: "histone", alignerParameters: MINT_ALIGNER_PARAMETERS });
  }

  return fail(
    ErrorTag.UNSUPPORTED_ORGANISM_OR_ASSAY,
    isControl || !experiment.assayTitle.startsWith("Control")
      ? `Unsupported assay "${experiment.assayTitle}" for ${experiment.accession}`
      : `${experiment.accession} is a "${experiment.assayTitle}" experiment without a control type`
  );
}
