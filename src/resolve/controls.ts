/**
 * Control resolution
 *
 * Chooses the control dataset(s) for an experiment and combines the
 * experiment's endedness and read length with those of its controls.
 * Each experiment walks the same small state machine:
 *
 * - IsControl: the experiment is itself a control; nothing to resolve
 * - NoControlsListed: no candidates at all
 * - TooManyControls: several candidates without the multiple-controls
 *   override; only eGFP-tagged TF experiments can be narrowed to their
 *   wildtype control
 * - ResolveCombined: combine run types and read lengths
 *
 * @module resolve/controls
 */

import { ErrorTag, fail, succeed } from "../errors";
import type { StageResult } from "../errors";
import type { ExperimentRecord, PipelineType, ReplicateDescriptor } from "../types";
import { EGFP_TARGET_ID, RunType } from "../types";
import { collectReadLengths, collectRunTypes, reduceRunTypes } from "./endedness";
import type { FileIndex } from "./file-index";
import { usableDatasetFastqs } from "./file-index";

export interface ControlResolutionInput {
  readonly experiment: ExperimentRecord;
  readonly pipelineType: PipelineType;
  readonly runType: RunType;
  /** Experiment minimum read length, or the crop override when one is set */
  readonly minReadLength: number;
  readonly forceSingleEnd?: boolean;
  readonly multipleControls?: boolean;
  readonly customCropLength?: number;
  readonly wildtypeControls: ReadonlySet<string>;
  readonly index: FileIndex;
  readonly allowedStatuses: ReadonlySet<string>;
}

export interface ControlResolution {
  /** Chosen control datasets; empty for control experiments */
  readonly controls: readonly string[];
  readonly pairedEnd: boolean;
  /** Crop length assigned to the configuration */
  readonly cropLength: number;
  /** Minimum read length across experiment and controls, for bam matching */
  readonly combinedMinReadLength: number;
}

/**
 * Union of antibody targets across replicates, or undefined when any
 * replicate has no antibody metadata
 */
export function collectAntibodyTargets(
  replicates: readonly ReplicateDescriptor[]
): Set<string> | undefined {
  const targets = new Set<string>();
  for (const replicate of replicates) {
    if (replicate.antibodyTargets === undefined) return undefined;
    for (const target of replicate.antibodyTargets) targets.add(target);
  }
  return targets;
}

/**
 * Pick the control datasets to use, narrowing multi-control eGFP TF
 * experiments to their wildtype control
 */
export function chooseControls(input: ControlResolutionInput): StageResult<readonly string[]> {
  const { experiment } = input;
  const candidates = experiment.possibleControls;

  if (candidates.length === 0) {
    return fail(
      ErrorTag.MISSING_CONTROLS,
      `No controls in possible_controls for experiment ${experiment.accession}`
    );
  }

  if (candidates.length === 1 || input.multipleControls === true) {
    return succeed(candidates);
  }

  const targets = collectAntibodyTargets(experiment.replicates);
  if (targets === undefined) {
    return fail(
      ErrorTag.MISSING_ANTIBODY_METADATA,
      `A replicate of ${experiment.accession} is missing metadata about the antibody used`
    );
  }

  const isTaggedTf = targets.size === 1 && targets.has(EGFP_TARGET_ID) && input.pipelineType === "tf";
  if (!isTaggedTf) {
    return fail(
      ErrorTag.TOO_MANY_CONTROLS,
      `Too many controls for experiment ${experiment.accession}: ${candidates.join(", ")}`
    );
  }

  const wildtype = candidates.find((control) => input.wildtypeControls.has(control));
  if (wildtype === undefined) {
    return fail(
      ErrorTag.NO_WILDTYPE_CONTROL_FOUND,
      `Could not locate a wildtype control for ${experiment.accession} among ${candidates.join(", ")}`
    );
  }
  return succeed([wildtype]);
}

/**
 * Resolve controls and the combined endedness and read length
 */
export function resolveControls(input: ControlResolutionInput): StageResult<ControlResolution> {
  const forcedSingle = input.forceSingleEnd === true;

  if (input.pipelineType === "control") {
    return succeed({
      controls: [],
      pairedEnd: !(forcedSingle || input.runType === RunType.SINGLE_ENDED),
      cropLength: input.minReadLength,
      combinedMinReadLength: input.minReadLength,
    });
  }

  const chosen = chooseControls(input);
  if (!chosen.success) return chosen;
  const controls = chosen.data;

  const controlFastqs = controls.flatMap((control) =>
    usableDatasetFastqs(control, input.index, input.allowedStatuses)
  );
  const controlRunTypes = collectRunTypes(controlFastqs);
  const controlReadLengths = collectReadLengths(controlFastqs);

  let pairedEnd: boolean;
  if (
    controlRunTypes.has(RunType.SINGLE_ENDED) ||
    input.runType === RunType.SINGLE_ENDED ||
    forcedSingle
  ) {
    pairedEnd = false;
  } else if (
    reduceRunTypes(controlRunTypes) === RunType.PAIRED_ENDED &&
    input.runType === RunType.PAIRED_ENDED
  ) {
    pairedEnd = true;
  } else {
    const labels = controlRunTypes.size === 0 ? "none" : [...controlRunTypes].sort().join(", ");
    return fail(
      ErrorTag.INDETERMINATE_ENDEDNESS,
      `Could not determine endedness for ${input.experiment.accession} and its control (control run types: ${labels})`
    );
  }

  const combinedMinReadLength = Math.min(input.minReadLength, ...controlReadLengths);

  return succeed({
    controls,
    pairedEnd,
    cropLength:
      input.customCropLength !== undefined ? input.minReadLength : combinedMinReadLength,
    combinedMinReadLength,
  });
}
