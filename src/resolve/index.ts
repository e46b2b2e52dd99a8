/**
 * Per-experiment resolution stages
 *
 * Each stage is a pure function returning a StageResult; the first
 * failing stage decides an experiment's error entries.
 */

export * from "./assets";
export * from "./control-bams";
export * from "./controls";
export * from "./endedness";
export * from "./file-index";
export * from "./pipeline-type";
export * from "./replicates";
