/**
 * Caper submission commands
 *
 * One `caper submit` line per configuration, each followed by a one-second
 * pause so the scheduler is not flooded.
 *
 * @module launch/caper
 */

import type { ExperimentRequest, SynthesisReport } from "../types";

export interface CaperOptions {
  /** Path or URL of the pipeline WDL */
  readonly wdlPath: string;
  /** Location the configurations are uploaded to; empty means alongside */
  readonly gcPath?: string;
}

function inputPrefix(gcPath: string | undefined): string {
  if (gcPath === undefined || gcPath === "") return "";
  return gcPath.endsWith("/") ? gcPath : `${gcPath}/`;
}

/**
 * @example
 * buildCaperCommand("ENCSR000AAA_PE_50_crop_2rep_tf_peakcall", { wdlPath: "chip.wdl" })
 * // "caper submit chip.wdl -i ENCSR000AAA_PE_50_crop_2rep_tf_peakcall.json -s ENCSR000AAA_PE_50_crop_2rep_tf_peakcall\nsleep 1\n"
 */
export function buildCaperCommand(
  description: string,
  options: CaperOptions,
  customMessage?: string
): string {
  const label = customMessage !== undefined && customMessage !== "" ? `_${customMessage}` : "";
  return (
    `caper submit ${options.wdlPath} -i ${inputPrefix(options.gcPath)}${description}.json` +
    ` -s ${description}${label}\nsleep 1\n`
  );
}

/**
 * Commands for every configuration of a report, in accession order
 *
 * Custom messages come from the matching requests.
 */
export function buildCaperScript(
  report: SynthesisReport,
  requests: readonly ExperimentRequest[],
  options: CaperOptions
): string {
  const messages = new Map(requests.map((request) => [request.accession, request.customMessage]));
  return Object.entries(report.configurations)
    .map(([accession, configuration]) =>
      buildCaperCommand(configuration["chip.description"], options, messages.get(accession))
    )
    .join("");
}

export function commandsFileName(message?: string): string {
  return message !== undefined && message !== "" ? `caper_submit_${message}.sh` : "caper_submit.sh";
}
