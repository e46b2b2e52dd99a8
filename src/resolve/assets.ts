/**
 * Reference genome assets per organism and assay category
 *
 * @module resolve/assets
 */

import { ErrorTag, fail, succeed } from "../errors";
import type { StageResult } from "../errors";
import type { AssetBundle, ExperimentRecord } from "../types";
import { AssayTitle, isMintAssay } from "../types";

export type Species = "Homo sapiens" | "Mus musculus";

export type AssayCategory = "mint" | "standard";

const PORTAL = "https://www.encodeproject.org/files";
const GENOME_DATA = "https://storage.googleapis.com/encode-pipeline-genome-data/genome_tsv/v3";

const HUMAN_GENOME = {
  genomeTsv: `${GENOME_DATA}/hg38.tsv`,
  chromSizes: `${PORTAL}/GRCh38_EBV.chrom.sizes/@@download/GRCh38_EBV.chrom.sizes.tsv`,
  referenceFasta: `${PORTAL}/GRCh38_no_alt_analysis_set_GCA_000001405.15/@@download/GRCh38_no_alt_analysis_set_GCA_000001405.15.fasta.gz`,
} as const;

const MOUSE_GENOME = {
  genomeTsv: `${GENOME_DATA}/mm10.tsv`,
  chromSizes: `${PORTAL}/mm10_no_alt.chrom.sizes/@@download/mm10_no_alt.chrom.sizes.tsv`,
  referenceFasta: `${PORTAL}/mm10_no_alt_analysis_set_ENCODE/@@download/mm10_no_alt_analysis_set_ENCODE.fasta.gz`,
} as const;

export const ASSET_TABLE: Readonly<Record<Species, Readonly<Record<AssayCategory, AssetBundle>>>> = {
  "Homo sapiens": {
    mint: {
      ...HUMAN_GENOME,
      blacklist: `${PORTAL}/ENCFF356LFX/@@download/ENCFF356LFX.bed.gz`,
      blacklist2: `${PORTAL}/ENCFF023CZC/@@download/ENCFF023CZC.bed.gz`,
      bwaIndex: `${PORTAL}/ENCFF643CGH/@@download/ENCFF643CGH.tar.gz`,
    },
    standard: {
      ...HUMAN_GENOME,
      blacklist: `${PORTAL}/ENCFF356LFX/@@download/ENCFF356LFX.bed.gz`,
      bowtie2Index: `${PORTAL}/ENCFF110MCL/@@download/ENCFF110MCL.tar.gz`,
    },
  },
  "Mus musculus": {
    // No curated blacklist or bwa index exists for mouse Mint-ChIP
    mint: { ...MOUSE_GENOME },
    standard: {
      ...MOUSE_GENOME,
      blacklist: `${PORTAL}/ENCFF547MET/@@download/ENCFF547MET.bed.gz`,
      bowtie2Index: `${PORTAL}/ENCFF309GLL/@@download/ENCFF309GLL.tar.gz`,
    },
  },
};

const STANDARD_ASSAYS: readonly string[] = [
  AssayTitle.TF_CHIP,
  AssayTitle.HISTONE_CHIP,
  AssayTitle.CONTROL_CHIP,
];

export function assayCategory(assayTitle: string): AssayCategory | undefined {
  if (isMintAssay(assayTitle)) return "mint";
  if (STANDARD_ASSAYS.includes(assayTitle)) return "standard";
  return undefined;
}

function isSpecies(value: string): value is Species {
  return value === "Homo sapiens" || value === "Mus musculus";
}

/**
 * Distinct organisms across an experiment's replicate biosamples
 */
export function experimentOrganisms(experiment: ExperimentRecord): string[] {
  const organisms = new Set<string>();
  for (const replicate of experiment.replicates) {
    if (replicate.organism !== undefined) organisms.add(replicate.organism);
  }
  return [...organisms].sort();
}

export function selectAssets(species: string, assayTitle: string): StageResult<AssetBundle> {
  const category = assayCategory(assayTitle);
  if (!isSpecies(species) || category === undefined) {
    return fail(
      ErrorTag.UNSUPPORTED_ORGANISM_OR_ASSAY,
      `No reference assets for organism "${species}" and assay "${assayTitle}"`
    );
  }
  return succeed(ASSET_TABLE[species][category]);
}

/**
 * Assets for an experiment whose replicates all come from one organism
 */
export function selectExperimentAssets(experiment: ExperimentRecord): StageResult<AssetBundle> {
  const organisms = experimentOrganisms(experiment);
  const [species] = organisms;
  if (organisms.length !== 1 || species === undefined) {
    return fail(
      ErrorTag.UNSUPPORTED_ORGANISM_OR_ASSAY,
      organisms.length === 0
        ? `No organism recorded for the replicates of ${experiment.accession}`
        : `Replicates of ${experiment.accession} span several organisms: ${organisms.join(", ")}`
    );
  }
  return selectAssets(species, experiment.assayTitle);
}
