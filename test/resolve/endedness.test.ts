import { describe, expect, test } from "vitest";
import { ErrorTag } from "../../src/errors";
import { reduceRunTypes, resolveReadProfile } from "../../src/resolve/endedness";
import { RunType } from "../../src/types";
import { experimentId, fastqFile, pairedFastqs } from "../utils/fixtures";

const DATASET = experimentId("ENCSR000EXP");

describe("reduceRunTypes", () => {
  test("single-ended wins over paired-ended", () => {
    expect(reduceRunTypes(new Set(["paired-ended", "single-ended"]))).toBe(RunType.SINGLE_ENDED);
  });

  test("exactly paired-ended is paired-ended", () => {
    expect(reduceRunTypes(new Set(["paired-ended"]))).toBe(RunType.PAIRED_ENDED);
  });

  test("empty and unknown sets have no answer", () => {
    expect(reduceRunTypes(new Set())).toBeUndefined();
    expect(reduceRunTypes(new Set(["paired-ended", "unknown"]))).toBeUndefined();
  });
});

describe("resolveReadProfile", () => {
  test("takes the minimum read length over both mates", () => {
    const [mate1, mate2] = pairedFastqs("M1", "M2", DATASET);
    const result = resolveReadProfile(
      [
        { ...mate1, readLength: 100 },
        { ...mate2, readLength: 76 },
      ],
      { accession: "ENCSR000EXP" }
    );

    expect(result).toEqual({
      success: true,
      data: { minReadLength: 76, runType: RunType.PAIRED_ENDED },
    });
  });

  test("uses a custom crop length verbatim", () => {
    const result = resolveReadProfile([fastqFile("A", DATASET, { readLength: 101 })], {
      accession: "ENCSR000EXP",
      customCropLength: 36,
    });

    expect(result).toEqual({
      success: true,
      data: { minReadLength: 36, runType: RunType.SINGLE_ENDED },
    });
  });

  test("forcing single-end overrides paired run types", () => {
    const result = resolveReadProfile(pairedFastqs("M1", "M2", DATASET), {
      accession: "ENCSR000EXP",
      forceSingleEnd: true,
    });

    expect(result.success && result.data.runType).toBe(RunType.SINGLE_ENDED);
  });

  test("fails when no fastq reports a run type", () => {
    const result = resolveReadProfile([fastqFile("A", DATASET, { runType: undefined })], {
      accession: "ENCSR000EXP",
    });

    expect(result).toEqual({
      success: false,
      failures: [
        {
          tag: ErrorTag.INDETERMINATE_ENDEDNESS,
          message: "Could not determine endedness of ENCSR000EXP from run types: none",
        },
      ],
    });
  });

  test("fails when no fastq reports a read length", () => {
    const result = resolveReadProfile([fastqFile("A", DATASET, { readLength: undefined })], {
      accession: "ENCSR000EXP",
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.failures[0]?.tag).toBe(ErrorTag.MISSING_READ_LENGTH);
  });
});
