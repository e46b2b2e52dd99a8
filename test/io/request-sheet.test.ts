import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import { parseRequestLists, parseRequestSheet, readRequestSheet } from "../../src/io/request-sheet";

function sheet(...rows: string[][]): string {
  return rows.map((row) => row.join("\t")).join("\n");
}

describe("parseRequestSheet", () => {
  test("reads required columns and sorts by accession", () => {
    const requests = parseRequestSheet(
      sheet(
        ["accession", "align_only"],
        ["ENCSR000BBB", "False"],
        ["ENCSR000AAA", "True"]
      )
    );
    expect(requests).toEqual([
      { accession: "ENCSR000AAA", alignOnly: true },
      { accession: "ENCSR000BBB", alignOnly: false },
    ]);
  });

  test("reads optional overrides and leaves empty cells unset", () => {
    const requests = parseRequestSheet(
      sheet(
        ["accession", "align_only", "custom_message", "custom_crop_length", "multiple_controls", "force_se", "redacted"],
        ["ENCSR000AAA", "false", "rerun", "36", "true", "false", "true"],
        ["ENCSR000BBB", "true", "", "", "", "", ""]
      ) + "\n"
    );
    expect(requests).toEqual([
      {
        accession: "ENCSR000AAA",
        alignOnly: false,
        customMessage: "rerun",
        customCropLength: 36,
        multipleControls: true,
        forceSingleEnd: false,
        redacted: true,
      },
      { accession: "ENCSR000BBB", alignOnly: true },
    ]);
  });

  test("keeps the first row of a repeated accession", () => {
    const requests = parseRequestSheet(
      sheet(["accession", "align_only"], ["ENCSR000AAA", "true"], ["ENCSR000AAA", "false"])
    );
    expect(requests).toEqual([{ accession: "ENCSR000AAA", alignOnly: true }]);
  });

  test("requires the align_only column", () => {
    expect(() => parseRequestSheet(sheet(["accession"], ["ENCSR000AAA"]))).toThrow(
      "Missing required align_only column"
    );
  });

  test("reports malformed cells with their line number", () => {
    const content = sheet(
      ["accession", "align_only", "custom_crop_length"],
      ["ENCSR000AAA", "true", "36"],
      ["ENCSR000BBB", "true", "short"]
    );
    let caught: unknown;
    try {
      parseRequestSheet(content);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ParseError);
    if (!(caught instanceof ParseError)) return;
    expect(caught.lineNumber).toBe(3);
    expect(caught.message).toBe("custom_crop_length must be a positive integer, got 'short'");
  });

  test("rejects flags other than true or false", () => {
    expect(() => parseRequestSheet(sheet(["accession", "align_only"], ["ENCSR000AAA", "maybe"]))).toThrow(
      ParseError
    );
  });

  test("rejects an empty sheet", () => {
    expect(() => parseRequestSheet("\n\n")).toThrow("Request sheet is empty");
  });
});

describe("parseRequestLists", () => {
  test("zips parallel lists", () => {
    const requests = parseRequestLists({
      accessions: "ENCSR000BBB,ENCSR000AAA",
      alignOnly: "True,False",
      customCropLength: ",50",
      redacted: "False,True",
    });
    expect(requests).toEqual([
      { accession: "ENCSR000AAA", alignOnly: false, customCropLength: 50, redacted: true },
      { accession: "ENCSR000BBB", alignOnly: true, redacted: false },
    ]);
  });

  test("defaults align_only to false", () => {
    expect(parseRequestLists({ accessions: "ENCSR000AAA" })).toEqual([
      { accession: "ENCSR000AAA", alignOnly: false },
    ]);
  });

  test("rejects lists of different lengths", () => {
    expect(() => parseRequestLists({ accessions: "ENCSR000AAA,ENCSR000BBB", alignOnly: "True" })).toThrow(
      "alignOnly has 1 entries for 2 accessions"
    );
  });
});

describe("readRequestSheet", () => {
  test("reads a sheet from disk", async () => {
    const dir = mkdtempSync(join(tmpdir(), "chipforge-sheet-"));
    try {
      const path = join(dir, "batch.tsv");
      writeFileSync(path, sheet(["accession", "align_only"], ["ENCSR000AAA", "true"]));
      expect(await readRequestSheet(path)).toEqual([{ accession: "ENCSR000AAA", alignOnly: true }]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
