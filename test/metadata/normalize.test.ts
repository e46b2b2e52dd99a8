import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import {
  datasetsToRetrieve,
  fileLink,
  normalizeExperiment,
  normalizeFile,
  normalizeSnapshot,
  parseSnapshot,
} from "../../src/metadata/normalize";
import type { ExperimentRow, FileRow } from "../../src/metadata/normalize";
import { catalogSnapshot, SNAPSHOT_CONTROL, SNAPSHOT_EXPERIMENT } from "../utils/catalog";

function experimentRow(overrides: Partial<ExperimentRow> = {}): ExperimentRow {
  return {
    "@id": "/experiments/ENCSR000EXP/",
    accession: "ENCSR000EXP",
    assay_title: "TF ChIP-seq",
    ...overrides,
  };
}

function fileRow(overrides: Partial<FileRow> = {}): FileRow {
  return {
    "@id": "/files/ENCFF000AAA/",
    dataset: "/experiments/ENCSR000EXP/",
    file_format: "fastq",
    status: "released",
    href: "/files/ENCFF000AAA/@@download/ENCFF000AAA.fastq.gz",
    s3_uri: "s3://test-bucket/ENCFF000AAA.fastq.gz",
    ...overrides,
  };
}

describe("fileLink", () => {
  test("prefixes href with the server", () => {
    expect(fileLink({ href: "/files/X/" }, { server: "https://catalog.test/" })).toBe(
      "https://catalog.test/files/X/"
    );
    expect(fileLink({ href: "/files/X/" })).toBe("https://www.encodeproject.org/files/X/");
  });

  test("uses the storage uri when asked", () => {
    expect(fileLink({ href: "/files/X/", s3_uri: "s3://b/X" }, { useS3Uris: true })).toBe("s3://b/X");
    expect(fileLink({ href: "/files/X/" }, { useS3Uris: true })).toBeUndefined();
  });
});

describe("normalizeExperiment", () => {
  test("maps replicates, files, and controls", () => {
    const record = normalizeExperiment(
      experimentRow({
        control_type: null,
        possible_controls: [{ "@id": "/experiments/ENCSR000CTL/" }],
        replicates: [
          {
            antibody: { targets: ["/targets/A/"] },
            library: { biosample: { organism: { scientific_name: "Mus musculus" } } },
          },
          { antibody: {} },
          {},
        ],
        files: [{ s3_uri: "s3://b/1" }, { href: "/files/2/", s3_uri: "s3://b/2" }],
      }),
      { useS3Uris: true }
    );

    expect(record).toEqual({
      id: "/experiments/ENCSR000EXP/",
      accession: "ENCSR000EXP",
      assayTitle: "TF ChIP-seq",
      controlType: undefined,
      replicates: [
        { antibodyTargets: ["/targets/A/"], organism: "Mus musculus" },
        { antibodyTargets: [], organism: undefined },
        { antibodyTargets: undefined, organism: undefined },
      ],
      files: ["s3://b/1", "s3://b/2"],
      possibleControls: ["/experiments/ENCSR000CTL/"],
    });
  });
});

describe("normalizeFile", () => {
  test("flattens nested fields and drops nulls", () => {
    const record = normalizeFile(
      fileRow({
        biological_replicates: [2, 3],
        paired_end: "1",
        paired_with: "/files/ENCFF000BBB/",
        run_type: "paired-ended",
        read_length: 100,
        mapped_run_type: null,
        replicate: { status: "in progress" },
      }),
      { useS3Uris: true }
    );

    expect(record).toEqual({
      uri: "s3://test-bucket/ENCFF000AAA.fastq.gz",
      id: "/files/ENCFF000AAA/",
      dataset: "/experiments/ENCSR000EXP/",
      format: "fastq",
      status: "released",
      replicateStatus: "in progress",
      biologicalReplicate: 2,
      pairedEnd: "1",
      pairedWith: "/files/ENCFF000BBB/",
      runType: "paired-ended",
      readLength: 100,
      mappedRunType: undefined,
      croppedReadLength: undefined,
      croppedReadLengthTolerance: undefined,
    });
  });

  test("skips files without a link", () => {
    const warnings: string[] = [];
    const record = normalizeFile(fileRow({ s3_uri: undefined }), {
      useS3Uris: true,
      onWarning: (warning) => warnings.push(warning),
    });
    expect(record).toBeUndefined();
    expect(warnings).toEqual(["File /files/ENCFF000AAA/ has no s3_uri; skipped"]);
  });
});

describe("datasetsToRetrieve", () => {
  test("lists experiments, then their controls, once each", () => {
    expect(
      datasetsToRetrieve([
        experimentRow({ possible_controls: [{ "@id": "/experiments/C1/" }] }),
        experimentRow({
          "@id": "/experiments/ENCSR000BBB/",
          accession: "ENCSR000BBB",
          possible_controls: [{ "@id": "/experiments/C1/" }, { "@id": "/experiments/C2/" }],
        }),
      ])
    ).toEqual([
      "/experiments/ENCSR000EXP/",
      "/experiments/ENCSR000BBB/",
      "/experiments/C1/",
      "/experiments/C2/",
    ]);
  });
});

describe("normalizeSnapshot", () => {
  test("builds collections from saved reports", () => {
    const metadata = normalizeSnapshot(catalogSnapshot(), { useS3Uris: true });

    expect(metadata.experiments.map((record) => record.accession)).toEqual([SNAPSHOT_EXPERIMENT]);
    expect(metadata.experiments[0]?.files).toEqual(["s3://test-bucket/ENCFF000AAA"]);
    expect(metadata.files.map((file) => file.uri)).toEqual([
      "s3://test-bucket/ENCFF000AAA",
      "s3://test-bucket/ENCFF000CCC",
      "s3://test-bucket/ENCFF000BAM",
    ]);
    expect(metadata.wildtypeControls).toEqual([`/experiments/${SNAPSHOT_CONTROL}/`]);
  });

  test("keeps a file reported twice once", () => {
    const snapshot = catalogSnapshot();
    const doubled = { ...snapshot, fileReports: [...snapshot.fileReports, ...snapshot.fileReports] };
    expect(normalizeSnapshot(doubled, { useS3Uris: true }).files).toHaveLength(3);
  });
});

describe("parseSnapshot", () => {
  test("round-trips saved JSON", () => {
    const snapshot = catalogSnapshot();
    expect(parseSnapshot(JSON.stringify(snapshot))).toEqual(snapshot);
  });

  test("rejects text that is not JSON", () => {
    expect(() => parseSnapshot("{not json")).toThrow(ParseError);
  });

  test("rejects reports of the wrong shape", () => {
    expect(() =>
      parseSnapshot(JSON.stringify({ experimentReports: [], fileReports: [{ "@graph": [{}] }] }))
    ).toThrow(ParseError);
  });

  test("rejects file rows in formats other than fastq and bam", () => {
    const snapshot = catalogSnapshot();
    const [report] = snapshot.fileReports;
    const [row] = report?.["@graph"] ?? [];
    const text = JSON.stringify({
      ...snapshot,
      fileReports: [{ "@graph": [{ ...row, file_format: "bed" }] }],
    });
    expect(() => parseSnapshot(text)).toThrow(/^Invalid catalog snapshot: .*file_format/);
  });
});
