import { Effect, Logger, LogLevel } from "effect";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { gzipSync, strToU8 } from "fflate";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ErrorTag, FileError, ParseError } from "../../src/errors";
import { generateFromSnapshot, MetadataSource, synthesizeFromSource } from "../../src/metadata/source";
import { request, resolvableBatch } from "../utils/fixtures";
import { catalogSnapshot, SNAPSHOT_EXPERIMENT } from "../utils/catalog";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "chipforge-source-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("MetadataSource.fromCollections", () => {
  test("only serves the requested experiments", async () => {
    const program = Effect.gen(function* () {
      const source = yield* MetadataSource;
      return yield* source.load(["ENCSR000OTH"]);
    });

    const metadata = await Effect.runPromise(
      program.pipe(Effect.provide(MetadataSource.fromCollections(resolvableBatch())))
    );
    expect(metadata.experiments).toEqual([]);
    expect(metadata.files).toHaveLength(3);
  });

  test("feeds synthesis", async () => {
    const report = await Effect.runPromise(
      synthesizeFromSource([request("ENCSR000EXP")]).pipe(
        Effect.provide(MetadataSource.fromCollections(resolvableBatch())),
        Logger.withMinimumLogLevel(LogLevel.None)
      )
    );
    expect(Object.keys(report.configurations)).toEqual(["ENCSR000EXP"]);
  });
});

describe("generateFromSnapshot", () => {
  test("resolves a gzipped snapshot", async () => {
    const path = join(dir, "batch.json.gz");
    writeFileSync(path, gzipSync(strToU8(JSON.stringify(catalogSnapshot()))));

    const report = await generateFromSnapshot(path, [request(SNAPSHOT_EXPERIMENT)], {
      useS3Uris: true,
    });

    expect(report.errors).toEqual({});
    const record = report.configurations[SNAPSHOT_EXPERIMENT];
    expect(record?.["chip.fastqs_rep1_R1"]).toEqual(["s3://test-bucket/ENCFF000AAA"]);
    expect(record?.["chip.ctl_nodup_bams"]).toEqual(["s3://test-bucket/ENCFF000BAM"]);
  });

  test("uses download links by default", async () => {
    const path = join(dir, "batch.json");
    writeFileSync(path, JSON.stringify(catalogSnapshot()));

    const report = await generateFromSnapshot(path, [request(SNAPSHOT_EXPERIMENT)], {
      server: "https://catalog.test",
    });

    expect(report.configurations[SNAPSHOT_EXPERIMENT]?.["chip.fastqs_rep1_R1"]).toEqual([
      "https://catalog.test/files/ENCFF000AAA/@@download/ENCFF000AAA",
    ]);
  });

  test("reports experiments missing from the snapshot", async () => {
    const path = join(dir, "batch.json");
    writeFileSync(path, JSON.stringify(catalogSnapshot()));

    const report = await generateFromSnapshot(path, [request("ENCSR999ZZZ")]);
    expect(report.errors["ENCSR999ZZZ"]?.[0]?.tag).toBe(ErrorTag.EXPERIMENT_NOT_FOUND);
  });

  test("rejects a malformed snapshot", async () => {
    const path = join(dir, "batch.json");
    writeFileSync(path, "{}");
    await expect(generateFromSnapshot(path, [])).rejects.toBeInstanceOf(ParseError);
  });

  test("rejects a missing snapshot", async () => {
    await expect(generateFromSnapshot(join(dir, "none.json"), [])).rejects.toBeInstanceOf(
      FileError
    );
  });
});
