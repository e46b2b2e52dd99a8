/**
 * Synthesize pipeline inputs for a batch of experiments
 *
 * Usage: tsx examples/synthesize-batch.ts <requests.tsv> <snapshot.json[.gz]> [output-dir]
 */

import { generateFromSnapshot, readRequestSheet, writeRunArtifacts } from "../src";

async function main(): Promise<void> {
  const [sheetPath, snapshotPath, outputPath = "configs"] = process.argv.slice(2);
  if (sheetPath === undefined || snapshotPath === undefined) {
    console.error("usage: synthesize-batch <requests.tsv> <snapshot.json> [output-dir]");
    process.exitCode = 2;
    return;
  }

  const requests = await readRequestSheet(sheetPath);
  const report = await generateFromSnapshot(snapshotPath, requests, { useS3Uris: true });

  const written = await writeRunArtifacts(report, requests, {
    outputPath,
    wdlPath: "chip.wdl",
  });
  console.log(`Wrote ${written.configurations.length} configurations`);

  for (const [accession, errors] of Object.entries(report.errors)) {
    console.log(`${accession}: ${errors.map((error) => error.tag).join(", ")}`);
  }
}

main().catch((error: unknown) => {
  console.error(String(error));
  process.exitCode = 1;
});
