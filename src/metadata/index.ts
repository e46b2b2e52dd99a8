/**
 * Catalog metadata: report queries, normalization, and sources
 *
 * @example Synthesizing from a saved snapshot
 * ```typescript
 * import { generateFromSnapshot } from "chipforge";
 *
 * const report = await generateFromSnapshot("batch.json.gz", requests, { useS3Uris: true });
 * ```
 */

export * from "./normalize";
export * from "./queries";
export * from "./source";
