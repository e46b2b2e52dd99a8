/**
 * Batch request sheets
 *
 * A request sheet is a tab-separated file with one header row. The
 * `accession` and `align_only` columns are required; `custom_message`,
 * `custom_crop_length`, `multiple_controls`, `force_se` and `redacted`
 * are optional. Empty cells leave the override unset.
 *
 * @example
 * ```
 * accession	align_only	custom_crop_length
 * ENCSR000AAA	false
 * ENCSR000BBB	true	36
 * ```
 *
 * @module io/request-sheet
 */

import { type } from "arktype";
import { normalizeRequests } from "../config/synthesize";
import { ParseError } from "../errors";
import type { ExperimentRequest } from "../types";
import { ExperimentRequestSchema } from "../types";
import { readToString } from "./file-reader";

const REQUIRED_COLUMNS = ["accession", "align_only"] as const;

/**
 * Column to request field mapping for the optional overrides
 */
const FLAG_COLUMNS = [
  ["multiple_controls", "multipleControls"],
  ["force_se", "forceSingleEnd"],
  ["redacted", "redacted"],
] as const;

const FORMAT = "tsv";

function parseFlag(value: string, column: string, lineNumber?: number): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "") return undefined;
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new ParseError(
    `Column ${column} must be true or false, got '${value}'`,
    FORMAT,
    lineNumber
  );
}

function parseCropLength(value: string, lineNumber?: number): number | undefined {
  const trimmed = value.trim();
  if (trimmed === "") return undefined;
  if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0) {
    throw new ParseError(
      `custom_crop_length must be a positive integer, got '${value}'`,
      FORMAT,
      lineNumber
    );
  }
  return Number(trimmed);
}

function validateRequest(candidate: Record<string, unknown>, lineNumber?: number): ExperimentRequest {
  const result = ExperimentRequestSchema(candidate);
  if (result instanceof type.errors) {
    throw new ParseError(`Invalid request: ${result.summary}`, FORMAT, lineNumber);
  }
  return result;
}

/**
 * Parse request sheet contents
 *
 * @throws {ParseError} On missing required columns or malformed cells
 */
export function parseRequestSheet(content: string): ExperimentRequest[] {
  const lines = content.split(/\r?\n/);
  const headerIndex = lines.findIndex((line) => line.trim() !== "");
  if (headerIndex === -1) {
    throw new ParseError("Request sheet is empty", FORMAT);
  }

  const headerLine = lines[headerIndex] ?? "";
  const header = headerLine.split("\t").map((column) => column.trim());
  for (const column of REQUIRED_COLUMNS) {
    if (!header.includes(column)) {
      throw new ParseError(`Missing required ${column} column`, FORMAT, headerIndex + 1, headerLine);
    }
  }

  const requests: ExperimentRequest[] = [];
  for (let index = headerIndex + 1; index < lines.length; index++) {
    const line = lines[index] ?? "";
    if (line.trim() === "") continue;
    const lineNumber = index + 1;

    const cells = line.split("\t");
    const cell = (column: string): string => {
      const position = header.indexOf(column);
      return position === -1 ? "" : (cells[position] ?? "");
    };

    const accession = cell("accession").trim();
    if (accession === "") {
      throw new ParseError("Row has no accession", FORMAT, lineNumber, line);
    }
    const alignOnly = parseFlag(cell("align_only"), "align_only", lineNumber);
    if (alignOnly === undefined) {
      throw new ParseError(`align_only is empty for ${accession}`, FORMAT, lineNumber, line);
    }

    const candidate: Record<string, unknown> = { accession, alignOnly };
    const message = cell("custom_message").trim();
    if (message !== "") candidate.customMessage = message;
    const cropLength = parseCropLength(cell("custom_crop_length"), lineNumber);
    if (cropLength !== undefined) candidate.customCropLength = cropLength;

    for (const [column, field] of FLAG_COLUMNS) {
      const flag = parseFlag(cell(column), column, lineNumber);
      if (flag !== undefined) candidate[field] = flag;
    }

    requests.push(validateRequest(candidate, lineNumber));
  }

  return normalizeRequests(requests);
}

/**
 * Parallel comma-separated lists, one entry per accession
 *
 * Every list other than `accessions` may be omitted; a given list must
 * have one entry per accession.
 */
export interface RequestLists {
  readonly accessions: string;
  readonly alignOnly?: string;
  readonly customMessage?: string;
  readonly customCropLength?: string;
  readonly multipleControls?: string;
  readonly forceSingleEnd?: string;
  readonly redacted?: string;
}

/**
 * Build requests from comma-separated lists
 *
 * @throws {ParseError} When list lengths differ or a value is malformed
 */
export function parseRequestLists(lists: RequestLists): ExperimentRequest[] {
  const accessions = lists.accessions.split(",").map((accession) => accession.trim());

  const column = (name: keyof RequestLists): string[] => {
    const raw = lists[name];
    if (raw === undefined || raw === "") return accessions.map(() => "");
    const values = raw.split(",");
    if (values.length !== accessions.length) {
      throw new ParseError(
        `${name} has ${values.length} entries for ${accessions.length} accessions`,
        "list"
      );
    }
    return values;
  };

  const alignOnly = column("alignOnly");
  const messages = column("customMessage");
  const cropLengths = column("customCropLength");
  const multipleControls = column("multipleControls");
  const forceSingleEnd = column("forceSingleEnd");
  const redacted = column("redacted");

  const requests = accessions.map((accession, i) => {
    const candidate: Record<string, unknown> = {
      accession,
      alignOnly: parseFlag(alignOnly[i] ?? "", "alignOnly") ?? false,
    };
    const message = (messages[i] ?? "").trim();
    if (message !== "") candidate.customMessage = message;
    const cropLength = parseCropLength(cropLengths[i] ?? "");
    if (cropLength !== undefined) candidate.customCropLength = cropLength;
    const flags = [
      ["multipleControls", multipleControls[i]],
      ["forceSingleEnd", forceSingleEnd[i]],
      ["redacted", redacted[i]],
    ] as const;
    for (const [field, value] of flags) {
      const flag = parseFlag(value ?? "", field);
      if (flag !== undefined) candidate[field] = flag;
    }
    return validateRequest(candidate);
  });

  return normalizeRequests(requests);
}

/**
 * Read and parse a request sheet from disk
 *
 * @throws {FileError} If the file cannot be read
 * @throws {ParseError} If its contents are malformed
 */
export async function readRequestSheet(path: string): Promise<ExperimentRequest[]> {
  return parseRequestSheet(await readToString(path));
}
