/**
 * Error handling for pipeline input synthesis
 *
 * Batch-level failures (bad metadata shape, unreadable files, malformed
 * request sheets) are thrown as classes rooted at ChipForgeError.
 * Per-experiment inconsistencies are never thrown: they are recorded as
 * tagged entries from {@link ErrorTag} and reported alongside the valid
 * configurations.
 */

/**
 * Base error class for all chipforge errors
 */
export class ChipForgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ChipForgeError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Metadata or options that fail schema validation
 */
export class ValidationError extends ChipForgeError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Malformed request sheets and catalog reports
 */
export class ParseError extends ChipForgeError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends ChipForgeError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const hint = FileError.hintFor(operation, errorMessage.toLowerCase());

    return new FileError(
      `Cannot ${OPERATION_VERBS[operation]} ${filePath}: ${errorMessage}${hint !== undefined ? `. ${hint}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  // Platform errors name the reason ("NotFound"); raw errno messages carry the code
  private static hintFor(operation: FileError["operation"], msg: string): string | undefined {
    const reading = operation === "read" || operation === "stat";

    if (msg.includes("enoent") || msg.includes("notfound")) {
      return reading
        ? "Check the request sheet or catalog snapshot path"
        : "The output directory could not be created";
    }
    if (msg.includes("eacces") || msg.includes("permissiondenied")) {
      return reading
        ? "The input is not readable by the current user"
        : "Choose an output path the current user can write to";
    }
    if (msg.includes("eisdir")) {
      return reading
        ? "Pass a file, not a directory"
        : "A directory already exists where a configuration or script belongs";
    }
    if (msg.includes("enotdir") || msg.includes("eexist")) {
      return "A file is in the way of the output directory";
    }
    if (msg.includes("enospc")) {
      return "No space left for run artifacts";
    }
    return undefined;
  }
}

const OPERATION_VERBS: Readonly<Record<FileError["operation"], string>> = {
  read: "read",
  write: "write",
  stat: "stat",
  mkdir: "create directory",
};

/**
 * Per-experiment error taxonomy
 *
 * One bad experiment never aborts a batch; each of these tags excludes
 * the experiment from the valid output and lands in the error report.
 */
export const ErrorTag = {
  NO_USABLE_FASTQS: "NoUsableFastqs",
  MISSING_MATE_PAIR: "MissingMatePair",
  MISSING_READ_LENGTH: "MissingReadLength",
  INDETERMINATE_ENDEDNESS: "IndeterminateEndedness",
  MISSING_CONTROLS: "MissingControls",
  MISSING_ANTIBODY_METADATA: "MissingAntibodyMetadata",
  TOO_MANY_CONTROLS: "TooManyControls",
  NO_WILDTYPE_CONTROL_FOUND: "NoWildtypeControlFound",
  NO_CONTROL_BAM_FOUND: "NoControlBamFound",
  UNTRUSTED_TOLERANCE: "UntrustedTolerance",
  CONTROL_BAM_MATCH_ERROR: "ControlBamMatchError",
  UNSUPPORTED_ORGANISM_OR_ASSAY: "UnsupportedOrganismOrAssay",
  CONTROL_NOT_ALIGN_ONLY: "ControlNotAlignOnly",
  EXPERIMENT_NOT_FOUND: "ExperimentNotFound",
} as const;

export type ErrorTag = (typeof ErrorTag)[keyof typeof ErrorTag];

/**
 * A single stage failure: the tag plus a message for operator triage
 */
export interface StageFailure {
  readonly tag: ErrorTag;
  readonly message: string;
}

/**
 * Outcome of one resolution stage
 *
 * Stages return this instead of throwing so the orchestrator can halt a
 * single experiment without unwinding the batch.
 */
export type StageResult<T> =
  | {
      readonly success: true;
      readonly data: T;
    }
  | {
      readonly success: false;
      readonly failures: readonly StageFailure[];
    };

export function succeed<T>(data: T): StageResult<T> {
  return { success: true, data };
}

export function fail<T = never>(tag: ErrorTag, message: string): StageResult<T> {
  return { success: false, failures: [{ tag, message }] };
}

export function failAll<T = never>(failures: readonly StageFailure[]): StageResult<T> {
  return { success: false, failures };
}
