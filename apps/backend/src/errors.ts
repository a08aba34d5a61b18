export type HppdErrorCode =
  | "INVALID_ARCHIVE"
  | "MALFORMED_SHEET"
  | "NO_USABLE_DATA"
  | "NOT_READY"
  | "NOT_FOUND"
  | "INTERNAL_FAILURE"
  | "INVALID_SUBMISSION"
  | "DUPLICATE_JOB_ID";

export class HppdError extends Error {
  constructor(
    readonly code: HppdErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArchiveError extends HppdError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_ARCHIVE", message, options);
  }
}

/** Per-file; the parser turns it into a warning instead of failing the job. */
export class MalformedSheetError extends HppdError {
  constructor(
    message: string,
    readonly missingColumns: string[] = [],
  ) {
    super("MALFORMED_SHEET", message);
  }
}

export class NoUsableDataError extends HppdError {
  constructor(message: string) {
    super("NO_USABLE_DATA", message);
  }
}

export class NotReadyError extends HppdError {
  constructor(message: string) {
    super("NOT_READY", message);
  }
}

export class NotFoundError extends HppdError {
  constructor(jobId: string) {
    super("NOT_FOUND", `Job '${jobId}' was not found or has expired`);
  }
}

export class InternalFailureError extends HppdError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INTERNAL_FAILURE", message, options);
  }
}

export class ValidationError extends HppdError {
  constructor(readonly issues: string[]) {
    super("INVALID_SUBMISSION", issues.join("; "));
  }
}

export class DuplicateJobError extends HppdError {
  constructor(readonly jobId: string) {
    super("DUPLICATE_JOB_ID", `Job '${jobId}' already exists`);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
