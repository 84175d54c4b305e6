export type GridErrorCode =
  | "invalid_resource_spec"
  | "invalid_task"
  | "submission_failed"
  | "job_failed"
  | "result_corrupt"
  | "cancelled";

export class GridError extends Error {
  constructor(
    readonly code: GridErrorCode,
    message: string
  ) {
    super(message);
    this.name = "GridError";
  }
}

export class InvalidResourceSpecError extends GridError {
  constructor(message: string) {
    super("invalid_resource_spec", message);
    this.name = "InvalidResourceSpecError";
  }
}

export class InvalidTaskError extends GridError {
  constructor(message: string) {
    super("invalid_task", message);
    this.name = "InvalidTaskError";
  }
}

export class SubmissionError extends GridError {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, detail: { exitCode?: number | null; stdout?: string; stderr?: string } = {}) {
    super("submission_failed", message);
    this.name = "SubmissionError";
    this.exitCode = detail.exitCode ?? null;
    this.stdout = detail.stdout ?? "";
    this.stderr = detail.stderr ?? "";
  }
}

export class JobFailedError extends GridError {
  constructor(
    message: string,
    readonly detail: { schedulerJobId: string | null; attempts: number; stdout: string; stderr: string }
  ) {
    super("job_failed", message);
    this.name = "JobFailedError";
  }
}

export class ResultCorruptError extends GridError {
  constructor(
    message: string,
    readonly resultPath: string
  ) {
    super("result_corrupt", message);
    this.name = "ResultCorruptError";
  }
}

export class JobCancelledError extends GridError {
  constructor(message: string) {
    super("cancelled", message);
    this.name = "JobCancelledError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
