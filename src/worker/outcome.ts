import type { GridError } from "../core/errors.js";
import type { JobId } from "../core/ids.js";

export type FailureReason = "submission_failed" | "job_failed" | "result_corrupt" | "cancelled";

export interface JobSucceeded<T> {
  status: "succeeded";
  jobId: JobId;
  schedulerJobId: string;
  attempts: number;
  value: T;
}

export interface JobFailed {
  status: "failed";
  jobId: JobId;
  schedulerJobId: string | null;
  attempts: number;
  reason: FailureReason;
  error: GridError;
  stdout: string;
  stderr: string;
}

export type JobOutcome<T> = JobSucceeded<T> | JobFailed;

export function unwrapOutcome<T>(outcome: JobOutcome<T>): T {
  if (outcome.status === "succeeded") return outcome.value;
  throw outcome.error;
}
