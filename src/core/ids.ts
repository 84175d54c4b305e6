import { ulid } from "ulid";

export type JobId = `job_${string}`;

const JOB_ID_RE = /^job_[0-9A-HJKMNP-TV-Z]{26}$/;

export function newJobId(): JobId {
  return `job_${ulid()}`;
}

export function isJobId(value: string): value is JobId {
  return JOB_ID_RE.test(value);
}
