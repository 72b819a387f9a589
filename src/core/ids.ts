import { ulid } from "ulid";

export type JobId = `job_${string}`;

const JOB_ID_RE = /^[A-Za-z0-9_-]+$/;

export function newJobId(): JobId {
  return `job_${ulid()}` as const;
}

// Job ids double as workspace directory names, so they must be a single safe path segment.
export function isSafeJobId(value: string): boolean {
  return JOB_ID_RE.test(value);
}
