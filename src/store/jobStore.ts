import type { Kysely, Selectable } from "kysely";
import type { JobId } from "../core/ids.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../core/json.js";
import type { JobEvent, LogLevel } from "../logging/jobLog.js";
import type { DB } from "../db/types.js";

export type JobStatus = "running" | "succeeded" | "failed";

/** Stored as an object so scalar and array results survive the jsonb column. */
export interface JobResultEnvelope {
  value: JsonValue;
}

export interface JobRecord {
  jobId: JobId;
  taskName: string;
  paramsHash: `sha256:${string}`;
  descriptor: JsonObject;
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  schedulerJobId: string | null;
  failureReason: string | null;
  error: string | null;
  result: JobResultEnvelope | null;
  createdAt: string;
  finishedAt: string | null;
}

export interface JobAttemptRecord {
  jobId: JobId;
  attempt: number;
  schedulerJobId: string | null;
  resources: JsonObject;
  outcome: string | null;
  submittedAt: string;
  finishedAt: string | null;
}

export interface JobStore {
  createJob(input: {
    jobId: JobId;
    taskName: string;
    paramsHash: `sha256:${string}`;
    descriptor: JsonObject;
    maxAttempts: number;
  }): Promise<JobRecord>;
  updateJob(
    jobId: JobId,
    patch: Partial<
      Pick<JobRecord, "status" | "attempts" | "schedulerJobId" | "failureReason" | "error" | "result" | "finishedAt">
    >
  ): Promise<void>;
  recordAttempt(input: { jobId: JobId; attempt: number; schedulerJobId: string | null; resources: JsonObject }): Promise<void>;
  finishAttempt(jobId: JobId, attempt: number, outcome: string): Promise<void>;
  addEvent(event: JobEvent): Promise<void>;
  getJob(jobId: JobId): Promise<JobRecord | null>;
  listAttempts(jobId: JobId): Promise<JobAttemptRecord[]>;
  listEvents(jobId: JobId, limit?: number): Promise<JobEvent[]>;
}

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function toEnvelope(value: unknown): JobResultEnvelope | null {
  if (isJsonObject(value) && "value" in value) return { value: value.value ?? null };
  return null;
}

function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function toLevel(value: string): LogLevel {
  return isLogLevel(value) ? value : "info";
}

export class PostgresJobStore implements JobStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createJob(input: {
    jobId: JobId;
    taskName: string;
    paramsHash: `sha256:${string}`;
    descriptor: JsonObject;
    maxAttempts: number;
  }): Promise<JobRecord> {
    await this.db
      .insertInto("jobs")
      .values({
        job_id: input.jobId,
        task_name: input.taskName,
        params_hash: input.paramsHash,
        descriptor: input.descriptor,
        status: "running",
        max_attempts: input.maxAttempts
      })
      .onConflict((oc) => oc.column("job_id").doNothing())
      .execute();

    const row = await this.db.selectFrom("jobs").selectAll().where("job_id", "=", input.jobId).executeTakeFirstOrThrow();
    return this.mapJob(row);
  }

  async updateJob(
    jobId: JobId,
    patch: Partial<
      Pick<JobRecord, "status" | "attempts" | "schedulerJobId" | "failureReason" | "error" | "result" | "finishedAt">
    >
  ): Promise<void> {
    const updates: Record<string, unknown> = {};
    if (patch.status) updates.status = patch.status;
    if (patch.attempts !== undefined) updates.attempts = patch.attempts;
    if (patch.schedulerJobId !== undefined) updates.scheduler_job_id = patch.schedulerJobId;
    if (patch.failureReason !== undefined) updates.failure_reason = patch.failureReason;
    if (patch.error !== undefined) updates.error = patch.error;
    if (patch.result !== undefined) updates.result_json = patch.result;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("jobs").set(updates).where("job_id", "=", jobId).execute();
  }

  async recordAttempt(input: {
    jobId: JobId;
    attempt: number;
    schedulerJobId: string | null;
    resources: JsonObject;
  }): Promise<void> {
    await this.db
      .insertInto("job_attempts")
      .values({
        job_id: input.jobId,
        attempt: input.attempt,
        scheduler_job_id: input.schedulerJobId,
        resources: input.resources
      })
      .onConflict((oc) => oc.columns(["job_id", "attempt"]).doNothing())
      .execute();
  }

  async finishAttempt(jobId: JobId, attempt: number, outcome: string): Promise<void> {
    await this.db
      .updateTable("job_attempts")
      .set({ outcome, finished_at: new Date().toISOString() })
      .where("job_id", "=", jobId)
      .where("attempt", "=", attempt)
      .execute();
  }

  async addEvent(event: JobEvent): Promise<void> {
    if (!event.jobId) return;
    await this.db
      .insertInto("job_events")
      .values({
        job_id: event.jobId,
        ts: event.ts,
        level: event.level,
        kind: event.kind,
        message: event.message,
        data: event.data ?? null
      })
      .execute();
  }

  async getJob(jobId: JobId): Promise<JobRecord | null> {
    const row = await this.db.selectFrom("jobs").selectAll().where("job_id", "=", jobId).executeTakeFirst();
    return row ? this.mapJob(row) : null;
  }

  async listAttempts(jobId: JobId): Promise<JobAttemptRecord[]> {
    const rows = await this.db
      .selectFrom("job_attempts")
      .selectAll()
      .where("job_id", "=", jobId)
      .orderBy("attempt", "asc")
      .execute();

    return rows.map((r) => ({
      jobId: r.job_id as JobId,
      attempt: r.attempt,
      schedulerJobId: r.scheduler_job_id,
      resources: (r.resources ?? {}) as JsonObject,
      outcome: r.outcome,
      submittedAt: toIso((r as unknown as { submitted_at: unknown }).submitted_at),
      finishedAt: toIsoOrNull((r as unknown as { finished_at: unknown }).finished_at)
    }));
  }

  async listEvents(jobId: JobId, limit = 500): Promise<JobEvent[]> {
    const rows = await this.db
      .selectFrom("job_events")
      .selectAll()
      .where("job_id", "=", jobId)
      .orderBy("event_id", "asc")
      .limit(limit)
      .execute();

    return rows.map((r) => ({
      ts: toIso((r as unknown as { ts: unknown }).ts),
      level: toLevel(r.level),
      jobId: r.job_id as JobId,
      kind: r.kind,
      message: r.message ?? "",
      data: r.data ? (r.data as JsonObject) : null
    }));
  }

  private mapJob(row: Selectable<DB["jobs"]>): JobRecord {
    return {
      jobId: row.job_id as JobId,
      taskName: row.task_name,
      paramsHash: row.params_hash as `sha256:${string}`,
      descriptor: (row.descriptor ?? {}) as JsonObject,
      status: row.status as JobStatus,
      attempts: row.attempts,
      maxAttempts: row.max_attempts,
      schedulerJobId: row.scheduler_job_id,
      failureReason: row.failure_reason,
      error: row.error,
      result: toEnvelope(row.result_json),
      createdAt: toIso((row as unknown as { created_at: unknown }).created_at),
      finishedAt: toIsoOrNull((row as unknown as { finished_at: unknown }).finished_at)
    };
  }
}
