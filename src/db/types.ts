import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface JobsTable {
  job_id: string;
  task_name: string;
  params_hash: string;
  descriptor: Json;
  status: string;
  attempts: Generated<number>;
  max_attempts: number;
  scheduler_job_id: OptionalNullable<string>;
  failure_reason: OptionalNullable<string>;
  error: OptionalNullable<string>;
  result_json: JsonNullable;
  created_at: Generated<string>;
  finished_at: OptionalNullable<string>;
}

export interface JobAttemptsTable {
  job_id: string;
  attempt: number;
  scheduler_job_id: OptionalNullable<string>;
  resources: Json;
  outcome: OptionalNullable<string>;
  submitted_at: Generated<string>;
  finished_at: OptionalNullable<string>;
}

export interface JobEventsTable {
  event_id: Generated<string>;
  job_id: string;
  ts: string;
  level: string;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  jobs: JobsTable;
  job_attempts: JobAttemptsTable;
  job_events: JobEventsTable;
}
