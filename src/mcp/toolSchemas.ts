import * as z from "zod/v4";

export const zJobId = z.string().regex(/^job_[0-9A-HJKMNP-TV-Z]{26}$/, "invalid job_id");

export const zTaskNameInput = z.string().min(1).max(128);

export const zResourcesInput = z.object({
  threads: z.number().int().min(1).optional(),
  time: z.union([z.number().int().min(0), z.string()]).optional(),
  mem: z.union([z.number().int().min(1), z.string()]).optional(),
  gpu: z.boolean().optional(),
  parallel_env: z.string().min(1).optional()
});

export const zFailureReason = z.enum(["submission_failed", "job_failed", "result_corrupt", "cancelled"]);

export const zJobOutcome = z.object({
  job_id: zJobId,
  status: z.enum(["succeeded", "failed"]),
  scheduler_job_id: z.string().nullable(),
  attempts: z.number().int(),
  value: z.unknown().optional(),
  reason: zFailureReason.optional(),
  error: z.string().optional(),
  stdout: z.string().optional(),
  stderr: z.string().optional()
});

export const zJobRunInput = z.object({
  task: zTaskNameInput,
  args: z.array(z.unknown()).default([]),
  kwargs: z.record(z.string(), z.unknown()).default({}),
  requires: z.array(z.string().min(1)).default([]),
  resources: zResourcesInput.optional(),
  max_attempts: z.number().int().min(1).max(20).optional()
});

export const zJobRunOutput = zJobOutcome;

export const zJobMapInput = z.object({
  task: zTaskNameInput,
  inputs: z.array(z.unknown()).min(1).max(10000),
  kwargs: z.record(z.string(), z.unknown()).default({}),
  requires: z.array(z.string().min(1)).default([]),
  resources: zResourcesInput.optional(),
  max_attempts: z.number().int().min(1).max(20).optional(),
  concurrency: z.number().int().min(1).max(256).optional()
});

export const zJobMapOutput = z.object({
  outcomes: z.array(zJobOutcome),
  succeeded: z.number().int(),
  failed: z.number().int()
});

export const zJobGetInput = z.object({
  job_id: zJobId,
  event_limit: z.number().int().min(1).max(5000).default(200)
});

export const zJobGetOutput = z.object({
  job: z.object({
    job_id: zJobId,
    task_name: z.string(),
    params_hash: z.string(),
    status: z.enum(["running", "succeeded", "failed"]),
    attempts: z.number().int(),
    max_attempts: z.number().int(),
    scheduler_job_id: z.string().nullable(),
    failure_reason: z.string().nullable(),
    error: z.string().nullable(),
    result: z.unknown().nullable(),
    created_at: z.string(),
    finished_at: z.string().nullable()
  }),
  attempts: z.array(
    z.object({
      attempt: z.number().int(),
      scheduler_job_id: z.string().nullable(),
      resources: z.record(z.string(), z.unknown()),
      outcome: z.string().nullable(),
      submitted_at: z.string(),
      finished_at: z.string().nullable()
    })
  ),
  events: z.array(
    z.object({
      ts: z.string(),
      level: z.string(),
      kind: z.string(),
      message: z.string(),
      data: z.record(z.string(), z.unknown()).nullable()
    })
  )
});
