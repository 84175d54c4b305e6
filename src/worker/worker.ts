import { promises as fs } from "fs";
import type * as z from "zod/v4";
import { paramsHash } from "../core/canonicalJson.js";
import {
  JobCancelledError,
  JobFailedError,
  ResultCorruptError,
  SubmissionError,
  errorMessage,
  type GridError
} from "../core/errors.js";
import { newJobId, type JobId } from "../core/ids.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../core/json.js";
import type { SchedulerClient } from "../execution/sge/client.js";
import { JobWorkspace } from "../execution/workspace.js";
import { JobLog, type JobEventSink, type SinkErrorHandler } from "../logging/jobLog.js";
import { StoreEventSink } from "../logging/storeSink.js";
import { resolveResourcePlan, type ResourcePlan, type ResourceRequest } from "../resources/resourceSpec.js";
import type { JobStore } from "../store/jobStore.js";
import type { TaskDescriptor } from "../tasks/descriptor.js";
import type { TaskArtifactPaths, TaskSerializer } from "../tasks/serializer.js";
import { nextDelay, pause, resolvePolling, type PollingOptions } from "./backoff.js";
import type { FailureReason, JobOutcome } from "./outcome.js";

export type WorkerState = "idle" | "serialized" | "submitted" | "polling" | "succeeded" | "failed" | "cleaned_up";

export interface JobHandle {
  schedulerJobId: string | null;
  attempt: number;
  maxAttempts: number;
}

export interface WorkerDeps {
  client: SchedulerClient;
  serializer: TaskSerializer;
  sinks?: readonly JobEventSink[];
  store?: JobStore;
  /** Called when a sink rejects an event; the default reports to stderr. */
  onSinkError?: SinkErrorHandler;
}

export interface WorkerOptions {
  baseDir: string;
  keepWorkspace?: boolean;
  polling?: Partial<PollingOptions>;
  cleanupRetryDelayMs?: number;
  /** Cap on the bytes read back from each captured job log. */
  maxLogBytes?: number;
}

export interface RunOptions {
  maxAttempts?: number;
  signal?: AbortSignal;
}

export type ResultDecoder<T> = (value: JsonValue) => { ok: true; value: T } | { ok: false; message: string };

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_MAX_LOG_BYTES = 1024 * 1024;

type PollResult = "success" | "failed" | "cancelled";

export function schemaDecoder<T>(schema: z.ZodType<T>): ResultDecoder<T> {
  return (value) => {
    const parsed = schema.safeParse(value);
    if (parsed.success) return { ok: true, value: parsed.data };
    return { ok: false, message: parsed.error.issues.map((i) => i.message).join("; ") };
  };
}

const identityDecoder: ResultDecoder<JsonValue> = (value) => ({ ok: true, value });

async function readCapped(filePath: string, maxBytes: number): Promise<string> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filePath, "r");
  } catch {
    return "";
  }
  try {
    const buf = Buffer.alloc(maxBytes);
    const { bytesRead } = await handle.read(buf, 0, maxBytes, 0);
    const st = await handle.stat();
    const text = buf.subarray(0, bytesRead).toString("utf8");
    return st.size > bytesRead ? `${text}\n[truncated]\n` : text;
  } finally {
    await handle.close();
  }
}

function resourcesJson(request: ResourceRequest): JsonObject {
  return {
    threads: request.threads,
    wall_time: request.wallTime,
    mem_per_thread: request.memPerThread,
    gpu: request.gpu,
    parallel_env: request.parallelEnv
  };
}

/**
 * Drives one task through submit, poll, retry and cleanup on the scheduler.
 * A worker owns its workspace and runs exactly once.
 */
export class Worker {
  readonly handle: JobHandle = { schedulerJobId: null, attempt: 1, maxAttempts: DEFAULT_MAX_ATTEMPTS };
  private current: WorkerState = "idle";
  private started = false;
  /** Scheduler job that is queued or running and not yet settled. */
  private live: string | null = null;
  private readonly polling: PollingOptions;

  private constructor(
    private readonly deps: WorkerDeps,
    private readonly options: WorkerOptions,
    readonly workspace: JobWorkspace,
    private readonly log: JobLog
  ) {
    this.polling = resolvePolling(options.polling);
  }

  static async create(deps: WorkerDeps, options: WorkerOptions): Promise<Worker> {
    const jobId = newJobId();
    const sinks: JobEventSink[] = [...(deps.sinks ?? [])];
    if (deps.store) sinks.push(new StoreEventSink(deps.store));
    const log = new JobLog(jobId, sinks, deps.onSinkError);

    const workspace = await JobWorkspace.create(options.baseDir, {
      jobId,
      log,
      cleanupRetryDelayMs: options.cleanupRetryDelayMs
    });
    return new Worker(deps, options, workspace, log);
  }

  get id(): JobId {
    return this.workspace.id;
  }

  get state(): WorkerState {
    return this.current;
  }

  /** Event history of this job as JSON lines. */
  logText(): string {
    return this.log.text();
  }

  run(task: TaskDescriptor, resources: ResourcePlan, options?: RunOptions): Promise<JobOutcome<JsonValue>>;
  run<T>(
    task: TaskDescriptor,
    resources: ResourcePlan,
    options: RunOptions & { resultSchema: z.ZodType<T> }
  ): Promise<JobOutcome<T>>;
  run<T>(
    task: TaskDescriptor,
    resources: ResourcePlan,
    options: RunOptions & { resultSchema?: z.ZodType<T> } = {}
  ): Promise<JobOutcome<T> | JobOutcome<JsonValue>> {
    if (options.resultSchema) return this.runWithDecoder(task, resources, options, schemaDecoder(options.resultSchema));
    return this.runWithDecoder(task, resources, options, identityDecoder);
  }

  async runWithDecoder<T>(
    task: TaskDescriptor,
    resources: ResourcePlan,
    options: RunOptions,
    decode: ResultDecoder<T>
  ): Promise<JobOutcome<T>> {
    if (this.started) throw new Error(`worker ${this.id} has already run`);
    this.started = true;

    try {
      const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
      const requests = resolveResourcePlan(resources, maxAttempts);
      this.handle.maxAttempts = maxAttempts;

      const descriptor: JsonObject = { task: task.task, args: task.args, kwargs: task.kwargs, requires: task.requires };
      await this.record("createJob", (store) =>
        store.createJob({ jobId: this.id, taskName: task.task, paramsHash: paramsHash(descriptor), descriptor, maxAttempts })
      );
      await this.log.event("job.start", `task=${task.task} max_attempts=${maxAttempts}`, {
        task: task.task,
        max_attempts: maxAttempts,
        workspace: this.workspace.rootDir
      });

      return await this.drive(task, requests, options.signal, decode);
    } catch (err) {
      await this.abandon(err);
      throw err;
    } finally {
      await this.workspace.cleanup({ keep: this.options.keepWorkspace ?? false });
      await this.transition("cleaned_up");
    }
  }

  private async drive<T>(
    task: TaskDescriptor,
    requests: ResourceRequest[],
    signal: AbortSignal | undefined,
    decode: ResultDecoder<T>
  ): Promise<JobOutcome<T>> {
    if (signal?.aborted) return this.cancelled(null);

    const paths = await this.deps.serializer.write(this.workspace, task);
    await this.transition("serialized");

    for (;;) {
      const attempt = this.handle.attempt;
      const request = requests[attempt - 1];
      if (!request) throw new Error(`no resource request for attempt ${attempt}`);
      if (signal?.aborted) return this.cancelled(paths);

      let schedulerJobId: string;
      try {
        const submit = await this.deps.client.submit(paths.submitScriptPath, request, {
          cwd: this.workspace.rootDir,
          stdoutPath: paths.stdoutPath,
          stderrPath: paths.stderrPath
        });
        schedulerJobId = submit.schedulerJobId;
      } catch (err) {
        if (err instanceof SubmissionError) {
          await this.log.event("job.submit.failed", err.message, { attempt, stderr: err.stderr }, "error");
          return this.fail("submission_failed", err, paths);
        }
        throw err;
      }

      this.handle.schedulerJobId = schedulerJobId;
      this.live = schedulerJobId;
      await fs.appendFile(paths.schedulerJobIdPath, `${schedulerJobId}\n`, "utf8");
      await this.transition("submitted");
      await this.log.event("job.submit.ok", `attempt=${attempt} scheduler_job_id=${schedulerJobId}`, {
        attempt,
        scheduler_job_id: schedulerJobId,
        resources: resourcesJson(request)
      });
      await this.record("recordAttempt", (store) =>
        store.recordAttempt({ jobId: this.id, attempt, schedulerJobId, resources: resourcesJson(request) })
      );
      await this.record("updateJob", (store) => store.updateJob(this.id, { attempts: attempt, schedulerJobId }));

      const result = await this.poll(schedulerJobId, signal);
      if (result === "cancelled") {
        await this.record("finishAttempt", (store) => store.finishAttempt(this.id, attempt, "cancelled"));
        return this.cancelled(paths);
      }
      this.live = null;
      await this.record("finishAttempt", (store) => store.finishAttempt(this.id, attempt, result));

      if (result === "success") return this.resolveSuccess(paths, decode);

      if (attempt < this.handle.maxAttempts) {
        await this.log.warn("job.retry", `attempt ${attempt} failed; resubmitting`, {
          attempt,
          scheduler_job_id: schedulerJobId,
          max_attempts: this.handle.maxAttempts
        });
        this.handle.attempt = attempt + 1;
        this.handle.schedulerJobId = null;
        // Scripts and parameters stay as written for the first attempt.
        await this.transition("serialized");
        continue;
      }

      const stdout = await readCapped(paths.stdoutPath, this.maxLogBytes());
      const stderr = await readCapped(paths.stderrPath, this.maxLogBytes());
      const error = new JobFailedError(`job failed: ${schedulerJobId} (after ${attempt} attempt(s))`, {
        schedulerJobId,
        attempts: attempt,
        stdout,
        stderr
      });
      return this.fail("job_failed", error, null, { stdout, stderr });
    }
  }

  private async poll(schedulerJobId: string, signal: AbortSignal | undefined): Promise<PollResult> {
    await this.transition("polling");
    let delay = this.polling.initialDelayMs;

    for (;;) {
      if (!(await pause(delay, signal))) return "cancelled";
      delay = nextDelay(delay, this.polling);

      const status = await this.deps.client.checkStatus(schedulerJobId);
      await this.log.event("job.poll.status", `qstat ${schedulerJobId}: ${status}`, { status }, "debug");
      if (status === "running") continue;

      if (status === "failed") {
        // An errored job stays in the queue until deleted.
        const removed = await this.deps.client.cancel(schedulerJobId);
        await this.log.warn("job.queue_error", `scheduler reports ${schedulerJobId} in error state`, {
          scheduler_job_id: schedulerJobId,
          deleted: removed
        });
        return "failed";
      }

      if (!(await pause(this.polling.unknownPauseMs, signal))) return "cancelled";
      const accounting = await this.deps.client.checkAccounting(schedulerJobId);
      await this.log.event("job.poll.accounting", `qacct ${schedulerJobId}: ${accounting}`, { accounting }, "debug");
      if (accounting === "unknown") continue;
      return accounting;
    }
  }

  private async resolveSuccess<T>(paths: TaskArtifactPaths, decode: ResultDecoder<T>): Promise<JobOutcome<T>> {
    const corrupt = (message: string) => this.fail("result_corrupt", new ResultCorruptError(message, paths.resultPath), paths);

    let raw: string;
    try {
      raw = await fs.readFile(paths.resultPath, "utf8");
    } catch (err) {
      return corrupt(`result file unreadable: ${errorMessage(err)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      return corrupt(`result file is not valid JSON: ${errorMessage(err)}`);
    }
    if (!isJsonObject(parsed) || !("value" in parsed)) {
      return corrupt(`result file has no "value" field`);
    }
    const rawValue: JsonValue = parsed.value ?? null;

    const decoded = decode(rawValue);
    if (!decoded.ok) return corrupt(`result does not match the expected shape: ${decoded.message}`);

    const schedulerJobId = this.handle.schedulerJobId;
    if (schedulerJobId === null) throw new Error("success without a scheduler job id");

    await this.transition("succeeded");
    await this.log.event("job.succeeded", `scheduler_job_id=${schedulerJobId}`, {
      scheduler_job_id: schedulerJobId,
      attempts: this.handle.attempt
    });
    await this.record("updateJob", (store) =>
      store.updateJob(this.id, { status: "succeeded", result: { value: rawValue }, finishedAt: new Date().toISOString() })
    );

    return {
      status: "succeeded",
      jobId: this.id,
      schedulerJobId,
      attempts: this.handle.attempt,
      value: decoded.value
    };
  }

  private async cancelled(paths: TaskArtifactPaths | null): Promise<JobOutcome<never>> {
    const schedulerJobId = this.handle.schedulerJobId;
    let deleted = false;
    if (schedulerJobId !== null) deleted = await this.deps.client.cancel(schedulerJobId);
    this.live = null;
    await this.log.warn("job.cancelled", `cancelled${schedulerJobId ? ` (scheduler job ${schedulerJobId})` : ""}`, {
      scheduler_job_id: schedulerJobId,
      deleted
    });
    return this.fail("cancelled", new JobCancelledError(`job ${this.id} cancelled`), paths);
  }

  private async fail(
    reason: FailureReason,
    error: GridError,
    paths: TaskArtifactPaths | null,
    captured?: { stdout: string; stderr: string }
  ): Promise<JobOutcome<never>> {
    const logs = captured ?? {
      stdout: paths ? await readCapped(paths.stdoutPath, this.maxLogBytes()) : "",
      stderr: paths ? await readCapped(paths.stderrPath, this.maxLogBytes()) : ""
    };

    await this.transition("failed");
    await this.log.event(
      "job.failed",
      error.message,
      { reason, scheduler_job_id: this.handle.schedulerJobId, attempts: this.handle.attempt, ...logs },
      "error"
    );
    await this.record("updateJob", (store) =>
      store.updateJob(this.id, {
        status: "failed",
        failureReason: reason,
        error: error.message,
        finishedAt: new Date().toISOString()
      })
    );

    return {
      status: "failed",
      jobId: this.id,
      schedulerJobId: this.handle.schedulerJobId,
      attempts: this.handle.attempt,
      reason,
      error,
      stdout: logs.stdout,
      stderr: logs.stderr
    };
  }

  /** Ledger writes are best-effort: a failed write is logged and the job carries on. */
  private async record(op: string, write: (store: JobStore) => Promise<unknown>): Promise<void> {
    const store = this.deps.store;
    if (!store) return;
    try {
      await write(store);
    } catch (err) {
      await this.log.warn("ledger.write_failed", `${op}: ${errorMessage(err)}`, { op, error: errorMessage(err) });
    }
  }

  /** Deletes a still-live scheduler job before an unexpected error leaves the worker. */
  private async abandon(cause: unknown): Promise<void> {
    const schedulerJobId = this.live;
    if (schedulerJobId === null) return;
    this.live = null;
    let deleted = false;
    try {
      deleted = await this.deps.client.cancel(schedulerJobId);
    } catch (err) {
      await this.log.warn("job.abandon.qdel_failed", errorMessage(err), { scheduler_job_id: schedulerJobId });
    }
    await this.log.event(
      "job.abandoned",
      `unexpected error with scheduler job ${schedulerJobId} live: ${errorMessage(cause)}`,
      { scheduler_job_id: schedulerJobId, deleted },
      "error"
    );
  }

  private maxLogBytes(): number {
    return this.options.maxLogBytes ?? DEFAULT_MAX_LOG_BYTES;
  }

  private async transition(next: WorkerState): Promise<void> {
    const prev = this.current;
    this.current = next;
    await this.log.event("worker.state", `${prev} -> ${next}`, { from: prev, to: next }, "debug");
  }
}
