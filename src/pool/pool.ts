import type * as z from "zod/v4";
import type { JsonValue } from "../core/json.js";
import { JobLog } from "../logging/jobLog.js";
import type { ResourcePlan } from "../resources/resourceSpec.js";
import type { TaskDescriptor } from "../tasks/descriptor.js";
import type { JobOutcome } from "../worker/outcome.js";
import {
  Worker,
  schemaDecoder,
  type ResultDecoder,
  type RunOptions,
  type WorkerDeps,
  type WorkerOptions
} from "../worker/worker.js";

export interface PoolOptions {
  worker: WorkerOptions;
  /** Default number of workers running at once. */
  concurrency?: number;
}

export interface MapOptions extends RunOptions {
  concurrency?: number;
  onProgress?: (done: number, total: number) => void;
}

function checkConcurrency(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`concurrency must be a positive integer: ${value}`);
  }
  return value;
}

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight. Results
 * land at their item's index. After the first rejection no new item starts;
 * calls already running finish, then that rejection is rethrown.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, idx: number) => Promise<R>
): Promise<R[]> {
  const n = checkConcurrency(concurrency);
  const results: R[] = new Array<R>(items.length);
  let nextIdx = 0;
  const errors: unknown[] = [];

  async function lane(): Promise<void> {
    for (;;) {
      if (errors.length) return;
      const idx = nextIdx;
      nextIdx += 1;
      if (idx >= items.length) return;

      const item = items[idx];
      if (item === undefined) return;

      try {
        results[idx] = await fn(item, idx);
      } catch (error) {
        errors.push(error);
        return;
      }
    }
  }

  const lanes = Array.from({ length: Math.min(n, items.length) }, () => lane());
  await Promise.all(lanes);
  if (errors.length) throw errors[0];
  return results;
}

/** Fans tasks out over independent workers; outcomes come back in input order. */
export class Pool {
  private readonly log: JobLog;

  constructor(
    private readonly deps: WorkerDeps,
    private readonly options: PoolOptions
  ) {
    if (options.concurrency !== undefined) checkConcurrency(options.concurrency);
    this.log = new JobLog(null, deps.sinks ?? [], deps.onSinkError);
  }

  map(tasks: readonly TaskDescriptor[], resources: ResourcePlan, options?: MapOptions): Promise<JobOutcome<JsonValue>[]>;
  map<T>(
    tasks: readonly TaskDescriptor[],
    resources: ResourcePlan,
    options: MapOptions & { resultSchema: z.ZodType<T> }
  ): Promise<JobOutcome<T>[]>;
  map<T>(
    tasks: readonly TaskDescriptor[],
    resources: ResourcePlan,
    options: MapOptions & { resultSchema?: z.ZodType<T> } = {}
  ): Promise<JobOutcome<T>[] | JobOutcome<JsonValue>[]> {
    if (options.resultSchema) return this.mapWithDecoder(tasks, resources, options, schemaDecoder(options.resultSchema));
    return this.mapWithDecoder<JsonValue>(tasks, resources, options, (value) => ({ ok: true, value }));
  }

  async mapWithDecoder<T>(
    tasks: readonly TaskDescriptor[],
    resources: ResourcePlan,
    options: MapOptions,
    decode: ResultDecoder<T>
  ): Promise<JobOutcome<T>[]> {
    const concurrency = checkConcurrency(options.concurrency ?? this.options.concurrency ?? 1);
    const total = tasks.length;
    let done = 0;

    await this.log.event("pool.start", `tasks=${total} concurrency=${concurrency}`, { tasks: total, concurrency });

    const outcomes = await runWithConcurrency(tasks, concurrency, async (task) => {
      const worker = await Worker.create(this.deps, this.options.worker);
      const outcome = await worker.runWithDecoder(
        task,
        resources,
        { maxAttempts: options.maxAttempts, signal: options.signal },
        decode
      );
      done += 1;
      await this.log.event("pool.progress", `${done}/${total}`, { done, total, job_id: outcome.jobId, status: outcome.status });
      options.onProgress?.(done, total);
      return outcome;
    });

    const failed = outcomes.filter((o) => o.status === "failed").length;
    await this.log.event("pool.done", `succeeded=${total - failed} failed=${failed}`, { total, failed });
    return outcomes;
  }
}
