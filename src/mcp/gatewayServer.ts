import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import type { GridConfig } from "../config/config.js";
import { InvalidResourceSpecError, InvalidTaskError } from "../core/errors.js";
import { isJobId } from "../core/ids.js";
import type { JsonObject, JsonValue } from "../core/json.js";
import type { SchedulerClient } from "../execution/sge/client.js";
import type { JobEventSink } from "../logging/jobLog.js";
import { Pool } from "../pool/pool.js";
import type { ResourceInput } from "../resources/resourceSpec.js";
import type { JobStore } from "../store/jobStore.js";
import { parseTaskDescriptor } from "../tasks/descriptor.js";
import type { TaskSerializer } from "../tasks/serializer.js";
import type { JobOutcome } from "../worker/outcome.js";
import { Worker, type WorkerDeps } from "../worker/worker.js";
import {
  zJobGetInput,
  zJobGetOutput,
  zJobMapInput,
  zJobMapOutput,
  zJobRunInput,
  zJobRunOutput,
  type zResourcesInput
} from "./toolSchemas.js";

export interface GatewayDeps {
  config: GridConfig;
  store: JobStore;
  client: SchedulerClient;
  serializer: TaskSerializer;
  sinks?: JobEventSink[];
}

function toResourceInput(input: z.infer<typeof zResourcesInput> | undefined): ResourceInput {
  const out: ResourceInput = {};
  if (!input) return out;
  if (input.threads !== undefined) out.threads = input.threads;
  if (input.time !== undefined) out.time = input.time;
  if (input.mem !== undefined) out.mem = input.mem;
  if (input.gpu !== undefined) out.gpu = input.gpu;
  if (input.parallel_env !== undefined) out.parallelEnv = input.parallel_env;
  return out;
}

export function outcomeToJson(outcome: JobOutcome<JsonValue>): JsonObject {
  if (outcome.status === "succeeded") {
    return {
      job_id: outcome.jobId,
      status: outcome.status,
      scheduler_job_id: outcome.schedulerJobId,
      attempts: outcome.attempts,
      value: outcome.value
    };
  }
  return {
    job_id: outcome.jobId,
    status: outcome.status,
    scheduler_job_id: outcome.schedulerJobId,
    attempts: outcome.attempts,
    reason: outcome.reason,
    error: outcome.error.message,
    stdout: outcome.stdout,
    stderr: outcome.stderr
  };
}

function toMcpError(e: unknown): unknown {
  if (e instanceof InvalidResourceSpecError || e instanceof InvalidTaskError) {
    return new McpError(ErrorCode.InvalidParams, e.message);
  }
  return e;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "gridpool-gateway",
    version: "0.1.0"
  });

  const workerDeps: WorkerDeps = {
    client: deps.client,
    serializer: deps.serializer,
    sinks: deps.sinks ?? [],
    store: deps.store
  };

  mcp.registerTool(
    "job_run",
    {
      description: "Submit one registered task to the Grid Engine cluster, wait for it (with retries) and return its outcome.",
      inputSchema: zJobRunInput,
      outputSchema: zJobRunOutput
    },
    async (args, extra) => {
      try {
        const task = parseTaskDescriptor({
          task: args.task,
          args: args.args,
          kwargs: args.kwargs,
          requires: args.requires
        });
        const resources = deps.config.resources(toResourceInput(args.resources));

        const worker = await Worker.create(workerDeps, deps.config.workerOptions());
        const outcome = await worker.run(task, resources, {
          maxAttempts: args.max_attempts ?? deps.config.maxAttempts(),
          signal: extra.signal
        });

        return {
          content: [{ type: "text", text: `job ${outcome.jobId}: ${outcome.status}` }],
          structuredContent: outcomeToJson(outcome)
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_map",
    {
      description:
        "Run one registered task over a list of inputs with bounded concurrency; outcomes are returned in input order.",
      inputSchema: zJobMapInput,
      outputSchema: zJobMapOutput
    },
    async (args, extra) => {
      try {
        const tasks = args.inputs.map((input) =>
          parseTaskDescriptor({ task: args.task, args: [input], kwargs: args.kwargs, requires: args.requires })
        );
        const resources = deps.config.resources(toResourceInput(args.resources));

        const pool = new Pool(workerDeps, { worker: deps.config.workerOptions(), concurrency: deps.config.concurrency() });
        const outcomes = await pool.map(tasks, resources, {
          concurrency: args.concurrency,
          maxAttempts: args.max_attempts ?? deps.config.maxAttempts(),
          signal: extra.signal
        });

        const failed = outcomes.filter((o) => o.status === "failed").length;
        const structured: JsonObject = {
          outcomes: outcomes.map(outcomeToJson),
          succeeded: outcomes.length - failed,
          failed
        };
        return {
          content: [{ type: "text", text: `job_map: ${outcomes.length - failed} succeeded, ${failed} failed` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_get",
    {
      description: "Fetch a job's ledger record: status, attempts and recorded events.",
      inputSchema: zJobGetInput,
      outputSchema: zJobGetOutput
    },
    async (args) => {
      const jobId = args.job_id;
      if (!isJobId(jobId)) throw new McpError(ErrorCode.InvalidParams, `invalid job_id: ${jobId}`);
      const job = await deps.store.getJob(jobId);
      if (!job) throw new McpError(ErrorCode.InvalidParams, `unknown job_id: ${jobId}`);

      const attempts = await deps.store.listAttempts(jobId);
      const events = await deps.store.listEvents(jobId, args.event_limit);

      const structured: JsonObject = {
        job: {
          job_id: job.jobId,
          task_name: job.taskName,
          params_hash: job.paramsHash,
          status: job.status,
          attempts: job.attempts,
          max_attempts: job.maxAttempts,
          scheduler_job_id: job.schedulerJobId,
          failure_reason: job.failureReason,
          error: job.error,
          result: job.result ? job.result.value : null,
          created_at: job.createdAt,
          finished_at: job.finishedAt
        },
        attempts: attempts.map((a) => ({
          attempt: a.attempt,
          scheduler_job_id: a.schedulerJobId,
          resources: a.resources,
          outcome: a.outcome,
          submitted_at: a.submittedAt,
          finished_at: a.finishedAt
        })),
        events: events.map((e) => ({ ts: e.ts, level: e.level, kind: e.kind, message: e.message, data: e.data }))
      };

      return {
        content: [{ type: "text", text: `job ${jobId}: ${job.status} (${job.attempts}/${job.maxAttempts} attempts)` }],
        structuredContent: structured
      };
    }
  );

  return mcp;
}
