export { GridConfig, parseGridConfig } from "./config/config.js";
export {
  GridError,
  InvalidResourceSpecError,
  InvalidTaskError,
  JobCancelledError,
  JobFailedError,
  ResultCorruptError,
  SubmissionError
} from "./core/errors.js";
export type { JobId } from "./core/ids.js";
export type { JsonObject, JsonValue } from "./core/json.js";
export { createDb, createMemoryPool, createPgPool } from "./db/connection.js";
export { applySqlFile, openLedger, type Ledger, type LedgerOptions } from "./db/bootstrap.js";
export {
  DEFAULT_SGE_COMMANDS,
  SystemSgeClient,
  findMissingCommands,
  type SchedulerClient,
  type SgeCommands
} from "./execution/sge/client.js";
export { createCommandRunner, type CommandRunner } from "./execution/sge/command.js";
export type { AccountingStatus, QueueStatus } from "./execution/sge/parse.js";
export { JobWorkspace } from "./execution/workspace.js";
export { JobLog, MemoryEventSink, StderrEventSink, type JobEvent, type JobEventSink } from "./logging/jobLog.js";
export { createGatewayServer, type GatewayDeps } from "./mcp/gatewayServer.js";
export { Pool, runWithConcurrency, type MapOptions, type PoolOptions } from "./pool/pool.js";
export {
  createResourceRequest,
  escalateResources,
  type ResourceInput,
  type ResourcePlan,
  type ResourceRequest
} from "./resources/resourceSpec.js";
export { PostgresJobStore, type JobStore } from "./store/jobStore.js";
export { defineTaskRegistry, parseTaskDescriptor, tasksFor, type TaskDescriptor } from "./tasks/descriptor.js";
export { NodeTaskSerializer, type TaskSerializer } from "./tasks/serializer.js";
export { unwrapOutcome, type JobOutcome } from "./worker/outcome.js";
export { Worker, type RunOptions, type WorkerOptions } from "./worker/worker.js";
