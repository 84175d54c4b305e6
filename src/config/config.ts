import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { LogLevel } from "../logging/jobLog.js";
import {
  createResourceRequest,
  type ResourceInput,
  type ResourceLimits,
  type ResourceRequest
} from "../resources/resourceSpec.js";
import { DEFAULT_SGE_COMMANDS, type SgeCommands } from "../execution/sge/client.js";
import { DEFAULT_MAX_CAPTURE_BYTES } from "../execution/sge/command.js";
import { DEFAULT_CLEANUP_RETRY_DELAY_MS } from "../execution/workspace.js";
import type { NodeExecutorOptions } from "../tasks/serializer.js";
import { DEFAULT_POLLING, type PollingOptions } from "../worker/backoff.js";
import { DEFAULT_MAX_ATTEMPTS, type WorkerOptions } from "../worker/worker.js";

const zPositiveInt = z.number().int().min(1);
const zNonNegativeInt = z.number().int().min(0);

export const zGridConfigFile = z.object({
  version: z.literal(1),
  workspace: z.object({
    base_dir: z.string().min(1),
    keep: z.boolean().optional(),
    cleanup_retry_delay_ms: zNonNegativeInt.optional()
  }),
  scheduler: z
    .object({
      qsub: z.string().min(1).optional(),
      qstat: z.string().min(1).optional(),
      qacct: z.string().min(1).optional(),
      qdel: z.string().min(1).optional(),
      max_capture_bytes: zPositiveInt.optional()
    })
    .optional(),
  resources: z
    .object({
      parallel_env: z.string().optional(),
      threads: z.number().optional(),
      time: z.union([z.number(), z.string()]).optional(),
      mem: z.union([z.number(), z.string()]).optional(),
      gpu: z.union([z.boolean(), z.literal(0), z.literal(1)]).optional()
    })
    .optional(),
  limits: z
    .object({
      max_threads: zPositiveInt.optional(),
      max_wall_time_seconds: zPositiveInt.optional(),
      max_mem_per_thread_gb: zPositiveInt.optional()
    })
    .optional(),
  retry: z.object({ max_attempts: zPositiveInt.optional() }).optional(),
  polling: z
    .object({
      initial_delay_ms: zNonNegativeInt.optional(),
      factor: z.number().min(1).optional(),
      max_delay_ms: zNonNegativeInt.optional(),
      unknown_pause_ms: zNonNegativeInt.optional()
    })
    .optional(),
  pool: z.object({ concurrency: zPositiveInt.optional() }).optional(),
  executor: z.object({
    node: z.string().min(1).optional(),
    registry_module: z.string().min(1),
    environment: z.string().min(1).nullable().optional(),
    bootstrap_template: z.string().optional()
  }),
  logging: z.object({ level: z.enum(["debug", "info", "warn", "error"]).optional() }).optional()
});

export type GridConfigFile = z.infer<typeof zGridConfigFile>;

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const m1 = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed);
  if (m1) {
    const varName = m1[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  const m2 = /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m2) {
    const varName = m2[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  return value;
}

function expandRequired(value: string, field: string): string {
  const expanded = expandEnvToken(value);
  if (expanded === null) throw new Error(`config ${field} references an unset environment variable: ${value}`);
  return expanded;
}

function expandConfigEnv(config: GridConfigFile): GridConfigFile {
  return {
    ...config,
    workspace: { ...config.workspace, base_dir: expandRequired(config.workspace.base_dir, "workspace.base_dir") },
    executor: {
      ...config.executor,
      registry_module: expandRequired(config.executor.registry_module, "executor.registry_module")
    }
  };
}

export function parseGridConfig(value: unknown, source = "<inline>"): GridConfigFile {
  const parsed = zGridConfigFile.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new Error(`invalid config at ${source}: ${detail}`);
  }
  return expandConfigEnv(parsed.data);
}

export class GridConfig {
  readonly configHash: `sha256:${string}`;

  constructor(private readonly config: GridConfigFile) {
    this.configHash = sha256Prefixed(stableJsonStringify(config));
  }

  static async loadFromFile(filePath: string): Promise<GridConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = YAML.parse(raw) as unknown;
    return new GridConfig(parseGridConfig(parsed, filePath));
  }

  baseDir(): string {
    return this.config.workspace.base_dir;
  }

  resourceDefaults(): ResourceInput {
    const r: NonNullable<GridConfigFile["resources"]> = this.config.resources ?? {};
    const out: ResourceInput = {};
    if (r.parallel_env !== undefined) out.parallelEnv = r.parallel_env;
    if (r.threads !== undefined) out.threads = r.threads;
    if (r.time !== undefined) out.time = r.time;
    if (r.mem !== undefined) out.mem = r.mem;
    if (r.gpu !== undefined) out.gpu = r.gpu;
    return out;
  }

  limits(): ResourceLimits {
    const l: NonNullable<GridConfigFile["limits"]> = this.config.limits ?? {};
    const out: ResourceLimits = {};
    if (l.max_threads !== undefined) out.maxThreads = l.max_threads;
    if (l.max_wall_time_seconds !== undefined) out.maxWallTimeSeconds = l.max_wall_time_seconds;
    if (l.max_mem_per_thread_gb !== undefined) out.maxMemPerThreadGb = l.max_mem_per_thread_gb;
    return out;
  }

  /** Request built from `input` over the configured defaults, checked against the limits. */
  resources(input: ResourceInput = {}): ResourceRequest {
    return createResourceRequest(input, { defaults: this.resourceDefaults(), limits: this.limits() });
  }

  maxAttempts(): number {
    return this.config.retry?.max_attempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  concurrency(): number {
    return this.config.pool?.concurrency ?? 1;
  }

  polling(): PollingOptions {
    const p: NonNullable<GridConfigFile["polling"]> = this.config.polling ?? {};
    return {
      initialDelayMs: p.initial_delay_ms ?? DEFAULT_POLLING.initialDelayMs,
      factor: p.factor ?? DEFAULT_POLLING.factor,
      maxDelayMs: p.max_delay_ms ?? DEFAULT_POLLING.maxDelayMs,
      unknownPauseMs: p.unknown_pause_ms ?? DEFAULT_POLLING.unknownPauseMs
    };
  }

  workerOptions(): WorkerOptions {
    return {
      baseDir: this.baseDir(),
      keepWorkspace: this.config.workspace.keep ?? false,
      cleanupRetryDelayMs: this.config.workspace.cleanup_retry_delay_ms ?? DEFAULT_CLEANUP_RETRY_DELAY_MS,
      polling: this.polling(),
      maxLogBytes: this.maxCaptureBytes()
    };
  }

  sgeCommands(): SgeCommands {
    const s: NonNullable<GridConfigFile["scheduler"]> = this.config.scheduler ?? {};
    return {
      qsub: s.qsub ?? DEFAULT_SGE_COMMANDS.qsub,
      qstat: s.qstat ?? DEFAULT_SGE_COMMANDS.qstat,
      qacct: s.qacct ?? DEFAULT_SGE_COMMANDS.qacct,
      qdel: s.qdel ?? DEFAULT_SGE_COMMANDS.qdel
    };
  }

  maxCaptureBytes(): number {
    return this.config.scheduler?.max_capture_bytes ?? DEFAULT_MAX_CAPTURE_BYTES;
  }

  executorOptions(): NodeExecutorOptions {
    const e = this.config.executor;
    const out: NodeExecutorOptions = {
      node: e.node ?? "node",
      registryModule: e.registry_module,
      environment: e.environment ?? null
    };
    if (e.bootstrap_template !== undefined) out.bootstrapTemplate = e.bootstrap_template;
    return out;
  }

  logLevel(): LogLevel {
    return this.config.logging?.level ?? "info";
  }
}
