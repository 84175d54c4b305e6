import { InvalidResourceSpecError } from "../core/errors.js";

export type TimeInput = number | string;
export type MemoryInput = number | string;

export interface ResourceInput {
  threads?: number;
  /** Seconds, or an `HH:MM:SS` string. */
  time?: TimeInput;
  /** Gigabytes per thread; a trailing `G`/`M` is accepted and dropped. */
  mem?: MemoryInput;
  gpu?: boolean | 0 | 1;
  parallelEnv?: string;
}

export interface ResourceLimits {
  maxThreads?: number;
  maxWallTimeSeconds?: number;
  maxMemPerThreadGb?: number;
}

export interface ResourceRequest {
  readonly threads: number;
  readonly wallTime: string;
  readonly memPerThread: string;
  readonly gpu: boolean;
  readonly parallelEnv: string;
}

export type ResourceEscalation = (attempt: number) => ResourceRequest;

export type ResourcePlan = ResourceRequest | ResourceEscalation;

export const DEFAULT_RESOURCES: Required<ResourceInput> = {
  threads: 1,
  time: "00:59:00",
  mem: 6,
  gpu: false,
  parallelEnv: "parallel"
};

const TIME_RE = /^[0-9]{2}:[0-5][0-9]:[0-5][0-9]$/;
const PARALLEL_ENV_RE = /^[A-Za-z0-9_.-]+$/;

export const MAX_WALL_TIME_SECONDS = 99 * 3600 + 59 * 60 + 59;

function formatSeconds(total: number): string {
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total - hours * 3600) / 60);
  const secs = total - hours * 3600 - minutes * 60;
  const hh = String(hours).padStart(2, "0");
  const mm = String(minutes).padStart(2, "0");
  const ss = String(secs).padStart(2, "0");
  return `${hh}:${mm}:${ss}`;
}

export function normalizeTime(input: TimeInput): string {
  let text = typeof input === "number" ? String(input) : input.trim();

  if (/^[0-9]+$/.test(text)) {
    const seconds = Number.parseInt(text, 10);
    if (!Number.isSafeInteger(seconds) || seconds > MAX_WALL_TIME_SECONDS) {
      throw new InvalidResourceSpecError(`time resource exceeds 99:59:59: ${text}`);
    }
    text = formatSeconds(seconds);
  }

  if (!TIME_RE.test(text)) {
    throw new InvalidResourceSpecError(`time resource not formatted correctly: ${String(input)}`);
  }
  return text;
}

export function wallTimeSeconds(wallTime: string): number {
  const m = /^(\d{2}):(\d{2}):(\d{2})$/.exec(wallTime);
  if (!m) throw new InvalidResourceSpecError(`time resource not formatted correctly: ${wallTime}`);
  const [, hh = "0", mm = "0", ss = "0"] = m;
  return Number(hh) * 3600 + Number(mm) * 60 + Number(ss);
}

export function normalizeMemory(input: MemoryInput): string {
  const text = String(input).trim();
  const digits = text.replace(/[GgMm]$/, "");
  if (!/^[0-9]+$/.test(digits)) {
    throw new InvalidResourceSpecError(`memory resource is not an integer: ${text}`);
  }
  const value = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidResourceSpecError(`memory resource must be positive: ${text}`);
  }
  return `${value}G`;
}

function normalizeThreads(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidResourceSpecError(`threads must be a positive integer: ${value}`);
  }
  return value;
}

function normalizeGpu(value: boolean | 0 | 1): boolean {
  if (value === true || value === 1) return true;
  if (value === false || value === 0) return false;
  throw new InvalidResourceSpecError(`gpu must be a boolean or 0/1: ${String(value)}`);
}

function normalizeParallelEnv(value: string): string {
  const trimmed = value.trim();
  if (!PARALLEL_ENV_RE.test(trimmed)) {
    throw new InvalidResourceSpecError(`invalid parallel environment name: ${JSON.stringify(value)}`);
  }
  return trimmed;
}

function enforceLimits(request: ResourceRequest, limits: ResourceLimits): void {
  if (limits.maxThreads !== undefined && request.threads > limits.maxThreads) {
    throw new InvalidResourceSpecError(`threads exceeds limit (${request.threads} > ${limits.maxThreads})`);
  }
  if (limits.maxWallTimeSeconds !== undefined) {
    const seconds = wallTimeSeconds(request.wallTime);
    if (seconds > limits.maxWallTimeSeconds) {
      throw new InvalidResourceSpecError(`wall time exceeds limit (${seconds}s > ${limits.maxWallTimeSeconds}s)`);
    }
  }
  if (limits.maxMemPerThreadGb !== undefined) {
    const gb = Number.parseInt(request.memPerThread, 10);
    if (gb > limits.maxMemPerThreadGb) {
      throw new InvalidResourceSpecError(`memory per thread exceeds limit (${gb}G > ${limits.maxMemPerThreadGb}G)`);
    }
  }
}

function definedOnly(input: ResourceInput | undefined): ResourceInput {
  const out: ResourceInput = {};
  if (!input) return out;
  if (input.threads !== undefined) out.threads = input.threads;
  if (input.time !== undefined) out.time = input.time;
  if (input.mem !== undefined) out.mem = input.mem;
  if (input.gpu !== undefined) out.gpu = input.gpu;
  if (input.parallelEnv !== undefined) out.parallelEnv = input.parallelEnv;
  return out;
}

export function createResourceRequest(
  input: ResourceInput = {},
  options: { defaults?: ResourceInput; limits?: ResourceLimits } = {}
): ResourceRequest {
  const merged: Required<ResourceInput> = {
    ...DEFAULT_RESOURCES,
    ...definedOnly(options.defaults),
    ...definedOnly(input)
  };

  const request: ResourceRequest = Object.freeze({
    threads: normalizeThreads(merged.threads),
    wallTime: normalizeTime(merged.time),
    memPerThread: normalizeMemory(merged.mem),
    gpu: normalizeGpu(merged.gpu),
    parallelEnv: normalizeParallelEnv(merged.parallelEnv)
  });

  if (options.limits) enforceLimits(request, options.limits);
  return request;
}

/**
 * Time and memory as functions of the attempt number and thread count. Every
 * attempt's request is still built through `createResourceRequest`.
 */
export function escalateResources(
  base: ResourceInput,
  rules: {
    time?: (attempt: number, threads: number) => TimeInput;
    mem?: (attempt: number, threads: number) => MemoryInput;
  },
  options: { defaults?: ResourceInput; limits?: ResourceLimits } = {}
): ResourceEscalation {
  const threads = base.threads ?? options.defaults?.threads ?? DEFAULT_RESOURCES.threads;
  return (attempt: number) =>
    createResourceRequest(
      {
        ...base,
        time: rules.time ? rules.time(attempt, threads) : base.time,
        mem: rules.mem ? rules.mem(attempt, threads) : base.mem
      },
      options
    );
}

/** Requests for attempts `1..maxAttempts`, index 0 being the first attempt. */
export function resolveResourcePlan(plan: ResourcePlan, maxAttempts: number): ResourceRequest[] {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new InvalidResourceSpecError(`maxAttempts must be a positive integer: ${maxAttempts}`);
  }
  const out: ResourceRequest[] = [];
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    out.push(typeof plan === "function" ? plan(attempt) : plan);
  }
  return out;
}
