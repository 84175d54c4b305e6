import { setTimeout as sleep } from "timers/promises";

export interface PollingOptions {
  initialDelayMs: number;
  factor: number;
  maxDelayMs: number;
  /** Pause after `qstat` loses track of a job, before asking accounting. */
  unknownPauseMs: number;
}

export const DEFAULT_POLLING: PollingOptions = {
  initialDelayMs: 2000,
  factor: 1.2,
  maxDelayMs: 60000,
  unknownPauseMs: 5000
};

export function resolvePolling(overrides: Partial<PollingOptions> = {}): PollingOptions {
  const out: PollingOptions = { ...DEFAULT_POLLING, ...overrides };
  if (!(out.initialDelayMs >= 0) || !(out.maxDelayMs >= out.initialDelayMs)) {
    throw new Error(`invalid polling delays: initial=${out.initialDelayMs} max=${out.maxDelayMs}`);
  }
  if (!(out.factor >= 1)) throw new Error(`polling factor must be >= 1: ${out.factor}`);
  if (!(out.unknownPauseMs >= 0)) throw new Error(`invalid unknown pause: ${out.unknownPauseMs}`);
  return out;
}

export function nextDelay(current: number, options: PollingOptions): number {
  return Math.min(current * options.factor, options.maxDelayMs);
}

/** Resolves `false` instead of sleeping the full time when `signal` aborts. */
export async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await sleep(ms, undefined, signal ? { signal } : undefined);
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}
