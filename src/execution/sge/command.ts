import { spawn } from "child_process";

export const DEFAULT_MAX_CAPTURE_BYTES = 1024 * 1024;

export interface CommandResult {
  /** `null` when the process could not be started or was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error: Error | null;
}

export type CommandRunner = (argv: string[], options?: { cwd?: string }) => Promise<CommandResult>;

function appendLimited(
  chunks: Buffer[],
  chunk: Buffer,
  state: { bytes: number; truncated: boolean },
  maxBytes: number
): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > maxBytes) {
    const keep = Math.max(0, maxBytes - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = maxBytes;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

export function createCommandRunner(maxCaptureBytes: number = DEFAULT_MAX_CAPTURE_BYTES): CommandRunner {
  return async (argv, options = {}) => {
    const [command, ...args] = argv;
    if (!command) throw new Error("command argv must be non-empty");

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState = { bytes: 0, truncated: false };
    const stderrState = { bytes: 0, truncated: false };

    child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState, maxCaptureBytes));
    child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState, maxCaptureBytes));

    const settled = await new Promise<{ exitCode: number | null; error: Error | null }>((resolve) => {
      child.on("error", (error: Error) => resolve({ exitCode: null, error }));
      child.on("close", (code: number | null) => resolve({ exitCode: code, error: null }));
    });

    const stdout = Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
    const stderr = Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");

    return { exitCode: settled.exitCode, stdout, stderr, error: settled.error };
  };
}
