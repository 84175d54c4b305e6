import { promises as fs } from "fs";
import path from "path";
import { SubmissionError } from "../../core/errors.js";
import type { ResourceRequest } from "../../resources/resourceSpec.js";
import { createCommandRunner, type CommandRunner } from "./command.js";
import {
  parseQacctStatus,
  parseQstatStatus,
  parseQsubJobId,
  type AccountingStatus,
  type QueueStatus
} from "./parse.js";

export interface SgeSubmitResult {
  schedulerJobId: string;
  stdout: string;
  stderr: string;
}

export interface SgeSubmitTargets {
  /** Working directory for `-cwd`. */
  cwd: string;
  stdoutPath: string;
  stderrPath: string;
}

export interface SchedulerClient {
  submit(scriptPath: string, resources: ResourceRequest, targets: SgeSubmitTargets): Promise<SgeSubmitResult>;
  checkStatus(schedulerJobId: string): Promise<QueueStatus>;
  checkAccounting(schedulerJobId: string): Promise<AccountingStatus>;
  cancel(schedulerJobId: string): Promise<boolean>;
}

export interface SgeCommands {
  qsub: string;
  qstat: string;
  qacct: string;
  qdel: string;
}

export const DEFAULT_SGE_COMMANDS: SgeCommands = {
  qsub: "qsub",
  qstat: "qstat",
  qacct: "qacct",
  qdel: "qdel"
};

export function buildQsubArgv(
  qsub: string,
  scriptPath: string,
  resources: ResourceRequest,
  targets: SgeSubmitTargets
): string[] {
  return [
    qsub,
    "-cwd",
    "-pe",
    resources.parallelEnv,
    String(resources.threads),
    "-l",
    `h_vmem=${resources.memPerThread}`,
    "-l",
    `h_rt=${resources.wallTime}`,
    "-l",
    `gpu=${resources.gpu ? 1 : 0}`,
    "-o",
    targets.stdoutPath,
    "-e",
    targets.stderrPath,
    scriptPath
  ];
}

export class SystemSgeClient implements SchedulerClient {
  private readonly commands: SgeCommands;
  private readonly run: CommandRunner;

  constructor(options: { commands?: Partial<SgeCommands>; runner?: CommandRunner } = {}) {
    this.commands = { ...DEFAULT_SGE_COMMANDS, ...options.commands };
    this.run = options.runner ?? createCommandRunner();
  }

  async submit(scriptPath: string, resources: ResourceRequest, targets: SgeSubmitTargets): Promise<SgeSubmitResult> {
    const argv = buildQsubArgv(this.commands.qsub, scriptPath, resources, targets);
    const res = await this.run(argv, { cwd: targets.cwd });

    if (res.error) {
      throw new SubmissionError(`qsub unavailable: ${res.error.message}`, { stderr: res.stderr });
    }
    if (res.exitCode !== 0) {
      throw new SubmissionError(
        `qsub failed (exit ${res.exitCode})${res.stderr.trim() ? `: ${res.stderr.trim()}` : ""}`,
        { exitCode: res.exitCode, stdout: res.stdout, stderr: res.stderr }
      );
    }

    const jobId = parseQsubJobId(res.stdout);
    if (!jobId) {
      throw new SubmissionError(`unable to parse qsub job id from output: ${res.stdout.trim() || "<empty>"}`, {
        exitCode: res.exitCode,
        stdout: res.stdout,
        stderr: res.stderr
      });
    }
    return { schedulerJobId: jobId, stdout: res.stdout, stderr: res.stderr };
  }

  async checkStatus(schedulerJobId: string): Promise<QueueStatus> {
    const res = await this.run([this.commands.qstat]);
    if (res.error || res.exitCode !== 0) return "unknown";
    return parseQstatStatus(res.stdout, schedulerJobId);
  }

  async checkAccounting(schedulerJobId: string): Promise<AccountingStatus> {
    const res = await this.run([this.commands.qacct, "-j", schedulerJobId]);
    if (res.error || res.exitCode !== 0) return "unknown";
    return parseQacctStatus(res.stdout);
  }

  async cancel(schedulerJobId: string): Promise<boolean> {
    const res = await this.run([this.commands.qdel, schedulerJobId]);
    return !res.error && res.exitCode === 0;
  }
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const st = await fs.stat(filePath);
    if (!st.isFile()) return false;
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Scheduler commands that cannot be resolved against `searchPath`. */
export async function findMissingCommands(
  commands: SgeCommands,
  searchPath: string = process.env.PATH ?? ""
): Promise<string[]> {
  const dirs = searchPath.split(path.delimiter).filter((d) => d.length > 0);
  const missing: string[] = [];
  for (const command of Object.values(commands)) {
    if (command.includes(path.sep)) {
      if (!(await isExecutable(command))) missing.push(command);
      continue;
    }
    let found = false;
    for (const dir of dirs) {
      if (await isExecutable(path.join(dir, command))) {
        found = true;
        break;
      }
    }
    if (!found) missing.push(command);
  }
  return missing;
}
