import { promises as fs } from "fs";
import path from "path";
import { setTimeout as sleep } from "timers/promises";
import { newJobId, type JobId } from "../core/ids.js";
import { errorMessage } from "../core/errors.js";
import type { JobLog } from "../logging/jobLog.js";

export type CleanupResult = "kept" | "removed" | "already_removed" | "failed";

export const DEFAULT_CLEANUP_RETRY_DELAY_MS = 5000;

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

export interface WorkspaceOptions {
  jobId?: JobId;
  log?: JobLog;
  cleanupRetryDelayMs?: number;
  remove?: (dir: string) => Promise<void>;
}

async function removeTree(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true });
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Private scratch directory of one job:
 *
 *   <base>/<job_id>/in/task.json
 *   <base>/<job_id>/meta/{executor.mjs,submit.sh,stdout.txt,stderr.txt,scheduler_job_id.txt}
 *   <base>/<job_id>/out/result.json
 */
export class JobWorkspace {
  readonly inDir: string;
  readonly outDir: string;
  readonly metaDir: string;
  private settled: CleanupResult | null = null;

  private constructor(
    readonly id: JobId,
    readonly rootDir: string,
    private readonly options: WorkspaceOptions
  ) {
    this.inDir = path.join(rootDir, "in");
    this.outDir = path.join(rootDir, "out");
    this.metaDir = path.join(rootDir, "meta");
  }

  static async create(baseDir: string, options: WorkspaceOptions = {}): Promise<JobWorkspace> {
    const id = options.jobId ?? newJobId();
    const base = path.resolve(baseDir);
    await fs.mkdir(base, { recursive: true });

    const root = path.join(base, id);
    // Non-recursive: an existing directory means an id collision.
    await fs.mkdir(root);

    const ws = new JobWorkspace(id, root, options);
    await fs.mkdir(ws.inDir);
    await fs.mkdir(ws.outDir);
    await fs.mkdir(ws.metaDir);
    return ws;
  }

  get removed(): boolean {
    return this.settled === "removed" || this.settled === "already_removed";
  }

  inPath(name: string): string {
    return safeJoin(this.inDir, name);
  }

  outPath(name: string): string {
    return safeJoin(this.outDir, name);
  }

  metaPath(name: string): string {
    return safeJoin(this.metaDir, name);
  }

  async cleanup(options: { keep?: boolean } = {}): Promise<CleanupResult> {
    if (options.keep) return "kept";
    if (this.settled !== null) return this.settled;

    if (!(await exists(this.rootDir))) {
      this.settled = "already_removed";
      return this.settled;
    }

    const remove = this.options.remove ?? removeTree;
    try {
      await remove(this.rootDir);
    } catch (first) {
      await sleep(this.options.cleanupRetryDelayMs ?? DEFAULT_CLEANUP_RETRY_DELAY_MS);
      try {
        await remove(this.rootDir);
      } catch (second) {
        this.settled = "failed";
        await this.options.log?.warn("workspace.cleanup_failed", `could not remove workspace: ${this.rootDir}`, {
          root_dir: this.rootDir,
          first_error: errorMessage(first),
          error: errorMessage(second)
        });
        return this.settled;
      }
    }

    this.settled = "removed";
    await this.options.log?.event("workspace.removed", `workspace removed: ${this.rootDir}`, { root_dir: this.rootDir }, "debug");
    return this.settled;
  }
}
