import { promises as fs } from "fs";
import path from "path";
import type { JobWorkspace } from "../execution/workspace.js";
import type { TaskDescriptor } from "./descriptor.js";
import { DEFAULT_BOOTSTRAP_TEMPLATE, renderExecutorScript, renderSubmitScript } from "./scripts.js";

export interface TaskArtifactPaths {
  paramsPath: string;
  executorPath: string;
  submitScriptPath: string;
  resultPath: string;
  stdoutPath: string;
  stderrPath: string;
  schedulerJobIdPath: string;
}

export function taskArtifactPaths(ws: JobWorkspace): TaskArtifactPaths {
  return {
    paramsPath: ws.inPath("task.json"),
    executorPath: ws.metaPath("executor.mjs"),
    submitScriptPath: ws.metaPath("submit.sh"),
    resultPath: ws.outPath("result.json"),
    stdoutPath: ws.metaPath("stdout.txt"),
    stderrPath: ws.metaPath("stderr.txt"),
    schedulerJobIdPath: ws.metaPath("scheduler_job_id.txt")
  };
}

export interface TaskSerializer {
  /** Writes everything a submission needs into the workspace. Called once per job. */
  write(ws: JobWorkspace, task: TaskDescriptor): Promise<TaskArtifactPaths>;
}

export interface NodeExecutorOptions {
  /** Node binary on the compute nodes. */
  node?: string;
  /** Module exporting `tasks`; relative paths resolve against the current directory. */
  registryModule: string;
  environment?: string | null;
  bootstrapTemplate?: string;
}

function resolveRegistry(moduleRef: string): string {
  return moduleRef.startsWith(".") ? path.resolve(moduleRef) : moduleRef;
}

export class NodeTaskSerializer implements TaskSerializer {
  constructor(private readonly options: NodeExecutorOptions) {}

  async write(ws: JobWorkspace, task: TaskDescriptor): Promise<TaskArtifactPaths> {
    const paths = taskArtifactPaths(ws);

    const params = {
      version: 1,
      task: task.task,
      args: task.args,
      kwargs: task.kwargs,
      requires: task.requires,
      registry: resolveRegistry(this.options.registryModule)
    };
    await fs.writeFile(paths.paramsPath, JSON.stringify(params, null, 2) + "\n", "utf8");

    await fs.writeFile(paths.executorPath, renderExecutorScript(), { encoding: "utf8", mode: 0o755 });

    const script = renderSubmitScript({
      jobName: `gridpool_${task.task}`,
      node: this.options.node ?? "node",
      executorPath: paths.executorPath,
      paramsPath: paths.paramsPath,
      resultPath: paths.resultPath,
      bootstrapTemplate: this.options.bootstrapTemplate ?? DEFAULT_BOOTSTRAP_TEMPLATE,
      environment: this.options.environment ?? null
    });
    await fs.writeFile(paths.submitScriptPath, script, { encoding: "utf8", mode: 0o755 });

    return paths;
  }
}
