import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { InvalidTaskError } from "../src/core/errors.js";
import { createCommandRunner } from "../src/execution/sge/command.js";
import { JobWorkspace } from "../src/execution/workspace.js";
import { defineTaskRegistry, parseTaskDescriptor, tasksFor } from "../src/tasks/descriptor.js";
import {
  DEFAULT_BOOTSTRAP_TEMPLATE,
  EXECUTOR_EXIT_MISSING_REQUIREMENT,
  EXECUTOR_EXIT_UNKNOWN_TASK,
  renderBootstrap,
  renderSubmitScript
} from "../src/tasks/scripts.js";
import { NodeTaskSerializer } from "../src/tasks/serializer.js";

describe("task descriptors", () => {
  it("fills defaults", () => {
    expect(parseTaskDescriptor({ task: "square" })).toEqual({ task: "square", args: [], kwargs: {}, requires: [] });
  });

  it("rejects bad names and non-JSON arguments", () => {
    expect(() => parseTaskDescriptor({ task: "9lives" })).toThrow(InvalidTaskError);
    expect(() => parseTaskDescriptor({ task: "rm -rf" })).toThrow(InvalidTaskError);
    expect(() => parseTaskDescriptor({ task: "square", args: [() => 1] })).toThrow("invalid task descriptor: args.0");
  });

  it("builds one descriptor per input", () => {
    const tasks = tasksFor("scale", [1, [2, 3]], { kwargs: { by: 10 } });
    expect(tasks).toEqual([
      { task: "scale", args: [1], kwargs: { by: 10 }, requires: [] },
      { task: "scale", args: [[2, 3]], kwargs: { by: 10 }, requires: [] }
    ]);
  });

  it("validates registry names", () => {
    const registry = defineTaskRegistry({ square: ({ args }) => args });
    expect(Object.keys(registry)).toEqual(["square"]);
    expect(() => defineTaskRegistry({ "bad name": () => null })).toThrow();
  });
});

describe("submit scripts", () => {
  it("substitutes the environment into the bootstrap", () => {
    const text = renderBootstrap(DEFAULT_BOOTSTRAP_TEMPLATE, "snakemake");
    expect(text.split("\n")).toEqual([
      "export OMP_NUM_THREADS=1",
      'if [[ -f ~/.bashrc ]] && grep -q "__conda_setup=" ~/.bashrc; then',
      "  . ~/.bashrc",
      "fi",
      "conda activate snakemake"
    ]);
  });

  it("drops environment lines when no environment is set", () => {
    const text = renderBootstrap(DEFAULT_BOOTSTRAP_TEMPLATE, null);
    expect(text).not.toContain("conda activate");
    expect(text.split("\n")[0]).toBe("export OMP_NUM_THREADS=1");
  });

  it("rejects environment names that need quoting", () => {
    expect(() => renderBootstrap(DEFAULT_BOOTSTRAP_TEMPLATE, "env; rm -rf /")).toThrow("invalid environment name");
  });

  it("renders the job script", () => {
    const script = renderSubmitScript({
      jobName: "gridpool_square it",
      node: "node",
      executorPath: "/w/meta/executor.mjs",
      paramsPath: "/w/in/task.json",
      resultPath: "/w/out/it's.json",
      bootstrapTemplate: "export OMP_NUM_THREADS=1\nconda activate {{environment}}",
      environment: null
    });
    expect(script).toBe(
      [
        "#!/bin/bash",
        "#$ -N gridpool_square_it",
        "#$ -S /bin/bash",
        "",
        "export OMP_NUM_THREADS=1",
        "",
        "set -eo pipefail",
        `exec 'node' '/w/meta/executor.mjs' '/w/in/task.json' '/w/out/it'"'"'s.json'`,
        ""
      ].join("\n")
    );
  });
});

describe("NodeTaskSerializer", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "gridpool-ser-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("writes parameters, executor and submit script into the workspace", async () => {
    const ws = await JobWorkspace.create(tmpDir);
    const serializer = new NodeTaskSerializer({ registryModule: "/srv/tasks/registry.mjs", environment: "analysis" });
    const task = parseTaskDescriptor({ task: "scale", args: [3], kwargs: { by: 2 }, requires: ["yaml"] });

    const paths = await serializer.write(ws, task);

    expect(paths.paramsPath).toBe(path.join(ws.rootDir, "in", "task.json"));
    expect(paths.resultPath).toBe(path.join(ws.rootDir, "out", "result.json"));
    expect(paths.stdoutPath).toBe(path.join(ws.rootDir, "meta", "stdout.txt"));

    const params: unknown = JSON.parse(await readFile(paths.paramsPath, "utf8"));
    expect(params).toEqual({
      version: 1,
      task: "scale",
      args: [3],
      kwargs: { by: 2 },
      requires: ["yaml"],
      registry: "/srv/tasks/registry.mjs"
    });

    const script = await readFile(paths.submitScriptPath, "utf8");
    expect(script).toContain("#$ -N gridpool_scale\n");
    expect(script).toContain("conda activate analysis\n");
    expect(script).toContain(`exec 'node' '${paths.executorPath}' '${paths.paramsPath}' '${paths.resultPath}'\n`);
    expect((await stat(paths.submitScriptPath)).mode & 0o100).toBe(0o100);
    expect((await stat(paths.executorPath)).mode & 0o100).toBe(0o100);
  });

  it("resolves a relative registry module against the working directory", async () => {
    const ws = await JobWorkspace.create(tmpDir);
    const serializer = new NodeTaskSerializer({ registryModule: "./tasks/registry.mjs" });
    const paths = await serializer.write(ws, parseTaskDescriptor({ task: "square" }));

    const params: unknown = JSON.parse(await readFile(paths.paramsPath, "utf8"));
    expect(params).toMatchObject({ registry: path.resolve("tasks/registry.mjs") });
  });
});

describe("executor", () => {
  let tmpDir: string;
  let registryPath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "gridpool-exe-"));
    registryPath = path.join(tmpDir, "registry.mjs");
    await writeFile(
      registryPath,
      "export const tasks = {\n  mul: ({ args, kwargs }) => args[0] * kwargs.y * kwargs.z,\n  nothing: () => undefined\n};\n",
      "utf8"
    );
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function runTask(input: unknown) {
    const ws = await JobWorkspace.create(path.join(tmpDir, "jobs"));
    const serializer = new NodeTaskSerializer({ registryModule: registryPath, node: process.execPath });
    const paths = await serializer.write(ws, parseTaskDescriptor(input));
    const res = await createCommandRunner()([process.execPath, paths.executorPath, paths.paramsPath, paths.resultPath]);
    return { res, paths };
  }

  it("calls the registered task and writes its value", async () => {
    const { res, paths } = await runTask({ task: "mul", args: [2], kwargs: { y: 2, z: 2 } });
    expect(res.exitCode).toBe(0);
    expect(JSON.parse(await readFile(paths.resultPath, "utf8"))).toEqual({ value: 8 });
  });

  it("runs tasks from the bundled registry", async () => {
    const ws = await JobWorkspace.create(path.join(tmpDir, "jobs"));
    const serializer = new NodeTaskSerializer({ registryModule: "./tasks/registry.mjs" });
    const paths = await serializer.write(ws, parseTaskDescriptor({ task: "square_all", args: [[1, 2, 3]] }));
    const res = await createCommandRunner()([process.execPath, paths.executorPath, paths.paramsPath, paths.resultPath]);
    expect(res.exitCode).toBe(0);
    expect(JSON.parse(await readFile(paths.resultPath, "utf8"))).toEqual({ value: [1, 4, 9] });
  });

  it("stores undefined results as null", async () => {
    const { res, paths } = await runTask({ task: "nothing" });
    expect(res.exitCode).toBe(0);
    expect(JSON.parse(await readFile(paths.resultPath, "utf8"))).toEqual({ value: null });
  });

  it("exits with a distinct code for an unknown task", async () => {
    const { res } = await runTask({ task: "divide" });
    expect(res.exitCode).toBe(EXECUTOR_EXIT_UNKNOWN_TASK);
    expect(res.stderr).toContain("unknown task: divide");
  });

  it("exits with a distinct code for a missing requirement", async () => {
    const { res } = await runTask({ task: "mul", requires: ["gridpool-no-such-package"] });
    expect(res.exitCode).toBe(EXECUTOR_EXIT_MISSING_REQUIREMENT);
    expect(res.stderr).toContain("missing requirement: gridpool-no-such-package");
  });
});
