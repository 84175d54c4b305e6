import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema } from "@modelcontextprotocol/sdk/types.js";

import {
  GridConfig,
  MemoryEventSink,
  NodeTaskSerializer,
  PostgresJobStore,
  applySqlFile,
  createDb,
  createMemoryPool,
  createGatewayServer,
  parseGridConfig
} from "../src/lib.js";
import { newJobId } from "../src/core/ids.js";
import { zJobGetOutput, zJobMapOutput, zJobRunOutput } from "../src/mcp/toolSchemas.js";
import { FakeScheduler, firstArg, writeResult } from "./fakeScheduler.js";

describe.sequential("gateway (in-memory)", () => {
  let tmpDir: string;
  let client: Client;
  let scheduler: FakeScheduler;
  let server: ReturnType<typeof createGatewayServer>;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;
  const sink = new MemoryEventSink();

  async function callTool(name: string, args: Record<string, unknown>) {
    return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema, {
      timeout: 60_000
    });
  }

  async function callToolError(name: string, args: Record<string, unknown>): Promise<string> {
    try {
      const res = await callTool(name, args);
      if (!res.isError) return "<no error>";
      return res.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }

  function text(res: Awaited<ReturnType<typeof callTool>>): string {
    return res.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
  }

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "gridpool-gw-"));

    const pool = createMemoryPool();
    await applySqlFile(pool, path.resolve("db/schema.sql"));
    const store = new PostgresJobStore(createDb(pool));

    const config = new GridConfig(
      parseGridConfig({
        version: 1,
        workspace: { base_dir: path.join(tmpDir, "jobs"), cleanup_retry_delay_ms: 1 },
        limits: { max_threads: 8 },
        retry: { max_attempts: 2 },
        polling: { initial_delay_ms: 1, factor: 2, max_delay_ms: 4, unknown_pause_ms: 1 },
        pool: { concurrency: 2 },
        executor: { registry_module: "/srv/tasks/registry.mjs" }
      })
    );

    const inputs = new Map<string, unknown>();
    scheduler = new FakeScheduler({
      onSubmit: async (job) => {
        const x = await firstArg(job);
        inputs.set(job.schedulerJobId, x);
        if (typeof x === "number") await writeResult(job, x * x);
      },
      accounting: (job) => (inputs.get(job.schedulerJobId) === -1 ? "failed" : "success")
    });

    server = createGatewayServer({
      config,
      store,
      client: scheduler,
      serializer: new NodeTaskSerializer(config.executorOptions()),
      sinks: [sink]
    });

    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: "gridpool-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await client.close();
    await server.close();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("lists the job tools", async () => {
    const res = await client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    expect(res.tools.map((t) => t.name).sort()).toEqual(["job_get", "job_map", "job_run"]);
  });

  it("runs one task and exposes its ledger record", async () => {
    const res = await callTool("job_run", { task: "square", args: [3], resources: { threads: 2, mem: "2G" } });
    if (res.isError) throw new Error(`job_run failed: ${text(res)}`);

    const outcome = zJobRunOutput.parse(res.structuredContent);
    expect(outcome).toMatchObject({ status: "succeeded", attempts: 1, value: 9 });
    expect(text(res)).toBe(`job ${outcome.job_id}: succeeded`);

    const submitted = scheduler.submitted.find((j) => j.schedulerJobId === outcome.scheduler_job_id);
    expect(submitted?.resources).toMatchObject({ threads: 2, memPerThread: "2G", parallelEnv: "parallel" });

    const got = await callTool("job_get", { job_id: outcome.job_id });
    if (got.isError) throw new Error(`job_get failed: ${text(got)}`);
    const record = zJobGetOutput.parse(got.structuredContent);

    expect(record.job).toMatchObject({
      job_id: outcome.job_id,
      task_name: "square",
      status: "succeeded",
      attempts: 1,
      max_attempts: 2,
      result: 9
    });
    expect(record.attempts).toHaveLength(1);
    expect(record.attempts[0]).toMatchObject({ attempt: 1, outcome: "success" });
    expect(record.events.map((e) => e.kind)).toContain("job.submit.ok");
  });

  it("maps a task over inputs in order", async () => {
    const res = await callTool("job_map", { task: "square", inputs: [1, 2, 3] });
    if (res.isError) throw new Error(`job_map failed: ${text(res)}`);

    const out = zJobMapOutput.parse(res.structuredContent);
    expect(out.outcomes.map((o) => o.value)).toEqual([1, 4, 9]);
    expect(out.succeeded).toBe(3);
    expect(out.failed).toBe(0);
    expect(text(res)).toBe("job_map: 3 succeeded, 0 failed");
  });

  it("reports failed jobs with their reason", async () => {
    const res = await callTool("job_map", { task: "square", inputs: [2, -1], max_attempts: 1 });
    if (res.isError) throw new Error(`job_map failed: ${text(res)}`);

    const out = zJobMapOutput.parse(res.structuredContent);
    expect(out.outcomes.map((o) => o.status)).toEqual(["succeeded", "failed"]);
    expect(out.outcomes[1]).toMatchObject({ reason: "job_failed", attempts: 1 });
    expect(out.failed).toBe(1);
  });

  it("rejects resources over the configured limits", async () => {
    const before = scheduler.submitted.length;
    const message = await callToolError("job_run", { task: "square", args: [2], resources: { threads: 16 } });
    expect(message).toContain("threads exceeds limit (16 > 8)");
    expect(scheduler.submitted.length).toBe(before);
  });

  it("rejects invalid task names", async () => {
    const message = await callToolError("job_run", { task: "not a task" });
    expect(message).toContain("invalid task descriptor");
  });

  it("rejects unknown job ids", async () => {
    const jobId = newJobId();
    const message = await callToolError("job_get", { job_id: jobId });
    expect(message).toContain(`unknown job_id: ${jobId}`);
  });
});
