import { describe, it, expect } from "vitest";
import { canonicalizeJson, paramsHash, stableJsonStringify } from "../src/core/canonicalJson.js";
import { newJobId } from "../src/core/ids.js";
import { JobLog, MemoryEventSink, StderrEventSink } from "../src/logging/jobLog.js";

describe("JobLog", () => {
  it("forwards events to every sink and keeps them as JSON lines", async () => {
    const jobId = newJobId();
    const memory = new MemoryEventSink();
    const lines: string[] = [];
    const log = new JobLog(jobId, [memory, new StderrEventSink("warn", (line) => lines.push(line))]);

    await log.event("job.start", "starting", { attempt: 1 });
    await log.event("worker.state", "idle -> serialized", null, "debug");
    await log.warn("job.retry", "again", { attempt: 1 });

    expect(memory.kinds(jobId)).toEqual(["job.start", "worker.state", "job.retry"]);
    expect(lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(lines[0] ?? "");
    expect(parsed).toMatchObject({ level: "warn", job_id: jobId, kind: "job.retry", message: "again", data: { attempt: 1 } });

    const text = log.text();
    expect(text.endsWith("\n")).toBe(true);
    expect(text.trimEnd().split("\n")).toHaveLength(3);
  });

  it("skips a failing sink and still delivers to the others", async () => {
    const memory = new MemoryEventSink();
    const failures: string[] = [];
    const failing = {
      write: async () => {
        throw new Error("sink offline");
      }
    };
    const log = new JobLog(null, [failing, memory], (err, event) =>
      failures.push(`${event.kind}: ${err instanceof Error ? err.message : String(err)}`)
    );

    await log.event("pool.start", "tasks=2");
    await log.warn("pool.done", "failed=1");

    expect(memory.kinds()).toEqual(["pool.start", "pool.done"]);
    expect(failures).toEqual(["pool.start: sink offline", "pool.done: sink offline"]);
    expect(log.text().trimEnd().split("\n")).toHaveLength(2);
  });

  it("starts with empty text", () => {
    expect(new JobLog(null, []).text()).toBe("");
  });
});

describe("paramsHash", () => {
  it("ignores key order", () => {
    const a = paramsHash({ task: "scale", kwargs: { x: 1, y: 2 } });
    const b = paramsHash({ kwargs: { y: 2, x: 1 }, task: "scale" });
    expect(a).toBe(b);
    expect(a).toMatch(/^sha256:[0-9a-f]{64}$/);
    expect(paramsHash({ task: "scale", kwargs: { x: 2, y: 2 } })).not.toBe(a);
  });

  it("sorts keys, drops undefined fields and normalizes numbers", () => {
    expect(canonicalizeJson({ b: [1, undefined, -0], a: undefined, c: { z: Number.NaN, y: true } })).toEqual({
      b: [1, null, 0],
      c: { y: true, z: null }
    });
    expect(stableJsonStringify({ kwargs: { y: 2, x: 1 }, task: "scale" })).toBe('{"kwargs":{"x":1,"y":2},"task":"scale"}');
    expect(stableJsonStringify(undefined)).toBe("null");
  });
});
