import { describe, it, expect } from "vitest";
import { InvalidResourceSpecError } from "../src/core/errors.js";
import {
  createResourceRequest,
  escalateResources,
  normalizeMemory,
  normalizeTime,
  resolveResourcePlan,
  wallTimeSeconds
} from "../src/resources/resourceSpec.js";

describe("normalizeTime", () => {
  it("formats whole seconds as HH:MM:SS", () => {
    expect(normalizeTime(0)).toBe("00:00:00");
    expect(normalizeTime(59)).toBe("00:00:59");
    expect(normalizeTime(3600)).toBe("01:00:00");
    expect(normalizeTime(3661)).toBe("01:01:01");
    expect(normalizeTime("7200")).toBe("02:00:00");
    expect(normalizeTime(359999)).toBe("99:59:59");
  });

  it("round-trips seconds through the formatted string", () => {
    for (const n of [0, 1, 59, 60, 61, 3599, 3600, 86399, 86400, 123456, 359999]) {
      const text = normalizeTime(n);
      expect(text).toMatch(/^[0-9]{2}:[0-5][0-9]:[0-5][0-9]$/);
      expect(wallTimeSeconds(text)).toBe(n);
    }
  });

  it("accepts well-formed strings unchanged", () => {
    expect(normalizeTime("12:30:00")).toBe("12:30:00");
    expect(normalizeTime(" 00:59:00 ")).toBe("00:59:00");
  });

  it("rejects malformed and out-of-range values", () => {
    for (const bad of ["1:00:00", "00:60:00", "00:00:60", "abc", "", "-1", "1.5"]) {
      expect(() => normalizeTime(bad)).toThrow(InvalidResourceSpecError);
    }
    expect(() => normalizeTime(-1)).toThrow(InvalidResourceSpecError);
    expect(() => normalizeTime(1.5)).toThrow(InvalidResourceSpecError);
    expect(() => normalizeTime(360000)).toThrow("time resource exceeds 99:59:59: 360000");
  });
});

describe("normalizeMemory", () => {
  it("strips a unit suffix and re-emits gigabytes", () => {
    expect(normalizeMemory(6)).toBe("6G");
    expect(normalizeMemory("6")).toBe("6G");
    expect(normalizeMemory("6G")).toBe("6G");
    expect(normalizeMemory("6g")).toBe("6G");
    expect(normalizeMemory("16M")).toBe("16G");
    expect(normalizeMemory(" 8 ")).toBe("8G");
  });

  it("rejects non-integers and non-positive values", () => {
    expect(() => normalizeMemory("abc")).toThrow("memory resource is not an integer: abc");
    expect(() => normalizeMemory("G")).toThrow(InvalidResourceSpecError);
    expect(() => normalizeMemory("6GB")).toThrow(InvalidResourceSpecError);
    expect(() => normalizeMemory(2.5)).toThrow(InvalidResourceSpecError);
    expect(() => normalizeMemory(-1)).toThrow(InvalidResourceSpecError);
    expect(() => normalizeMemory("0")).toThrow("memory resource must be positive: 0");
  });
});

describe("createResourceRequest", () => {
  it("fills defaults", () => {
    const r = createResourceRequest();
    expect(r).toEqual({ threads: 1, wallTime: "00:59:00", memPerThread: "6G", gpu: false, parallelEnv: "parallel" });
    expect(Object.isFrozen(r)).toBe(true);
  });

  it("layers input over configured defaults", () => {
    const r = createResourceRequest({ threads: 4, gpu: 1 }, { defaults: { mem: "2G", parallelEnv: "smp" } });
    expect(r).toEqual({ threads: 4, wallTime: "00:59:00", memPerThread: "2G", gpu: true, parallelEnv: "smp" });
  });

  it("ignores explicitly undefined fields", () => {
    const r = createResourceRequest({ threads: undefined }, { defaults: { threads: 8 } });
    expect(r.threads).toBe(8);
  });

  it("rejects invalid fields", () => {
    expect(() => createResourceRequest({ threads: 0 })).toThrow(InvalidResourceSpecError);
    expect(() => createResourceRequest({ threads: 1.5 })).toThrow(InvalidResourceSpecError);
    expect(() => createResourceRequest({ parallelEnv: "bad env" })).toThrow(InvalidResourceSpecError);
    expect(() => createResourceRequest({ time: "soon" })).toThrow(InvalidResourceSpecError);
  });

  it("enforces limits", () => {
    expect(() => createResourceRequest({ threads: 8 }, { limits: { maxThreads: 4 } })).toThrow(
      "threads exceeds limit (8 > 4)"
    );
    expect(() => createResourceRequest({ time: 7200 }, { limits: { maxWallTimeSeconds: 3600 } })).toThrow(
      "wall time exceeds limit (7200s > 3600s)"
    );
    expect(() => createResourceRequest({ mem: 64 }, { limits: { maxMemPerThreadGb: 32 } })).toThrow(
      "memory per thread exceeds limit (64G > 32G)"
    );
    expect(createResourceRequest({ threads: 4 }, { limits: { maxThreads: 4 } }).threads).toBe(4);
  });
});

describe("escalation", () => {
  it("derives time and memory from the attempt number and threads", () => {
    const seen: Array<[number, number]> = [];
    const plan = escalateResources(
      { threads: 2 },
      {
        mem: (attempt, threads) => {
          seen.push([attempt, threads]);
          return attempt * 2;
        },
        time: (attempt) => attempt * 3600
      }
    );

    const requests = resolveResourcePlan(plan, 3);
    expect(requests.map((r) => r.memPerThread)).toEqual(["2G", "4G", "6G"]);
    expect(requests.map((r) => r.wallTime)).toEqual(["01:00:00", "02:00:00", "03:00:00"]);
    expect(requests.every((r) => r.threads === 2)).toBe(true);
    expect(seen).toEqual([
      [1, 2],
      [2, 2],
      [3, 2]
    ]);
  });

  it("repeats a fixed request for every attempt", () => {
    const fixed = createResourceRequest({ threads: 2 });
    const requests = resolveResourcePlan(fixed, 2);
    expect(requests).toHaveLength(2);
    expect(requests[0]).toBe(fixed);
    expect(requests[1]).toBe(fixed);
  });

  it("fails up front when a later attempt is invalid", () => {
    const plan = escalateResources({}, { mem: (attempt) => (attempt === 2 ? 0 : 4) });
    expect(() => resolveResourcePlan(plan, 3)).toThrow(InvalidResourceSpecError);
  });

  it("rejects a non-positive attempt budget", () => {
    expect(() => resolveResourcePlan(createResourceRequest(), 0)).toThrow(
      "maxAttempts must be a positive integer: 0"
    );
  });
});
