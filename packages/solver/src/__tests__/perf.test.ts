import { afterEach, describe, expect, it } from "vitest";
import {
  diffSolverPerfCounters,
  formatSolverPerfSummary,
  incrementSolverPerfCounter,
  resetSolverPerfCounters,
  setSolverPerfEnabled,
  snapshotSolverPerfCounters,
} from "../perf.js";

describe("solver perf counters", () => {
  afterEach(() => {
    setSolverPerfEnabled(false);
    resetSolverPerfCounters();
  });

  it("ignores counters while disabled", () => {
    setSolverPerfEnabled(false);
    incrementSolverPerfCounter("resolve.constraints");
    expect(snapshotSolverPerfCounters().size).toBe(0);
  });

  it("diffs snapshots", () => {
    setSolverPerfEnabled(true);
    incrementSolverPerfCounter("resolve.constraints");
    const before = snapshotSolverPerfCounters();
    incrementSolverPerfCounter("resolve.constraints", 2);
    incrementSolverPerfCounter("resolve.ambiguous-stops");
    incrementSolverPerfCounter("resolve.unused", 0);

    expect(diffSolverPerfCounters({ before, after: snapshotSolverPerfCounters() })).toEqual({
      "resolve.ambiguous-stops": 1,
      "resolve.constraints": 2,
    });
  });

  it("formats a summary line", () => {
    expect(
      formatSolverPerfSummary({
        label: "prelude",
        success: true,
        diagnostics: 0,
        phasesMs: { overlaps: 0.5, lower: 1.23456 },
        counters: { "load.instances": 3 },
      })
    ).toBe(
      '[tyclass:solver:perf] {"label":"prelude","success":true,"diagnostics":0,"phasesMs":{"lower":1.235,"overlaps":0.5},"counters":{"load.instances":3}}'
    );
  });

  it("returns the previous setting", () => {
    setSolverPerfEnabled(false);
    expect(setSolverPerfEnabled(true)).toBe(false);
    expect(setSolverPerfEnabled(false)).toBe(true);
  });
});
