import { performance } from "node:perf_hooks";
import { DiagnosticEmitter } from "./diagnostics/index.js";
import type { ProgramDeclarations } from "./declarations/types.js";
import { createTypeArena, type TypeArena } from "./types/type-arena.js";
import { lowerProgram } from "./program/lower.js";
import {
  createInstanceEnvironment,
  type InstanceEnvironment,
} from "./program/environment.js";
import { validateFunctionalDependencies } from "./classes/functional-dependencies.js";
import { buildSuperclassGraph } from "./classes/superclass-graph.js";
import { checkOrphans } from "./instances/orphan-check.js";
import { checkChainOverlaps } from "./instances/overlap.js";
import { createInstanceStore } from "./instances/instance-store.js";
import { resolveSolverOptions, type SolverOptions } from "./config.js";
import {
  diffSolverPerfCounters,
  incrementSolverPerfCounter,
  logSolverPerfSummary,
  setSolverPerfEnabled,
  snapshotSolverPerfCounters,
} from "./perf.js";

export type LoadProgramOptions = Partial<SolverOptions> & {
  arena?: TypeArena;
  /** Used in perf summaries. */
  label?: string;
};

/**
 * Lowers and checks a whole program, then freezes it into an
 * `InstanceEnvironment`. Throws a `DiagnosticError` listing every
 * load-time error; warnings are kept on the environment.
 */
export const loadProgram = (
  declarations: ProgramDeclarations,
  options: LoadProgramOptions = {}
): InstanceEnvironment => {
  const { arena = createTypeArena(), label = "program", ...overrides } = options;
  const resolved = resolveSolverOptions(overrides);
  const previousPerf = resolved.perf ? setSolverPerfEnabled(true) : undefined;

  const diagnostics = new DiagnosticEmitter();
  const before = snapshotSolverPerfCounters();
  const phasesMs: Record<string, number> = {};
  const timed = <T>(phase: string, run: () => T): T => {
    const start = performance.now();
    try {
      return run();
    } finally {
      phasesMs[phase] = performance.now() - start;
    }
  };

  let success = false;
  try {
    const tables = timed("lower", () =>
      lowerProgram({ declarations, arena, diagnostics })
    );
    incrementSolverPerfCounter("load.instances", tables.instances.length);
    incrementSolverPerfCounter("load.chains", tables.chains.length);

    timed("classes", () => {
      tables.classes.forEach((entry) =>
        validateFunctionalDependencies(entry, diagnostics)
      );
    });
    const superclasses = timed("superclasses", () =>
      buildSuperclassGraph({ classes: tables.classes, arena, diagnostics })
    );
    timed("orphans", () => checkOrphans({ tables, arena, diagnostics }));
    timed("overlaps", () => checkChainOverlaps({ tables, arena, diagnostics }));

    diagnostics.throwIfErrors();

    const environment = createInstanceEnvironment({
      arena,
      modules: tables.modules,
      typeConstructors: tables.typeConstructors,
      classes: tables.classes,
      store: createInstanceStore(tables),
      superclasses,
      diagnostics: diagnostics.diagnostics,
    });
    success = true;
    return environment;
  } finally {
    logSolverPerfSummary({
      label,
      success,
      phasesMs,
      counters: diffSolverPerfCounters({
        before,
        after: snapshotSolverPerfCounters(),
      }),
      diagnostics: diagnostics.diagnostics.length,
    });
    if (previousPerf !== undefined) {
      setSolverPerfEnabled(previousPerf);
    }
  }
};
