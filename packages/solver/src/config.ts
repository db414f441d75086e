import { processEnv, readEnvFlag, readEnvInteger } from "@tyclass/lib/env.js";
import { DEBUG_RESOLVE_ENV } from "./debug.js";
import { SOLVER_PERF_ENV } from "./perf.js";

export type SolverOptions = {
  /** Nesting limit for prerequisite constraints. */
  maxDepth: number;
  /** Print an indented resolution trace. */
  debug: boolean;
  /** Collect perf counters and log a summary per load. */
  perf: boolean;
};

export const MAX_DEPTH_ENV = "TYCLASS_MAX_RESOLUTION_DEPTH";

export const DEFAULT_SOLVER_OPTIONS: Readonly<SolverOptions> = Object.freeze({
  maxDepth: 64,
  debug: false,
  perf: false,
});

/** Explicit overrides win over the environment, which wins over defaults. */
export const resolveSolverOptions = (
  overrides: Partial<SolverOptions> = {},
  env: Readonly<Record<string, string | undefined>> = processEnv()
): SolverOptions => {
  const maxDepth =
    overrides.maxDepth ?? readEnvInteger(MAX_DEPTH_ENV, env) ?? DEFAULT_SOLVER_OPTIONS.maxDepth;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return {
    maxDepth,
    debug: overrides.debug ?? (readEnvFlag(DEBUG_RESOLVE_ENV, env) || DEFAULT_SOLVER_OPTIONS.debug),
    perf: overrides.perf ?? (readEnvFlag(SOLVER_PERF_ENV, env) || DEFAULT_SOLVER_OPTIONS.perf),
  };
};
