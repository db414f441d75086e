import type { ClassId, ExistentialId, TypeId, TypeParamId } from "../ids.js";
import {
  diagnosticFromCode,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { Improvement, Substitution } from "../types/type-arena.js";
import type { InstanceEnvironment } from "../program/environment.js";
import type { Constraint, Given, InstanceEntry } from "../program/tables.js";
import { resolveSolverOptions, type SolverOptions } from "../config.js";
import { incrementSolverPerfCounter, setSolverPerfEnabled } from "../perf.js";
import {
  createResolveTracer,
  silentTracer,
  type ResolveTracer,
} from "../debug.js";
import { resolveClass, type ResolvedInstance } from "./chain-resolver.js";

export type Evidence =
  | {
      kind: "instance";
      constraint: Constraint;
      instance: InstanceEntry;
      /** Every instance variable, bound or freshly instantiated. */
      substitution: Substitution;
      prerequisites: readonly Evidence[];
    }
  | {
      kind: "given";
      constraint: Constraint;
      given: number;
      /** Classes walked from the given's class up to the constraint's. */
      path: readonly ClassId[];
    };

export type ResolutionFailure =
  | { kind: "no-instance"; constraint: Constraint; diagnostic: Diagnostic }
  | {
      kind: "ambiguous";
      constraint: Constraint;
      blocking: InstanceEntry;
      diagnostic: Diagnostic;
    }
  | {
      kind: "depth-exceeded";
      constraint: Constraint;
      depth: number;
      diagnostic: Diagnostic;
    }
  | {
      kind: "overlapping";
      constraint: Constraint;
      candidates: readonly InstanceEntry[];
      diagnostic: Diagnostic;
    }
  | { kind: "unknown-class"; constraint: Constraint; diagnostic: Diagnostic };

export type SolveResult =
  | { ok: true; evidence: Evidence; improvement: Improvement }
  | { ok: false; failure: ResolutionFailure };

export type SolveOptions = {
  givens?: readonly Given[];
  span?: SourceSpan;
};

export interface ConstraintSolver {
  readonly options: SolverOptions;
  solve(constraint: Constraint, options?: SolveOptions): SolveResult;
  /** Solves independent constraints; one failure never affects another. */
  solveAll(
    constraints: readonly Constraint[],
    options?: SolveOptions
  ): readonly SolveResult[];
}

export const createSolver = (
  env: InstanceEnvironment,
  overrides: Partial<SolverOptions> = {},
  tracer?: ResolveTracer
): ConstraintSolver => {
  const options = resolveSolverOptions(overrides);
  const trace = tracer ?? (options.debug ? createResolveTracer() : silentTracer);
  const { arena } = env;

  const solveAt = (
    constraint: Constraint,
    givens: readonly Given[],
    depth: number,
    span: SourceSpan | undefined
  ): SolveResult => {
    const classEntry = env.classes[constraint.classId];
    if (!classEntry) {
      return failure({
        kind: "unknown-class",
        constraint,
        diagnostic: diagnosticFromCode({
          code: "RS0005",
          params: { kind: "unknown-class", className: `#${constraint.classId}` },
          span,
        }),
      });
    }
    if (classEntry.params.length !== constraint.args.length) {
      throw new RangeError(
        `class ${classEntry.name} expects ${classEntry.params.length} arguments, got ${constraint.args.length}`
      );
    }

    const text = env.formatConstraint(constraint);
    if (depth > options.maxDepth) {
      trace.log(`${text}: depth limit ${options.maxDepth} exceeded`);
      return failure({
        kind: "depth-exceeded",
        constraint,
        depth: options.maxDepth,
        diagnostic: diagnosticFromCode({
          code: "RS0003",
          params: { kind: "depth-exceeded", constraint: text, depth: options.maxDepth },
          span,
        }),
      });
    }

    incrementSolverPerfCounter("resolve.constraints");
    trace.push(text);
    try {
      const resolution = resolveClass(env, constraint, trace);
      switch (resolution.kind) {
        case "resolved":
          return instantiate(resolution, constraint, givens, depth, span);
        case "not-found": {
          const discharged = env.superclasses.findSuperclassEvidence(
            constraint,
            givens
          );
          if (discharged) {
            incrementSolverPerfCounter("resolve.superclass-discharges");
            trace.log(`discharged by given #${discharged.given}`);
            return {
              ok: true,
              evidence: {
                kind: "given",
                constraint,
                given: discharged.given,
                path: discharged.path,
              },
              improvement: new Map(),
            };
          }
          return failure({
            kind: "no-instance",
            constraint,
            diagnostic: diagnosticFromCode({
              code: "RS0001",
              params: { kind: "no-instance", constraint: text },
              span,
            }),
          });
        }
        case "ambiguous-stop":
          return failure({
            kind: "ambiguous",
            constraint,
            blocking: resolution.instance,
            diagnostic: diagnosticFromCode({
              code: "RS0002",
              params: {
                kind: "ambiguous-instance",
                constraint: text,
                blockingInstance: resolution.instance.name,
              },
              span,
            }),
          });
        case "overlapping": {
          const candidates = resolution.candidates.map(
            (candidate) => candidate.instance
          );
          return failure({
            kind: "overlapping",
            constraint,
            candidates,
            diagnostic: diagnosticFromCode({
              code: "RS0004",
              params: {
                kind: "overlapping-instances",
                constraint: text,
                instances: candidates.map((candidate) => candidate.name),
              },
              span,
            }),
          });
        }
      }
    } finally {
      trace.pop();
    }
  };

  const instantiate = (
    resolution: ResolvedInstance,
    constraint: Constraint,
    givens: readonly Given[],
    depth: number,
    span: SourceSpan | undefined
  ): SolveResult => {
    const { instance } = resolution;
    const substitution = new Map<TypeParamId, TypeId>(resolution.substitution);
    instance.params.forEach((param) => {
      if (!substitution.has(param)) {
        substitution.set(param, arena.freshExistential(arena.typeParamName(param)));
      }
    });

    const improvement = new Map<ExistentialId, TypeId>();
    resolution.improvement.forEach((type, existential) => {
      improvement.set(existential, arena.substitute(type, substitution));
    });

    const prerequisites: Evidence[] = [];
    for (const prerequisite of instance.constraints) {
      const args = prerequisite.args.map((arg) =>
        arena.improve(arena.substitute(arg, substitution), improvement)
      );
      const result = solveAt(
        { classId: prerequisite.classId, args },
        givens,
        depth + 1,
        span
      );
      if (!result.ok) {
        return result;
      }
      result.improvement.forEach((type, existential) => {
        if (!improvement.has(existential)) improvement.set(existential, type);
      });
      prerequisites.push(result.evidence);
    }

    const solved = new Map<TypeParamId, TypeId>();
    substitution.forEach((type, param) => {
      solved.set(param, arena.improve(type, improvement));
    });

    return {
      ok: true,
      evidence: {
        kind: "instance",
        constraint,
        instance,
        substitution: solved,
        prerequisites,
      },
      improvement,
    };
  };

  // Counters are process-wide; `perf` only turns them on for this solver's calls.
  const withPerf = <T>(run: () => T): T => {
    if (!options.perf) return run();
    const previous = setSolverPerfEnabled(true);
    try {
      return run();
    } finally {
      setSolverPerfEnabled(previous);
    }
  };

  return {
    options,
    solve: (constraint, solveOptions = {}) =>
      withPerf(() =>
        solveAt(constraint, solveOptions.givens ?? [], 0, solveOptions.span)
      ),
    solveAll: (constraints, solveOptions = {}) =>
      withPerf(() =>
        constraints.map((constraint) =>
          solveAt(constraint, solveOptions.givens ?? [], 0, solveOptions.span)
        )
      ),
  };
};

const failure = (resolutionFailure: ResolutionFailure): SolveResult => ({
  ok: false,
  failure: resolutionFailure,
});
