import { describe, expect, it } from "vitest";
import {
  ProgramBuilder,
  con,
  constraint,
  param,
} from "../../declarations/builder.js";
import { loadProgram } from "../../pipeline.js";
import { createResolveTracer } from "../../debug.js";
import {
  resetSolverPerfCounters,
  setSolverPerfEnabled,
  snapshotSolverPerfCounters,
} from "../../perf.js";
import { createSolver } from "../solver.js";
import {
  elemProgram,
  evidenceTree,
  existentialOf,
  expectFailure,
  expectSolved,
  monadProgram,
  showProgram,
  withPreludeTypes,
} from "../../__tests__/__fixtures__/programs.js";

describe("createSolver", () => {
  it("solves prerequisites recursively", () => {
    const env = loadProgram(showProgram());
    const solver = createSolver(env, { debug: false });
    const nested = env.type("Array", env.type("Array", env.type("Int")));

    const result = expectSolved(solver.solve(env.constraint("Show", nested)));
    expect(evidenceTree(result.evidence)).toEqual({
      instance: "showArray",
      prerequisites: [
        {
          instance: "showArray",
          prerequisites: [{ instance: "showInt", prerequisites: [] }],
        },
      ],
    });
  });

  it("fails with the unresolved constraint named", () => {
    const env = loadProgram(showProgram());
    const solver = createSolver(env, { debug: false });

    const failure = expectFailure(
      solver.solve(env.constraint("Show", env.type("Array", env.type("String"))))
    );
    expect(failure.kind).toBe("no-instance");
    expect(failure.diagnostic.code).toBe("RS0001");
    expect(failure.diagnostic.message).toBe(
      "No type class instance was found for Show String"
    );
  });

  it("reports the instance that blocked an ambiguous constraint", () => {
    const env = loadProgram(showProgram());
    const solver = createSolver(env, { debug: false });
    const unknown = env.arena.freshExistential("a");

    const failure = expectFailure(solver.solve(env.constraint("Show", unknown)));
    expect(failure.kind).toBe("ambiguous");
    if (failure.kind !== "ambiguous") return;
    expect(failure.blocking.name).toBe("showInt");
    expect(failure.diagnostic.code).toBe("RS0002");
    expect(failure.diagnostic.message).toBe("No type class instance was found for Show ?a");
  });

  it("solves constraints independently", () => {
    const env = loadProgram(showProgram());
    const solver = createSolver(env, { debug: false });
    const results = solver.solveAll([
      env.constraint("Show", env.type("Int")),
      env.constraint("Show", env.type("String")),
      env.constraint("Show", env.type("Array", env.type("Int"))),
    ]);
    expect(results.map((result) => result.ok)).toEqual([true, false, true]);
  });

  it("stops at the depth limit", () => {
    const env = loadProgram(
      new ProgramBuilder()
        .module("Loops", (module) =>
          withPreludeTypes(module)
            .class("Loop", ["a"])
            .instance("loopGrow", "Loop", [param("a")], {
              constraints: [constraint("Loop", con("Array", param("a")))],
            })
        )
        .build()
    );
    const solver = createSolver(env, { maxDepth: 5, debug: false });

    const failure = expectFailure(solver.solve(env.constraint("Loop", env.type("Int"))));
    expect(failure.kind).toBe("depth-exceeded");
    expect(failure.diagnostic.code).toBe("RS0003");
    expect(failure.diagnostic.message).toBe(
      "constraint resolution did not terminate for Loop (Array (Array (Array (Array (Array (Array Int)))))) (depth limit 5)"
    );
  });

  it("rejects constraints on unknown classes", () => {
    const env = loadProgram(showProgram());
    const solver = createSolver(env, { debug: false });
    const failure = expectFailure(solver.solve({ classId: 99, args: [] }));
    expect(failure.kind).toBe("unknown-class");
    expect(failure.diagnostic.message).toBe("unknown class #99");
  });

  it("throws on a constraint with the wrong number of arguments", () => {
    const env = loadProgram(showProgram());
    const solver = createSolver(env, { debug: false });
    const int = env.type("Int");
    expect(() => solver.solve(env.constraint("Show", int, int))).toThrow(
      "class Show expects 1 arguments, got 2"
    );
  });

  it("reports overlapping chains at the use site", () => {
    const env = loadProgram(
      new ProgramBuilder()
        .module("Prelude", (module) =>
          withPreludeTypes(module)
            .class("Show", ["a"])
            .instance("showAny", "Show", [param("a")])
            .instance("showInt", "Show", [con("Int")])
        )
        .build()
    );
    const solver = createSolver(env, { debug: false });

    const failure = expectFailure(solver.solve(env.constraint("Show", env.type("Int"))));
    expect(failure.kind).toBe("overlapping");
    expect(failure.diagnostic.message).toBe(
      "overlapping instances for Show Int: showAny, showInt"
    );
  });

  describe("superclass discharge", () => {
    it("discharges a constraint through a chain of superclasses", () => {
      const env = loadProgram(monadProgram());
      const solver = createSolver(env, { debug: false });
      const m = env.arena.freshRigid("m");
      const givens = [{ constraint: env.constraint("MonadFail", m), label: "signature" }];

      const result = expectSolved(
        solver.solve(env.constraint("Applicative", m), { givens })
      );
      expect(result.evidence).toEqual({
        kind: "given",
        constraint: env.constraint("Applicative", m),
        given: 0,
        path: ["MonadFail", "Monad", "Applicative"].map(
          (name) => env.findClass(name)?.id
        ),
      });

      const functor = expectSolved(solver.solve(env.constraint("Functor", m), { givens }));
      expect(functor.evidence.kind === "given" && functor.evidence.path).toHaveLength(4);
    });

    it("prefers instances over givens", () => {
      const env = loadProgram(monadProgram());
      const solver = createSolver(env, { debug: false });
      const givens = [{ constraint: env.constraint("MonadFail", env.arena.freshRigid("m")) }];

      const result = expectSolved(
        solver.solve(env.constraint("Applicative", env.type("List")), { givens })
      );
      expect(evidenceTree(result.evidence)).toEqual({
        instance: "applicativeList",
        prerequisites: [],
      });
    });

    it("needs a given for the same type", () => {
      const env = loadProgram(monadProgram());
      const solver = createSolver(env, { debug: false });
      const givens = [{ constraint: env.constraint("MonadFail", env.arena.freshRigid("m")) }];

      const failure = expectFailure(
        solver.solve(env.constraint("Applicative", env.arena.freshRigid("n")), { givens })
      );
      expect(failure.kind).toBe("no-instance");
    });

    it("does not discharge an ambiguous constraint", () => {
      const env = loadProgram(monadProgram());
      const solver = createSolver(env, { debug: false });
      const unknown = env.arena.freshExistential("f");
      const givens = [{ constraint: env.constraint("MonadFail", unknown) }];

      const failure = expectFailure(
        solver.solve(env.constraint("Applicative", unknown), { givens })
      );
      expect(failure.kind).toBe("ambiguous");
    });
  });

  describe("functional dependencies", () => {
    it("carries improvements out of nested prerequisites", () => {
      const env = loadProgram(elemProgram());
      const solver = createSolver(env, { debug: false });
      const unknown = env.arena.freshExistential("x");
      const collection = env.type("Array", env.type("Array", env.type("String")));

      const result = expectSolved(
        solver.solve(env.constraint("Elem", collection, unknown))
      );
      expect(result.improvement.get(existentialOf(env.arena, unknown))).toBe(
        env.type("Int")
      );
      expect(evidenceTree(result.evidence)).toEqual({
        instance: "elemArray",
        prerequisites: [
          {
            instance: "elemArray",
            prerequisites: [{ instance: "elemString", prerequisites: [] }],
          },
        ],
      });

      if (result.evidence.kind !== "instance") return;
      const [, e] = result.evidence.instance.params;
      expect(e === undefined ? undefined : result.evidence.substitution.get(e)).toBe(
        env.type("Int")
      );
    });
  });

  it("traces resolution when debugging", () => {
    const env = loadProgram(showProgram());
    const lines: string[] = [];
    const solver = createSolver(
      env,
      { debug: true },
      createResolveTracer((line) => lines.push(line))
    );

    expectSolved(solver.solve(env.constraint("Show", env.type("Array", env.type("Int")))));
    expect(lines).toEqual([
      "[resolve] Show (Array Int)",
      "  [resolve] showInt: no match at argument 0",
      "  [resolve] showArray: match",
      "  [resolve] Show Int",
      "    [resolve] showInt: match",
      "    [resolve] showArray: no match at argument 0",
    ]);
  });

  it("counts resolution work when perf is on", () => {
    const env = loadProgram(showProgram());
    const solver = createSolver(env, { debug: false, perf: true });
    resetSolverPerfCounters();

    expectSolved(solver.solve(env.constraint("Show", env.type("Array", env.type("Int")))));

    const previous = setSolverPerfEnabled(true);
    const counters = snapshotSolverPerfCounters();
    setSolverPerfEnabled(previous);
    expect(counters.get("resolve.constraints")).toBe(2);
    expect(counters.get("resolve.chain-entries")).toBe(4);
  });
});
