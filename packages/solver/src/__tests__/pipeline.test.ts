import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ProgramBuilder,
  con,
  fundep,
  param,
  superclass,
} from "../declarations/builder.js";
import { loadProgram } from "../pipeline.js";
import { isSolverPerfEnabled } from "../perf.js";
import { createSolver } from "../resolution/solver.js";
import {
  expectFailure,
  expectSolved,
  evidenceTree,
  loadErrors,
  myShowProgram,
  showProgram,
  withPreludeTypes,
} from "./__fixtures__/programs.js";

describe("loadProgram", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds a frozen environment", () => {
    const env = loadProgram(showProgram());

    expect(env.diagnostics).toEqual([]);
    expect(env.classes.map((entry) => entry.name)).toEqual(["Show"]);
    expect(env.store.instances.map((instance) => instance.name)).toEqual([
      "showInt",
      "showArray",
    ]);
    expect(Object.isFrozen(env)).toBe(true);
    expect(Object.isFrozen(env.store.instances[0])).toBe(true);
    expect(env.store.findInstance("showArray")?.chain).toBe(1);
  });

  it("rejects superclass cycles", () => {
    const errors = loadErrors(
      new ProgramBuilder()
        .module("Cycle", (module) =>
          module
            .class("A", ["a"], { superclasses: [superclass("B", "a")] })
            .class("B", ["a"], { superclasses: [superclass("A", "a")] })
        )
        .build()
    );
    expect(errors.map((error) => error.message)).toEqual([
      "class A is its own superclass: A <= B <= A",
    ]);
  });

  it("rejects conflicting functional dependencies", () => {
    const errors = loadErrors(
      new ProgramBuilder()
        .module("Deps", (module) =>
          module
            .class("Self", ["a", "b"], { fundeps: [fundep("a b -> b")] })
            .class("Conflict", ["a", "b", "c"], {
              fundeps: [fundep("a -> c"), fundep("b -> c")],
            })
        )
        .build()
    );
    expect(errors.map((error) => error.code)).toEqual(["CL0002", "CL0003"]);
  });

  it("rejects orphan instances", () => {
    const errors = loadErrors(
      new ProgramBuilder()
        .module("Core", (module) => module.type("Int"))
        .module("Algebra", (module) => module.class("Semigroup", ["a"]))
        .module("Extras", (module) =>
          module.instance("semigroupInt", "Semigroup", [con("Int")])
        )
        .build()
    );
    expect(errors.map((error) => error.code)).toEqual(["IN0001"]);
  });

  it("keeps overlap warnings on the environment", () => {
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
    expect(env.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ["IN0007", "warning"],
    ]);
  });

  it("logs a perf summary when asked to", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});
    loadProgram(showProgram(), { perf: true, label: "show" });

    expect(log).toHaveBeenCalledTimes(1);
    const [line] = log.mock.calls[0] ?? [];
    expect(typeof line).toBe("string");
    const prefix = "[tyclass:solver:perf] ";
    const text = String(line);
    expect(text.startsWith(prefix)).toBe(true);

    const summary: unknown = JSON.parse(text.slice(prefix.length));
    expect(summary).toMatchObject({
      label: "show",
      success: true,
      diagnostics: 0,
      counters: { "load.chains": 2, "load.instances": 2 },
    });
    expect(isSolverPerfEnabled()).toBe(false);
  });
});

describe("end to end", () => {
  it("resolves an else-chain the way it is written", () => {
    const env = loadProgram(myShowProgram());
    const solver = createSolver(env, { debug: false });
    const selected = (typeName: string) => {
      const result = expectSolved(solver.solve(env.constraint("MyShow", env.type(typeName))));
      return evidenceTree(result.evidence);
    };

    expect(selected("String")).toEqual({ instance: "showString", prerequisites: [] });
    expect(selected("Boolean")).toEqual({ instance: "showBoolean", prerequisites: [] });
    expect(selected("Int")).toEqual({ instance: "showAny", prerequisites: [] });

    const failure = expectFailure(
      solver.solve(env.constraint("MyShow", env.arena.freshExistential("t")))
    );
    expect(failure.kind === "ambiguous" && failure.blocking.name).toBe("showString");
  });

  it("does not look past an instance that might still match", () => {
    const env = loadProgram(
      new ProgramBuilder()
        .module("Prelude", (module) =>
          withPreludeTypes(module)
            .class("MyShow", ["a"])
            .chain((chain) =>
              chain
                .instance("showStringPair", "MyShow", [con("Tuple", con("String"), param("a"))])
                .else("showAny", "MyShow", [param("a")])
            )
        )
        .build()
    );
    const solver = createSolver(env, { debug: false });
    const left = env.arena.freshExistential("l");
    const right = env.arena.freshExistential("r");

    const failure = expectFailure(
      solver.solve(env.constraint("MyShow", env.type("Tuple", left, right)))
    );
    expect(failure.kind).toBe("ambiguous");
    expect(failure.diagnostic.message).toBe(
      "No type class instance was found for MyShow (Tuple ?l ?r)"
    );
  });
});
