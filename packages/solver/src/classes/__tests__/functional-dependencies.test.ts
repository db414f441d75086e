import { describe, expect, it } from "vitest";
import { DiagnosticEmitter } from "../../diagnostics/index.js";
import type { ClassEntry, FunctionalDependency } from "../../program/tables.js";
import { createTypeArena } from "../../types/type-arena.js";
import {
  argumentModes,
  formatFunctionalDependency,
  requiredConcrete,
  validateFunctionalDependencies,
} from "../functional-dependencies.js";

const classEntry = (
  name: string,
  params: string[],
  fundeps: FunctionalDependency[]
): ClassEntry => ({ id: 0, name, params, superclasses: [], fundeps, module: 0 });

const typeEquals = classEntry(
  "TypeEquals",
  ["a", "b"],
  [
    { determiners: [0], determined: [1] },
    { determiners: [1], determined: [0] },
  ]
);

describe("requiredConcrete", () => {
  it("follows dependencies in both directions", () => {
    expect([...requiredConcrete(typeEquals, new Set([0]))]).toEqual([0, 1]);
    expect([...requiredConcrete(typeEquals, new Set([1]))].sort()).toEqual([0, 1]);
    expect([...requiredConcrete(typeEquals, new Set())]).toEqual([]);
  });

  it("closes over chained dependencies", () => {
    const chained = classEntry(
      "Chain",
      ["a", "b", "c"],
      [
        { determiners: [1], determined: [2] },
        { determiners: [0], determined: [1] },
      ]
    );
    expect([...requiredConcrete(chained, new Set([0]))].sort()).toEqual([0, 1, 2]);
  });

  it("needs every determiner", () => {
    const joint = classEntry("Joint", ["a", "b", "c"], [
      { determiners: [0, 1], determined: [2] },
    ]);
    expect([...requiredConcrete(joint, new Set([0]))]).toEqual([0]);
    expect([...requiredConcrete(joint, new Set([0, 1]))]).toEqual([0, 1, 2]);
  });
});

describe("validateFunctionalDependencies", () => {
  it("accepts well-formed dependencies", () => {
    const diagnostics = new DiagnosticEmitter();
    expect(validateFunctionalDependencies(typeEquals, diagnostics)).toBe(true);
    expect(diagnostics.diagnostics).toEqual([]);
  });

  it("rejects a dependency that determines its own input", () => {
    const diagnostics = new DiagnosticEmitter();
    const entry = classEntry("C", ["a", "b"], [{ determiners: [0, 1], determined: [1] }]);

    expect(validateFunctionalDependencies(entry, diagnostics)).toBe(false);
    expect(diagnostics.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["CL0002", "functional dependency a b -> b of class C determines one of its own inputs"],
    ]);
  });

  it("rejects a parameter determined by two different sets", () => {
    const diagnostics = new DiagnosticEmitter();
    const entry = classEntry(
      "C",
      ["a", "b", "c"],
      [
        { determiners: [0], determined: [2] },
        { determiners: [1], determined: [2] },
      ]
    );

    expect(validateFunctionalDependencies(entry, diagnostics)).toBe(false);
    expect(diagnostics.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["CL0003", "parameter c of class C is determined by both a -> c and b -> c"],
    ]);
  });

  it("allows the same determiners to repeat", () => {
    const diagnostics = new DiagnosticEmitter();
    const entry = classEntry(
      "C",
      ["a", "b", "c"],
      [
        { determiners: [0], determined: [1] },
        { determiners: [0], determined: [1, 2] },
      ]
    );
    expect(validateFunctionalDependencies(entry, diagnostics)).toBe(true);
  });

  it("rejects empty and out-of-range dependencies", () => {
    const diagnostics = new DiagnosticEmitter();
    const entry = classEntry(
      "C",
      ["a", "b"],
      [
        { determiners: [], determined: [1] },
        { determiners: [0], determined: [4] },
      ]
    );

    expect(validateFunctionalDependencies(entry, diagnostics)).toBe(false);
    expect(diagnostics.diagnostics.map((d) => d.message)).toEqual([
      "invalid functional dependency  -> b in class C: both sides of a dependency must name at least one parameter",
      "invalid functional dependency a -> #4 in class C: parameter index 4 is out of range",
    ]);
  });
});

describe("argumentModes", () => {
  it("splits arguments into known and improvable positions", () => {
    const arena = createTypeArena();
    const int = arena.internConstructor({ constructor: 0, name: "Int", args: [] });
    const unknown = arena.freshExistential("b");

    const modes = argumentModes(arena, typeEquals, [int, unknown]);
    expect([...modes.known]).toEqual([0]);
    expect([...modes.improvable]).toEqual([1]);
  });

  it("never improves without dependencies", () => {
    const arena = createTypeArena();
    const unknown = arena.freshExistential("a");
    const modes = argumentModes(arena, classEntry("Show", ["a"], []), [unknown]);
    expect(modes.known.size).toBe(0);
    expect(modes.improvable.size).toBe(0);
  });
});

it("formats dependencies by parameter name", () => {
  expect(
    formatFunctionalDependency(typeEquals, { determiners: [0], determined: [1] })
  ).toBe("a -> b");
});
