import { describe, expect, it } from "vitest";
import {
  ChainBuilder,
  ProgramBuilder,
  con,
  constraint,
  fundep,
  param,
  superclass,
} from "../builder.js";

describe("declaration builder", () => {
  it("parses functional dependencies", () => {
    expect(fundep("a b -> c")).toEqual({
      determiners: ["a", "b"],
      determined: ["c"],
    });
    expect(fundep("  c->e ")).toEqual({ determiners: ["c"], determined: ["e"] });
  });

  it("rejects dependencies without exactly one arrow", () => {
    expect(() => fundep("a -> b -> c")).toThrow(
      "functional dependency must have one '->': a -> b -> c"
    );
    expect(() => fundep("a b")).toThrow();
  });

  it("refuses an else branch with nothing before it", () => {
    expect(() => new ChainBuilder().else("orphanElse", "Show", [param("a")])).toThrow(
      "'else' instance orphanElse has no preceding instance"
    );
  });

  it("builds modules with types, classes and chains", () => {
    const program = new ProgramBuilder()
      .module("Prelude", (module) =>
        module
          .type("Int")
          .type("Array", 1)
          .class("Eq", ["a"])
          .class("Ord", ["a"], { superclasses: [superclass("Eq", "a")] })
          .instance("eqInt", "Eq", [con("Int")])
          .chain((chain) =>
            chain
              .instance("ordInt", "Ord", [con("Int")])
              .else("ordArray", "Ord", [con("Array", param("a"))], {
                constraints: [constraint("Ord", param("a"))],
              })
          )
      )
      .module("Empty")
      .build();

    expect(program.modules).toHaveLength(2);
    expect(program.modules[1]).toEqual({
      name: "Empty",
      types: [],
      classes: [],
      chains: [],
    });

    const [prelude] = program.modules;
    expect(prelude?.types).toEqual([{ name: "Int" }, { name: "Array", arity: 1 }]);
    expect(prelude?.classes?.[1]).toEqual({
      name: "Ord",
      params: ["a"],
      superclasses: [{ className: "Eq", args: ["a"] }],
    });
    expect(prelude?.chains?.map((chain) => chain.instances.map((i) => i.name))).toEqual([
      ["eqInt"],
      ["ordInt", "ordArray"],
    ]);
    expect(prelude?.chains?.[1]?.instances[1]).toEqual({
      name: "ordArray",
      className: "Ord",
      head: [
        {
          kind: "constructor",
          name: "Array",
          args: [{ kind: "param", name: "a" }],
        },
      ],
      constraints: [{ className: "Ord", args: [{ kind: "param", name: "a" }] }],
    });
  });
});
