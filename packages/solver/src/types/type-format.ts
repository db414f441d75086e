import type { TypeId } from "../ids.js";
import type { TypeArena } from "./type-arena.js";

// Applied constructors are parenthesized when they appear as arguments:
// `Tuple (Array Int) ?r`.
export const formatType = (
  arena: TypeArena,
  type: TypeId,
  nested = false
): string => {
  const desc = arena.get(type);
  switch (desc.kind) {
    case "type-param":
    case "rigid":
      return desc.name;
    case "existential":
      return `?${desc.name}`;
    case "constructor": {
      if (desc.args.length === 0) return desc.name;
      const applied = [
        desc.name,
        ...desc.args.map((arg) => formatType(arena, arg, true)),
      ].join(" ");
      return nested ? `(${applied})` : applied;
    }
  }
};

export const formatConstraint = (
  arena: TypeArena,
  className: string,
  args: readonly TypeId[]
): string =>
  [className, ...args.map((arg) => formatType(arena, arg, true))].join(" ");
