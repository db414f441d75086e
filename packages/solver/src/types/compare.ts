import type { TypeId } from "../ids.js";
import type { TypeArena } from "./type-arena.js";

/**
 * Three-valued structural equality between constraint-side types.
 * `unknown` means the answer depends on how existentials get solved.
 */
export type TypeComparison = "equal" | "apart" | "unknown";

export const combineComparisons = (
  comparisons: Iterable<TypeComparison>
): TypeComparison => {
  let result: TypeComparison = "equal";
  for (const comparison of comparisons) {
    if (comparison === "apart") return "apart";
    if (comparison === "unknown") result = "unknown";
  }
  return result;
};

export const compareTypes = (
  arena: TypeArena,
  left: TypeId,
  right: TypeId
): TypeComparison => {
  if (left === right) {
    return "equal";
  }

  const leftDesc = arena.get(left);
  const rightDesc = arena.get(right);

  if (
    leftDesc.kind === "existential" ||
    rightDesc.kind === "existential" ||
    leftDesc.kind === "type-param" ||
    rightDesc.kind === "type-param"
  ) {
    return "unknown";
  }

  if (leftDesc.kind === "rigid" || rightDesc.kind === "rigid") {
    return "apart";
  }

  if (
    leftDesc.constructor !== rightDesc.constructor ||
    leftDesc.args.length !== rightDesc.args.length
  ) {
    return "apart";
  }

  return combineComparisons(
    leftDesc.args.map((arg, index) =>
      compareTypes(arena, arg, rightDesc.args[index])
    )
  );
};

export const compareTypeLists = (
  arena: TypeArena,
  left: readonly TypeId[],
  right: readonly TypeId[]
): TypeComparison => {
  if (left.length !== right.length) {
    return "apart";
  }
  return combineComparisons(
    left.map((type, index) => compareTypes(arena, type, right[index]))
  );
};
