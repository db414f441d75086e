import type { ExistentialId, TypeId, TypeParamId } from "../ids.js";
import type {
  Improvement,
  Substitution,
  TypeArena,
} from "../types/type-arena.js";
import { compareTypes, type TypeComparison } from "../types/compare.js";

export type MatchKind = "match" | "no-match" | "ambiguous";

/**
 * Outcome of matching an instance head against constraint arguments.
 * Improvement targets may still mention head parameters the head left
 * unbound; instantiation replaces those with fresh existentials.
 */
export type MatchResult =
  | { kind: "match"; substitution: Substitution; improvement: Improvement }
  | { kind: "no-match"; position: number }
  | { kind: "ambiguous"; position: number };

export type MatchOptions = {
  /** Positions an existential may be solved at through a dependency. */
  improvable?: ReadonlySet<number>;
  /** Restrict matching to these positions. Defaults to all of them. */
  positions?: readonly number[];
};

type Binding = { type: TypeId; weak: boolean; position: number };
type Outcome = { kind: MatchKind; position: number };

const fromComparison = (comparison: TypeComparison): MatchKind => {
  switch (comparison) {
    case "equal":
      return "match";
    case "apart":
      return "no-match";
    case "unknown":
      return "ambiguous";
  }
};

/** no-match dominates ambiguous, which dominates match. */
export const combineMatchKinds = (kinds: Iterable<MatchKind>): MatchKind => {
  let result: MatchKind = "match";
  for (const kind of kinds) {
    if (kind === "no-match") return "no-match";
    if (kind === "ambiguous") result = "ambiguous";
  }
  return result;
};

export const matchInstanceHead = (
  arena: TypeArena,
  head: readonly TypeId[],
  args: readonly TypeId[],
  options: MatchOptions = {}
): MatchResult => {
  if (head.length !== args.length) {
    return { kind: "no-match", position: Math.min(head.length, args.length) };
  }

  const improvable = options.improvable ?? new Set<number>();
  const positions = options.positions ?? head.map((_, index) => index);
  const bindings = new Map<TypeParamId, Binding[]>();
  const improvements = new Map<ExistentialId, { type: TypeId; position: number }[]>();
  const outcomes: Outcome[] = [];

  const bind = (param: TypeParamId, binding: Binding) => {
    const existing = bindings.get(param);
    if (existing) existing.push(binding);
    else bindings.set(param, [binding]);
  };

  const recordImprovement = (existential: ExistentialId, type: TypeId, position: number) => {
    const existing = improvements.get(existential);
    if (existing) existing.push({ type, position });
    else improvements.set(existential, [{ type, position }]);
  };

  const matchType = (
    headType: TypeId,
    argType: TypeId,
    position: number,
    improving: boolean
  ): MatchKind => {
    const headDesc = arena.get(headType);
    if (headDesc.kind === "type-param") {
      bind(headDesc.param, { type: argType, weak: improving, position });
      return "match";
    }

    if (headDesc.kind !== "constructor") {
      return fromComparison(compareTypes(arena, headType, argType));
    }

    const argDesc = arena.get(argType);
    switch (argDesc.kind) {
      case "constructor":
        if (
          headDesc.constructor !== argDesc.constructor ||
          headDesc.args.length !== argDesc.args.length
        ) {
          return "no-match";
        }
        return combineMatchKinds(
          headDesc.args.map((arg, index) =>
            matchType(arg, argDesc.args[index], position, improving)
          )
        );
      case "existential":
        if (improving) {
          recordImprovement(argDesc.existential, headType, position);
          return "match";
        }
        return "ambiguous";
      case "rigid":
        return "no-match";
      case "type-param":
        return "ambiguous";
    }
  };

  // Solves existentials in `candidate` so that it equals `target`.
  const improveAgainst = (
    target: TypeId,
    candidate: TypeId,
    position: number
  ): MatchKind => {
    if (target === candidate) return "match";
    const candidateDesc = arena.get(candidate);
    if (candidateDesc.kind === "existential") {
      recordImprovement(candidateDesc.existential, target, position);
      return "match";
    }
    const targetDesc = arena.get(target);
    if (candidateDesc.kind === "constructor" && targetDesc.kind === "constructor") {
      if (
        candidateDesc.constructor !== targetDesc.constructor ||
        candidateDesc.args.length !== targetDesc.args.length
      ) {
        return "no-match";
      }
      return combineMatchKinds(
        candidateDesc.args.map((arg, index) =>
          improveAgainst(targetDesc.args[index], arg, position)
        )
      );
    }
    return fromComparison(compareTypes(arena, target, candidate));
  };

  positions.forEach((position) => {
    outcomes.push({
      kind: matchType(head[position], args[position], position, improvable.has(position)),
      position,
    });
  });

  const substitution = new Map<TypeParamId, TypeId>();
  bindings.forEach((list, param) => {
    const strong = list.filter((binding) => !binding.weak);
    const representative = strong[0] ?? list[0];
    if (!representative) return;
    substitution.set(param, representative.type);

    list.forEach((binding) => {
      if (binding === representative) return;
      const kind = binding.weak
        ? improveAgainst(representative.type, binding.type, binding.position)
        : fromComparison(compareTypes(arena, representative.type, binding.type));
      outcomes.push({ kind, position: binding.position });
    });
  });

  const improvement = new Map<ExistentialId, TypeId>();
  improvements.forEach((list, existential) => {
    const [first, ...rest] = list.map((entry) => ({
      type: arena.substitute(entry.type, substitution),
      position: entry.position,
    }));
    if (!first) return;
    improvement.set(existential, first.type);
    rest.forEach((entry) => {
      outcomes.push({
        kind: fromComparison(compareTypes(arena, first.type, entry.type)),
        position: entry.position,
      });
    });
  });

  const blocking =
    outcomes.find((outcome) => outcome.kind === "no-match") ??
    outcomes.find((outcome) => outcome.kind === "ambiguous");
  if (blocking) {
    return blocking.kind === "no-match"
      ? { kind: "no-match", position: blocking.position }
      : { kind: "ambiguous", position: blocking.position };
  }

  return { kind: "match", substitution, improvement };
};
