import type { TypeId } from "../ids.js";
import {
  DiagnosticError,
  diagnosticFromCode,
  type DiagnosticEmitter,
} from "../diagnostics/index.js";
import type { TypeArena } from "../types/type-arena.js";
import type { ClassEntry, FunctionalDependency } from "../program/tables.js";

export const formatFunctionalDependency = (
  classEntry: ClassEntry,
  dependency: FunctionalDependency
): string => {
  const names = (indices: readonly number[]) =>
    indices.map((index) => classEntry.params[index] ?? `#${index}`).join(" ");
  return `${names(dependency.determiners)} -> ${names(dependency.determined)}`;
};

const sameIndexSet = (left: readonly number[], right: readonly number[]) =>
  left.length === right.length && left.every((index) => right.includes(index));

/**
 * Load-time validation. A parameter may be determined by a single
 * determiner set; two dependencies that both determine it from different
 * parameters are rejected rather than ranked.
 */
export const validateFunctionalDependencies = (
  classEntry: ClassEntry,
  diagnostics: DiagnosticEmitter
): boolean => {
  let valid = true;
  const arity = classEntry.params.length;
  const determinedBy = new Map<number, FunctionalDependency>();

  classEntry.fundeps.forEach((dependency) => {
    const text = formatFunctionalDependency(classEntry, dependency);
    const invalid = (reason: string) => {
      valid = false;
      diagnostics.reportCode({
        code: "CL0004",
        params: {
          kind: "fundep-invalid",
          className: classEntry.name,
          dependency: text,
          reason,
        },
        span: dependency.span ?? classEntry.span,
      });
    };

    if (dependency.determiners.length === 0 || dependency.determined.length === 0) {
      invalid("both sides of a dependency must name at least one parameter");
      return;
    }

    const outOfRange = [...dependency.determiners, ...dependency.determined].find(
      (index) => index < 0 || index >= arity
    );
    if (outOfRange !== undefined) {
      invalid(`parameter index ${outOfRange} is out of range`);
      return;
    }

    if (dependency.determined.some((index) => dependency.determiners.includes(index))) {
      valid = false;
      diagnostics.reportCode({
        code: "CL0002",
        params: {
          kind: "fundep-self-determination",
          className: classEntry.name,
          dependency: text,
        },
        span: dependency.span ?? classEntry.span,
      });
      return;
    }

    dependency.determined.forEach((index) => {
      const previous = determinedBy.get(index);
      if (!previous) {
        determinedBy.set(index, dependency);
        return;
      }
      if (sameIndexSet(previous.determiners, dependency.determiners)) {
        return;
      }
      valid = false;
      diagnostics.reportCode({
        code: "CL0003",
        params: {
          kind: "fundep-conflict",
          className: classEntry.name,
          parameter: classEntry.params[index] ?? `#${index}`,
          first: formatFunctionalDependency(classEntry, previous),
          second: text,
        },
        span: dependency.span ?? classEntry.span,
      });
    });
  });

  return valid;
};

/**
 * Closes `knownConcrete` under the class's dependencies: whenever every
 * determiner of a dependency is known, its determined parameters are too.
 */
export const requiredConcrete = (
  classEntry: ClassEntry,
  knownConcrete: ReadonlySet<number>
): ReadonlySet<number> => {
  const result = new Set(knownConcrete);
  // Each productive pass completes at least one dependency.
  const maxIterations = classEntry.fundeps.length + 1;

  for (let iteration = 0; ; iteration++) {
    if (iteration > maxIterations) {
      throw new DiagnosticError(
        diagnosticFromCode({
          code: "CL0002",
          params: {
            kind: "fundep-nonconvergent",
            className: classEntry.name,
            iterations: iteration,
          },
          span: classEntry.span,
        })
      );
    }

    let changed = false;
    classEntry.fundeps.forEach((dependency) => {
      if (!dependency.determiners.every((index) => result.has(index))) {
        return;
      }
      dependency.determined.forEach((index) => {
        if (!result.has(index)) {
          result.add(index);
          changed = true;
        }
      });
    });

    if (!changed) {
      return result;
    }
  }
};

export type ArgumentModes = {
  /** Positions whose argument mentions no existential. */
  known: ReadonlySet<number>;
  /** Positions not yet concrete but fixed by a dependency on `known`. */
  improvable: ReadonlySet<number>;
};

export const argumentModes = (
  arena: TypeArena,
  classEntry: ClassEntry,
  args: readonly TypeId[]
): ArgumentModes => {
  const known = new Set<number>();
  args.forEach((arg, index) => {
    if (!arena.containsExistential(arg)) known.add(index);
  });

  if (classEntry.fundeps.length === 0) {
    return { known, improvable: new Set() };
  }

  const determined = requiredConcrete(classEntry, known);
  const improvable = new Set(
    [...determined].filter((index) => !known.has(index))
  );
  return { known, improvable };
};
