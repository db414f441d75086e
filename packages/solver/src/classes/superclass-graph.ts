import { FastShiftArray } from "@tyclass/lib/fast-shift-array.js";
import type { ClassId, TypeId } from "../ids.js";
import type { DiagnosticEmitter } from "../diagnostics/index.js";
import type { TypeArena } from "../types/type-arena.js";
import { compareTypeLists } from "../types/compare.js";
import type { ClassEntry, Constraint, Given } from "../program/tables.js";

/** A constraint implied by another through superclass edges. */
export interface ImpliedConstraint {
  constraint: Constraint;
  /** Classes walked, from the source class to `constraint.classId`. */
  path: readonly ClassId[];
}

export interface SuperclassEvidence extends ImpliedConstraint {
  given: number;
}

export interface SuperclassGraph {
  superclassesOf(classId: ClassId): ReadonlySet<ClassId>;
  subclassesOf(classId: ClassId): ReadonlySet<ClassId>;
  /**
   * Classes reachable from the constraint's class by one or more
   * superclass edges: evidence for the constraint discharges all of them.
   */
  dischargeBySuperclass(constraint: Constraint): ReadonlySet<ClassId>;
  impliedConstraints(constraint: Constraint): readonly ImpliedConstraint[];
  findSuperclassEvidence(
    constraint: Constraint,
    givens: readonly Given[]
  ): SuperclassEvidence | undefined;
  readonly hasCycles: boolean;
}

const findCycles = (classes: readonly ClassEntry[]): ClassId[][] => {
  const state = new Map<ClassId, "visiting" | "done">();
  const stack: ClassId[] = [];
  const cycles: ClassId[][] = [];
  const seenCycles = new Set<string>();

  const visit = (classId: ClassId): void => {
    state.set(classId, "visiting");
    stack.push(classId);
    classes[classId]?.superclasses.forEach(({ superclass }) => {
      const current = state.get(superclass);
      if (current === "visiting") {
        const cycle = stack.slice(stack.indexOf(superclass));
        const key = [...cycle].sort((a, b) => a - b).join(",");
        if (!seenCycles.has(key)) {
          seenCycles.add(key);
          cycles.push(cycle);
        }
        return;
      }
      if (current === undefined) {
        visit(superclass);
      }
    });
    stack.pop();
    state.set(classId, "done");
  };

  classes.forEach((entry) => {
    if (!state.has(entry.id)) visit(entry.id);
  });
  return cycles;
};

export const buildSuperclassGraph = ({
  classes,
  arena,
  diagnostics,
}: {
  classes: readonly ClassEntry[];
  arena: TypeArena;
  diagnostics: DiagnosticEmitter;
}): SuperclassGraph => {
  const cycles = findCycles(classes);
  cycles.forEach((cycle) => {
    const names = cycle.map((id) => classes[id]?.name ?? `#${id}`);
    const head = classes[cycle[0] ?? 0];
    diagnostics.reportCode({
      code: "CL0001",
      params: {
        kind: "superclass-cycle",
        className: names[0] ?? "",
        cycle: [...names, names[0] ?? ""],
      },
      span: head?.span,
    });
  });

  const subclassEdges = new Map<ClassId, ClassId[]>();
  classes.forEach((entry) => {
    entry.superclasses.forEach(({ superclass }) => {
      const existing = subclassEdges.get(superclass) ?? [];
      existing.push(entry.id);
      subclassEdges.set(superclass, existing);
    });
  });

  const closure = (
    start: ClassId,
    next: (classId: ClassId) => readonly ClassId[]
  ): Set<ClassId> => {
    const reached = new Set<ClassId>();
    const queue = new FastShiftArray<ClassId>(...next(start));
    while (!queue.isEmpty()) {
      const current = queue.shift();
      if (current === undefined || reached.has(current)) continue;
      reached.add(current);
      queue.push(...next(current));
    }
    return reached;
  };

  const superclassCache = new Map<ClassId, ReadonlySet<ClassId>>();
  const subclassCache = new Map<ClassId, ReadonlySet<ClassId>>();

  const superclassesOf = (classId: ClassId): ReadonlySet<ClassId> => {
    const cached = superclassCache.get(classId);
    if (cached) return cached;
    const result = closure(classId, (id) =>
      (classes[id]?.superclasses ?? []).map((edge) => edge.superclass)
    );
    superclassCache.set(classId, result);
    return result;
  };

  const subclassesOf = (classId: ClassId): ReadonlySet<ClassId> => {
    const cached = subclassCache.get(classId);
    if (cached) return cached;
    const result = closure(classId, (id) => subclassEdges.get(id) ?? []);
    subclassCache.set(classId, result);
    return result;
  };

  const impliedConstraints = (
    constraint: Constraint
  ): readonly ImpliedConstraint[] => {
    const implied: ImpliedConstraint[] = [];
    const seen = new Set<string>();
    const queue = new FastShiftArray<ImpliedConstraint>({
      constraint,
      path: [constraint.classId],
    });

    while (!queue.isEmpty()) {
      const current = queue.shift();
      if (!current) continue;
      const key = `${current.constraint.classId}:${current.constraint.args.join(",")}`;
      if (seen.has(key)) continue;
      seen.add(key);
      implied.push(current);

      classes[current.constraint.classId]?.superclasses.forEach((edge) => {
        const args: TypeId[] = edge.args.map(
          (index) => current.constraint.args[index]
        );
        queue.push({
          constraint: { classId: edge.superclass, args },
          path: [...current.path, edge.superclass],
        });
      });
    }
    return implied;
  };

  const findSuperclassEvidence = (
    constraint: Constraint,
    givens: readonly Given[]
  ): SuperclassEvidence | undefined => {
    for (const [given, entry] of givens.entries()) {
      const { classId } = entry.constraint;
      if (classId !== constraint.classId && !superclassesOf(classId).has(constraint.classId)) {
        continue;
      }
      const match = impliedConstraints(entry.constraint).find(
        (implied) =>
          implied.constraint.classId === constraint.classId &&
          compareTypeLists(arena, implied.constraint.args, constraint.args) === "equal"
      );
      if (match) {
        return { ...match, given };
      }
    }
    return undefined;
  };

  return {
    superclassesOf,
    subclassesOf,
    dischargeBySuperclass: (constraint) => superclassesOf(constraint.classId),
    impliedConstraints,
    findSuperclassEvidence,
    hasCycles: cycles.length > 0,
  };
};
