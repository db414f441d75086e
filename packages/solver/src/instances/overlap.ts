import type { TypeId, TypeParamId } from "../ids.js";
import {
  diagnosticFromCode,
  type DiagnosticEmitter,
} from "../diagnostics/index.js";
import type { TypeArena } from "../types/type-arena.js";
import type { InstanceEntry, ProgramTables } from "../program/tables.js";

/**
 * Whether some instantiation of both heads makes them equal. Head
 * variables of both instances are bindable; they never clash because
 * every instance gets fresh parameters when lowered.
 */
export const headsOverlap = (
  arena: TypeArena,
  left: readonly TypeId[],
  right: readonly TypeId[]
): boolean => {
  if (left.length !== right.length) return false;
  const bindings = new Map<TypeParamId, TypeId>();

  const walk = (type: TypeId): TypeId => {
    let current = type;
    for (;;) {
      const desc = arena.get(current);
      if (desc.kind !== "type-param") return current;
      const bound = bindings.get(desc.param);
      if (bound === undefined) return current;
      current = bound;
    }
  };

  const occurs = (param: TypeParamId, type: TypeId): boolean => {
    const desc = arena.get(walk(type));
    if (desc.kind === "type-param") return desc.param === param;
    if (desc.kind === "constructor") {
      return desc.args.some((arg) => occurs(param, arg));
    }
    return false;
  };

  const unify = (a: TypeId, b: TypeId): boolean => {
    const leftType = walk(a);
    const rightType = walk(b);
    if (leftType === rightType) return true;

    const leftDesc = arena.get(leftType);
    const rightDesc = arena.get(rightType);

    if (leftDesc.kind === "type-param") {
      if (occurs(leftDesc.param, rightType)) return false;
      bindings.set(leftDesc.param, rightType);
      return true;
    }
    if (rightDesc.kind === "type-param") {
      if (occurs(rightDesc.param, leftType)) return false;
      bindings.set(rightDesc.param, leftType);
      return true;
    }
    if (leftDesc.kind !== "constructor" || rightDesc.kind !== "constructor") {
      return false;
    }
    if (
      leftDesc.constructor !== rightDesc.constructor ||
      leftDesc.args.length !== rightDesc.args.length
    ) {
      return false;
    }
    return leftDesc.args.every((arg, index) => unify(arg, rightDesc.args[index]));
  };

  return left.every((type, index) => unify(type, right[index]));
};

/**
 * Instances of one class declared in different chains have no order
 * between them. Overlaps are reported as warnings here and rejected at the
 * use site when both chains select an instance.
 */
export const checkChainOverlaps = ({
  tables,
  arena,
  diagnostics,
}: {
  tables: ProgramTables;
  arena: TypeArena;
  diagnostics: DiagnosticEmitter;
}): void => {
  const byClass = new Map<number, InstanceEntry[]>();
  tables.instances.forEach((instance) => {
    const existing = byClass.get(instance.classId) ?? [];
    existing.push(instance);
    byClass.set(instance.classId, existing);
  });

  byClass.forEach((instances, classId) => {
    const className = tables.classes[classId]?.name ?? `#${classId}`;
    instances.forEach((instance, index) => {
      instances.slice(index + 1).forEach((other) => {
        if (other.chain === instance.chain) return;
        if (!headsOverlap(arena, instance.head, other.head)) return;
        diagnostics.reportCode({
          code: "IN0007",
          params: {
            kind: "overlapping-chains",
            className,
            instanceName: other.name,
            otherInstance: instance.name,
          },
          span: other.span,
          severity: "warning",
          related: [
            diagnosticFromCode({
              code: "IN0007",
              params: { kind: "previous-overlap", instanceName: instance.name },
              span: instance.span,
              severity: "note",
            }),
          ],
        });
      });
    });
  });
};
