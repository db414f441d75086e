import type { TypeConstructorId } from "../ids.js";
import type { DiagnosticEmitter } from "../diagnostics/index.js";
import type { TypeArena } from "../types/type-arena.js";
import type {
  ClassEntry,
  InstanceEntry,
  ModuleEntry,
  ProgramTables,
  TypeConstructorEntry,
} from "../program/tables.js";

export type OrphanCheckResult =
  | { ok: true; via: "class" }
  | { ok: true; via: "type"; typeConstructor: TypeConstructorId }
  | { ok: false; reason: string };

/**
 * An instance must live in the module defining its class, or in the module
 * defining the outermost constructor of its head type. Multi-parameter
 * classes accept any top-level head type.
 */
export const checkInstance = ({
  instance,
  classEntry,
  module,
  arena,
  typeConstructors,
}: {
  instance: InstanceEntry;
  classEntry: ClassEntry;
  module: ModuleEntry;
  arena: TypeArena;
  typeConstructors: readonly TypeConstructorEntry[];
}): OrphanCheckResult => {
  if (instance.module !== module.id) {
    throw new Error(
      `instance ${instance.name} is not owned by module ${module.name}`
    );
  }

  if (classEntry.module === module.id) {
    return { ok: true, via: "class" };
  }

  const candidates =
    classEntry.params.length === 1 ? instance.head.slice(0, 1) : instance.head;
  for (const type of candidates) {
    const constructor = arena.outermostConstructor(type);
    if (constructor === undefined) continue;
    if (typeConstructors[constructor]?.module === module.id) {
      return { ok: true, via: "type", typeConstructor: constructor };
    }
  }

  return {
    ok: false,
    reason: `${module.name} defines neither ${classEntry.name} nor a type in the head of ${instance.name}`,
  };
};

export const checkOrphans = ({
  tables,
  arena,
  diagnostics,
}: {
  tables: ProgramTables;
  arena: TypeArena;
  diagnostics: DiagnosticEmitter;
}): void => {
  tables.instances.forEach((instance) => {
    const classEntry = tables.classes[instance.classId];
    const module = tables.modules[instance.module];
    if (!classEntry || !module) return;

    const result = checkInstance({
      instance,
      classEntry,
      module,
      arena,
      typeConstructors: tables.typeConstructors,
    });
    if (result.ok) return;

    diagnostics.reportCode({
      code: "IN0001",
      params: {
        kind: "orphan-instance",
        instanceName: instance.name,
        className: classEntry.name,
        moduleName: module.name,
      },
      span: instance.span,
    });
  });
};
