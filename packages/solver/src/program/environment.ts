import type { ClassId, TypeId } from "../ids.js";
import type { Diagnostic } from "../diagnostics/index.js";
import type { TypeArena } from "../types/type-arena.js";
import { formatConstraint } from "../types/type-format.js";
import type { InstanceStore } from "../instances/instance-store.js";
import type { SuperclassGraph } from "../classes/superclass-graph.js";
import {
  tableEntry,
  type ClassEntry,
  type Constraint,
  type ModuleEntry,
  type TypeConstructorEntry,
} from "./tables.js";

/**
 * Everything resolution reads. Produced by `loadProgram` after every
 * load-time check has passed; only the type arena keeps growing as
 * constraint types are interned.
 */
export interface InstanceEnvironment {
  readonly arena: TypeArena;
  readonly modules: readonly ModuleEntry[];
  readonly typeConstructors: readonly TypeConstructorEntry[];
  readonly classes: readonly ClassEntry[];
  readonly store: InstanceStore;
  readonly superclasses: SuperclassGraph;
  /** Non-fatal diagnostics (warnings) from loading. */
  readonly diagnostics: readonly Diagnostic[];
  getClass(id: ClassId): ClassEntry;
  findClass(name: string): ClassEntry | undefined;
  findTypeConstructor(name: string): TypeConstructorEntry | undefined;
  /** Interns a constructor type by name; throws on unknown names. */
  type(name: string, ...args: TypeId[]): TypeId;
  /** Builds a constraint by class name; throws on unknown names. */
  constraint(className: string, ...args: TypeId[]): Constraint;
  formatConstraint(constraint: Constraint): string;
}

export const createInstanceEnvironment = ({
  arena,
  modules,
  typeConstructors,
  classes,
  store,
  superclasses,
  diagnostics,
}: {
  arena: TypeArena;
  modules: readonly ModuleEntry[];
  typeConstructors: readonly TypeConstructorEntry[];
  classes: readonly ClassEntry[];
  store: InstanceStore;
  superclasses: SuperclassGraph;
  diagnostics: readonly Diagnostic[];
}): InstanceEnvironment => {
  const classByName = new Map(classes.map((entry) => [entry.name, entry] as const));
  const typeByName = new Map(
    typeConstructors.map((entry) => [entry.name, entry] as const)
  );

  const getClass = (id: ClassId): ClassEntry => tableEntry(classes, id, "class");

  return Object.freeze({
    arena,
    modules: Object.freeze([...modules]),
    typeConstructors: Object.freeze([...typeConstructors]),
    classes: Object.freeze([...classes]),
    store,
    superclasses,
    diagnostics: Object.freeze([...diagnostics]),
    getClass,
    findClass: (name: string) => classByName.get(name),
    findTypeConstructor: (name: string) => typeByName.get(name),
    type: (name: string, ...args: TypeId[]): TypeId => {
      const entry = typeByName.get(name);
      if (!entry) {
        throw new Error(`unknown type constructor ${name}`);
      }
      if (entry.arity !== undefined && entry.arity !== args.length) {
        throw new Error(
          `type constructor ${name} expects ${entry.arity} arguments, got ${args.length}`
        );
      }
      return arena.internConstructor({ constructor: entry.id, name, args });
    },
    constraint: (className: string, ...args: TypeId[]): Constraint => {
      const entry = classByName.get(className);
      if (!entry) {
        throw new Error(`unknown class ${className}`);
      }
      return { classId: entry.id, args };
    },
    formatConstraint: (constraint: Constraint): string =>
      formatConstraint(arena, getClass(constraint.classId).name, constraint.args),
  });
};
