import type {
  ChainId,
  ClassId,
  InstanceId,
  ModuleId,
  TypeConstructorId,
  TypeId,
  TypeParamId,
} from "../ids.js";
import type { SourceSpan } from "../diagnostics/index.js";
import type { InstanceOrigin } from "../declarations/types.js";

export interface ModuleEntry {
  id: ModuleId;
  name: string;
  span?: SourceSpan;
}

export interface TypeConstructorEntry {
  id: TypeConstructorId;
  name: string;
  arity?: number;
  module: ModuleId;
  span?: SourceSpan;
}

/** `superclass` applied to the subclass parameters at `args`. */
export interface SuperclassEdge {
  superclass: ClassId;
  args: readonly number[];
  span?: SourceSpan;
}

export interface FunctionalDependency {
  determiners: readonly number[];
  determined: readonly number[];
  span?: SourceSpan;
}

export interface ClassEntry {
  id: ClassId;
  name: string;
  params: readonly string[];
  superclasses: readonly SuperclassEdge[];
  fundeps: readonly FunctionalDependency[];
  module: ModuleId;
  span?: SourceSpan;
}

export interface Constraint {
  classId: ClassId;
  args: readonly TypeId[];
}

/** Evidence already available at the use site, e.g. from a signature. */
export interface Given {
  constraint: Constraint;
  label?: string;
}

export interface InstanceEntry {
  id: InstanceId;
  name: string;
  classId: ClassId;
  head: readonly TypeId[];
  /** Every variable bound by the head or by the prerequisites. */
  params: readonly TypeParamId[];
  /** Prerequisites; never consulted when selecting the instance. */
  constraints: readonly Constraint[];
  module: ModuleId;
  chain: ChainId;
  position: number;
  origin: InstanceOrigin;
  span?: SourceSpan;
}

export interface ChainEntry {
  id: ChainId;
  classId: ClassId;
  module: ModuleId;
  instances: readonly InstanceId[];
  span?: SourceSpan;
}

export interface ProgramTables {
  modules: readonly ModuleEntry[];
  typeConstructors: readonly TypeConstructorEntry[];
  classes: readonly ClassEntry[];
  instances: readonly InstanceEntry[];
  chains: readonly ChainEntry[];
}

export const tableEntry = <T>(
  table: readonly T[],
  id: number,
  label: string
): T => {
  const entry = table[id];
  if (entry === undefined) {
    throw new Error(`unknown ${label} ${id}`);
  }
  return entry;
};
