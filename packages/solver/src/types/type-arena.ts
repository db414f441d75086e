import type {
  ExistentialId,
  RigidId,
  TypeConstructorId,
  TypeId,
  TypeParamId,
} from "../ids.js";

/** Instance-head variable bindings produced by matching. */
export type Substitution = ReadonlyMap<TypeParamId, TypeId>;

/** Existentials solved through functional dependencies. */
export type Improvement = ReadonlyMap<ExistentialId, TypeId>;

export type TypeDescriptor =
  | ConstructorType
  | TypeParamRef
  | ExistentialType
  | RigidType;

export interface ConstructorType {
  kind: "constructor";
  constructor: TypeConstructorId;
  name: string;
  args: readonly TypeId[];
}

/** Variable bound by an instance head or instance constraint. */
export interface TypeParamRef {
  kind: "type-param";
  param: TypeParamId;
  name: string;
}

/** Constraint-side unknown that a later unification may still solve. */
export interface ExistentialType {
  kind: "existential";
  existential: ExistentialId;
  name: string;
}

/** Constraint-side skolem; never becomes concrete. */
export interface RigidType {
  kind: "rigid";
  rigid: RigidId;
  name: string;
}

export interface TypeArena {
  get(id: TypeId): Readonly<TypeDescriptor>;
  internConstructor(desc: Omit<ConstructorType, "kind">): TypeId;
  internTypeParamRef(param: TypeParamId): TypeId;
  freshTypeParam(name: string): TypeParamId;
  typeParamName(param: TypeParamId): string;
  freshExistential(name: string): TypeId;
  freshRigid(name: string): TypeId;
  substitute(type: TypeId, subst: Substitution): TypeId;
  improve(type: TypeId, improvement: Improvement): TypeId;
  containsExistential(type: TypeId): boolean;
  typeParamsOf(type: TypeId): readonly TypeParamId[];
  outermostConstructor(type: TypeId): TypeConstructorId | undefined;
  readonly size: number;
}

export const createTypeArena = (): TypeArena => {
  let nextTypeParamId: TypeParamId = 0;
  let nextExistentialId: ExistentialId = 0;
  let nextRigidId: RigidId = 0;

  const descriptors: TypeDescriptor[] = [];
  const descriptorCache = new Map<string, TypeId>();
  const typeParamNames = new Map<TypeParamId, string>();

  const keyFor = (desc: TypeDescriptor): string => {
    switch (desc.kind) {
      case "constructor":
        return `c${desc.constructor}(${desc.args.join(",")})`;
      case "type-param":
        return `p${desc.param}`;
      case "existential":
        return `e${desc.existential}`;
      case "rigid":
        return `r${desc.rigid}`;
    }
  };

  const storeDescriptor = (desc: TypeDescriptor): TypeId => {
    const key = keyFor(desc);
    const cached = descriptorCache.get(key);
    if (typeof cached === "number") {
      return cached;
    }

    const id = descriptors.length;
    descriptors.push(desc);
    descriptorCache.set(key, id);
    return id;
  };

  const getDescriptor = (id: TypeId): TypeDescriptor => {
    const desc = descriptors[id];
    if (!desc) {
      throw new Error(`unknown TypeId ${id}`);
    }

    return desc;
  };

  const internConstructor = (desc: Omit<ConstructorType, "kind">): TypeId =>
    storeDescriptor({
      kind: "constructor",
      constructor: desc.constructor,
      name: desc.name,
      args: [...desc.args],
    });

  const typeParamName = (param: TypeParamId): string =>
    typeParamNames.get(param) ?? `t${param}`;

  const internTypeParamRef = (param: TypeParamId): TypeId =>
    storeDescriptor({ kind: "type-param", param, name: typeParamName(param) });

  const freshTypeParam = (name: string): TypeParamId => {
    const param = nextTypeParamId++;
    typeParamNames.set(param, name);
    return param;
  };

  const freshExistential = (name: string): TypeId =>
    storeDescriptor({
      kind: "existential",
      existential: nextExistentialId++,
      name,
    });

  const freshRigid = (name: string): TypeId =>
    storeDescriptor({ kind: "rigid", rigid: nextRigidId++, name });

  // Rebuilds `type` bottom-up, replacing the leaves `replace` maps.
  const mapLeaves = (
    type: TypeId,
    replace: (desc: TypeDescriptor) => TypeId | undefined
  ): TypeId => {
    const visit = (current: TypeId): TypeId => {
      const desc = getDescriptor(current);
      if (desc.kind !== "constructor") {
        return replace(desc) ?? current;
      }
      if (desc.args.length === 0) {
        return current;
      }
      const args = desc.args.map(visit);
      const changed = args.some((arg, index) => arg !== desc.args[index]);
      return changed ? internConstructor({ ...desc, args }) : current;
    };
    return visit(type);
  };

  const substitute = (type: TypeId, subst: Substitution): TypeId => {
    if (subst.size === 0) {
      return type;
    }
    return mapLeaves(type, (desc) =>
      desc.kind === "type-param" ? subst.get(desc.param) : undefined
    );
  };

  const improve = (type: TypeId, improvement: Improvement): TypeId => {
    if (improvement.size === 0) {
      return type;
    }
    const active = new Set<ExistentialId>();
    const visit = (current: TypeId): TypeId =>
      mapLeaves(current, (desc) => {
        if (desc.kind !== "existential") return undefined;
        const target = improvement.get(desc.existential);
        // An existential improved (transitively) to itself is left alone.
        if (target === undefined || active.has(desc.existential)) {
          return undefined;
        }
        active.add(desc.existential);
        const resolved = visit(target);
        active.delete(desc.existential);
        return resolved;
      });
    return visit(type);
  };

  const containsExistential = (type: TypeId): boolean => {
    const desc = getDescriptor(type);
    switch (desc.kind) {
      case "existential":
        return true;
      case "constructor":
        return desc.args.some(containsExistential);
      default:
        return false;
    }
  };

  const typeParamsOf = (type: TypeId): readonly TypeParamId[] => {
    const params: TypeParamId[] = [];
    const visit = (current: TypeId): void => {
      const desc = getDescriptor(current);
      if (desc.kind === "type-param" && !params.includes(desc.param)) {
        params.push(desc.param);
      }
      if (desc.kind === "constructor") {
        desc.args.forEach(visit);
      }
    };
    visit(type);
    return params;
  };

  const outermostConstructor = (type: TypeId): TypeConstructorId | undefined => {
    const desc = getDescriptor(type);
    return desc.kind === "constructor" ? desc.constructor : undefined;
  };

  return {
    get: getDescriptor,
    internConstructor,
    internTypeParamRef,
    freshTypeParam,
    typeParamName,
    freshExistential,
    freshRigid,
    substitute,
    improve,
    containsExistential,
    typeParamsOf,
    outermostConstructor,
    get size() {
      return descriptors.length;
    },
  };
};
