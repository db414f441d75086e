import type { ChainId, ClassId, InstanceId } from "../ids.js";
import {
  tableEntry,
  type ChainEntry,
  type InstanceEntry,
} from "../program/tables.js";

/**
 * Read-only view over lowered instances, grouped into chains per class.
 * Built once after the load-time checks pass and never mutated afterwards.
 */
export interface InstanceStore {
  readonly instances: readonly InstanceEntry[];
  readonly chains: readonly ChainEntry[];
  getInstance(id: InstanceId): InstanceEntry;
  getChain(id: ChainId): ChainEntry;
  /** Chains of a class, in declaration order. */
  chainsFor(classId: ClassId): readonly ChainEntry[];
  findInstance(name: string): InstanceEntry | undefined;
}

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  Object.values(value).forEach((field: unknown) => {
    if (typeof field === "object" && field !== null && !Object.isFrozen(field)) {
      deepFreeze(field);
    }
  });
  return Object.freeze(value);
};

export const createInstanceStore = ({
  instances,
  chains,
}: {
  instances: readonly InstanceEntry[];
  chains: readonly ChainEntry[];
}): InstanceStore => {
  const frozenInstances = deepFreeze([...instances]);
  const frozenChains = deepFreeze([...chains]);

  const chainsByClass = new Map<ClassId, ChainEntry[]>();
  frozenChains.forEach((chain) => {
    const existing = chainsByClass.get(chain.classId) ?? [];
    existing.push(chain);
    chainsByClass.set(chain.classId, existing);
  });

  const byName = new Map(
    frozenInstances.map((instance) => [instance.name, instance] as const)
  );

  return {
    instances: frozenInstances,
    chains: frozenChains,
    getInstance: (id) => tableEntry(frozenInstances, id, "instance"),
    getChain: (id) => tableEntry(frozenChains, id, "chain"),
    chainsFor: (classId) => chainsByClass.get(classId) ?? [],
    findInstance: (name) => byName.get(name),
  };
};
