import type { InstanceId } from "../ids.js";
import type { Improvement, Substitution } from "../types/type-arena.js";
import type { InstanceEnvironment } from "../program/environment.js";
import type {
  ChainEntry,
  Constraint,
  InstanceEntry,
} from "../program/tables.js";
import { argumentModes } from "../classes/functional-dependencies.js";
import { incrementSolverPerfCounter } from "../perf.js";
import { silentTracer, type ResolveTracer } from "../debug.js";
import { matchInstanceHead } from "./matcher.js";

export type ResolvedInstance = {
  kind: "resolved";
  instance: InstanceEntry;
  substitution: Substitution;
  improvement: Improvement;
  consulted: readonly InstanceId[];
};

export type ChainResolution =
  | ResolvedInstance
  | { kind: "not-found"; consulted: readonly InstanceId[] }
  | {
      kind: "ambiguous-stop";
      instance: InstanceEntry;
      position: number;
      consulted: readonly InstanceId[];
    };

export type ClassResolution =
  | ChainResolution
  | {
      kind: "overlapping";
      candidates: readonly ResolvedInstance[];
      consulted: readonly InstanceId[];
    };

/**
 * Walks one chain in declaration order. The first entry that matches wins;
 * the first entry that might match (ambiguous) ends the walk without a
 * result, since later entries are only reachable once it is ruled out.
 */
export const resolveChain = (
  env: InstanceEnvironment,
  chain: ChainEntry,
  constraint: Constraint,
  tracer: ResolveTracer = silentTracer
): ChainResolution => {
  const { arena, store } = env;
  const classEntry = env.getClass(constraint.classId);
  const modes = argumentModes(arena, classEntry, constraint.args);
  const knownPositions = [...modes.known].sort((a, b) => a - b);
  const consulted: InstanceId[] = [];

  for (const instanceId of chain.instances) {
    const instance = store.getInstance(instanceId);
    consulted.push(instance.id);
    incrementSolverPerfCounter("resolve.chain-entries");

    if (modes.improvable.size > 0) {
      const prefilter = matchInstanceHead(arena, instance.head, constraint.args, {
        positions: knownPositions,
      });
      if (prefilter.kind === "no-match") {
        incrementSolverPerfCounter("resolve.fundep-rejections");
        tracer.log(`${instance.name}: rejected on determining arguments`);
        continue;
      }
    }

    const result = matchInstanceHead(arena, instance.head, constraint.args, {
      improvable: modes.improvable,
    });

    switch (result.kind) {
      case "match":
        tracer.log(`${instance.name}: match`);
        return {
          kind: "resolved",
          instance,
          substitution: result.substitution,
          improvement: result.improvement,
          consulted,
        };
      case "no-match":
        tracer.log(`${instance.name}: no match at argument ${result.position}`);
        continue;
      case "ambiguous":
        incrementSolverPerfCounter("resolve.ambiguous-stops");
        tracer.log(`${instance.name}: ambiguous at argument ${result.position}, chain stops`);
        return {
          kind: "ambiguous-stop",
          instance,
          position: result.position,
          consulted,
        };
    }
  }

  return { kind: "not-found", consulted };
};

/**
 * Runs every chain of the constraint's class. Chains are unordered with
 * respect to each other, so a selection only stands when no other chain
 * selects an instance or might do so.
 */
export const resolveClass = (
  env: InstanceEnvironment,
  constraint: Constraint,
  tracer: ResolveTracer = silentTracer
): ClassResolution => {
  const resolutions = env.store
    .chainsFor(constraint.classId)
    .map((chain) => resolveChain(env, chain, constraint, tracer));
  const consulted = resolutions.flatMap((resolution) => resolution.consulted);

  const resolved = resolutions.filter(
    (resolution): resolution is ResolvedInstance => resolution.kind === "resolved"
  );
  if (resolved.length > 1) {
    return { kind: "overlapping", candidates: resolved, consulted };
  }

  const ambiguous = resolutions.find(
    (resolution) => resolution.kind === "ambiguous-stop"
  );
  if (ambiguous) {
    return { ...ambiguous, consulted };
  }

  const [only] = resolved;
  if (only) {
    return { ...only, consulted };
  }

  return { kind: "not-found", consulted };
};
