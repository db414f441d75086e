import { readEnvFlag } from "@tyclass/lib/env.js";

type SolverPerfSummary = {
  label: string;
  success: boolean;
  phasesMs: Readonly<Record<string, number>>;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

export const SOLVER_PERF_ENV = "TYCLASS_SOLVER_PERF";

let perfEnabled = readEnvFlag(SOLVER_PERF_ENV);

const counters = new Map<string, number>();

const roundMs = (value: number): number =>
  Math.round(value * 1000) / 1000;

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export const isSolverPerfEnabled = (): boolean => perfEnabled;

/** Overrides the environment flag; returns the previous setting. */
export const setSolverPerfEnabled = (enabled: boolean): boolean => {
  const previous = perfEnabled;
  perfEnabled = enabled;
  return previous;
};

export const incrementSolverPerfCounter = (
  name: string,
  amount = 1,
): void => {
  if (!perfEnabled || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotSolverPerfCounters = (): ReadonlyMap<string, number> =>
  perfEnabled ? new Map(counters) : new Map();

export const resetSolverPerfCounters = (): void => {
  counters.clear();
};

export const diffSolverPerfCounters = ({
  before,
  after,
}: {
  before: ReadonlyMap<string, number>;
  after: ReadonlyMap<string, number>;
}): Record<string, number> => {
  if (!perfEnabled) {
    return {};
  }

  const keys = new Set<string>([...before.keys(), ...after.keys()]);
  const delta = new Map<string, number>();
  keys.forEach((key) => {
    const diff = (after.get(key) ?? 0) - (before.get(key) ?? 0);
    if (diff !== 0) {
      delta.set(key, diff);
    }
  });
  return toSortedRecord(delta);
};

export const formatSolverPerfSummary = ({
  label,
  success,
  phasesMs,
  counters: summaryCounters,
  diagnostics,
}: SolverPerfSummary): string => {
  const summary = {
    label,
    success,
    diagnostics,
    phasesMs: Object.fromEntries(
      Object.entries(phasesMs)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([phase, value]) => [phase, roundMs(value)]),
    ),
    counters: summaryCounters,
  };
  return `[tyclass:solver:perf] ${JSON.stringify(summary)}`;
};

export const logSolverPerfSummary = (summary: SolverPerfSummary): void => {
  if (!perfEnabled) {
    return;
  }
  console.error(formatSolverPerfSummary(summary));
};
