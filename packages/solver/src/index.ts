export { loadProgram } from "./pipeline.js";
export type { LoadProgramOptions } from "./pipeline.js";
export { createSolver } from "./resolution/solver.js";
export type {
  ConstraintSolver,
  Evidence,
  ResolutionFailure,
  SolveOptions,
  SolveResult,
} from "./resolution/solver.js";
export { resolveChain, resolveClass } from "./resolution/chain-resolver.js";
export type {
  ChainResolution,
  ClassResolution,
  ResolvedInstance,
} from "./resolution/chain-resolver.js";
export { combineMatchKinds, matchInstanceHead } from "./resolution/matcher.js";
export type { MatchKind, MatchOptions, MatchResult } from "./resolution/matcher.js";
export {
  ChainBuilder,
  ModuleBuilder,
  ProgramBuilder,
  con,
  constraint,
  fundep,
  param,
  superclass,
} from "./declarations/builder.js";
export type { ClassOptions, InstanceOptions } from "./declarations/builder.js";
export type * from "./declarations/types.js";
export { createTypeArena } from "./types/type-arena.js";
export type {
  Improvement,
  Substitution,
  TypeArena,
  TypeDescriptor,
} from "./types/type-arena.js";
export { compareTypeLists, compareTypes } from "./types/compare.js";
export type { TypeComparison } from "./types/compare.js";
export { formatConstraint, formatType } from "./types/type-format.js";
export type { InstanceEnvironment } from "./program/environment.js";
export type {
  ChainEntry,
  ClassEntry,
  Constraint,
  FunctionalDependency,
  Given,
  InstanceEntry,
  ModuleEntry,
  SuperclassEdge,
  TypeConstructorEntry,
} from "./program/tables.js";
export {
  argumentModes,
  formatFunctionalDependency,
  requiredConcrete,
} from "./classes/functional-dependencies.js";
export type { ArgumentModes } from "./classes/functional-dependencies.js";
export type {
  ImpliedConstraint,
  SuperclassEvidence,
  SuperclassGraph,
} from "./classes/superclass-graph.js";
export { checkInstance } from "./instances/orphan-check.js";
export type { OrphanCheckResult } from "./instances/orphan-check.js";
export { headsOverlap } from "./instances/overlap.js";
export type { InstanceStore } from "./instances/instance-store.js";
export {
  DiagnosticEmitter,
  DiagnosticError,
  createDiagnostic,
  diagnosticCodes,
  diagnosticFromCode,
  formatDiagnostic,
} from "./diagnostics/index.js";
export type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticPhase,
  DiagnosticSeverity,
  SourceSpan,
} from "./diagnostics/index.js";
export {
  DEFAULT_SOLVER_OPTIONS,
  MAX_DEPTH_ENV,
  resolveSolverOptions,
} from "./config.js";
export type { SolverOptions } from "./config.js";
export { DEBUG_RESOLVE_ENV, createResolveTracer } from "./debug.js";
export type { ResolveTracer } from "./debug.js";
export { SOLVER_PERF_ENV, setSolverPerfEnabled } from "./perf.js";
export type {
  ChainId,
  ClassId,
  ExistentialId,
  InstanceId,
  ModuleId,
  RigidId,
  TypeConstructorId,
  TypeId,
  TypeParamId,
} from "./ids.js";
