/**
 * Table indices shared by the loader, the instance store and the resolver.
 * Declarations are lowered into flat arenas once; everything downstream
 * refers to them by these ids.
 */
export type ModuleId = number;
export type ClassId = number;
export type TypeConstructorId = number;
export type InstanceId = number;
export type ChainId = number;

export type TypeId = number;
export type TypeParamId = number;
export type ExistentialId = number;
export type RigidId = number;

export type {
  SourceSpan,
  DiagnosticSeverity,
  Diagnostic,
  DiagnosticPhase,
} from "./diagnostics/index.js";
