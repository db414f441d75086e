import type { SourceSpan } from "../diagnostics/index.js";

/**
 * Structured declarations handed over by the declaration-collection pass.
 * Names are global: classes, type constructors and instances are each
 * identified by a unique name across the whole program.
 */
export type TypeExpr = ConstructorTypeExpr | ParamTypeExpr;

export interface ConstructorTypeExpr {
  kind: "constructor";
  name: string;
  args?: readonly TypeExpr[];
  span?: SourceSpan;
}

export interface ParamTypeExpr {
  kind: "param";
  name: string;
  span?: SourceSpan;
}

export interface ConstraintDecl {
  className: string;
  args: readonly TypeExpr[];
  span?: SourceSpan;
}

/** Superclass of a class, applied to the subclass's parameters by name. */
export interface SuperclassDecl {
  className: string;
  args: readonly string[];
  span?: SourceSpan;
}

export interface FunctionalDependencyDecl {
  determiners: readonly string[];
  determined: readonly string[];
  span?: SourceSpan;
}

export interface ClassDecl {
  name: string;
  params: readonly string[];
  superclasses?: readonly SuperclassDecl[];
  fundeps?: readonly FunctionalDependencyDecl[];
  span?: SourceSpan;
}

export interface TypeConstructorDecl {
  name: string;
  /** When present, every use of the constructor is checked against it. */
  arity?: number;
  span?: SourceSpan;
}

export type InstanceOrigin = "declared" | "derived" | "newtype-derived";

export interface InstanceDecl {
  name: string;
  className: string;
  head: readonly TypeExpr[];
  constraints?: readonly ConstraintDecl[];
  origin?: InstanceOrigin;
  span?: SourceSpan;
}

/** `instance ... else instance ...`, in declaration order. */
export interface InstanceChainDecl {
  instances: readonly InstanceDecl[];
  span?: SourceSpan;
}

export interface ModuleDecl {
  name: string;
  types?: readonly TypeConstructorDecl[];
  classes?: readonly ClassDecl[];
  chains?: readonly InstanceChainDecl[];
  span?: SourceSpan;
}

export interface ProgramDeclarations {
  modules: readonly ModuleDecl[];
}
