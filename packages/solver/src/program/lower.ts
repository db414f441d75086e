import type {
  ClassId,
  ModuleId,
  TypeConstructorId,
  TypeId,
  TypeParamId,
} from "../ids.js";
import {
  diagnosticFromCode,
  normalizeSpan,
  type DiagnosticEmitter,
} from "../diagnostics/index.js";
import type {
  ClassDecl,
  ConstraintDecl,
  InstanceDecl,
  ProgramDeclarations,
  TypeExpr,
} from "../declarations/types.js";
import type { TypeArena } from "../types/type-arena.js";
import type {
  ChainEntry,
  ClassEntry,
  Constraint,
  FunctionalDependency,
  InstanceEntry,
  ModuleEntry,
  ProgramTables,
  SuperclassEdge,
  TypeConstructorEntry,
} from "./tables.js";

type PendingClass = { decl: ClassDecl; module: ModuleId };

type InstanceScope = {
  instanceName: string;
  params: Map<string, TypeParamId>;
};

/**
 * Lowers named declarations into id-indexed tables. Problems are reported to
 * `diagnostics`; a declaration that fails to lower is left out of the tables
 * so later checks only see well-formed entries.
 */
export const lowerProgram = ({
  declarations,
  arena,
  diagnostics,
}: {
  declarations: ProgramDeclarations;
  arena: TypeArena;
  diagnostics: DiagnosticEmitter;
}): ProgramTables => {
  const modules: ModuleEntry[] = [];
  const moduleByName = new Map<string, ModuleId>();
  const typeConstructors: TypeConstructorEntry[] = [];
  const typeByName = new Map<string, TypeConstructorId>();
  const pendingClasses: PendingClass[] = [];
  const classByName = new Map<string, ClassId>();
  const acceptedModules: { id: ModuleId; decl: ProgramDeclarations["modules"][number] }[] = [];

  declarations.modules.forEach((moduleDecl) => {
    if (moduleByName.has(moduleDecl.name)) {
      diagnostics.reportCode({
        code: "CL0006",
        params: { kind: "duplicate-module", name: moduleDecl.name },
        span: moduleDecl.span,
      });
      return;
    }

    const id = modules.length;
    modules.push({ id, name: moduleDecl.name, span: moduleDecl.span });
    moduleByName.set(moduleDecl.name, id);
    acceptedModules.push({ id, decl: moduleDecl });

    moduleDecl.types?.forEach((typeDecl) => {
      if (typeByName.has(typeDecl.name)) {
        diagnostics.reportCode({
          code: "CL0006",
          params: {
            kind: "duplicate-type",
            name: typeDecl.name,
            moduleName: moduleDecl.name,
          },
          span: typeDecl.span,
        });
        return;
      }
      const typeId = typeConstructors.length;
      typeConstructors.push({
        id: typeId,
        name: typeDecl.name,
        arity: typeDecl.arity,
        module: id,
        span: typeDecl.span,
      });
      typeByName.set(typeDecl.name, typeId);
    });

    moduleDecl.classes?.forEach((classDecl) => {
      if (classByName.has(classDecl.name)) {
        diagnostics.reportCode({
          code: "CL0006",
          params: {
            kind: "duplicate-class",
            name: classDecl.name,
            moduleName: moduleDecl.name,
          },
          span: classDecl.span,
        });
        return;
      }
      classByName.set(classDecl.name, pendingClasses.length);
      pendingClasses.push({ decl: classDecl, module: id });
    });
  });

  const classes = pendingClasses.map(({ decl, module }, id) =>
    lowerClass({ decl, module, id, pendingClasses, classByName, diagnostics })
  );

  const instances: InstanceEntry[] = [];
  const chains: ChainEntry[] = [];
  const instanceSpans = new Map<string, InstanceDecl>();

  const lowerType = (expr: TypeExpr, scope: InstanceScope): TypeId | undefined => {
    if (expr.kind === "param") {
      const existing = scope.params.get(expr.name);
      if (existing !== undefined) {
        return arena.internTypeParamRef(existing);
      }
      const fresh = arena.freshTypeParam(expr.name);
      scope.params.set(expr.name, fresh);
      return arena.internTypeParamRef(fresh);
    }

    const constructor = typeByName.get(expr.name);
    if (constructor === undefined) {
      diagnostics.reportCode({
        code: "IN0006",
        params: {
          kind: "unknown-type",
          instanceName: scope.instanceName,
          typeName: expr.name,
        },
        span: expr.span,
      });
      return undefined;
    }

    const exprArgs = expr.args ?? [];
    const expected = typeConstructors[constructor]?.arity;
    if (expected !== undefined && expected !== exprArgs.length) {
      diagnostics.reportCode({
        code: "IN0006",
        params: {
          kind: "type-arity",
          instanceName: scope.instanceName,
          typeName: expr.name,
          expected,
          actual: exprArgs.length,
        },
        span: expr.span,
      });
      return undefined;
    }

    const args: TypeId[] = [];
    for (const argExpr of exprArgs) {
      const arg = lowerType(argExpr, scope);
      if (arg === undefined) return undefined;
      args.push(arg);
    }
    return arena.internConstructor({ constructor, name: expr.name, args });
  };

  const lowerTypes = (
    exprs: readonly TypeExpr[],
    scope: InstanceScope
  ): TypeId[] | undefined => {
    const types: TypeId[] = [];
    for (const expr of exprs) {
      const type = lowerType(expr, scope);
      if (type === undefined) return undefined;
      types.push(type);
    }
    return types;
  };

  const lowerConstraint = (
    decl: ConstraintDecl,
    scope: InstanceScope
  ): Constraint | undefined => {
    const classId = classByName.get(decl.className);
    if (classId === undefined) {
      diagnostics.reportCode({
        code: "IN0002",
        params: {
          kind: "unknown-class",
          instanceName: scope.instanceName,
          className: decl.className,
          context: "constraint",
        },
        span: decl.span,
      });
      return undefined;
    }
    const expected = pendingClasses[classId]?.decl.params.length ?? 0;
    if (expected !== decl.args.length) {
      diagnostics.reportCode({
        code: "IN0003",
        params: {
          kind: "constraint-arity",
          instanceName: scope.instanceName,
          className: decl.className,
          expected,
          actual: decl.args.length,
        },
        span: decl.span,
      });
      return undefined;
    }
    const args = lowerTypes(decl.args, scope);
    return args ? { classId, args } : undefined;
  };

  acceptedModules.forEach(({ id: moduleId, decl: moduleDecl }) => {
    moduleDecl.chains?.forEach((chainDecl) => {
      if (chainDecl.instances.length === 0) {
        diagnostics.reportCode({
          code: "IN0005",
          params: { kind: "empty-chain", moduleName: moduleDecl.name },
          span: normalizeSpan(chainDecl.span, moduleDecl.span),
        });
        return;
      }

      const chainId = chains.length;
      const chainHead = chainDecl.instances[0];
      const members: InstanceEntry[] = [];

      chainDecl.instances.forEach((decl) => {
        const previous = instanceSpans.get(decl.name);
        if (previous) {
          diagnostics.reportCode({
            code: "IN0004",
            params: { kind: "duplicate-instance", instanceName: decl.name },
            span: decl.span,
            related: [
              diagnosticFromCode({
                code: "IN0004",
                params: { kind: "previous-instance", instanceName: decl.name },
                span: previous.span,
                severity: "note",
              }),
            ],
          });
          return;
        }
        instanceSpans.set(decl.name, decl);

        if (chainHead && chainHead.className !== decl.className) {
          diagnostics.reportCode({
            code: "IN0005",
            params: {
              kind: "mixed-chain",
              chainHead: chainHead.name,
              expectedClass: chainHead.className,
              instanceName: decl.name,
              actualClass: decl.className,
            },
            span: decl.span,
          });
          return;
        }

        const classId = classByName.get(decl.className);
        if (classId === undefined) {
          diagnostics.reportCode({
            code: "IN0002",
            params: {
              kind: "unknown-class",
              instanceName: decl.name,
              className: decl.className,
              context: "head",
            },
            span: decl.span,
          });
          return;
        }

        const arity = pendingClasses[classId]?.decl.params.length ?? 0;
        if (decl.head.length !== arity) {
          diagnostics.reportCode({
            code: "IN0003",
            params: {
              kind: "head-arity",
              instanceName: decl.name,
              className: decl.className,
              expected: arity,
              actual: decl.head.length,
            },
            span: decl.span,
          });
          return;
        }

        const scope: InstanceScope = { instanceName: decl.name, params: new Map() };
        const head = lowerTypes(decl.head, scope);
        if (!head) return;

        const constraints: Constraint[] = [];
        for (const constraintDecl of decl.constraints ?? []) {
          const lowered = lowerConstraint(constraintDecl, scope);
          if (!lowered) return;
          constraints.push(lowered);
        }

        members.push({
          id: instances.length + members.length,
          name: decl.name,
          classId,
          head,
          params: [...scope.params.values()],
          constraints,
          module: moduleId,
          chain: chainId,
          position: members.length,
          origin: decl.origin ?? "declared",
          span: decl.span,
        });
      });

      const first = members[0];
      if (!first) return;
      instances.push(...members);
      chains.push({
        id: chainId,
        classId: first.classId,
        module: moduleId,
        instances: members.map((member) => member.id),
        span: normalizeSpan(chainDecl.span, first.span),
      });
    });
  });

  return { modules, typeConstructors, classes, instances, chains };
};

const lowerClass = ({
  decl,
  module,
  id,
  pendingClasses,
  classByName,
  diagnostics,
}: {
  decl: ClassDecl;
  module: ModuleId;
  id: ClassId;
  pendingClasses: readonly PendingClass[];
  classByName: ReadonlyMap<string, ClassId>;
  diagnostics: DiagnosticEmitter;
}): ClassEntry => {
  if (decl.params.length === 0) {
    diagnostics.reportCode({
      code: "CL0006",
      params: { kind: "empty-class", className: decl.name },
      span: decl.span,
    });
  }

  const paramIndex = new Map<string, number>();
  decl.params.forEach((name, index) => {
    if (paramIndex.has(name)) {
      diagnostics.reportCode({
        code: "CL0006",
        params: { kind: "duplicate-parameter", className: decl.name, parameter: name },
        span: decl.span,
      });
      return;
    }
    paramIndex.set(name, index);
  });

  const superclasses: SuperclassEdge[] = [];
  decl.superclasses?.forEach((superDecl) => {
    const superclass = classByName.get(superDecl.className);
    if (superclass === undefined) {
      diagnostics.reportCode({
        code: "CL0005",
        params: {
          kind: "unknown-superclass",
          className: decl.name,
          superclass: superDecl.className,
        },
        span: normalizeSpan(superDecl.span, decl.span),
      });
      return;
    }

    const expected = pendingClasses[superclass]?.decl.params.length ?? 0;
    if (expected !== superDecl.args.length) {
      diagnostics.reportCode({
        code: "CL0005",
        params: {
          kind: "superclass-arity",
          className: decl.name,
          superclass: superDecl.className,
          expected,
          actual: superDecl.args.length,
        },
        span: normalizeSpan(superDecl.span, decl.span),
      });
      return;
    }

    const args: number[] = [];
    for (const name of superDecl.args) {
      const index = paramIndex.get(name);
      if (index === undefined) {
        diagnostics.reportCode({
          code: "CL0005",
          params: {
            kind: "unknown-parameter",
            className: decl.name,
            superclass: superDecl.className,
            parameter: name,
          },
          span: normalizeSpan(superDecl.span, decl.span),
        });
        return;
      }
      args.push(index);
    }
    superclasses.push({ superclass, args, span: superDecl.span });
  });

  const fundeps: FunctionalDependency[] = [];
  decl.fundeps?.forEach((fundepDecl) => {
    const resolveNames = (names: readonly string[]): number[] | undefined => {
      const indices: number[] = [];
      for (const name of names) {
        const index = paramIndex.get(name);
        if (index === undefined) {
          diagnostics.reportCode({
            code: "CL0004",
            params: {
              kind: "fundep-invalid",
              className: decl.name,
              dependency: `${fundepDecl.determiners.join(" ")} -> ${fundepDecl.determined.join(" ")}`,
              reason: `unknown parameter ${name}`,
            },
            span: normalizeSpan(fundepDecl.span, decl.span),
          });
          return undefined;
        }
        if (!indices.includes(index)) indices.push(index);
      }
      return indices;
    };

    const determiners = resolveNames(fundepDecl.determiners);
    const determined = determiners && resolveNames(fundepDecl.determined);
    if (determiners && determined) {
      fundeps.push({ determiners, determined, span: fundepDecl.span });
    }
  });

  return {
    id,
    name: decl.name,
    params: [...decl.params],
    superclasses,
    fundeps,
    module,
    span: decl.span,
  };
};
