import type {
  ClassDecl,
  ConstraintDecl,
  FunctionalDependencyDecl,
  InstanceChainDecl,
  InstanceDecl,
  InstanceOrigin,
  ModuleDecl,
  ProgramDeclarations,
  SuperclassDecl,
  TypeConstructorDecl,
  TypeExpr,
} from "./types.js";

export const con = (name: string, ...args: TypeExpr[]): TypeExpr => ({
  kind: "constructor",
  name,
  args,
});

export const param = (name: string): TypeExpr => ({ kind: "param", name });

export const constraint = (
  className: string,
  ...args: TypeExpr[]
): ConstraintDecl => ({ className, args });

export const superclass = (
  className: string,
  ...args: string[]
): SuperclassDecl => ({ className, args });

/** Parses `"a b -> c"` into a functional dependency. */
export const fundep = (source: string): FunctionalDependencyDecl => {
  const parts = source.split("->");
  if (parts.length !== 2) {
    throw new Error(`functional dependency must have one '->': ${source}`);
  }
  const words = (text: string): string[] =>
    text.split(/\s+/).filter((word) => word.length > 0);
  const [left = "", right = ""] = parts;
  return { determiners: words(left), determined: words(right) };
};

export type InstanceOptions = {
  constraints?: readonly ConstraintDecl[];
  origin?: InstanceOrigin;
};

export type ClassOptions = {
  superclasses?: readonly SuperclassDecl[];
  fundeps?: readonly FunctionalDependencyDecl[];
};

export class ChainBuilder {
  readonly #instances: InstanceDecl[] = [];

  instance(
    name: string,
    className: string,
    head: readonly TypeExpr[],
    options: InstanceOptions = {}
  ): this {
    this.#instances.push({ name, className, head, ...options });
    return this;
  }

  /** `else instance ...`: appends to the chain after the previous entry. */
  else(
    name: string,
    className: string,
    head: readonly TypeExpr[],
    options: InstanceOptions = {}
  ): this {
    if (this.#instances.length === 0) {
      throw new Error(`'else' instance ${name} has no preceding instance`);
    }
    return this.instance(name, className, head, options);
  }

  build(): InstanceChainDecl {
    return { instances: [...this.#instances] };
  }
}

export class ModuleBuilder {
  readonly #name: string;
  readonly #types: TypeConstructorDecl[] = [];
  readonly #classes: ClassDecl[] = [];
  readonly #chains: InstanceChainDecl[] = [];

  constructor(name: string) {
    this.#name = name;
  }

  type(name: string, arity?: number): this {
    this.#types.push(arity === undefined ? { name } : { name, arity });
    return this;
  }

  class(name: string, params: readonly string[], options: ClassOptions = {}): this {
    this.#classes.push({ name, params, ...options });
    return this;
  }

  /** A bare instance: a chain of length one. */
  instance(
    name: string,
    className: string,
    head: readonly TypeExpr[],
    options: InstanceOptions = {}
  ): this {
    return this.chain((chain) => chain.instance(name, className, head, options));
  }

  chain(build: (chain: ChainBuilder) => void): this {
    const chain = new ChainBuilder();
    build(chain);
    this.#chains.push(chain.build());
    return this;
  }

  build(): ModuleDecl {
    return {
      name: this.#name,
      types: [...this.#types],
      classes: [...this.#classes],
      chains: [...this.#chains],
    };
  }
}

export class ProgramBuilder {
  readonly #modules: ModuleDecl[] = [];

  module(name: string, build: (module: ModuleBuilder) => void = () => {}): this {
    const module = new ModuleBuilder(name);
    build(module);
    this.#modules.push(module.build());
    return this;
  }

  build(): ProgramDeclarations {
    return { modules: [...this.#modules] };
  }
}
