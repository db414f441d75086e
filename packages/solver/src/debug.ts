// Resolution trace for debugging instance selection.
// Enable with TYCLASS_DEBUG_RESOLVE=1 or the solver's `debug` option.

export const DEBUG_RESOLVE_ENV = "TYCLASS_DEBUG_RESOLVE";

export type ResolveTracer = {
  push(label: string): void;
  pop(): void;
  log(message: string): void;
};

export const silentTracer: ResolveTracer = {
  push: () => {},
  pop: () => {},
  log: () => {},
};

export const createResolveTracer = (
  write: (line: string) => void = (line) => {
    // eslint-disable-next-line no-console
    console.log(line);
  }
): ResolveTracer => {
  let depth = 0;
  const indent = () => " ".repeat(depth * 2);
  return {
    push: (label) => {
      write(`${indent()}[resolve] ${label}`);
      depth += 1;
    },
    pop: () => {
      depth = Math.max(0, depth - 1);
    },
    log: (message) => {
      write(`${indent()}[resolve] ${message}`);
    },
  };
};
