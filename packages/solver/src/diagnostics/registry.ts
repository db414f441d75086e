import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const orphanHint: DiagnosticHint = {
  message:
    "Move the instance into the module that defines the class or one of the types in its head, or wrap the type in a newtype you own.",
};

type DiagnosticParamsMap = {
  CL0001: { kind: "superclass-cycle"; className: string; cycle: readonly string[] };
  CL0002:
    | { kind: "fundep-self-determination"; className: string; dependency: string }
    | { kind: "fundep-nonconvergent"; className: string; iterations: number };
  CL0003: {
    kind: "fundep-conflict";
    className: string;
    parameter: string;
    first: string;
    second: string;
  };
  CL0004: {
    kind: "fundep-invalid";
    className: string;
    dependency: string;
    reason: string;
  };
  CL0005:
    | { kind: "unknown-superclass"; className: string; superclass: string }
    | {
        kind: "superclass-arity";
        className: string;
        superclass: string;
        expected: number;
        actual: number;
      }
    | {
        kind: "unknown-parameter";
        className: string;
        superclass: string;
        parameter: string;
      };
  CL0006:
    | { kind: "duplicate-module"; name: string }
    | { kind: "duplicate-class"; name: string; moduleName: string }
    | { kind: "duplicate-type"; name: string; moduleName: string }
    | { kind: "duplicate-parameter"; className: string; parameter: string }
    | { kind: "empty-class"; className: string };
  IN0001: {
    kind: "orphan-instance";
    instanceName: string;
    className: string;
    moduleName: string;
  };
  IN0002: {
    kind: "unknown-class";
    instanceName: string;
    className: string;
    context: "head" | "constraint";
  };
  IN0003:
    | {
        kind: "head-arity";
        instanceName: string;
        className: string;
        expected: number;
        actual: number;
      }
    | {
        kind: "constraint-arity";
        instanceName: string;
        className: string;
        expected: number;
        actual: number;
      };
  IN0004:
    | { kind: "duplicate-instance"; instanceName: string }
    | { kind: "previous-instance"; instanceName: string };
  IN0005:
    | {
        kind: "mixed-chain";
        chainHead: string;
        expectedClass: string;
        instanceName: string;
        actualClass: string;
      }
    | { kind: "empty-chain"; moduleName: string };
  IN0006:
    | { kind: "unknown-type"; instanceName: string; typeName: string }
    | {
        kind: "type-arity";
        instanceName: string;
        typeName: string;
        expected: number;
        actual: number;
      };
  IN0007:
    | {
        kind: "overlapping-chains";
        className: string;
        instanceName: string;
        otherInstance: string;
      }
    | { kind: "previous-overlap"; instanceName: string };
  RS0001: { kind: "no-instance"; constraint: string };
  RS0002: { kind: "ambiguous-instance"; constraint: string; blockingInstance: string };
  RS0003: { kind: "depth-exceeded"; constraint: string; depth: number };
  RS0004: {
    kind: "overlapping-instances";
    constraint: string;
    instances: readonly string[];
  };
  RS0005: { kind: "unknown-class"; className: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const noInstanceMessage = (constraint: string): string =>
  `No type class instance was found for ${constraint}`;

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  CL0001: {
    code: "CL0001",
    message: (params) =>
      `class ${params.className} is its own superclass: ${params.cycle.join(" <= ")}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CL0001"]>,
  CL0002: {
    code: "CL0002",
    message: (params) => {
      switch (params.kind) {
        case "fundep-self-determination":
          return `functional dependency ${params.dependency} of class ${params.className} determines one of its own inputs`;
        case "fundep-nonconvergent":
          return `functional dependencies of class ${params.className} did not converge after ${params.iterations} iterations`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CL0002"]>,
  CL0003: {
    code: "CL0003",
    message: (params) =>
      `parameter ${params.parameter} of class ${params.className} is determined by both ${params.first} and ${params.second}`,
    severity: "error",
    hints: [
      {
        message:
          "Merge the dependencies so that each parameter is determined by a single set of parameters.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CL0003"]>,
  CL0004: {
    code: "CL0004",
    message: (params) =>
      `invalid functional dependency ${params.dependency} in class ${params.className}: ${params.reason}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CL0004"]>,
  CL0005: {
    code: "CL0005",
    message: (params) => {
      switch (params.kind) {
        case "unknown-superclass":
          return `class ${params.className} names unknown superclass ${params.superclass}`;
        case "superclass-arity":
          return `superclass ${params.superclass} of class ${params.className} expects ${params.expected} arguments, got ${params.actual}`;
        case "unknown-parameter":
          return `superclass ${params.superclass} of class ${params.className} refers to unknown parameter ${params.parameter}`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CL0005"]>,
  CL0006: {
    code: "CL0006",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-module":
          return `module ${params.name} is declared more than once`;
        case "duplicate-class":
          return `class ${params.name} in module ${params.moduleName} is already declared`;
        case "duplicate-type":
          return `type ${params.name} in module ${params.moduleName} is already declared`;
        case "duplicate-parameter":
          return `class ${params.className} declares parameter ${params.parameter} more than once`;
        case "empty-class":
          return `class ${params.className} must declare at least one parameter`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CL0006"]>,
  IN0001: {
    code: "IN0001",
    message: (params) =>
      `orphan instance ${params.instanceName}: ${params.moduleName} defines neither class ${params.className} nor any type in the instance head`,
    severity: "error",
    hints: [orphanHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0001"]>,
  IN0002: {
    code: "IN0002",
    message: (params) =>
      params.context === "head"
        ? `instance ${params.instanceName} is declared for unknown class ${params.className}`
        : `instance ${params.instanceName} requires unknown class ${params.className}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0002"]>,
  IN0003: {
    code: "IN0003",
    message: (params) =>
      params.kind === "head-arity"
        ? `instance ${params.instanceName} gives ${params.actual} arguments to class ${params.className}, which expects ${params.expected}`
        : `constraint ${params.className} on instance ${params.instanceName} has ${params.actual} arguments, expected ${params.expected}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0003"]>,
  IN0004: {
    code: "IN0004",
    message: (params) =>
      params.kind === "duplicate-instance"
        ? `instance name ${params.instanceName} is already in use`
        : `instance ${params.instanceName} first declared here`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0004"]>,
  IN0005: {
    code: "IN0005",
    message: (params) =>
      params.kind === "mixed-chain"
        ? `instance ${params.instanceName} is for class ${params.actualClass}, but its chain starting at ${params.chainHead} is for ${params.expectedClass}`
        : `module ${params.moduleName} declares an empty instance chain`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0005"]>,
  IN0006: {
    code: "IN0006",
    message: (params) =>
      params.kind === "unknown-type"
        ? `instance ${params.instanceName} refers to unknown type ${params.typeName}`
        : `type ${params.typeName} in instance ${params.instanceName} expects ${params.expected} arguments, got ${params.actual}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0006"]>,
  IN0007: {
    code: "IN0007",
    message: (params) =>
      params.kind === "overlapping-chains"
        ? `instance ${params.instanceName} of class ${params.className} overlaps ${params.otherInstance} from a different chain`
        : `overlapping instance ${params.instanceName} declared here`,
    severity: "warning",
    hints: [
      {
        message:
          "Declare overlapping instances in one chain with `else` to give them an order.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0007"]>,
  RS0001: {
    code: "RS0001",
    message: (params) => noInstanceMessage(params.constraint),
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0001"]>,
  RS0002: {
    code: "RS0002",
    message: (params) => noInstanceMessage(params.constraint),
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0002"]>,
  RS0003: {
    code: "RS0003",
    message: (params) =>
      `constraint resolution did not terminate for ${params.constraint} (depth limit ${params.depth})`,
    severity: "error",
    hints: [
      {
        message:
          "Check for instances whose prerequisites mention the same constraint, or raise TYCLASS_MAX_RESOLUTION_DEPTH.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0003"]>,
  RS0004: {
    code: "RS0004",
    message: (params) =>
      `overlapping instances for ${params.constraint}: ${params.instances.join(", ")}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0004"]>,
  RS0005: {
    code: "RS0005",
    message: (params) => `unknown class ${params.className}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0005"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  code in diagnosticsRegistry;

const exhaustive = (_value: never): never => _value;
