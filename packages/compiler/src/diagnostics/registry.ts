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

const declareReturnTypeHint: DiagnosticHint = {
  message: "Declare the return type explicitly.",
};

type DiagnosticParamsMap = {
  QF0001: { kind: "query-cycle"; query: string; key: string };
  SG0001: {
    kind: "parenless-redeclares-field";
    name: string;
    typeName: string;
  };
  SG0002: { kind: "where-clause-not-param-bool"; functionName: string };
  FD0001: { kind: "forwarding-cycle"; typeName: string };
  FD0002:
    | {
        kind: "multiple-class-parents";
        typeName: string;
        first: string;
        second: string;
      }
    | { kind: "non-class-parent"; typeName: string; parent: string };
  CR0001: {
    kind: "no-matching-function";
    name: string;
    actuals: readonly string[];
    rejected: number;
  };
  CR0002: {
    kind: "ambiguous-call";
    name: string;
    candidates: readonly string[];
  };
  CR0003: { kind: "not-callable"; name: string };
  CR0004: { kind: "invalid-builtin-type"; typeName: string; reason: string };
  CR0005: { kind: "mixed-tuple" };
  CR0006: {
    kind: "return-type-mismatch";
    functionName: string;
    first: string;
    second: string;
  };
  CR0007: { kind: "recursive-return-inference"; functionName: string };
  CR0008: {
    kind: "too-many-candidates";
    name: string;
    count: number;
    limit: number;
  };
  CR0009: { kind: "undefined-identifier"; name: string };
  CR0010: { kind: "invalid-param-operation"; op: string; reason: string };
  CR0011:
    | { kind: "unknown-field-in-init"; field: string; typeName: string }
    | { kind: "uninitialized-generic-field"; field: string; typeName: string };
  CR0012: { kind: "unknown-member"; name: string; receiver: string };
  RS9999: { kind: "internal-error"; message: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  QF0001: {
    code: "QF0001",
    message: (params) =>
      `query ${params.query}(${params.key}) depends on itself`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["QF0001"]>,
  SG0001: {
    code: "SG0001",
    message: (params) =>
      `parenless proc ${params.name} redeclares the field ${params.name} of ${params.typeName}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0001"]>,
  SG0002: {
    code: "SG0002",
    message: (params) =>
      `where clause of ${params.functionName} does not result in a param bool value`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0002"]>,
  FD0001: {
    code: "FD0001",
    message: (params) => `forwarding cycle detected in ${params.typeName}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["FD0001"]>,
  FD0002: {
    code: "FD0002",
    message: (params) => {
      switch (params.kind) {
        case "multiple-class-parents":
          return `class ${params.typeName} cannot inherit from both ${params.first} and ${params.second}`;
        case "non-class-parent":
          return `${params.typeName} cannot inherit from ${params.parent}; only classes may be inherited`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["FD0002"]>,
  CR0001: {
    code: "CR0001",
    message: (params) => {
      const rejected =
        params.rejected > 0
          ? ` (${params.rejected} candidate(s) rejected)`
          : "";
      return `unable to resolve call to ${params.name}(${params.actuals.join(", ")})${rejected}`;
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0001"]>,
  CR0002: {
    code: "CR0002",
    message: (params) =>
      `ambiguous call to ${params.name}; candidates: ${params.candidates.join(", ")}`,
    severity: "error",
    hints: [
      {
        message:
          "Give one overload a more specific formal type or a where clause.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0002"]>,
  CR0003: {
    code: "CR0003",
    message: (params) => `${params.name} is not callable`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0003"]>,
  CR0004: {
    code: "CR0004",
    message: (params) => `invalid type ${params.typeName}: ${params.reason}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0004"]>,
  CR0005: {
    code: "CR0005",
    message: () => "tuple expressions cannot mix values and types",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0005"]>,
  CR0006: {
    code: "CR0006",
    message: (params) =>
      `returns of ${params.functionName} disagree: ${params.first} vs ${params.second}`,
    severity: "error",
    hints: [declareReturnTypeHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0006"]>,
  CR0007: {
    code: "CR0007",
    message: (params) =>
      `unable to infer the return type of recursive function ${params.functionName}`,
    severity: "error",
    hints: [declareReturnTypeHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0007"]>,
  CR0008: {
    code: "CR0008",
    message: (params) =>
      `call to ${params.name} has ${params.count} applicable candidates (limit ${params.limit})`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0008"]>,
  CR0009: {
    code: "CR0009",
    message: (params) => `undefined identifier ${params.name}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0009"]>,
  CR0010: {
    code: "CR0010",
    message: (params) => `invalid param ${params.op}: ${params.reason}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0010"]>,
  CR0011: {
    code: "CR0011",
    message: (params) => {
      switch (params.kind) {
        case "unknown-field-in-init":
          return `${params.typeName} has no field named ${params.field}`;
        case "uninitialized-generic-field":
          return `generic field ${params.field} of ${params.typeName} is never initialized`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0011"]>,
  CR0012: {
    code: "CR0012",
    message: (params) => `${params.receiver} has no member ${params.name}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0012"]>,
  RS9999: {
    code: "RS9999",
    message: (params) => params.message,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS9999"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry) as DiagnosticCode[];

const exhaustive = (_value: never): never => _value;
