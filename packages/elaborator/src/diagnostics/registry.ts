import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";
import { didYouMean } from "./suggest.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const commitHint: DiagnosticHint = {
  message: "Call commit() to close the consensus round before publishing again.",
};

const methodFieldHint: DiagnosticHint = {
  message: "Instead of {f() {...}}, write {f: () => {...}}.",
};

type DiagnosticParamsMap = {
  BD0001: { name: string; known: readonly string[] };
  BD0002: { name: string };
  SX0001: { construct: string };
  SX0002: { construct: string };
  SX0003: { operator: string };
  SX0004: Record<string, never>;
  SX0005: Record<string, never>;
  SX0006: { construct: string };
  SX0007: { construct: string };
  SX0008: Record<string, never>;
  SX0009: Record<string, never>;
  SX0010: Record<string, never>;
  SX0011: Record<string, never>;
  SX0012: { construct: string };
  SX0013: { construct: string };
  SX0014: { operator: string };
  SX0015: { operator: string };
  SX0016: { literal: string };
  SX0017: { remaining: number };
  SX0018: { count: number };
  SX0019: Record<string, never>;
  SX0020: { count: number };
  SX0021: { count: number };
  SX0022: { form: string; expected: number; got: number };
  SX0023: { construct: string };
  SX0024: Record<string, never>;
  TY0001: { expected: number; got: number; definedAt: string };
  TY0002: { valueType: string };
  TY0003: { idents: number; values: number };
  TY0004: { field: string; valid: readonly string[] };
  TY0005: { valueType: string };
  TY0006: { valueType: string };
  TY0007: { valueType: string };
  TY0008: { valueType: string };
  TY0009: { valueType: string };
  TY0010: { valueType: string };
  TY0011: { valueType: string };
  TY0012: { size: number; index: string };
  TY0013: { valueType: string };
  TY0014: { valueType: string };
  TY0015: { valueType: string };
  TY0016: { valueType: string };
  TY0017: { prim: string; argTypes: readonly string[] };
  TY0018: { type: string };
  TY0019: { level: string; valueType: string };
  TY0020: Record<string, never>;
  TY0021: { valueType: string };
  TY0022: { expected: string; actual: string };
  TY0023: { valueKind: string };
  TY0024: { expected: number; got: number };
  TY0025: { left: string; leftAt: string; right: string; rightAt: string };
  TY0026: Record<string, never>;
  TY0027: { type: string };
  TY0028: { name: string };
  TY0029: { mode: "publish" | "pay" | "timeout" };
  TY0030: { size: string; max: string };
  MO0001: { mode: string; operation: string };
  MO0002: { mode: string };
  MO0003: Record<string, never>;
  MO0004: Record<string, never>;
  MD0001: { expected: string };
  MD0002: Record<string, never>;
  IN0001: { moduleId: string };
  IN9999: { message: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  BD0001: {
    code: "BD0001",
    message: (params) =>
      `Invalid unbound identifier: ${params.name}${didYouMean(params.name, params.known)}`,
    phase: "binding",
  },
  BD0002: {
    code: "BD0002",
    message: (params) => `Invalid name shadowing. Cannot be rebound: ${params.name}`,
    phase: "binding",
  },
  SX0001: {
    code: "SX0001",
    message: (params) => `Invalid statement: ${params.construct}`,
    phase: "syntax",
  },
  SX0002: {
    code: "SX0002",
    message: (params) => `Invalid expression syntax: ${params.construct}`,
    phase: "syntax",
  },
  SX0003: {
    code: "SX0003",
    message: (params) =>
      `Invalid assignment with ${params.operator}. Assignments may only appear as \`[x, ...] = [e, ...]; continue;\` inside a while body`,
    phase: "syntax",
  },
  SX0004: {
    code: "SX0004",
    message: () => "Invalid `var` syntax. (Double check your syntax for while?)",
    phase: "syntax",
  },
  SX0005: {
    code: "SX0005",
    message: () => "Invalid `while` syntax",
    phase: "syntax",
  },
  SX0006: {
    code: "SX0006",
    message: (params) =>
      `Invalid binding. Expressions cannot appear on the LHS: ${params.construct}`,
    phase: "syntax",
  },
  SX0007: {
    code: "SX0007",
    message: (params) => `Invalid declaration: ${params.construct}`,
    phase: "syntax",
  },
  SX0008: {
    code: "SX0008",
    message: () =>
      "Invalid function expression. Anonymous functions must not be named.",
    phase: "syntax",
  },
  SX0009: {
    code: "SX0009",
    message: () =>
      "Invalid function declaration. Top-level functions must be named.",
    phase: "syntax",
  },
  SX0010: {
    code: "SX0010",
    message: () => "Invalid function field",
    phase: "syntax",
    hints: [methodFieldHint],
  },
  SX0011: {
    code: "SX0011",
    message: () => "Invalid field name. Fields must be bytes, but got: uint256",
    phase: "syntax",
  },
  SX0012: {
    code: "SX0012",
    message: (params) => `Invalid import syntax: ${params.construct}`,
    phase: "syntax",
  },
  SX0013: {
    code: "SX0013",
    message: (params) => `Invalid export syntax: ${params.construct}`,
    phase: "syntax",
  },
  SX0014: {
    code: "SX0014",
    message: (params) => `Invalid binary operator: ${params.operator}`,
    phase: "syntax",
  },
  SX0015: {
    code: "SX0015",
    message: (params) => `Invalid unary operator: ${params.operator}`,
    phase: "syntax",
  },
  SX0016: {
    code: "SX0016",
    message: (params) => `Invalid literal: ${params.literal}`,
    phase: "syntax",
  },
  SX0017: {
    code: "SX0017",
    message: (params) =>
      `Invalid statement block. Expected empty tail, but found ${params.remaining} more statements`,
    phase: "syntax",
  },
  SX0018: {
    code: "SX0018",
    message: (params) =>
      `Invalid while loop invariant. Expected 1 expr, but got ${params.count}`,
    phase: "syntax",
  },
  SX0019: {
    code: "SX0019",
    message: () =>
      "Invalid while statement block. Expected continue, exit, or return, but found empty tail.",
    phase: "syntax",
  },
  SX0020: {
    code: "SX0020",
    message: (params) =>
      `Invalid Participant.timeout args. Expected a delay and a thunk, got ${params.count} args`,
    phase: "syntax",
  },
  SX0021: {
    code: "SX0021",
    message: (params) =>
      `Invalid app arguments. Expected options, participants and a program arrow, got ${params.count} args`,
    phase: "syntax",
  },
  SX0022: {
    code: "SX0022",
    message: (params) =>
      `Invalid args for ${params.form}. Expected ${params.expected} but got ${params.got}`,
    phase: "syntax",
  },
  SX0023: {
    code: "SX0023",
    message: (params) => `Invalid syntax. Expected identifier, got: ${params.construct}`,
    phase: "syntax",
  },
  SX0024: {
    code: "SX0024",
    message: () => "Invalid `return` syntax",
    phase: "syntax",
  },
  TY0001: {
    code: "TY0001",
    message: (params) =>
      `Invalid function application. Expected ${params.expected} args, got ${params.got} for function defined at ${params.definedAt}`,
    phase: "typing",
  },
  TY0002: {
    code: "TY0002",
    message: (params) =>
      `Invalid binding. Expected array or tuple, got: ${params.valueType}`,
    phase: "typing",
  },
  TY0003: {
    code: "TY0003",
    message: (params) =>
      `Invalid array binding. nIdents:${params.idents} does not match nVals:${params.values}`,
    phase: "typing",
  },
  TY0004: {
    code: "TY0004",
    message: (params) =>
      `Invalid field: ${params.field}${didYouMean(params.field, params.valid)}`,
    phase: "typing",
  },
  TY0005: {
    code: "TY0005",
    message: (params) =>
      `Invalid if statement. Expected if condition to be bool, got: ${params.valueType}`,
    phase: "typing",
  },
  TY0006: {
    code: "TY0006",
    message: (params) =>
      `Invalid function application. Cannot apply: ${params.valueType}`,
    phase: "typing",
  },
  TY0007: {
    code: "TY0007",
    message: (params) => `Invalid function. Cannot apply: ${params.valueType}`,
    phase: "typing",
  },
  TY0008: {
    code: "TY0008",
    message: (params) =>
      `Invalid field access. Expected object, got: ${params.valueType}`,
    phase: "typing",
  },
  TY0009: {
    code: "TY0009",
    message: (params) =>
      `Invalid element reference. Expected array or tuple, got: ${params.valueType}`,
    phase: "typing",
  },
  TY0010: {
    code: "TY0010",
    message: (params) =>
      `Invalid array index. Expected uint256, got: ${params.valueType}`,
    phase: "typing",
  },
  TY0011: {
    code: "TY0011",
    message: (params) =>
      `Invalid indirect element reference. Expected array, got: ${params.valueType}`,
    phase: "typing",
  },
  TY0012: {
    code: "TY0012",
    message: (params) =>
      `Invalid array index. Expected (0 <= ix < ${params.size}), got ${params.index}`,
    phase: "typing",
  },
  TY0013: {
    code: "TY0013",
    message: (params) =>
      `Invalid declassify. Expected to declassify something private, but this ${params.valueType} is public.`,
    phase: "typing",
  },
  TY0014: {
    code: "TY0014",
    message: (params) => `Invalid access of secret value (${params.valueType})`,
    phase: "typing",
  },
  TY0015: {
    code: "TY0015",
    message: (params) =>
      `Invalid computed field name. Fields must be bytes, but got: ${params.valueType}`,
    phase: "typing",
  },
  TY0016: {
    code: "TY0016",
    message: (params) =>
      `Invalid object spread. Expected object, got: ${params.valueType}`,
    phase: "typing",
  },
  TY0017: {
    code: "TY0017",
    message: (params) =>
      `Invalid args for ${params.prim}. got: [${params.argTypes.join(", ")}]`,
    phase: "typing",
  },
  TY0018: {
    code: "TY0018",
    message: (params) =>
      `Invalid block result type. Expected Null, got ${params.type}`,
    phase: "typing",
  },
  TY0019: {
    code: "TY0019",
    message: (params) =>
      `Invalid interact specification. Expected public type, got: ${params.level} ${params.valueType}`,
    phase: "typing",
  },
  TY0020: {
    code: "TY0020",
    message: () =>
      "Invalid participant spec. Expected [name, interface object]",
    phase: "typing",
  },
  TY0021: {
    code: "TY0021",
    message: (params) =>
      `Invalid compilation target. Expected App, but got ${params.valueType}`,
    phase: "typing",
  },
  TY0022: {
    code: "TY0022",
    message: (params) =>
      `Type mismatch. Expected ${params.expected}, but got ${params.actual}`,
    phase: "typing",
  },
  TY0023: {
    code: "TY0023",
    message: (params) => `Value cannot exist at runtime: ${params.valueKind}`,
    phase: "typing",
  },
  TY0024: {
    code: "TY0024",
    message: (params) =>
      `Invalid argument count. Expected ${params.expected}, got ${params.got}`,
    phase: "typing",
  },
  TY0025: {
    code: "TY0025",
    message: (params) =>
      `Types do not unify: ${params.left} at ${params.leftAt} and ${params.right} at ${params.rightAt}`,
    phase: "typing",
  },
  TY0026: {
    code: "TY0026",
    message: () => "No types to unify",
    phase: "typing",
  },
  TY0027: {
    code: "TY0027",
    message: (params) => `Invalid application of non-function type ${params.type}`,
    phase: "typing",
  },
  TY0028: {
    code: "TY0028",
    message: (params) =>
      `Invalid loop variable update. Expected loop variable, got: ${params.name}`,
    phase: "typing",
  },
  TY0029: {
    code: "TY0029",
    message: (params) =>
      params.mode === "publish"
        ? "Invalid double publish."
        : "Invalid double toConsensus.",
    phase: "typing",
    hints: [commitHint],
  },
  TY0030: {
    code: "TY0030",
    message: (params) =>
      `Invalid array size. Expected 0 to ${params.max}, got: ${params.size}`,
    phase: "typing",
  },
  MO0001: {
    code: "MO0001",
    message: (params) =>
      `Invalid operation. \`${params.operation}\` cannot be used in context: ${params.mode}`,
    phase: "mode",
  },
  MO0002: {
    code: "MO0002",
    message: (params) => `Illegal lift in context: ${params.mode}`,
    phase: "mode",
  },
  MO0003: {
    code: "MO0003",
    message: () => "Nowhere to return to",
    phase: "mode",
  },
  MO0004: {
    code: "MO0004",
    message: () => "Invalid continue. Expected to be inside of a while.",
    phase: "mode",
  },
  MD0001: {
    code: "MD0001",
    message: (params) =>
      `Invalid source file. Expected header '${params.expected}'; at top of file.`,
    phase: "module-graph",
  },
  MD0002: {
    code: "MD0002",
    message: () =>
      "Invalid return statement. Cannot return at top level of module.",
    phase: "module-graph",
  },
  IN0001: {
    code: "IN0001",
    message: (params) =>
      `dependency ${params.moduleId} was not elaborated before its importer`,
    phase: "internal",
  },
  IN9999: {
    code: "IN9999",
    message: (params) => `internal compiler error: ${params.message}`,
    phase: "internal",
  },
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

export const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  Object.prototype.hasOwnProperty.call(diagnosticsRegistry, code);
