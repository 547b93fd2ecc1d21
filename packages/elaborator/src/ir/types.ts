import type { SrcLoc } from "../semantics/srcloc.js";
import type { Value } from "../semantics/values.js";

export type SLType =
  | { kind: "null" }
  | { kind: "bool" }
  | { kind: "uint256" }
  | { kind: "bytes" }
  | { kind: "address" }
  | { kind: "fun"; domain: readonly SLType[]; range: SLType }
  | { kind: "array"; element: SLType; size: number }
  | { kind: "tuple"; elements: readonly SLType[] }
  | { kind: "object"; fields: Readonly<Record<string, SLType>> }
  | { kind: "forall"; variable: string; body: SLType }
  | { kind: "var"; name: string };

export const T_Null: SLType = { kind: "null" };
export const T_Bool: SLType = { kind: "bool" };
export const T_UInt256: SLType = { kind: "uint256" };
export const T_Bytes: SLType = { kind: "bytes" };
export const T_Address: SLType = { kind: "address" };

export const T_Fun = (domain: readonly SLType[], range: SLType): SLType => ({
  kind: "fun",
  domain,
  range,
});

export const T_Array = (element: SLType, size: number): SLType => ({
  kind: "array",
  element,
  size,
});

export const T_Tuple = (elements: readonly SLType[]): SLType => ({
  kind: "tuple",
  elements,
});

export const T_Object = (fields: Readonly<Record<string, SLType>>): SLType => ({
  kind: "object",
  fields,
});

export const T_Forall = (variable: string, body: SLType): SLType => ({
  kind: "forall",
  variable,
  body,
});

export const T_Var = (name: string): SLType => ({ kind: "var", name });

export type PrimOp =
  | "ADD"
  | "SUB"
  | "MUL"
  | "DIV"
  | "MOD"
  | "PLT"
  | "PLE"
  | "PEQ"
  | "PGE"
  | "PGT"
  | "IF_THEN_ELSE"
  | "BYTES_EQ"
  | "BALANCE"
  | "TXN_VALUE"
  | "LSH"
  | "RSH"
  | "BAND"
  | "BIOR"
  | "BXOR";

export type ClaimType = "assert" | "assume" | "require" | "possible";

/** An IR variable. `id` is unique within one elaboration segment. */
export interface DLVar {
  readonly at: SrcLoc;
  readonly name: string;
  readonly type: SLType;
  readonly id: number;
}

export type DLConstant =
  | { kind: "null" }
  | { kind: "bool"; value: boolean }
  | { kind: "int"; value: bigint }
  | { kind: "bytes"; value: string };

export type DLArg =
  | { kind: "var"; dv: DLVar }
  | { kind: "con"; constant: DLConstant }
  | { kind: "array"; element: SLType; elements: readonly DLArg[] }
  | { kind: "tuple"; elements: readonly DLArg[] }
  | { kind: "object"; fields: Readonly<Record<string, DLArg>> }
  | { kind: "interact"; who: string; method: string; type: SLType };

export type CallFrame = {
  kind: "closure-app";
  at: SrcLoc;
  closureAt: SrcLoc;
  name?: string;
};

export type CallStack = readonly CallFrame[];

export type DLExpr =
  | { kind: "arg"; at: SrcLoc; arg: DLArg }
  | { kind: "prim-op"; at: SrcLoc; op: PrimOp; args: readonly DLArg[] }
  | {
      kind: "array-ref";
      at: SrcLoc;
      stack: CallStack;
      array: DLArg;
      size: number;
      index: DLArg;
    }
  | { kind: "tuple-ref"; at: SrcLoc; tuple: DLArg; index: number }
  | { kind: "object-ref"; at: SrcLoc; object: DLArg; field: string }
  | {
      kind: "interact";
      at: SrcLoc;
      who: string;
      method: string;
      type: SLType;
      args: readonly DLArg[];
    }
  | { kind: "digest"; at: SrcLoc; args: readonly DLArg[] };

/** Loop-variable updates: each entry writes a value into a loop slot. */
export type DLAssignment = readonly (readonly [DLVar, DLArg])[];

export interface DLBlock {
  readonly at: SrcLoc;
  readonly stack: CallStack;
  readonly stmts: DLStmts;
  readonly result: DLArg;
}

/** Whether a consensus round is a participant's first publication. */
export type FromSpec =
  | { kind: "join"; address: DLVar }
  | { kind: "again"; address: DLVar };

export interface TimeoutSpec {
  readonly delay: DLArg;
  readonly stmts: DLStmts;
}

export type DLStmt =
  | { kind: "let"; at: SrcLoc; dv: DLVar; expr: DLExpr }
  | { kind: "claim"; at: SrcLoc; stack: CallStack; claim: ClaimType; arg: DLArg }
  | { kind: "transfer"; at: SrcLoc; stack: CallStack; to: DLArg; amount: DLArg }
  | { kind: "stop"; at: SrcLoc; stack: CallStack }
  | { kind: "only"; at: SrcLoc; who: string; stmts: DLStmts }
  | {
      kind: "to-consensus";
      at: SrcLoc;
      who: string;
      from: FromSpec;
      msgArgs: readonly DLArg[];
      msgVars: readonly DLVar[];
      amount: DLArg;
      timeout?: TimeoutSpec;
      stmts: DLStmts;
    }
  | { kind: "from-consensus"; at: SrcLoc; stmts: DLStmts }
  | { kind: "if"; at: SrcLoc; cond: DLArg; then: DLStmts; else: DLStmts }
  /**
   * `value` is the elaborator value being returned; later stages lower it.
   * It is compared by identity when deciding whether a prompt is redundant.
   */
  | { kind: "return"; at: SrcLoc; slot: number; value: Value }
  | {
      kind: "prompt";
      at: SrcLoc;
      /** A bare slot id, or the variable that receives the block's result. */
      target: { kind: "slot"; slot: number } | { kind: "var"; dv: DLVar };
      stmts: DLStmts;
    }
  | {
      kind: "while";
      at: SrcLoc;
      assignment: DLAssignment;
      invariant: DLBlock;
      cond: DLBlock;
      body: DLStmts;
    }
  | { kind: "continue"; at: SrcLoc; assignment: DLAssignment };

export type DLStmts = readonly DLStmt[];

/** Participant name to its interaction interface (field name to type). */
export type InteractEnv = Readonly<Record<string, SLType>>;

export interface Program {
  readonly at: SrcLoc;
  readonly participants: Readonly<Record<string, InteractEnv>>;
  readonly stmts: DLStmts;
}
