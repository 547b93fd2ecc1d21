import type { Expression, Statement } from "../ast/index.js";
import type {
  ClaimType,
  DLArg,
  DLVar,
  PrimOp,
  SLType,
} from "../ir/types.js";
import type { Env } from "./env.js";
import type { SrcLoc } from "./srcloc.js";
import { typeEqual } from "./types.js";

export type SecurityLevel = "public" | "secret";

export type ToConsensusMode = "publish" | "pay" | "timeout";

export type Primitive =
  | { kind: "op"; op: PrimOp }
  | { kind: "make-enum" }
  | { kind: "declassify" }
  | { kind: "commit" }
  | { kind: "committed" }
  | { kind: "digest" }
  | { kind: "claim"; claim: ClaimType }
  | { kind: "transfer" }
  | { kind: "transfer-to"; amount: DLArg }
  | { kind: "exit" }
  | { kind: "exited" }
  | { kind: "array-type" }
  | { kind: "tuple-type" }
  | { kind: "object-type" }
  | { kind: "fun-type" }
  | {
      kind: "app-delay";
      at: SrcLoc;
      options: Env;
      participants: readonly SVal[];
      body: readonly Statement[];
      env: Env;
    }
  | { kind: "interact"; at: SrcLoc; who: string; method: string; type: SLType };

export interface TimeoutClause {
  readonly at: SrcLoc;
  readonly delay: Expression;
  readonly body: readonly Statement[];
}

/** Application-time constructs; applying one dispatches to the form evaluator. */
export type Form =
  | { kind: "app" }
  | { kind: "part-only"; participant: Value }
  | {
      kind: "part-only-answer";
      at: SrcLoc;
      who: string;
      env: Env;
      value: Value;
    }
  | {
      kind: "to-consensus";
      at: SrcLoc;
      who: string;
      /** Name the participant was referenced through, if any. */
      displayVar?: string;
      /** The field about to be filled in by the next application. */
      pending?: ToConsensusMode;
      publish?: readonly string[];
      pay?: Expression;
      timeout?: TimeoutClause;
    };

export type Value =
  | { kind: "null"; at: SrcLoc; label: string }
  | { kind: "bool"; at: SrcLoc; value: boolean }
  | { kind: "int"; at: SrcLoc; value: bigint }
  | { kind: "bytes"; at: SrcLoc; value: string }
  | {
      kind: "closure";
      at: SrcLoc;
      name?: string;
      params: readonly string[];
      body: readonly Statement[];
      env: Env;
    }
  | { kind: "prim"; prim: Primitive }
  | { kind: "form"; form: Form }
  | { kind: "type"; type: SLType }
  | { kind: "tuple"; at: SrcLoc; elements: readonly Value[] }
  | { kind: "object"; at: SrcLoc; fields: Env }
  | {
      kind: "participant";
      at: SrcLoc;
      who: string;
      interact: Value;
      displayVar?: string;
      address?: DLVar;
    }
  | { kind: "dlvar"; dv: DLVar };

/** A value tagged with its security level. */
export interface SVal {
  readonly level: SecurityLevel;
  readonly value: Value;
}

export const publicVal = (value: Value): SVal => ({ level: "public", value });

export const secretVal = (value: Value): SVal => ({ level: "secret", value });

export const nullValue = (at: SrcLoc, label: string): Value => ({
  kind: "null",
  at,
  label,
});

export const primValue = (prim: Primitive): Value => ({ kind: "prim", prim });

export const formValue = (form: Form): Value => ({ kind: "form", form });

export const dlvarValue = (dv: DLVar): Value => ({ kind: "dlvar", dv });

export const typeValue = (type: SLType): Value => ({ kind: "type", type });

/**
 * Structural equality on values. Constants, types, variables, tuples and
 * objects compare by content; closures, primitives, forms and participants
 * only equal themselves.
 */
export const sameValue = (left: Value, right: Value): boolean => {
  if (left === right) return true;
  switch (left.kind) {
    case "null":
      return right.kind === "null";
    case "bool":
      return right.kind === "bool" && right.value === left.value;
    case "int":
      return right.kind === "int" && right.value === left.value;
    case "bytes":
      return right.kind === "bytes" && right.value === left.value;
    case "type":
      return right.kind === "type" && typeEqual(left.type, right.type);
    case "dlvar":
      return right.kind === "dlvar" && right.dv.id === left.dv.id;
    case "tuple": {
      if (right.kind !== "tuple") return false;
      const others = right.elements;
      return (
        others.length === left.elements.length &&
        left.elements.every((element, index) => {
          const other = others[index];
          return other !== undefined && sameValue(element, other);
        })
      );
    }
    case "object": {
      if (right.kind !== "object") return false;
      const fields = left.fields;
      const others = right.fields;
      const names = fields.names();
      if (names.length !== others.size) return false;
      return names.every((name) => {
        const mine = fields.get(name);
        const other = others.get(name);
        return (
          mine !== undefined &&
          other !== undefined &&
          mine.level === other.level &&
          sameValue(mine.value, other.value)
        );
      });
    }
    case "closure":
    case "prim":
    case "form":
    case "participant":
      return false;
  }
};
