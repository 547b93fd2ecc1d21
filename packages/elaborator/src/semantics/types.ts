import {
  T_Address,
  T_Array,
  T_Bool,
  T_Bytes,
  T_Forall,
  T_Fun,
  T_Null,
  T_Object,
  T_Tuple,
  T_UInt256,
  T_Var,
  type DLArg,
  type PrimOp,
  type SLType,
} from "../ir/types.js";
import { displaySrcLoc, type SrcLoc } from "./srcloc.js";
import { emitDiagnostic } from "./errors.js";
import type { Value } from "./values.js";

export type Typed = readonly [SLType, DLArg];

export const displayType = (type: SLType): string => {
  switch (type.kind) {
    case "null":
    case "bool":
    case "uint256":
    case "bytes":
    case "address":
      return type.kind;
    case "fun":
      return "function";
    case "array":
      return "array";
    case "tuple":
      return "tuple";
    case "object":
      return "object";
    case "forall":
      return `Forall(${type.variable}: ${displayType(type.body)})`;
    case "var":
      return type.name;
  }
};

/**
 * The runtime type of a value and the IR argument standing for it, or
 * `undefined` for values that only exist during elaboration (closures,
 * forms, types and most primitives).
 */
export const typeOfMaybe = (value: Value): Typed | undefined => {
  switch (value.kind) {
    case "null":
      return [T_Null, { kind: "con", constant: { kind: "null" } }];
    case "bool":
      return [T_Bool, { kind: "con", constant: { kind: "bool", value: value.value } }];
    case "int":
      return [T_UInt256, { kind: "con", constant: { kind: "int", value: value.value } }];
    case "bytes":
      return [T_Bytes, { kind: "con", constant: { kind: "bytes", value: value.value } }];
    case "dlvar":
      return [value.dv.type, { kind: "var", dv: value.dv }];
    case "tuple": {
      const parts = value.elements.map(typeOfMaybe);
      const types: SLType[] = [];
      const args: DLArg[] = [];
      for (const part of parts) {
        if (!part) return undefined;
        types.push(part[0]);
        args.push(part[1]);
      }
      return [T_Tuple(types), { kind: "tuple", elements: args }];
    }
    case "object": {
      const types: Record<string, SLType> = {};
      const args: Record<string, DLArg> = {};
      for (const [name, field] of value.fields.entries()) {
        const part = typeOfMaybe(field.value);
        if (!part) return undefined;
        types[name] = part[0];
        args[name] = part[1];
      }
      return [T_Object(types), { kind: "object", fields: args }];
    }
    case "participant":
      return value.address
        ? [T_Address, { kind: "var", dv: value.address }]
        : undefined;
    case "prim":
      if (value.prim.kind !== "interact") return undefined;
      return [
        value.prim.type,
        {
          kind: "interact",
          who: value.prim.who,
          method: value.prim.method,
          type: value.prim.type,
        },
      ];
    case "closure":
    case "form":
    case "type":
      return undefined;
  }
};

export const typeOf = (at: SrcLoc, value: Value): Typed =>
  typeOfMaybe(value) ??
  emitDiagnostic({ at, code: "TY0023", params: { valueKind: value.kind } });

/**
 * Views a concrete tuple whose elements share one type as a fixed-size
 * array. Anything else is returned as `typeOf` sees it.
 */
export const typeOfAsArray = (at: SrcLoc, value: Value): Typed => {
  const typed = typeOf(at, value);
  const [type, arg] = typed;
  if (type.kind !== "tuple" || arg.kind !== "tuple") return typed;
  const [first, ...rest] = type.elements;
  if (!first || !rest.every((element) => typeEqual(element, first))) {
    return typed;
  }
  return [
    T_Array(first, type.elements.length),
    { kind: "array", element: first, elements: arg.elements },
  ];
};

export const typeEqual = (left: SLType, right: SLType): boolean => {
  switch (left.kind) {
    case "null":
    case "bool":
    case "uint256":
    case "bytes":
    case "address":
      return right.kind === left.kind;
    case "fun":
      return (
        right.kind === "fun" &&
        typesEqual(left.domain, right.domain) &&
        typeEqual(left.range, right.range)
      );
    case "array":
      return (
        right.kind === "array" &&
        left.size === right.size &&
        typeEqual(left.element, right.element)
      );
    case "tuple":
      return right.kind === "tuple" && typesEqual(left.elements, right.elements);
    case "object": {
      if (right.kind !== "object") return false;
      const names = Object.keys(left.fields);
      if (names.length !== Object.keys(right.fields).length) return false;
      return names.every((name) => {
        const other = right.fields[name];
        const mine = left.fields[name];
        return other !== undefined && mine !== undefined && typeEqual(mine, other);
      });
    }
    case "forall":
      return (
        right.kind === "forall" &&
        left.variable === right.variable &&
        typeEqual(left.body, right.body)
      );
    case "var":
      return right.kind === "var" && left.name === right.name;
  }
};

const typesEqual = (left: readonly SLType[], right: readonly SLType[]): boolean =>
  left.length === right.length &&
  left.every((type, index) => {
    const other = right[index];
    return other !== undefined && typeEqual(type, other);
  });

/** Checks `value` against `expected` and lowers it to an IR argument. */
export const checkType = (at: SrcLoc, expected: SLType, value: Value): DLArg => {
  if (expected.kind === "array" && value.kind === "tuple") {
    if (value.elements.length !== expected.size) {
      return mismatch(at, expected, typeOf(at, value)[0]);
    }
    return {
      kind: "array",
      element: expected.element,
      elements: value.elements.map((element) =>
        checkType(at, expected.element, element)
      ),
    };
  }
  const [actual, arg] = typeOf(at, value);
  if (!typeEqual(expected, actual)) {
    return mismatch(at, expected, actual);
  }
  return arg;
};

const mismatch = (at: SrcLoc, expected: SLType, actual: SLType): never =>
  emitDiagnostic({
    at,
    code: "TY0022",
    params: { expected: displayType(expected), actual: displayType(actual) },
  });

export type Converted = {
  range: SLType;
  args: DLArg[];
};

/**
 * Applies a function type to argument values: checks the count, then each
 * argument in order, and returns the IR arguments with the result type.
 * Quantified variables are bound by their first occurrence in the domain.
 */
export const checkAndConvert = (
  at: SrcLoc,
  type: SLType,
  values: readonly Value[]
): Converted => {
  const quantified = new Set<string>();
  let body = type;
  while (body.kind === "forall") {
    quantified.add(body.variable);
    body = body.body;
  }
  if (body.kind !== "fun") {
    return emitDiagnostic({
      at,
      code: "TY0027",
      params: { type: displayType(type) },
    });
  }
  const fun = body;
  if (fun.domain.length !== values.length) {
    return emitDiagnostic({
      at,
      code: "TY0024",
      params: { expected: fun.domain.length, got: values.length },
    });
  }

  const bound = new Map<string, SLType>();
  const args = values.map((value, index) => {
    const expected = fun.domain[index] ?? T_Null;
    if (expected.kind !== "var" || !quantified.has(expected.name)) {
      return checkType(at, expected, value);
    }
    const known = bound.get(expected.name);
    if (known) return checkType(at, known, value);
    const [actual, arg] = typeOf(at, value);
    bound.set(expected.name, actual);
    return arg;
  });

  return { range: substitute(fun.range, bound), args };
};

const substitute = (type: SLType, bound: ReadonlyMap<string, SLType>): SLType => {
  switch (type.kind) {
    case "var":
      return bound.get(type.name) ?? type;
    case "fun":
      return T_Fun(
        type.domain.map((part) => substitute(part, bound)),
        substitute(type.range, bound)
      );
    case "array":
      return T_Array(substitute(type.element, bound), type.size);
    case "tuple":
      return T_Tuple(type.elements.map((part) => substitute(part, bound)));
    case "object": {
      const fields: Record<string, SLType> = {};
      for (const [name, field] of Object.entries(type.fields)) {
        fields[name] = substitute(field, bound);
      }
      return T_Object(fields);
    }
    default:
      return type;
  }
};

export type TypeAt = readonly [SrcLoc, SLType];

/** Unifies the types of two branch results. UInt256 is the only numeric type, so this is equality. */
export const typeMeet = (at: SrcLoc, [leftAt, left]: TypeAt, [rightAt, right]: TypeAt): SLType => {
  if (!typeEqual(left, right)) {
    return emitDiagnostic({
      at,
      code: "TY0025",
      params: {
        left: displayType(left),
        leftAt: displaySrcLoc(leftAt),
        right: displayType(right),
        rightAt: displaySrcLoc(rightAt),
      },
    });
  }
  return left;
};

export const typeMeets = (at: SrcLoc, types: readonly TypeAt[]): SLType => {
  const [first, ...rest] = types;
  if (!first) {
    return emitDiagnostic({ at, code: "TY0026", params: {} });
  }
  let acc = first;
  for (const next of rest) {
    acc = [acc[0], typeMeet(at, acc, next)];
  }
  return acc[1];
};

const binaryUInt = T_Fun([T_UInt256, T_UInt256], T_UInt256);
const compareUInt = T_Fun([T_UInt256, T_UInt256], T_Bool);

export const primOpType = (op: PrimOp): SLType => {
  switch (op) {
    case "ADD":
    case "SUB":
    case "MUL":
    case "DIV":
    case "MOD":
    case "LSH":
    case "RSH":
    case "BAND":
    case "BIOR":
    case "BXOR":
      return binaryUInt;
    case "PLT":
    case "PLE":
    case "PGE":
    case "PGT":
      return compareUInt;
    case "PEQ":
      return T_Forall("a", T_Fun([T_Var("a"), T_Var("a")], T_Bool));
    case "IF_THEN_ELSE":
      return T_Forall("a", T_Fun([T_Bool, T_Var("a"), T_Var("a")], T_Var("a")));
    case "BYTES_EQ":
      return T_Fun([T_Bytes, T_Bytes], T_Bool);
    case "BALANCE":
    case "TXN_VALUE":
      return T_Fun([], T_UInt256);
  }
};
