import { build } from "../../ast/index.js";
import {
  T_Address,
  T_Array,
  T_Bool,
  T_Fun,
  T_Null,
  T_Object,
  T_Tuple,
  T_UInt256,
  type PrimOp,
  type SLType,
} from "../../ir/types.js";
import { illegalContext, liftExpr, localName, type Ctxt } from "../context.js";
import { displayValueType } from "../display.js";
import { Env } from "../env.js";
import { emitDiagnostic } from "../errors.js";
import { pure, res, type Res } from "../result.js";
import { declassify, ensurePublics, meetAll } from "../security.js";
import { srclocAt, type SrcLoc } from "../srcloc.js";
import { checkAndConvert, primOpType, typeOf } from "../types.js";
import {
  dlvarValue,
  nullValue,
  primValue,
  publicVal,
  secretVal,
  typeValue,
  type Primitive,
  type SVal,
  type Value,
} from "../values.js";

type Fold = (left: bigint, right: bigint) => Value;

const intFolds: Partial<Record<PrimOp, (left: bigint, right: bigint) => bigint>> = {
  ADD: (left, right) => left + right,
  SUB: (left, right) => left - right,
  MUL: (left, right) => left * right,
  LSH: (left, right) => left << right,
  RSH: (left, right) => left >> right,
  BAND: (left, right) => left & right,
  BIOR: (left, right) => left | right,
  BXOR: (left, right) => left ^ right,
};

const boolFolds: Partial<Record<PrimOp, (left: bigint, right: bigint) => boolean>> = {
  PLT: (left, right) => left < right,
  PLE: (left, right) => left <= right,
  PEQ: (left, right) => left === right,
  PGE: (left, right) => left >= right,
  PGT: (left, right) => left > right,
};

const constantFold = (at: SrcLoc, op: PrimOp): Fold | undefined => {
  const intFold = intFolds[op];
  if (intFold) {
    return (left, right) => ({ kind: "int", at, value: intFold(left, right) });
  }
  const boolFold = boolFolds[op];
  if (boolFold) {
    return (left, right) => ({ kind: "bool", at, value: boolFold(left, right) });
  }
  return undefined;
};

/**
 * Arithmetic, shifts, bitwise ops and comparisons on two known integers
 * fold at compile time. Everything else becomes an IR primitive application.
 */
export const evalPrimOp = (
  ctxt: Ctxt,
  at: SrcLoc,
  op: PrimOp,
  sargs: readonly SVal[]
): Res<SVal> => {
  const level = meetAll(sargs.map((sarg) => sarg.level));
  const values = sargs.map((sarg) => sarg.value);
  const fold = constantFold(at, op);
  const [left, right] = values;
  if (
    fold &&
    values.length === 2 &&
    left?.kind === "int" &&
    right?.kind === "int"
  ) {
    return pure({ level, value: fold(left.value, right.value) });
  }

  const { range, args } = checkAndConvert(at, primOpType(op), values);
  const [dv, lifts] = liftExpr(ctxt, at, "prim", range, {
    kind: "prim-op",
    at,
    op,
    args,
  });
  return res(lifts, { level, value: dlvarValue(dv) });
};

export const primName = (prim: Primitive): string =>
  prim.kind === "op" ? prim.op : prim.kind;

const MAX_ARRAY_SIZE = BigInt(Number.MAX_SAFE_INTEGER);

const illegalArgs = (at: SrcLoc, prim: Primitive, values: readonly Value[]): never =>
  emitDiagnostic({
    at,
    code: "TY0017",
    params: { prim: primName(prim), argTypes: values.map(displayValueType) },
  });

/** Bounds predicate `x => 0 <= x && x < size`, built over the standard library. */
const enumPredicate = (ctxt: Ctxt, at: SrcLoc, size: bigint): Value => ({
  kind: "closure",
  at,
  name: localName(ctxt, "makeEnum"),
  params: ["x"],
  body: [
    build.ret(
      build.bin(
        "&&",
        build.bin("<=", build.num(0), build.id("x")),
        build.bin("<", build.id("x"), build.num(size))
      )
    ),
  ],
  env: ctxt.stdlib,
});

export const evalPrim = (
  ctxt: Ctxt,
  at: SrcLoc,
  prim: Primitive,
  sargs: readonly SVal[]
): Res<SVal> => {
  const values = sargs.map((sarg) => sarg.value);
  const level = meetAll(sargs.map((sarg) => sarg.level));
  const expectType = (value: Value): SLType =>
    value.kind === "type" ? value.type : illegalArgs(at, prim, values);

  switch (prim.kind) {
    case "op":
      return evalPrimOp(ctxt, at, prim.op, sargs);
    case "fun-type": {
      const [domain, range] = values;
      if (values.length !== 2 || domain?.kind !== "tuple" || range?.kind !== "type") {
        return illegalArgs(at, prim, values);
      }
      return pure({
        level,
        value: typeValue(T_Fun(domain.elements.map(expectType), range.type)),
      });
    }
    case "array-type": {
      const [element, size] = values;
      if (values.length !== 2 || element?.kind !== "type" || size?.kind !== "int") {
        return illegalArgs(at, prim, values);
      }
      if (size.value < 0n || size.value > MAX_ARRAY_SIZE) {
        return emitDiagnostic({
          at,
          code: "TY0030",
          params: { size: size.value.toString(), max: MAX_ARRAY_SIZE.toString() },
        });
      }
      return pure({
        level,
        value: typeValue(T_Array(element.type, Number(size.value))),
      });
    }
    case "tuple-type":
      return pure({ level, value: typeValue(T_Tuple(values.map(expectType))) });
    case "object-type": {
      const [spec] = values;
      if (values.length !== 1 || spec?.kind !== "object") {
        return illegalArgs(at, prim, values);
      }
      const fields: Record<string, SLType> = {};
      for (const [name, field] of spec.fields.entries()) {
        fields[name] = expectType(field.value);
      }
      return pure({ level, value: typeValue(T_Object(fields)) });
    }
    case "make-enum": {
      const [count] = values;
      if (values.length !== 1 || count?.kind !== "int") {
        return illegalArgs(at, prim, values);
      }
      const enumAt = srclocAt("makeEnum", undefined, at);
      const members: Value[] = [];
      for (let index = 0n; index < count.value; index += 1n) {
        members.push({ kind: "int", at: enumAt, value: index });
      }
      return pure({
        level,
        value: {
          kind: "tuple",
          at: enumAt,
          elements: [enumPredicate(ctxt, enumAt, count.value), ...members],
        },
      });
    }
    case "app-delay":
      return emitDiagnostic({
        at,
        code: "TY0006",
        params: { valueType: displayValueType(primValue(prim)) },
      });
    case "interact": {
      if (ctxt.mode.kind !== "local-step") {
        return illegalContext(ctxt, at, "interact");
      }
      const { range, args } = checkAndConvert(at, prim.type, values);
      const [dv, lifts] = liftExpr(ctxt, at, "interact", range, {
        kind: "interact",
        at,
        who: prim.who,
        method: prim.method,
        type: range,
        args,
      });
      return res(lifts, secretVal(dlvarValue(dv)));
    }
    case "declassify": {
      const [target] = sargs;
      if (sargs.length !== 1 || !target) return illegalArgs(at, prim, values);
      return pure(declassify(at, target));
    }
    case "commit":
      if (sargs.length !== 0) return illegalArgs(at, prim, values);
      return pure(publicVal(primValue({ kind: "committed" })));
    case "digest": {
      const args = values.map((value) => typeOf(at, value)[1]);
      const [dv, lifts] = liftExpr(ctxt, at, "digest", T_UInt256, {
        kind: "digest",
        at,
        args,
      });
      return res(lifts, { level, value: dlvarValue(dv) });
    }
    case "claim": {
      const { args } = checkAndConvert(at, T_Fun([T_Bool], T_Null), values);
      const [arg] = args;
      if (!arg) return illegalArgs(at, prim, values);
      return res(
        [{ kind: "claim", at, stack: ctxt.stack, claim: prim.claim, arg }],
        publicVal(nullValue(at, "claim"))
      );
    }
    case "transfer": {
      if (ctxt.mode.kind !== "consensus-step") {
        return illegalContext(ctxt, at, "transfer");
      }
      const typed = ensurePublics(at, sargs).map((value) => typeOf(at, value));
      const [amount] = typed;
      if (typed.length !== 1 || !amount || amount[0].kind !== "uint256") {
        return illegalArgs(at, prim, values);
      }
      return pure(
        publicVal({
          kind: "object",
          at,
          fields: Env.fromEntries(at, [
            ["to", publicVal(primValue({ kind: "transfer-to", amount: amount[1] }))],
          ]),
        })
      );
    }
    case "transfer-to": {
      if (ctxt.mode.kind !== "consensus-step") {
        return illegalContext(ctxt, at, "transfer.to");
      }
      const { args } = checkAndConvert(at, T_Fun([T_Address], T_Null), values);
      const [to] = args;
      if (!to) return illegalArgs(at, prim, values);
      return res(
        [{ kind: "transfer", at, stack: ctxt.stack, to, amount: prim.amount }],
        publicVal(nullValue(at, "transfer.to"))
      );
    }
    case "exit":
      if (ctxt.mode.kind !== "step") {
        return illegalContext(ctxt, at, "exit");
      }
      if (sargs.length !== 0) return illegalArgs(at, prim, values);
      return res(
        [{ kind: "stop", at, stack: ctxt.stack }],
        publicVal(primValue({ kind: "exited" }))
      );
    case "committed":
    case "exited":
      return illegalArgs(at, prim, values);
  }
};
