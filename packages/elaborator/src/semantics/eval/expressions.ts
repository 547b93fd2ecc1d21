import type {
  Expression,
  NumberExpr,
  ObjectProperty,
  PropertyName,
} from "../../ast/index.js";
import { trace } from "../../debug.js";
import type { DLExpr, DLStmts, DLVar, PrimOp, SLType } from "../../ir/types.js";
import { allocId, liftExpr, localName, type Ctxt } from "../context.js";
import { displayValueType } from "../display.js";
import { Env } from "../env.js";
import { emitDiagnostic } from "../errors.js";
import { keepLifts, pure, res, type Res } from "../result.js";
import { meet, meetAll, meetWith } from "../security.js";
import { srclocAt, type SrcLoc } from "../srcloc.js";
import { typeMeet, typeOf, typeOfAsArray } from "../types.js";
import {
  dlvarValue,
  nullValue,
  primValue,
  publicVal,
  type SecurityLevel,
  type SVal,
  type Value,
} from "../values.js";
import { evalApply } from "./apply.js";
import { evalDot } from "./dot.js";
import { evalPrimOp } from "./prims.js";
import { arrowStatements, expectIdentifier, trimQuotes } from "./shared.js";

const binaryPrims: Readonly<Record<string, PrimOp>> = {
  "/": "DIV",
  "==": "PEQ",
  ">=": "PGE",
  ">": "PGT",
  "<=": "PLE",
  "<": "PLT",
  "-": "SUB",
  "%": "MOD",
  "+": "ADD",
  "===": "BYTES_EQ",
  "*": "MUL",
  "<<": "LSH",
  ">>": "RSH",
  "&": "BAND",
  "|": "BIOR",
  "^": "BXOR",
};

// Operators implemented in the standard library rather than as primitives.
const binaryHelpers: Readonly<Record<string, string>> = {
  "&&": "and",
  "||": "or",
  "!=": "neq",
  "!==": "bytes_neq",
};

const unaryHelpers: Readonly<Record<string, string>> = {
  "-": "minus",
  "!": "not",
};

export const binaryToPrim = (at: SrcLoc, env: Env, operator: string): Value => {
  if (Object.hasOwn(binaryHelpers, operator)) {
    return env.lookup(at, binaryHelpers[operator]).value;
  }
  if (Object.hasOwn(binaryPrims, operator)) {
    return primValue({ kind: "op", op: binaryPrims[operator] });
  }
  return emitDiagnostic({ at, code: "SX0014", params: { operator } });
};

export const unaryToPrim = (at: SrcLoc, env: Env, operator: string): Value => {
  if (Object.hasOwn(unaryHelpers, operator)) {
    return env.lookup(at, unaryHelpers[operator]).value;
  }
  return emitDiagnostic({ at, code: "SX0015", params: { operator } });
};

const digitPatterns: Record<NumberExpr["radix"], RegExp> = {
  10: /^[0-9]+$/,
  16: /^[0-9a-fA-F]+$/,
  8: /^[0-7]+$/,
};

export const parseNumber = (at: SrcLoc, { raw, radix }: NumberExpr): bigint => {
  const digits =
    radix === 16
      ? raw.replace(/^0[xX]/, "")
      : radix === 8
        ? raw.replace(/^0[oO]?/, "") || "0"
        : raw;
  if (!digitPatterns[radix].test(digits)) {
    return emitDiagnostic({ at, code: "SX0016", params: { literal: raw } });
  }
  const prefix = radix === 16 ? "0x" : radix === 8 ? "0o" : "";
  return BigInt(`${prefix}${digits}`);
};

const numberLabel = (radix: NumberExpr["radix"]): string =>
  radix === 16 ? "hex" : radix === 8 ? "octal" : "decimal";

/** Participants pick up the first name they are referenced through. */
const infectWithId = (name: string, sval: SVal): SVal => {
  const value = sval.value;
  if (value.kind !== "participant" || value.displayVar !== undefined) return sval;
  return { level: sval.level, value: { ...value, displayVar: name } };
};

export const evalExprs = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  exprs: readonly Expression[]
): Res<SVal[]> => {
  const lifts: DLStmts[] = [];
  const svals: SVal[] = [];
  for (const expr of exprs) {
    const evaluated = evalExpr(ctxt, at, env, expr);
    lifts.push(evaluated.lifts);
    svals.push(evaluated.result);
  }
  return res(lifts.flat(), svals);
};

const evalPropertyName = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  key: PropertyName
): Res<readonly [SecurityLevel, string]> => {
  switch (key.kind) {
    case "ident":
      return pure(["public", key.name]);
    case "string":
      return pure(["public", trimQuotes(key.raw)]);
    case "number":
      return emitDiagnostic({
        at: srclocAt("number", key.span, at),
        code: "SX0011",
        params: {},
      });
    case "computed": {
      const nameAt = srclocAt("computed field name", key.span, at);
      const evaluated = evalExpr(ctxt, nameAt, env, key.expression);
      const { level, value } = evaluated.result;
      if (value.kind !== "bytes") {
        return emitDiagnostic({
          at: nameAt,
          code: "TY0015",
          params: { valueType: displayValueType(value) },
        });
      }
      return res(evaluated.lifts, [level, value.value]);
    }
  }
};

type ObjectAcc = { level: SecurityLevel; fields: Env };

const evalProperty = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  fields: Env,
  property: ObjectProperty
): Res<ObjectAcc> => {
  switch (property.kind) {
    case "init": {
      const propAt = srclocAt("property binding", property.span, at);
      const name = evalPropertyName(ctxt, propAt, env, property.key);
      const [level, field] = name.result;
      const value = evalExpr(ctxt, propAt, env, property.value);
      return res([...name.lifts, ...value.lifts], {
        level,
        fields: fields.insert(propAt, field, value.result),
      });
    }
    case "shorthand": {
      const propAt = srclocAt("property binding", property.span, at);
      const value = evalExpr(ctxt, propAt, env, {
        kind: "identifier",
        name: property.name,
        span: property.span,
      });
      return res(value.lifts, {
        level: "public",
        fields: fields.insert(propAt, property.name, value.result),
      });
    }
    case "spread": {
      const spreadAt = srclocAt("...obj", property.span, at);
      const spread = evalExpr(ctxt, spreadAt, env, property.argument);
      const { level, value } = spread.result;
      if (value.kind !== "object") {
        return emitDiagnostic({
          at,
          code: "TY0016",
          params: { valueType: displayValueType(value) },
        });
      }
      return res(spread.lifts, { level, fields: fields.merge(spreadAt, value.fields) });
    }
    case "method":
      return emitDiagnostic({
        at: srclocAt("method", property.span, at),
        code: "SX0010",
        params: {},
      });
  }
};

const evalTernary = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  expr: Extract<Expression, { kind: "conditional" }>
): Res<SVal> => {
  const condAt = srclocAt("?:", expr.span, at);
  const thenAt = srclocAt("?: > true", expr.consequent.span, condAt);
  const elseAt = srclocAt("?: > false", expr.alternate.span, thenAt);
  const test = evalExpr(ctxt, condAt, env, expr.test);
  const whenTrue = evalExpr(ctxt, thenAt, env, expr.consequent);
  const whenFalse = evalExpr(ctxt, elseAt, env, expr.alternate);
  const level = meetAll([test.result.level, whenTrue.result.level, whenFalse.result.level]);
  const cond = test.result.value;

  if (cond.kind === "bool") {
    const taken = cond.value ? whenTrue : whenFalse;
    return keepLifts(test.lifts, res(taken.lifts, meetWith(level, taken.result)));
  }
  if (cond.kind !== "dlvar" || cond.dv.type.kind !== "bool") {
    return emitDiagnostic({
      at,
      code: "TY0005",
      params: { valueType: displayValueType(cond) },
    });
  }

  if (whenTrue.lifts.length === 0 && whenFalse.lifts.length === 0) {
    const selected = evalPrimOp(ctxt, at, "IF_THEN_ELSE", [
      test.result,
      whenTrue.result,
      whenFalse.result,
    ]);
    return keepLifts(test.lifts, res(selected.lifts, meetWith(level, selected.result)));
  }

  const ret = allocId(ctxt, condAt);
  const withReturn = (branchAt: SrcLoc, branch: Res<SVal>): DLStmts => [
    ...branch.lifts,
    { kind: "return", at: branchAt, slot: ret, value: branch.result.value },
  ];
  const type = typeMeet(
    condAt,
    [thenAt, typeOf(thenAt, whenTrue.result.value)[0]],
    [elseAt, typeOf(elseAt, whenFalse.result.value)[0]]
  );
  const answer: DLVar = { at: condAt, name: localName(ctxt, "clo app"), type, id: ret };
  const lifts: DLStmts = [
    ...test.lifts,
    {
      kind: "prompt",
      at: condAt,
      target: { kind: "var", dv: answer },
      stmts: [
        {
          kind: "if",
          at: condAt,
          cond: { kind: "var", dv: cond.dv },
          then: withReturn(thenAt, whenTrue),
          else: withReturn(elseAt, whenFalse),
        },
      ],
    },
  ];
  return res(lifts, { level, value: dlvarValue(answer) });
};

const evalRef = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  expr: Extract<Expression, { kind: "index" }>
): Res<SVal> => {
  const refAt = srclocAt("array ref", expr.span, at);
  const array = evalExpr(ctxt, refAt, env, expr.object);
  const index = evalExpr(ctxt, refAt, env, expr.index);
  const level = meet(array.result.level, index.result.level);
  const arr = array.result.value;
  const idx = index.result.value;
  const before = [...array.lifts, ...index.lifts];

  const outOfBounds = (size: number, tried: bigint): never =>
    emitDiagnostic({
      at: refAt,
      code: "TY0012",
      params: { size, index: tried.toString() },
    });

  const lifted = (type: SLType, refExpr: DLExpr): Res<SVal> => {
    const [dv, lifts] = liftExpr(ctxt, refAt, "ref", type, refExpr);
    return res([...before, ...lifts], { level, value: dlvarValue(dv) });
  };

  if (idx.kind === "int") {
    const position = idx.value;
    if (arr.kind === "tuple") {
      const found = position >= 0n ? arr.elements[Number(position)] : undefined;
      if (!found) return outOfBounds(arr.elements.length, position);
      return res(before, { level, value: found });
    }
    if (arr.kind === "dlvar" && arr.dv.type.kind === "tuple") {
      const elements = arr.dv.type.elements;
      const element = position >= 0n ? elements[Number(position)] : undefined;
      if (!element) return outOfBounds(elements.length, position);
      return lifted(element, {
        kind: "tuple-ref",
        at: refAt,
        tuple: { kind: "var", dv: arr.dv },
        index: Number(position),
      });
    }
    if (arr.kind === "dlvar" && arr.dv.type.kind === "array") {
      const { element, size } = arr.dv.type;
      if (position < 0n || position >= BigInt(size)) return outOfBounds(size, position);
      return lifted(element, {
        kind: "array-ref",
        at: refAt,
        stack: ctxt.stack,
        array: { kind: "var", dv: arr.dv },
        size,
        index: { kind: "con", constant: { kind: "int", value: position } },
      });
    }
    return emitDiagnostic({
      at: refAt,
      code: "TY0009",
      params: { valueType: displayValueType(arr) },
    });
  }

  if (idx.kind === "dlvar" && idx.dv.type.kind === "uint256") {
    const [type, arg] = typeOfAsArray(refAt, arr);
    if (type.kind !== "array") {
      return emitDiagnostic({
        at: refAt,
        code: "TY0011",
        params: { valueType: displayValueType(arr) },
      });
    }
    return lifted(type.element, {
      kind: "array-ref",
      at: refAt,
      stack: ctxt.stack,
      array: arg,
      size: type.size,
      index: { kind: "var", dv: idx.dv },
    });
  }

  return emitDiagnostic({
    at: refAt,
    code: "TY0010",
    params: { valueType: displayValueType(idx) },
  });
};

/** Evaluates one expression. `env` is never changed; lifts come back in evaluation order. */
export const evalExpr = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  expr: Expression
): Res<SVal> => {
  trace(ctxt, "expr", { kind: expr.kind });
  switch (expr.kind) {
    case "identifier":
      return pure(
        infectWithId(expr.name, env.lookup(srclocAt("id ref", expr.span, at), expr.name))
      );
    case "number": {
      const numAt = srclocAt(numberLabel(expr.radix), expr.span, at);
      return pure(publicVal({ kind: "int", at: numAt, value: parseNumber(numAt, expr) }));
    }
    case "literal": {
      const litAt = srclocAt("literal", expr.span, at);
      switch (expr.value) {
        case "null":
          return pure(publicVal(nullValue(litAt, "null")));
        case "true":
          return pure(publicVal({ kind: "bool", at: litAt, value: true }));
        case "false":
          return pure(publicVal({ kind: "bool", at: litAt, value: false }));
        default:
          return emitDiagnostic({
            at: litAt,
            code: "SX0016",
            params: { literal: expr.value },
          });
      }
    }
    case "string":
      return pure(
        publicVal({
          kind: "bytes",
          at: srclocAt("string", expr.span, at),
          value: trimQuotes(expr.raw),
        })
      );
    case "array": {
      const tupleAt = srclocAt("tuple", expr.span, at);
      const elements = evalExprs(ctxt, tupleAt, env, expr.elements);
      return res(elements.lifts, {
        level: meetAll(elements.result.map((sval) => sval.level)),
        value: {
          kind: "tuple",
          at: tupleAt,
          elements: elements.result.map((sval) => sval.value),
        },
      });
    }
    case "object": {
      const objAt = srclocAt("obj", expr.span, at);
      let acc: Res<ObjectAcc> = pure({ level: "public", fields: Env.empty });
      for (const property of expr.properties) {
        const next = evalProperty(ctxt, objAt, env, acc.result.fields, property);
        acc = res([...acc.lifts, ...next.lifts], {
          level: meet(acc.result.level, next.result.level),
          fields: next.result.fields,
        });
      }
      return res(acc.lifts, {
        level: acc.result.level,
        value: { kind: "object", at: objAt, fields: acc.result.fields },
      });
    }
    case "call": {
      const ratorAt = srclocAt("application, rator", expr.span, at);
      const rator = evalExpr(ctxt, ratorAt, env, expr.callee);
      const applied = evalApply(
        ctxt,
        srclocAt("application", expr.span, at),
        env,
        rator.result.value,
        expr.arguments
      );
      return keepLifts(
        rator.lifts,
        res(applied.lifts, meetWith(rator.result.level, applied.result))
      );
    }
    case "member": {
      const dotAt = srclocAt("dot", expr.span, at);
      const obj = evalExpr(ctxt, dotAt, env, expr.object);
      const field = expectIdentifier(dotAt, expr.property);
      const projected = evalDot(ctxt, dotAt, obj.result.value, field);
      return res(
        [...obj.lifts, ...projected.lifts],
        meetWith(obj.result.level, projected.result)
      );
    }
    case "index":
      return evalRef(ctxt, at, env, expr);
    case "binary": {
      const rator = binaryToPrim(at, env, expr.operator);
      const appAt = srclocAt("application", expr.span, at);
      return evalApply(ctxt, appAt, env, rator, [expr.left, expr.right]);
    }
    case "unary": {
      const rator = unaryToPrim(at, env, expr.operator);
      const appAt = srclocAt("application", expr.span, at);
      return evalApply(ctxt, appAt, env, rator, [expr.argument]);
    }
    case "paren":
      return evalExpr(ctxt, srclocAt("paren", expr.span, at), env, expr.expression);
    case "conditional":
      return evalTernary(ctxt, at, env, expr);
    case "arrow": {
      const arrowAt = srclocAt("arrow", expr.span, at);
      return pure(
        publicVal({
          kind: "closure",
          at: arrowAt,
          name: localName(ctxt, "arrow"),
          params: expr.params,
          body: arrowStatements(expr.body),
          env,
        })
      );
    }
    case "function": {
      const fnAt = srclocAt("function exp", expr.span, at);
      if (expr.name !== undefined) {
        return emitDiagnostic({ at: fnAt, code: "SX0008", params: {} });
      }
      return pure(
        publicVal({
          kind: "closure",
          at: fnAt,
          name: localName(ctxt, "function"),
          params: expr.params,
          body: expr.body.body,
          env,
        })
      );
    }
    case "rejected-expression":
      return emitDiagnostic({ at, code: "SX0002", params: { construct: expr.construct } });
  }
};
