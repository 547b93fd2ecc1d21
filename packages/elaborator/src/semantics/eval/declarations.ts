import type { Declarator } from "../../ast/index.js";
import type { DLExpr, DLStmt, SLType } from "../../ir/types.js";
import { liftExpr, withLocalNames, type Ctxt } from "../context.js";
import { displayValueType } from "../display.js";
import { Env } from "../env.js";
import { emitDiagnostic } from "../errors.js";
import { res, type Res } from "../result.js";
import { srclocAt, type SrcLoc } from "../srcloc.js";
import { dlvarValue, type SVal, type Value } from "../values.js";
import { evalExpr } from "./expressions.js";
import { expectIdentifier } from "./shared.js";

/** Splits an aggregate into its components, projecting IR aggregates one field at a time. */
const destructure = (ctxt: Ctxt, at: SrcLoc, value: Value): Res<readonly Value[]> => {
  if (value.kind === "tuple") return res([], value.elements);
  if (value.kind !== "dlvar") {
    return emitDiagnostic({
      at,
      code: "TY0002",
      params: { valueType: displayValueType(value) },
    });
  }

  const { dv } = value;
  const lifts: DLStmt[] = [];
  const parts: Value[] = [];
  const project = (name: string, type: SLType, expr: DLExpr): void => {
    const [part, partLifts] = liftExpr(ctxt, at, name, type, expr);
    lifts.push(...partLifts);
    parts.push(dlvarValue(part));
  };

  if (dv.type.kind === "tuple") {
    dv.type.elements.forEach((type, index) =>
      project("tuple idx", type, {
        kind: "tuple-ref",
        at,
        tuple: { kind: "var", dv },
        index,
      })
    );
    return res(lifts, parts);
  }
  if (dv.type.kind === "array") {
    const { element, size } = dv.type;
    for (let index = 0; index < size; index += 1) {
      project("array idx", element, {
        kind: "array-ref",
        at,
        stack: ctxt.stack,
        array: { kind: "var", dv },
        size,
        index: { kind: "con", constant: { kind: "int", value: BigInt(index) } },
      });
    }
    return res(lifts, parts);
  }
  return emitDiagnostic({
    at,
    code: "TY0002",
    params: { valueType: displayValueType(value) },
  });
};

/**
 * Evaluates one declarator against `rhsEnv` and binds its names into
 * `lhsEnv`.
 */
export const evalDecl = (
  ctxt: Ctxt,
  at: SrcLoc,
  lhsEnv: Env,
  rhsEnv: Env,
  decl: Declarator
): Res<Env> => {
  const { target, init } = decl;
  if (!init) {
    return emitDiagnostic({
      at,
      code: "SX0007",
      params: { construct: "declaration without an initializer" },
    });
  }
  const initAt = srclocAt("var initializer", decl.span, at);

  if (target.kind === "identifier") {
    const rhs = evalExpr(withLocalNames(ctxt, [target.name]), initAt, rhsEnv, init);
    const idAt = srclocAt("id", target.span, at);
    return res(rhs.lifts, lhsEnv.insert(idAt, target.name, rhs.result));
  }

  if (target.kind === "array") {
    const arrayAt = srclocAt("array", target.span, at);
    const names = target.elements.map((element) => expectIdentifier(arrayAt, element));
    const rhs = evalExpr(withLocalNames(ctxt, names), initAt, rhsEnv, init);
    const { level, value } = rhs.result;
    const parts = destructure(ctxt, initAt, value);
    if (parts.result.length !== names.length) {
      return emitDiagnostic({
        at: arrayAt,
        code: "TY0003",
        params: { idents: names.length, values: parts.result.length },
      });
    }
    let env = lhsEnv;
    parts.result.forEach((part, index) => {
      const name = names[index];
      const bound: SVal = { level, value: part };
      if (name !== undefined) env = env.insert(arrayAt, name, bound);
    });
    return res([...rhs.lifts, ...parts.lifts], env);
  }

  return emitDiagnostic({
    at,
    code: "SX0006",
    params: { construct: target.kind },
  });
};

/** Declarations of one statement, each evaluated in `rhsEnv`; returns only the new bindings. */
export const evalDecls = (
  ctxt: Ctxt,
  at: SrcLoc,
  rhsEnv: Env,
  decls: readonly Declarator[]
): Res<Env> =>
  decls.reduce<Res<Env>>((acc, decl) => {
    const next = evalDecl(ctxt, at, acc.result, rhsEnv, decl);
    return res([...acc.lifts, ...next.lifts], next.result);
  }, res([], Env.empty));
