import type { Expression } from "../../ast/index.js";
import { trace } from "../../debug.js";
import type { DLStmts } from "../../ir/types.js";
import { allocId, localName, pushFrame, type Ctxt, type Scope } from "../context.js";
import { displayValueType } from "../display.js";
import type { Env } from "../env.js";
import { emitDiagnostic } from "../errors.js";
import { res, type AppRes, type Res } from "../result.js";
import { meetAll } from "../security.js";
import { displaySrcLoc, srclocAt, type SrcLoc } from "../srcloc.js";
import { typeMeets, typeOf } from "../types.js";
import {
  dlvarValue,
  nullValue,
  publicVal,
  sameValue,
  type SVal,
  type Value,
} from "../values.js";
import { evalExprs } from "./expressions.js";
import { evalForm } from "./forms.js";
import { evalPrim } from "./prims.js";
import { evalStmts } from "./statements.js";

type Closure = Extract<Value, { kind: "closure" }>;

const applyClosure = (
  ctxt: Ctxt,
  at: SrcLoc,
  closure: Closure,
  sargs: readonly SVal[]
): Res<AppRes> => {
  const ret = allocId(ctxt, at);
  const bodyAt = srclocAt("block", undefined, closure.at);
  if (closure.params.length !== sargs.length) {
    return emitDiagnostic({
      at,
      code: "TY0001",
      params: {
        expected: closure.params.length,
        got: sargs.length,
        definedAt: displaySrcLoc(closure.at),
      },
    });
  }

  let env = closure.env;
  closure.params.forEach((param, index) => {
    const sarg = sargs[index];
    if (sarg) env = env.insert(closure.at, param, sarg);
  });
  const bodyCtxt = pushFrame(ctxt, {
    kind: "closure-app",
    at,
    closureAt: closure.at,
    name: closure.name,
  });
  const scope: Scope = { ret, mustReturn: "implicit-null", env };
  const body = evalStmts(bodyCtxt, bodyAt, scope, closure.body);
  const { rets } = body.result;

  const noPrompt = (sval: SVal): Res<AppRes> => {
    const last = body.lifts.at(-1);
    const lifts: DLStmts =
      last?.kind === "return" && last.slot === ret && sameValue(last.value, sval.value)
        ? body.lifts.slice(0, -1)
        : [{ kind: "prompt", at: bodyAt, target: { kind: "slot", slot: ret }, stmts: body.lifts }];
    return res(lifts, { env: body.result.env, value: sval });
  };

  const [only] = rets;
  if (!only) return noPrompt(publicVal(nullValue(bodyAt, "clo app")));
  if (rets.length === 1) return noPrompt(only.value);

  trace(ctxt, "closure has many results", { count: rets.length });
  const type = typeMeets(
    bodyAt,
    rets.map(({ at: retAt, value }) => [retAt, typeOf(retAt, value.value)[0]] as const)
  );
  const level = meetAll(rets.map(({ value }) => value.level));
  const dv = { at: bodyAt, name: localName(ctxt, "clo app"), type, id: ret };
  return res([{ kind: "prompt", at: bodyAt, target: { kind: "var", dv }, stmts: body.lifts }], {
    env: body.result.env,
    value: { level, value: dlvarValue(dv) },
  });
};

/** Applies an already evaluated operator to already evaluated arguments. */
export const evalApplyVals = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  rator: Value,
  sargs: readonly SVal[]
): Res<AppRes> => {
  trace(ctxt, "apply", { rator: displayValueType(rator), args: sargs.length });
  switch (rator.kind) {
    case "prim": {
      const applied = evalPrim(ctxt, at, rator.prim, sargs);
      return res(applied.lifts, { env, value: applied.result });
    }
    case "closure":
      return applyClosure(ctxt, at, rator, sargs);
    default:
      return emitDiagnostic({
        at,
        code: "TY0007",
        params: { valueType: displayValueType(rator) },
      });
  }
};

/**
 * Applies `rator` to unevaluated operands. Primitives and closures take
 * their arguments left to right; forms receive the syntax itself.
 */
export const evalApply = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  rator: Value,
  rands: readonly Expression[]
): Res<SVal> => {
  switch (rator.kind) {
    case "prim":
    case "closure": {
      const args = evalExprs(ctxt, at, env, rands);
      const applied = evalApplyVals(ctxt, at, env, rator, args.result);
      return res([...args.lifts, ...applied.lifts], applied.result.value);
    }
    case "form":
      return evalForm(ctxt, at, env, rator.form, rands);
    default:
      return emitDiagnostic({
        at,
        code: "TY0006",
        params: { valueType: displayValueType(rator) },
      });
  }
};
