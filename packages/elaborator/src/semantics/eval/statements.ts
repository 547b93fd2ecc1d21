import { build, type Statement } from "../../ast/index.js";
import { trace } from "../../debug.js";
import type { Ctxt, Scope } from "../context.js";
import { displayValueType } from "../display.js";
import { emitDiagnostic } from "../errors.js";
import { keepLifts, pure, res, type Res, type ReturnPoint, type StmtRes } from "../result.js";
import { meet } from "../security.js";
import { srclocAfter, srclocAt, type SrcLoc } from "../srcloc.js";
import { nullValue, publicVal, type SecurityLevel } from "../values.js";
import { evalExprStmt } from "./consensus.js";
import { evalDecls } from "./declarations.js";
import { evalExpr } from "./expressions.js";
import { evalContinue, evalWhile } from "./loops.js";
import { dropEmpty, expectEmptyTail } from "./shared.js";

/**
 * Runs `rest` after a statement that produced `first`, unless nothing
 * remains. Once a return point exists the rest must end in one too.
 */
export const retSeqn = (
  ctxt: Ctxt,
  at: SrcLoc,
  scope: Scope,
  first: Res<StmtRes>,
  rest: readonly Statement[]
): Res<StmtRes> => {
  const remaining = dropEmpty(rest);
  if (remaining.length === 0) return first;
  const nextScope: Scope =
    first.result.rets.length === 0 ? scope : { ...scope, mustReturn: "implicit-null" };
  const next = evalStmts(ctxt, at, nextScope, remaining);
  return res([...first.lifts, ...next.lifts], {
    env: next.result.env,
    rets: [...first.result.rets, ...next.result.rets],
  });
};

/** Joins the return points of two alternatives; a side that never returns gets a null one. */
export const combineStmtRes = (
  at: SrcLoc,
  level: SecurityLevel,
  left: StmtRes,
  right: StmtRes
): StmtRes => {
  const filler = (label: string): ReturnPoint => ({
    at,
    value: { level, value: nullValue(at, label) },
  });
  const rets = (() => {
    if (left.rets.length === 0 && right.rets.length === 0) return [];
    if (left.rets.length === 0) return [filler("empty left"), ...right.rets];
    if (right.rets.length === 0) return [...left.rets, filler("empty right")];
    return [...left.rets, ...right.rets];
  })();
  return { env: right.env, rets };
};

const evalEmptyTail = (at: SrcLoc, scope: Scope): Res<StmtRes> => {
  const done = (rets: readonly ReturnPoint[]) => pure({ env: scope.env, rets });
  switch (scope.mustReturn) {
    case "cannot-return":
    case "may-be-empty":
      return done([]);
    case "implicit-null":
      return done([{ at, value: publicVal(nullValue(at, "implicit null")) }]);
    case "need-explicit":
      return emitDiagnostic({ at, code: "SX0019", params: {} });
  }
};

const evalIf = (
  ctxt: Ctxt,
  at: SrcLoc,
  scope: Scope,
  stmt: Extract<Statement, { kind: "if" }>,
  rest: readonly Statement[]
): Res<StmtRes> => {
  const env = scope.env;
  const ifAt = srclocAt("if", stmt.span, at);
  const thenAt = srclocAt("if > true", stmt.consequent.span, ifAt);
  const elseAt = srclocAt("if > false", stmt.alternate?.span, thenAt);
  const alternate: Statement = stmt.alternate ?? { kind: "empty" };
  const test = evalExpr(ctxt, ifAt, env, stmt.test);
  const remaining = dropEmpty(rest);
  const branchScope: Scope =
    remaining.length === 0 ? scope : { ...scope, mustReturn: "may-be-empty" };
  const { level, value: cond } = test.result;

  if (cond.kind === "bool") {
    const taken = cond.value
      ? evalStmts(ctxt, thenAt, branchScope, [stmt.consequent])
      : evalStmts(ctxt, elseAt, branchScope, [alternate]);
    return keepLifts(test.lifts, retSeqn(ctxt, ifAt, scope, taken, remaining));
  }
  if (cond.kind !== "dlvar" || cond.dv.type.kind !== "bool") {
    return emitDiagnostic({
      at,
      code: "TY0005",
      params: { valueType: displayValueType(cond) },
    });
  }

  const whenTrue = evalStmts(ctxt, thenAt, branchScope, [stmt.consequent]);
  const whenFalse = evalStmts(ctxt, elseAt, branchScope, [alternate]);
  const guarded = (rets: readonly ReturnPoint[]): StmtRes => ({
    env,
    rets: rets.map((ret) => ({
      at: ret.at,
      value: { level: meet(level, ret.value.level), value: ret.value.value },
    })),
  });
  const combined = res(
    [
      {
        kind: "if",
        at: ifAt,
        cond: { kind: "var", dv: cond.dv },
        then: whenTrue.lifts,
        else: whenFalse.lifts,
      },
    ],
    combineStmtRes(ifAt, level, guarded(whenTrue.result.rets), guarded(whenFalse.result.rets))
  );
  return keepLifts(test.lifts, retSeqn(ctxt, ifAt, scope, combined, remaining));
};

const evalReturn = (
  ctxt: Ctxt,
  at: SrcLoc,
  scope: Scope,
  stmt: Extract<Statement, { kind: "return" }>,
  rest: readonly Statement[]
): Res<StmtRes> => {
  const retAt = srclocAt("return", stmt.span, at);
  const returned = stmt.argument
    ? evalExpr(ctxt, retAt, scope.env, stmt.argument)
    : pure(publicVal(nullValue(retAt, "empty return")));
  expectEmptyTail(srclocAfter("return", stmt.span, at), rest);
  if (scope.ret === undefined) {
    return emitDiagnostic({ at: retAt, code: "MO0003", params: {} });
  }
  if (scope.mustReturn === "cannot-return") {
    return emitDiagnostic({ at, code: "SX0024", params: {} });
  }
  return res(
    [
      ...returned.lifts,
      { kind: "return", at: retAt, slot: scope.ret, value: returned.result.value },
    ],
    { env: scope.env, rets: [{ at: retAt, value: returned.result }] }
  );
};

/**
 * Evaluates a statement sequence. The first statement decides how the rest
 * is threaded: declarations extend the scope, consensus transitions switch
 * mode for everything after them, and terminal statements require the rest
 * to be empty.
 */
export const evalStmts = (
  ctxt: Ctxt,
  at: SrcLoc,
  scope: Scope,
  stmts: readonly Statement[]
): Res<StmtRes> => {
  const [stmt, ...rest] = stmts;
  if (!stmt) return evalEmptyTail(at, scope);
  trace(ctxt, "stmt", { kind: stmt.kind, remaining: rest.length });

  switch (stmt.kind) {
    case "block": {
      const inner = evalStmts(ctxt, srclocAt("block", stmt.span, at), scope, stmt.body);
      return retSeqn(ctxt, srclocAfter("block", stmt.span, at), scope, inner, rest);
    }
    case "const": {
      const constAt = srclocAt("const", stmt.span, at);
      const decls = evalDecls(ctxt, constAt, scope.env, stmt.declarations);
      const env = scope.env.merge(constAt, decls.result);
      return keepLifts(
        decls.lifts,
        evalStmts(ctxt, srclocAfter("const", stmt.span, at), { ...scope, env }, rest)
      );
    }
    case "continue":
      return evalStmts(ctxt, at, scope, [build.assign(build.arr(), build.arr()), stmt, ...rest]);
    case "function-declaration": {
      const fnAt = srclocAt("function def", stmt.span, at);
      if (stmt.name === undefined) {
        return emitDiagnostic({ at: fnAt, code: "SX0009", params: {} });
      }
      const closure = publicVal({
        kind: "closure",
        at: fnAt,
        name: stmt.name,
        params: stmt.params,
        body: stmt.body.body,
        env: scope.env,
      });
      const env = scope.env.insert(at, stmt.name, closure);
      return evalStmts(ctxt, srclocAfter("function def", stmt.span, at), { ...scope, env }, rest);
    }
    case "if":
      return evalIf(ctxt, at, scope, stmt, rest);
    case "empty":
      return evalStmts(ctxt, srclocAt("empty", stmt.span, at), scope, rest);
    case "expression":
      return evalExprStmt(ctxt, at, scope, stmt, rest);
    case "method-call":
      return evalExprStmt(
        ctxt,
        at,
        scope,
        {
          kind: "expression",
          span: stmt.span,
          expression: {
            kind: "call",
            span: stmt.span,
            callee: stmt.callee,
            arguments: stmt.arguments,
          },
        },
        rest
      );
    case "assign": {
      const [next, ...afterContinue] = rest;
      if (stmt.operator === "=" && next?.kind === "continue") {
        return evalContinue(ctxt, at, scope, stmt, next, afterContinue);
      }
      return emitDiagnostic({
        at: srclocAt("assign", stmt.span, at),
        code: "SX0003",
        params: { operator: stmt.operator },
      });
    }
    case "return":
      return evalReturn(ctxt, at, scope, stmt, rest);
    case "var": {
      const [invariant, loop, ...afterLoop] = rest;
      if (
        invariant?.kind === "method-call" &&
        invariant.callee.kind === "identifier" &&
        invariant.callee.name === "invariant" &&
        loop?.kind === "while"
      ) {
        return evalWhile(ctxt, at, scope, stmt, invariant, loop, afterLoop);
      }
      return emitDiagnostic({ at: srclocAt("var", stmt.span, at), code: "SX0004", params: {} });
    }
    case "while":
      return emitDiagnostic({ at: srclocAt("while", stmt.span, at), code: "SX0005", params: {} });
    case "rejected-statement":
      return emitDiagnostic({
        at: srclocAt(stmt.construct, stmt.span, at),
        code: "SX0001",
        params: { construct: stmt.construct },
      });
  }
};
