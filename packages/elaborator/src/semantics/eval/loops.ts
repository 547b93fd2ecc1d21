import type { Expression, Statement } from "../../ast/index.js";
import {
  T_Bool,
  type DLArg,
  type DLAssignment,
  type DLBlock,
  type DLVar,
} from "../../ir/types.js";
import { allocId, illegalContext, type Ctxt, type Scope } from "../context.js";
import { Env } from "../env.js";
import { emitDiagnostic } from "../errors.js";
import { res, type Res, type StmtRes } from "../result.js";
import { ensurePublic } from "../security.js";
import { srclocAfter, srclocAt, type SrcLoc } from "../srcloc.js";
import { checkType, typeOf } from "../types.js";
import { dlvarValue, publicVal } from "../values.js";
import { evalDecl, evalDecls } from "./declarations.js";
import { evalExpr } from "./expressions.js";
import { expectEmptyTail } from "./shared.js";
import { evalStmts } from "./statements.js";

type VarStmt = Extract<Statement, { kind: "var" }>;
type MethodCallStmt = Extract<Statement, { kind: "method-call" }>;
type WhileStmt = Extract<Statement, { kind: "while" }>;
type AssignStmt = Extract<Statement, { kind: "assign" }>;
type ContinueStmt = Extract<Statement, { kind: "continue" }>;

/** A boolean expression elaborated into its own block. */
const boolBlock = (ctxt: Ctxt, at: SrcLoc, env: Env, expr: Expression): DLBlock => {
  const evaluated = evalExpr(ctxt, at, env, expr);
  return {
    at,
    stack: ctxt.stack,
    stmts: evaluated.lifts,
    result: checkType(at, T_Bool, evaluated.result.value),
  };
};

/** `var [...] = init; invariant(inv); while (cond) body` followed by `rest`. */
export const evalWhile = (
  ctxt: Ctxt,
  at: SrcLoc,
  scope: Scope,
  decl: VarStmt,
  invariant: MethodCallStmt,
  loop: WhileStmt,
  rest: readonly Statement[]
): Res<StmtRes> => {
  const varAt = srclocAt("var", decl.span, at);
  const invAt = srclocAt("invariant", invariant.span, at);
  const condAt = srclocAt("cond", loop.test.span, at);
  const whileAt = srclocAt("while", loop.span, at);
  if (ctxt.mode.kind !== "consensus-step") {
    return illegalContext(ctxt, varAt, "while");
  }

  const env = scope.env;
  const init = evalDecls(ctxt, varAt, env, decl.declarations);
  const whileVars = new Map<string, DLVar>();
  const assignment: [DLVar, DLArg][] = [];
  for (const [name, sval] of init.result.entries()) {
    const [type, arg] = typeOf(varAt, sval.value);
    const dv: DLVar = { at: varAt, name, type, id: allocId(ctxt, varAt) };
    whileVars.set(name, dv);
    assignment.push([dv, arg]);
  }
  const loopEnv = env.merge(
    at,
    Env.fromEntries(
      at,
      [...whileVars].map(([name, dv]) => [name, publicVal(dlvarValue(dv))] as const)
    )
  );

  const [invariantExpr] = invariant.arguments;
  if (invariant.arguments.length !== 1 || !invariantExpr) {
    return emitDiagnostic({
      at: invAt,
      code: "SX0018",
      params: { count: invariant.arguments.length },
    });
  }
  const invariantBlock = boolBlock(ctxt, invAt, loopEnv, invariantExpr);
  const condBlock = boolBlock(ctxt, condAt, loopEnv, loop.test);

  const body = evalStmts(
    ctxt,
    whileAt,
    { ...scope, env: loopEnv, mustReturn: "need-explicit", whileVars },
    [loop.body]
  );
  const k = evalStmts(ctxt, whileAt, { ...scope, env: loopEnv }, rest);

  return res(
    [
      ...init.lifts,
      {
        kind: "while",
        at: varAt,
        assignment,
        invariant: invariantBlock,
        cond: condBlock,
        body: body.lifts,
      },
      ...k.lifts,
    ],
    { env: k.result.env, rets: [...body.result.rets, ...k.result.rets] }
  );
};

/** `[x, ...] = [e, ...]; continue;` inside a while body. */
export const evalContinue = (
  ctxt: Ctxt,
  at: SrcLoc,
  scope: Scope,
  assign: AssignStmt,
  cont: ContinueStmt,
  rest: readonly Statement[]
): Res<StmtRes> => {
  const varAt = srclocAt("continue", assign.span, at);
  const contAt = srclocAt("continue", cont.span, at);
  if (ctxt.mode.kind !== "consensus-step") {
    return illegalContext(ctxt, varAt, "continue");
  }

  const env = scope.env;
  const updated = evalDecl(ctxt, varAt, Env.empty, env, {
    target: assign.target,
    init: assign.value,
    span: assign.span,
  });
  const whileVars = scope.whileVars;
  if (!whileVars) {
    return emitDiagnostic({ at: contAt, code: "MO0004", params: {} });
  }
  const assignment: DLAssignment = updated.result.entries().map(([name, sval]) => {
    const dv =
      whileVars.get(name) ??
      emitDiagnostic({ at: varAt, code: "TY0028", params: { name } });
    return [dv, checkType(at, dv.type, ensurePublic(varAt, sval))] as const;
  });
  expectEmptyTail(srclocAfter("continue", cont.span, at), rest);

  return res(
    [...updated.lifts, { kind: "continue", at: contAt, assignment }],
    { env, rets: [] }
  );
};
