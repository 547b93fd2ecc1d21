import { build, type Statement } from "../../ast/index.js";
import { trace } from "../../debug.js";
import {
  T_Address,
  T_UInt256,
  type DLArg,
  type DLStmt,
  type DLVar,
  type FromSpec,
  type TimeoutSpec,
} from "../../ir/types.js";
import { TXN_VALUE_NAME } from "../base-env.js";
import {
  allocId,
  withMode,
  type Ctxt,
  type PartEnvs,
  type Scope,
} from "../context.js";
import { Env } from "../env.js";
import { emitDiagnostic, impossible } from "../errors.js";
import { keepLifts, res, type Res, type StmtRes } from "../result.js";
import { ensurePublic } from "../security.js";
import { srclocAfter, type SrcLoc } from "../srcloc.js";
import { checkType, displayType, typeOf } from "../types.js";
import { dlvarValue, publicVal, type Form, type SVal, type Value } from "../values.js";
import { evalExpr } from "./expressions.js";
import { expectEmptyTail } from "./shared.js";
import { combineStmtRes, evalStmts } from "./statements.js";

type ToConsensus = Extract<Form, { kind: "to-consensus" }>;
type StepMode = Extract<Ctxt["mode"], { kind: "step" }>;

const mapEnvs = (penvs: PartEnvs, update: (who: string, env: Env) => Env): PartEnvs =>
  new Map([...penvs].map(([who, env]): [string, Env] => [who, update(who, env)]));

const expectNull = (at: SrcLoc, typeAt: SrcLoc, value: Value): void => {
  const [type] = typeOf(typeAt, value);
  if (type.kind !== "null") {
    emitDiagnostic({ at, code: "TY0018", params: { type: displayType(type) } });
  }
};

/**
 * The published values of a round, each copied into a fresh public variable
 * read from the publisher's private environment.
 */
const publishedMessage = (
  ctxt: Ctxt,
  at: SrcLoc,
  bindAt: SrcLoc,
  form: ToConsensus,
  penv: Env
): { env: Env; args: DLArg[]; vars: DLVar[] } => {
  let env = Env.empty;
  const args: DLArg[] = [];
  const vars: DLVar[] = [];
  for (const name of form.publish ?? []) {
    const value = ensurePublic(at, penv.lookup(form.at, name));
    const [type, arg] = typeOf(form.at, value);
    const dv: DLVar = {
      at: form.at,
      name: arg.kind === "var" ? arg.dv.name : "msg",
      type,
      id: allocId(ctxt, form.at),
    };
    args.push(arg);
    vars.push(dv);
    env = env.insert(bindAt, name, publicVal(dlvarValue(dv)));
  }
  return { env, args, vars };
};

const evalToConsensusStmt = (
  ctxt: Ctxt,
  mode: StepMode,
  at: SrcLoc,
  afterAt: SrcLoc,
  scope: Scope,
  form: ToConsensus,
  exprLifts: readonly DLStmt[],
  rest: readonly Statement[]
): Res<StmtRes> => {
  const { who } = form;
  const env = scope.env;
  trace(ctxt, "to-consensus", { who, publish: form.publish ?? [] });
  const penv = mode.penvs.get(who) ?? impossible(at, `no environment for ${who}`);
  const message = publishedMessage(ctxt, at, afterAt, form, penv);

  const known = mode.addresses.get(who);
  const from: FromSpec = known
    ? { kind: "again", address: known }
    : {
        kind: "join",
        address: { at: form.at, name: who, type: T_Address, id: allocId(ctxt, form.at) },
      };
  const addresses = known ? mode.addresses : new Map(mode.addresses).set(who, from.address);

  const displayVar = form.displayVar;
  const addWho = ((): ((target: Env) => Env) => {
    if (displayVar === undefined) return (target) => target;
    const bound = env.lookup(form.at, displayVar);
    if (bound.value.kind !== "participant") {
      return impossible(form.at, "participant binding is not a participant");
    }
    const withAddress: SVal = {
      level: bound.level,
      value: { ...bound.value, address: from.address },
    };
    return (target) => target.set(displayVar, withAddress);
  })();

  const roundEnv = addWho(env.merge(form.at, message.env));
  const penvs = mapEnvs(mode.penvs, (part, old) =>
    part === who ? addWho(old) : addWho(old.merge(form.at, message.env))
  );

  const publisherEnv = penvs.get(who) ?? impossible(at, `no environment for ${who}`);
  const amountExpr = form.pay ?? build.num(0);
  let amountLifts: readonly DLStmt[] = [];
  let amountArg: DLArg = { kind: "con", constant: { kind: "int", value: 0n } };
  if (form.pay) {
    const evaluated = evalExpr(ctxt, at, publisherEnv, form.pay);
    amountLifts = evaluated.lifts;
    amountArg = checkType(at, T_UInt256, ensurePublic(at, evaluated.result));
  }
  const amountCheck = evalExpr(
    ctxt,
    at,
    roundEnv,
    build.call(
      build.id("require"),
      build.bin("==", amountExpr, build.call(build.id(TXN_VALUE_NAME)))
    )
  );

  let timeoutLifts: readonly DLStmt[] = [];
  let timeoutRes: StmtRes = { env, rets: [] };
  let timeout: TimeoutSpec | undefined;
  if (form.timeout) {
    const clause = form.timeout;
    const delay = evalExpr(ctxt, at, env, clause.delay);
    const delayArg = checkType(clause.at, T_UInt256, ensurePublic(clause.at, delay.result));
    const handler = evalStmts(ctxt, clause.at, scope, clause.body);
    timeoutLifts = delay.lifts;
    timeoutRes = handler.result;
    timeout = { delay: delayArg, stmts: handler.lifts };
  }

  const consensusCtxt = withMode(ctxt, {
    kind: "consensus-step",
    roundEnv,
    addresses,
    penvs,
  });
  const k = evalStmts(consensusCtxt, afterAt, { ...scope, env: roundEnv }, rest);
  trace(ctxt, "to-consensus done", { who, lifts: k.lifts.length });

  return res(
    [
      ...exprLifts,
      ...timeoutLifts,
      { kind: "only", at, who, stmts: amountLifts },
      {
        kind: "to-consensus",
        at: form.at,
        who,
        from,
        msgArgs: message.args,
        msgVars: message.vars,
        amount: amountArg,
        timeout,
        stmts: [...amountCheck.lifts, ...k.lifts],
      },
    ],
    combineStmtRes(afterAt, "public", timeoutRes, k.result)
  );
};

/**
 * An expression statement. Besides plain effects this is where the round
 * structure advances: `only` answers, publish/pay chains, `commit()` and
 * `exit()` all take effect here.
 */
export const evalExprStmt = (
  ctxt: Ctxt,
  at: SrcLoc,
  scope: Scope,
  stmt: Extract<Statement, { kind: "expression" }>,
  rest: readonly Statement[]
): Res<StmtRes> => {
  const env = scope.env;
  const afterAt = srclocAfter("expr stmt", stmt.span, at);
  const evaluated = evalExpr(ctxt, at, env, stmt.expression);
  const value = evaluated.result.value;
  const mode = ctxt.mode;

  if (mode.kind === "step" && value.kind === "prim" && value.prim.kind === "exited") {
    expectEmptyTail(afterAt, rest);
    return res(evaluated.lifts, { env, rets: [] });
  }

  if (mode.kind === "step" && value.kind === "form") {
    const form = value.form;
    if (form.kind === "part-only-answer") {
      expectNull(at, afterAt, form.value);
      const penvs = new Map(mode.penvs).set(form.who, form.env);
      return keepLifts(
        [{ kind: "only", at: form.at, who: form.who, stmts: evaluated.lifts }],
        evalStmts(withMode(ctxt, { ...mode, penvs }), afterAt, scope, rest)
      );
    }
    if (form.kind === "to-consensus" && form.pending === undefined) {
      return evalToConsensusStmt(
        ctxt,
        mode,
        at,
        afterAt,
        scope,
        form,
        evaluated.lifts,
        rest
      );
    }
  }

  if (
    mode.kind === "consensus-step" &&
    value.kind === "prim" &&
    value.prim.kind === "committed"
  ) {
    const introduced = env.difference(mode.roundEnv);
    const penvs = mapEnvs(mode.penvs, (_, penv) => penv.merge(afterAt, introduced));
    trace(ctxt, "commit", { introduced: introduced.names() });
    const stepCtxt = withMode(ctxt, {
      kind: "step",
      addresses: mode.addresses,
      penvs,
    });
    const k = evalStmts(stepCtxt, afterAt, scope, rest);
    return res(
      [...evaluated.lifts, { kind: "from-consensus", at, stmts: k.lifts }],
      k.result
    );
  }

  expectNull(at, afterAt, value);
  return keepLifts(evaluated.lifts, evalStmts(ctxt, afterAt, scope, rest));
};
