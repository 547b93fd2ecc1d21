import type { Expression } from "../../ast/index.js";
import { build } from "../../ast/index.js";
import { illegalContext, withMode, type Ctxt } from "../context.js";
import { displayValueType } from "../display.js";
import { Env } from "../env.js";
import { emitDiagnostic, impossible } from "../errors.js";
import { cannotLift, pure, res, type Res } from "../result.js";
import { displaySrcLoc, srclocAt, type SrcLoc } from "../srcloc.js";
import {
  formValue,
  primValue,
  publicVal,
  secretVal,
  type Form,
  type SVal,
  type Value,
} from "../values.js";
import { evalApplyVals } from "./apply.js";
import { evalExprs } from "./expressions.js";
import { arrowStatements, expectIdentifier } from "./shared.js";

/** The interaction object of a participant: each declared field becomes an interact primitive. */
export const makeInteract = (at: SrcLoc, who: string, spec: Env): Value => {
  const fields = spec.entries().map(([method, sval]): [string, SVal] => {
    if (sval.level !== "public" || sval.value.kind !== "type") {
      return emitDiagnostic({
        at,
        code: "TY0019",
        params: { level: sval.level, valueType: displayValueType(sval.value) },
      });
    }
    return [
      method,
      secretVal(primValue({ kind: "interact", at, who, method, type: sval.value.type })),
    ];
  });
  return { kind: "object", at, fields: Env.fromEntries(at, fields) };
};

const makeParticipant = (at: SrcLoc, spec: Value): SVal => {
  if (spec.kind === "tuple" && spec.elements.length === 2) {
    const [name, iface] = spec.elements;
    if (name?.kind === "bytes" && iface?.kind === "object") {
      return secretVal({
        kind: "participant",
        at: spec.at,
        who: name.value,
        interact: makeInteract(iface.at, name.value, iface.fields),
      });
    }
  }
  return emitDiagnostic({ at, code: "TY0020", params: {} });
};

const evalApp = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  args: readonly Expression[]
): Res<SVal> => {
  if (ctxt.mode.kind !== "module") {
    return illegalContext(ctxt, at, "Reach.App");
  }
  const [optionsExpr, partsExpr, program] = args;
  if (args.length !== 3 || !optionsExpr || !partsExpr || program?.kind !== "arrow") {
    return emitDiagnostic({ at, code: "SX0021", params: { count: args.length } });
  }
  const [options, parts] = cannotLift(
    at,
    "App args",
    evalExprs(ctxt, at, env, [optionsExpr, partsExpr])
  ).map((sval) => sval.value);
  if (options?.kind !== "object" || parts?.kind !== "tuple") {
    return emitDiagnostic({ at, code: "SX0021", params: { count: args.length } });
  }

  const participants = parts.elements.map((part) => makeParticipant(at, part));
  if (program.params.length !== participants.length) {
    return emitDiagnostic({
      at,
      code: "TY0001",
      params: {
        expected: program.params.length,
        got: participants.length,
        definedAt: displaySrcLoc(at),
      },
    });
  }
  let programEnv = env;
  program.params.forEach((param, index) => {
    const participant = participants[index];
    if (participant) programEnv = programEnv.insert(at, param, participant);
  });

  return pure(
    publicVal(
      primValue({
        kind: "app-delay",
        at,
        options: options.fields,
        participants,
        body: arrowStatements(program.body),
        env: programEnv,
      })
    )
  );
};

/**
 * `Participant.only(() => ...)`: the closure is built in the participant's
 * private environment, then applied as a local step.
 */
const evalPartOnly = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  participant: Value,
  args: readonly Expression[]
): Res<SVal> => {
  if (participant.kind !== "participant") {
    return impossible(at, "only form without a participant");
  }
  if (ctxt.mode.kind !== "step") {
    return illegalContext(ctxt, at, "part.only");
  }
  const who = participant.who;
  const penv = ctxt.mode.penvs.get(who) ?? impossible(at, `no environment for ${who}`);

  const localCtxt: Ctxt = { ...withMode(ctxt, { kind: "local" }), counter: undefined };
  const evaluated = evalExprs(localCtxt, at, penv, args);
  const [only] = evaluated.result;
  if (evaluated.result.length !== 1 || only?.value.kind !== "closure") {
    return emitDiagnostic({
      at,
      code: "SX0022",
      params: { form: "only", expected: 1, got: args.length },
    });
  }
  const closure = only.value;

  const freeVars = evalExprs(ctxt, at, env, closure.params.map((param) => build.id(param)));
  const applied = evalApplyVals(
    withMode(ctxt, { kind: "local-step" }),
    at,
    penv,
    closure,
    freeVars.result
  );
  const localEnv = closure.params.reduce(
    (acc, param) => acc.delete(param),
    applied.result.env
  );

  return res(
    [...freeVars.lifts, ...evaluated.lifts, ...applied.lifts],
    publicVal(
      formValue({
        kind: "part-only-answer",
        at,
        who,
        env: localEnv,
        value: applied.result.value.value,
      })
    )
  );
};

const evalToConsensus = (
  ctxt: Ctxt,
  at: SrcLoc,
  form: Extract<Form, { kind: "to-consensus" }>,
  args: readonly Expression[]
): Res<SVal> => {
  if (ctxt.mode.kind !== "step") {
    return illegalContext(ctxt, at, "toConsensus");
  }
  const next = (update: Partial<typeof form>): Res<SVal> =>
    pure(publicVal(formValue({ ...form, ...update, pending: undefined })));

  switch (form.pending) {
    case "publish":
      if (form.publish) {
        return emitDiagnostic({ at, code: "TY0029", params: { mode: "publish" } });
      }
      return next({ publish: args.map((arg) => expectIdentifier(at, arg)) });
    case "pay": {
      if (form.pay) {
        return emitDiagnostic({ at, code: "TY0029", params: { mode: "pay" } });
      }
      const [amount] = args;
      if (args.length !== 1 || !amount) {
        return emitDiagnostic({
          at,
          code: "SX0022",
          params: { form: "pay", expected: 1, got: args.length },
        });
      }
      return next({ pay: amount });
    }
    case "timeout": {
      if (form.timeout) {
        return emitDiagnostic({ at, code: "TY0029", params: { mode: "timeout" } });
      }
      const [delay, handler] = args;
      if (
        args.length !== 2 ||
        !delay ||
        handler?.kind !== "arrow" ||
        handler.params.length !== 0
      ) {
        return emitDiagnostic({ at, code: "SX0020", params: { count: args.length } });
      }
      return next({
        timeout: { at, delay, body: arrowStatements(handler.body) },
      });
    }
    case undefined:
      return emitDiagnostic({
        at,
        code: "TY0006",
        params: { valueType: displayValueType(formValue(form)) },
      });
  }
};

/** Applies a syntax form to its unevaluated arguments. */
export const evalForm = (
  ctxt: Ctxt,
  at: SrcLoc,
  env: Env,
  form: Form,
  args: readonly Expression[]
): Res<SVal> => {
  switch (form.kind) {
    case "app":
      return evalApp(ctxt, at, env, args);
    case "part-only":
      return evalPartOnly(ctxt, at, env, form.participant, args);
    case "part-only-answer":
      return impossible(at, "part-only-answer applied");
    case "to-consensus":
      return evalToConsensus(ctxt, srclocAt("toConsensus", undefined, at), form, args);
  }
};
