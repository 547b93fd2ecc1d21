import type { Bundle } from "../ast/index.js";
import { trace, traceEnabledByDefault } from "../debug.js";
import type { InteractEnv, Program, SLType } from "../ir/types.js";
import { IdCounter, type Ctxt, type Scope } from "./context.js";
import { displayValueType } from "./display.js";
import type { Env } from "./env.js";
import { emitDiagnostic, impossible } from "./errors.js";
import { evalStmts } from "./eval/statements.js";
import { evalLibs } from "./modules.js";
import { ensurePublic } from "./security.js";
import { srclocAt, srclocTop } from "./srcloc.js";
import { secretVal, type SVal, type Value } from "./values.js";

export type CompileOptions = {
  /** Exported binding of the entry module holding the program. Defaults to `main`. */
  top?: string;
  /** Print evaluator trace output. Defaults to `DEBUG_ELAB=1`. */
  trace?: boolean;
};

type Participant = Extract<Value, { kind: "participant" }>;

const expectParticipant = (sval: SVal): Participant =>
  sval.value.kind === "participant"
    ? sval.value
    : impossible(srclocTop, "program participant is not a participant");

const interactTypes = (participant: Participant): InteractEnv => {
  const { interact } = participant;
  if (interact.kind !== "object") {
    return impossible(participant.at, "interact is not an object");
  }
  const types: Record<string, SLType> = {};
  for (const [name, field] of interact.fields.entries()) {
    const value = field.value;
    if (value.kind !== "prim" || value.prim.kind !== "interact") {
      return impossible(participant.at, `interact field ${name} is not an interact primitive`);
    }
    types[name] = value.prim.type;
  }
  return types;
};

/** Elaborates the body of a `Reach.App` in step mode, with one private environment per participant. */
export const compileDApp = (top: Value, stdlib: Env, traceOn = false): Program => {
  if (top.kind !== "prim" || top.prim.kind !== "app-delay") {
    return emitDiagnostic({
      at: srclocTop,
      code: "TY0021",
      params: { valueType: displayValueType(top) },
    });
  }
  const app = top.prim;
  const at = srclocAt("compileDApp", undefined, app.at);
  const participants = app.participants.map(expectParticipant);

  const penvs = new Map(
    participants.map((participant): [string, Env] => [
      participant.who,
      app.env.insert(at, "interact", secretVal(participant.interact)),
    ])
  );
  const ctxt: Ctxt = {
    mode: { kind: "step", addresses: new Map(), penvs },
    counter: new IdCounter(),
    stack: [],
    stdlib,
    trace: traceOn,
  };
  const scope: Scope = { mustReturn: "cannot-return", env: app.env };
  trace(ctxt, "program", { participants: participants.map((part) => part.who) });
  const body = evalStmts(ctxt, at, scope, app.body);

  return {
    at,
    participants: Object.fromEntries(
      participants.map((participant) => [participant.who, interactTypes(participant)])
    ),
    stmts: body.lifts,
  };
};

/**
 * Elaborates a bundle of parsed modules. The last module is the entry; its
 * exported `top` binding must be a program built with `Reach.App`.
 */
export const compileBundle = (bundle: Bundle, options: CompileOptions = {}): Program => {
  const top = options.top ?? "main";
  const traceOn = options.trace ?? traceEnabledByDefault();
  const entry = bundle.modules.at(-1);
  if (!entry) return impossible(srclocTop, "compileBundle: no modules");

  const { libs, stdlib } = evalLibs(bundle.modules, traceOn);
  const exports = libs.get(entry.id) ?? impossible(srclocTop, `missing module ${entry.id}`);
  const binding = exports.lookup(srclocTop, top);
  return compileDApp(ensurePublic(srclocTop, binding), stdlib, traceOn);
};
