import type {
  CallFrame,
  CallStack,
  DLExpr,
  DLStmt,
  DLVar,
  SLType,
} from "../ir/types.js";
import { displayMode } from "./display.js";
import type { Env } from "./env.js";
import { emitDiagnostic } from "./errors.js";
import type { SrcLoc } from "./srcloc.js";

export type PartAddresses = ReadonlyMap<string, DLVar>;
export type PartEnvs = ReadonlyMap<string, Env>;

/**
 * Where in the consensus protocol evaluation currently is. Each mode admits a
 * different set of constructs; see the statement evaluator.
 */
export type Mode =
  | { kind: "module" }
  | { kind: "step"; addresses: PartAddresses; penvs: PartEnvs }
  | { kind: "local" }
  | { kind: "local-step" }
  | {
      kind: "consensus-step";
      /** Shared environment as it stood when the round opened. */
      roundEnv: Env;
      addresses: PartAddresses;
      penvs: PartEnvs;
    };

/** Fresh IR ids for one elaboration segment. */
export class IdCounter {
  private next: number;

  constructor(start = 0) {
    this.next = start;
  }

  take(): number {
    const id = this.next;
    this.next += 1;
    return id;
  }
}

export type Ctxt = {
  mode: Mode;
  /** Absent where lifting is not allowed. */
  counter?: IdCounter;
  stack: CallStack;
  /** Names on the left of the declaration being evaluated. */
  localNames?: readonly string[];
  /** Environment synthetic closures are built against. */
  stdlib: Env;
  trace: boolean;
};

export type ReturnStyle =
  | "implicit-null"
  | "need-explicit"
  | "cannot-return"
  | "may-be-empty";

export type Scope = {
  ret?: number;
  mustReturn: ReturnStyle;
  env: Env;
  /** Loop variable name to its IR slot, inside a while body. */
  whileVars?: ReadonlyMap<string, DLVar>;
};

export const withMode = (ctxt: Ctxt, mode: Mode): Ctxt => ({ ...ctxt, mode });

export const pushFrame = (ctxt: Ctxt, frame: CallFrame): Ctxt => ({
  ...ctxt,
  stack: [frame, ...ctxt.stack],
});

export const withLocalNames = (ctxt: Ctxt, names: readonly string[]): Ctxt => ({
  ...ctxt,
  localNames: names,
});

/** Display name for a lifted variable, e.g. `x (as prim)`. */
export const localName = (ctxt: Ctxt, fallback: string): string => {
  const names = ctxt.localNames;
  if (!names) return fallback;
  const as = ` (as ${fallback})`;
  const [only] = names;
  if (names.length === 1 && only !== undefined) return `${only}${as}`;
  return `one of ${JSON.stringify(names)}${as}`;
};

export const allocId = (ctxt: Ctxt, at: SrcLoc): number => {
  if (!ctxt.counter) {
    return emitDiagnostic({
      at,
      code: "MO0002",
      params: { mode: displayMode(ctxt.mode) },
    });
  }
  return ctxt.counter.take();
};

export const allocVar = (
  ctxt: Ctxt,
  at: SrcLoc,
  name: string,
  type: SLType
): DLVar => ({ at, name, type, id: allocId(ctxt, at) });

/** Binds `expr` to a fresh variable and returns it with the `let` that defines it. */
export const liftExpr = (
  ctxt: Ctxt,
  at: SrcLoc,
  name: string,
  type: SLType,
  expr: DLExpr
): [DLVar, DLStmt[]] => {
  const dv = allocVar(ctxt, at, localName(ctxt, name), type);
  return [dv, [{ kind: "let", at, dv, expr }]];
};

export const illegalContext = (ctxt: Ctxt, at: SrcLoc, operation: string): never =>
  emitDiagnostic({
    at,
    code: "MO0001",
    params: { mode: displayMode(ctxt.mode), operation },
  });
