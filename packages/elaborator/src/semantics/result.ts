import type { DLStmts } from "../ir/types.js";
import type { Env } from "./env.js";
import { impossible } from "./errors.js";
import type { SrcLoc } from "./srcloc.js";
import type { SVal } from "./values.js";

/** An evaluation result together with the IR statements it emitted, in order. */
export type Res<T> = {
  lifts: DLStmts;
  result: T;
};

export const res = <T>(lifts: DLStmts, result: T): Res<T> => ({ lifts, result });

export const pure = <T>(result: T): Res<T> => ({ lifts: [], result });

/** Prepends `lifts` to the lifts of `r`. */
export const keepLifts = <T>(lifts: DLStmts, r: Res<T>): Res<T> =>
  lifts.length === 0 ? r : { lifts: [...lifts, ...r.lifts], result: r.result };

export const cannotLift = <T>(at: SrcLoc, what: string, r: Res<T>): T =>
  r.lifts.length === 0 ? r.result : impossible(at, `${what} had lifts`);

export type ReturnPoint = {
  at: SrcLoc;
  value: SVal;
};

export type StmtRes = {
  env: Env;
  rets: readonly ReturnPoint[];
};

export type AppRes = {
  env: Env;
  value: SVal;
};
