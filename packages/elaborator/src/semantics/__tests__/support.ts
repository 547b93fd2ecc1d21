import {
  build,
  type Bundle,
  type Expression,
  type ModuleItem,
  type Statement,
} from "../../ast/index.js";
import { DiagnosticError, type Diagnostic } from "../../diagnostics/index.js";
import { versionHeader } from "../../version.js";
import { IdCounter, type Ctxt, type Mode } from "../context.js";
import type { Env } from "../env.js";
import { evalLibs } from "../modules.js";

/** Runs `elaborate` and returns the diagnostic it failed with. */
export const diagnosticOf = (elaborate: () => unknown): Diagnostic => {
  try {
    elaborate();
  } catch (error) {
    if (error instanceof DiagnosticError) return error.diagnostic;
    throw error;
  }
  throw new Error("expected elaboration to fail");
};

export const moduleOf = (id: string, ...items: ModuleItem[]) => ({
  id,
  items: [build.header(versionHeader), ...items],
});

/**
 * A one-module bundle exporting `main = Reach.App({}, [["A", iface]], (A) => {...body})`.
 */
export const appBundle = (
  body: readonly Statement[],
  iface: Expression = build.obj()
): Bundle => {
  const { arr, arrow, call, constDecl, dot, exportItem, id, obj, str } = build;
  const app = call(
    dot(id("Reach"), "App"),
    obj(),
    arr(arr(str("A"), iface)),
    arrow(["A"], body)
  );
  return { modules: [moduleOf("app.rsh", exportItem(constDecl("main", app)))] };
};

/** Base environment plus the standard library, as every user module sees it. */
export const stdlibEnv = (): Env => evalLibs([], false).stdlib;

export const consensusMode = (roundEnv: Env): Mode => ({
  kind: "consensus-step",
  roundEnv,
  addresses: new Map(),
  penvs: new Map(),
});

/** A context for evaluating directly; module mode gets no id counter. */
export const testCtxt = (mode: Mode, stdlib: Env): Ctxt => ({
  mode,
  counter: mode.kind === "module" || mode.kind === "local" ? undefined : new IdCounter(),
  stack: [],
  stdlib,
  trace: false,
});
