import type { ModuleItem, SourceModule, Statement } from "../ast/index.js";
import { trace } from "../debug.js";
import { versionHeader } from "../version.js";
import { baseEnv } from "./base-env.js";
import type { Ctxt, Scope } from "./context.js";
import { Env } from "./env.js";
import { emitDiagnostic, emitInternal } from "./errors.js";
import { evalStmts } from "./eval/statements.js";
import { trimQuotes } from "./eval/shared.js";
import { srclocAfter, srclocAt, srclocFile, srclocTop, type SrcLoc } from "./srcloc.js";
import { STDLIB_MODULE_ID, stdlibModule } from "./stdlib.js";

/** Export environments of the modules elaborated so far, by module id. */
export type Libraries = ReadonlyMap<string, Env>;

const moduleCtxt = (stdlib: Env, traceOn: boolean): Ctxt => ({
  mode: { kind: "module" },
  stack: [],
  stdlib,
  trace: traceOn,
});

const headerSpan = (items: readonly ModuleItem[]) => {
  const [first, ...rest] = items;
  if (first?.kind !== "statement") return undefined;
  const stmt = first.statement;
  if (stmt.kind !== "expression" || stmt.expression.kind !== "string") return undefined;
  if (trimQuotes(stmt.expression.raw) !== versionHeader) return undefined;
  return { span: stmt.span ?? first.span, rest };
};

/**
 * Elaborates one module's top level against `env` and returns the bindings
 * its export statements introduced.
 */
export const elaborateModule = (
  ctxt: Ctxt,
  source: SourceModule,
  libs: Libraries,
  env: Env
): Env => {
  const fileAt = srclocFile(source.id);
  const header = headerSpan(source.items);
  if (!header) {
    return emitDiagnostic({ at: fileAt, code: "MD0001", params: { expected: versionHeader } });
  }
  trace(ctxt, "module", { id: source.id, items: header.rest.length });

  let moduleEnv = env;
  let exports = Env.empty;
  let at = srclocAfter("header", header.span, fileAt);

  const doStmt = (stmtAt: SrcLoc, isExport: boolean, stmt: Statement): void => {
    const scope: Scope = { mustReturn: "cannot-return", env: moduleEnv };
    const evaluated = evalStmts(ctxt, stmtAt, scope, [stmt]);
    if (evaluated.lifts.length > 0 || evaluated.result.rets.length > 0) {
      emitDiagnostic({ at: stmtAt, code: "MD0002", params: {} });
    }
    if (isExport) {
      exports = exports.merge(stmtAt, evaluated.result.env.difference(moduleEnv));
    }
    moduleEnv = evaluated.result.env;
    at = stmtAt;
  };

  for (const item of header.rest) {
    switch (item.kind) {
      case "import": {
        const importAt = srclocAt("import", item.span, at);
        const lib =
          libs.get(item.source) ??
          emitInternal({ at: importAt, code: "IN0001", params: { moduleId: item.source } });
        moduleEnv = moduleEnv.merge(importAt, lib);
        at = srclocAfter("import", item.span, at);
        break;
      }
      case "rejected-import":
        return emitDiagnostic({
          at,
          code: "SX0012",
          params: { construct: item.construct },
        });
      case "export":
        doStmt(srclocAt("export", item.span, at), true, item.statement);
        break;
      case "rejected-export":
        return emitDiagnostic({
          at: srclocAt("export", item.span, at),
          code: "SX0013",
          params: { construct: item.construct },
        });
      case "statement":
        doStmt(at, false, item.statement);
        break;
    }
  }
  return exports;
};

export type ElaboratedLibraries = {
  libs: Libraries;
  /** Base environment plus the standard library exports; every user module starts here. */
  stdlib: Env;
};

/**
 * Elaborates the standard library and then every module in order. Each
 * module sees only the modules before it.
 */
export const evalLibs = (
  modules: readonly SourceModule[],
  traceOn: boolean
): ElaboratedLibraries => {
  const stdlibExports = elaborateModule(
    moduleCtxt(baseEnv, traceOn),
    stdlibModule,
    new Map(),
    baseEnv
  );
  const stdlib = baseEnv.merge(srclocTop, stdlibExports);
  const ctxt = moduleCtxt(stdlib, traceOn);

  const libs = new Map<string, Env>([[STDLIB_MODULE_ID, stdlibExports]]);
  for (const source of modules) {
    libs.set(source.id, elaborateModule(ctxt, source, libs, stdlib));
  }
  return { libs, stdlib };
};
