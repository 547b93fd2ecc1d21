export * from "./ast/index.js";
export * from "./diagnostics/index.js";
export * from "./ir/types.js";
export {
  formatArg,
  formatExpr,
  formatProgram,
  formatStmts,
  formatType,
  formatVar,
} from "./ir/print.js";
export { elaborate, type ElaborateResult } from "./pipeline.js";
export {
  compileBundle,
  compileDApp,
  type CompileOptions,
} from "./semantics/program.js";
export {
  elaborateModule,
  evalLibs,
  type ElaboratedLibraries,
  type Libraries,
} from "./semantics/modules.js";
export { Env } from "./semantics/env.js";
export { baseEnv } from "./semantics/base-env.js";
export { STDLIB_MODULE_ID, stdlibModule } from "./semantics/stdlib.js";
export type { SecurityLevel, SVal, Value } from "./semantics/values.js";
export type { SrcLoc } from "./semantics/srcloc.js";
export { compatibleVersion, version, versionHeader } from "./version.js";
