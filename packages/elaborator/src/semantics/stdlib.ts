import { build, type SourceModule } from "../ast/index.js";
import { versionHeader } from "../version.js";

const {
  bin,
  bool,
  call,
  cond,
  exportItem,
  fnDecl,
  header,
  id,
  num,
  ret,
} = build;

export const STDLIB_MODULE_ID = "<stdlib>";

/**
 * Helpers the operator desugaring refers to by name: `!x` is `not(x)`,
 * `a && b` is `and(a, b)`, `-x` is `minus(x)` and so on.
 */
export const stdlibModule: SourceModule = {
  id: STDLIB_MODULE_ID,
  items: [
    header(versionHeader),
    exportItem(fnDecl("not", ["x"], [ret(cond(id("x"), bool(false), bool(true)))])),
    exportItem(
      fnDecl("neq", ["x", "y"], [ret(call(id("not"), bin("==", id("x"), id("y"))))])
    ),
    exportItem(
      fnDecl("bytes_neq", ["x", "y"], [
        ret(call(id("not"), bin("===", id("x"), id("y")))),
      ])
    ),
    exportItem(fnDecl("and", ["x", "y"], [ret(cond(id("x"), id("y"), bool(false)))])),
    exportItem(fnDecl("or", ["x", "y"], [ret(cond(id("x"), bool(true), id("y")))])),
    exportItem(fnDecl("minus", ["x"], [ret(bin("-", num(0), id("x")))])),
  ],
};
