import { describe, expect, it } from "vitest";
import { build, type Expression } from "../../ast/index.js";
import { InternalError } from "../../diagnostics/index.js";
import { versionHeader } from "../../version.js";
import { evalLibs } from "../modules.js";
import { STDLIB_MODULE_ID } from "../stdlib.js";
import { diagnosticOf, moduleOf } from "./support.js";

const { bin, bool, call, constDecl, exportItem, exprStmt, id, importItem, num, stmtItem } =
  build;

describe("module elaboration", () => {
  it("folds top-level constants", () => {
    const { libs } = evalLibs(
      [moduleOf("m.rsh", exportItem(constDecl("x", bin("+", num(1), num(2)))))],
      false
    );
    expect(libs.get("m.rsh")?.get("x")).toMatchObject({
      level: "public",
      value: { kind: "int", value: 3n },
    });
  });

  it("exports only what export statements bind", () => {
    const lib = moduleOf("lib.rsh", exportItem(constDecl("y", num(5))));
    const main = moduleOf(
      "main.rsh",
      importItem("lib.rsh"),
      stmtItem(constDecl("hidden", num(1))),
      exportItem(constDecl("z", bin("+", id("y"), id("hidden"))))
    );
    const { libs } = evalLibs([lib, main], false);
    const exports = libs.get("main.rsh");
    expect(exports?.names()).toEqual(["z"]);
    expect(exports?.get("z")?.value).toMatchObject({ kind: "int", value: 6n });
  });

  it("elaborates the standard library first", () => {
    const { libs, stdlib } = evalLibs([], false);
    expect(libs.get(STDLIB_MODULE_ID)?.names()).toEqual([
      "not",
      "neq",
      "bytes_neq",
      "and",
      "or",
      "minus",
    ]);
    expect(stdlib.has("Reach")).toBe(true);
    expect(stdlib.has("minus")).toBe(true);
  });

  it("requires the version header", () => {
    const diagnostic = diagnosticOf(() => evalLibs([{ id: "m.rsh", items: [] }], false));
    expect(diagnostic.code).toBe("MD0001");
    expect(diagnostic.message).toBe(
      `Invalid source file. Expected header '${versionHeader}'; at top of file.`
    );
    expect(diagnostic.span).toEqual({ file: "m.rsh", start: 0, end: 0 });
  });

  it("rejects a header for another version", () => {
    const source = {
      id: "m.rsh",
      items: [build.header("reach 9.9"), stmtItem(constDecl("x", num(1)))],
    };
    expect(diagnosticOf(() => evalLibs([source], false)).code).toBe("MD0001");
  });

  it("rejects top-level statements that emit code", () => {
    const source = moduleOf("m.rsh", stmtItem(exprStmt(call(id("assert"), bool(true)))));
    const diagnostic = diagnosticOf(() => evalLibs([source], false));
    expect(diagnostic.code).toBe("MD0002");
  });

  it("rejects calls to standard-library closures at the top level", () => {
    const source = moduleOf(
      "m.rsh",
      stmtItem(constDecl("b", bin("&&", bool(true), bool(false))))
    );
    const diagnostic = diagnosticOf(() => evalLibs([source], false));
    expect(diagnostic.code).toBe("MO0002");
    expect(diagnostic.message).toBe("Illegal lift in context: module");
  });

  it("rejects array sizes outside the safe integer range", () => {
    const arrayOf = (size: Expression) =>
      diagnosticOf(() =>
        evalLibs(
          [moduleOf("m.rsh", stmtItem(constDecl("T", call(id("Array"), id("UInt256"), size))))],
          false
        )
      );
    expect(arrayOf(bin("-", num(0), num(1))).message).toBe(
      "Invalid array size. Expected 0 to 9007199254740991, got: -1"
    );
    const huge = arrayOf(num("9007199254740992"));
    expect(huge.code).toBe("TY0030");
    expect(huge.message).toBe(
      "Invalid array size. Expected 0 to 9007199254740991, got: 9007199254740992"
    );
  });

  it("reports unbound names against everything in scope", () => {
    const source = moduleOf("m.rsh", stmtItem(constDecl("a", id("b"))));
    const diagnostic = diagnosticOf(() => evalLibs([source], false));
    expect(diagnostic.message).toBe(
      'Invalid unbound identifier: b. Did you mean: ["or","Fun","and","neq","not"]'
    );
  });

  it("rejects rebinding a name from the standard library", () => {
    const source = moduleOf("m.rsh", stmtItem(constDecl("and", num(1))));
    const diagnostic = diagnosticOf(() => evalLibs([source], false));
    expect(diagnostic.code).toBe("BD0002");
    expect(diagnostic.message).toBe("Invalid name shadowing. Cannot be rebound: and");
  });

  it("treats an import of an unknown module as an internal error", () => {
    const source = moduleOf("main.rsh", importItem("missing.rsh"));
    expect(() => evalLibs([source], false)).toThrow(InternalError);
    const diagnostic = diagnosticOf(() => evalLibs([source], false));
    expect(diagnostic.code).toBe("IN0001");
    expect(diagnostic.phase).toBe("internal");
    expect(diagnostic.context).toBe("import");
  });

  it("names rejected import and export shapes", () => {
    const badImport = moduleOf("m.rsh", {
      kind: "rejected-import",
      construct: "import * as lib",
    });
    expect(diagnosticOf(() => evalLibs([badImport], false)).message).toBe(
      "Invalid import syntax: import * as lib"
    );
    const badExport = moduleOf("m.rsh", {
      kind: "rejected-export",
      construct: "export default",
    });
    expect(diagnosticOf(() => evalLibs([badExport], false)).message).toBe(
      "Invalid export syntax: export default"
    );
  });

  it("rejects statements outside the language", () => {
    const source = moduleOf("m.rsh", stmtItem({ kind: "rejected-statement", construct: "for of" }));
    const diagnostic = diagnosticOf(() => evalLibs([source], false));
    expect(diagnostic.code).toBe("SX0001");
    expect(diagnostic.message).toBe("Invalid statement: for of");
    expect(diagnostic.context).toBe("for of");
  });
});
