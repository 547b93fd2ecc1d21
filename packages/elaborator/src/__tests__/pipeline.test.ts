import { describe, expect, it } from "vitest";
import { build } from "../ast/index.js";
import { elaborate } from "../pipeline.js";
import { appBundle, moduleOf } from "../semantics/__tests__/support.js";

describe("elaborate", () => {
  it("returns the program and no diagnostics on success", () => {
    const result = elaborate(appBundle([]), { trace: false });
    expect(result.diagnostics).toEqual([]);
    expect(result.program?.participants).toEqual({ A: {} });
    expect(result.program?.stmts).toEqual([]);
  });

  it("reports a top binding that is not an app", () => {
    const bundle = {
      modules: [moduleOf("app.rsh", build.exportItem(build.constDecl("main", build.num(1))))],
    };
    const { program, diagnostics } = elaborate(bundle, { trace: false });
    expect(program).toBeUndefined();
    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["TY0021"]);
    expect(diagnostics[0]?.message).toBe(
      "Invalid compilation target. Expected App, but got uint256"
    );
  });

  it("reports a missing top binding", () => {
    const { diagnostics } = elaborate(appBundle([]), { top: "nope", trace: false });
    expect(diagnostics[0]?.code).toBe("BD0001");
  });

  it("reports an empty bundle as an internal error", () => {
    const { diagnostics } = elaborate({ modules: [] }, { trace: false });
    expect(diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "internal compiler error: compileBundle: no modules",
    ]);
  });
});
