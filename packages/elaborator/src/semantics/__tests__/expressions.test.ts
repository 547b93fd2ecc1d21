import { describe, expect, it } from "vitest";
import { build, type Expression } from "../../ast/index.js";
import { T_Bool, T_Tuple, T_UInt256, type DLVar } from "../../ir/types.js";
import { formatStmts } from "../../ir/print.js";
import type { Env } from "../env.js";
import { evalExpr } from "../eval/expressions.js";
import { srclocTop } from "../srcloc.js";
import { dlvarValue, publicVal } from "../values.js";
import { consensusMode, diagnosticOf, stdlibEnv, testCtxt } from "./support.js";

const { arr, bin, call, cond, dot, field, id, index, num, obj, spread, str, unary } = build;

const stdlib = stdlibEnv();

const variable = (slot: number, type: DLVar["type"]): DLVar => ({
  at: srclocTop,
  name: `var${slot}`,
  type,
  id: slot,
});

const withVars = (...vars: DLVar[]): Env =>
  vars.reduce(
    (env, dv) => env.insert(srclocTop, dv.name, publicVal(dlvarValue(dv))),
    stdlib
  );

const inModule = (expr: Expression, env: Env = stdlib) =>
  evalExpr(testCtxt({ kind: "module" }, stdlib), srclocTop, env, expr);

const inConsensus = (expr: Expression, env: Env = stdlib) =>
  evalExpr(testCtxt(consensusMode(env), stdlib), srclocTop, env, expr);

describe("constant folding", () => {
  it("folds integer arithmetic without lifting", () => {
    const evaluated = inModule(bin("+", num(1), num(2)));
    expect(evaluated.lifts).toEqual([]);
    expect(evaluated.result.level).toBe("public");
    expect(evaluated.result.value).toMatchObject({ kind: "int", value: 3n });
  });

  it("folds comparisons to booleans", () => {
    const evaluated = inModule(bin("<=", num("0x10", 16), num(16)));
    expect(evaluated.result.value).toMatchObject({ kind: "bool", value: true });
  });

  it("desugars operators through the standard library", () => {
    expect(inConsensus(unary("!", bin("==", num(1), num(1)))).result.value).toMatchObject({
      kind: "bool",
      value: false,
    });
    const yes = build.bool(true);
    const evaluated = inConsensus(bin("&&", cond(yes, yes, build.bool(false)), yes));
    expect(evaluated.lifts).toEqual([]);
    expect(evaluated.result.value).toMatchObject({ kind: "bool", value: true });
  });

  it("lifts an operation on a variable", () => {
    const x = variable(40, T_UInt256);
    const evaluated = inConsensus(bin("*", id("var40"), num(2)), withVars(x));
    expect(formatStmts(evaluated.lifts)).toBe("let v0: UInt256 = MUL(v40, 2);");
    expect(evaluated.result.value).toMatchObject({
      kind: "dlvar",
      dv: { id: 0, type: T_UInt256 },
    });
  });

  it("refuses to lift where no ids can be allocated", () => {
    const diagnostic = diagnosticOf(() => inModule(call(id("digest"), num(1))));
    expect(diagnostic.code).toBe("MO0002");
    expect(diagnostic.message).toBe("Illegal lift in context: module");
  });
});

describe("literals", () => {
  it("parses hex and octal numbers", () => {
    expect(inModule(num("0xff", 16)).result.value).toMatchObject({ value: 255n });
    expect(inModule(num("017", 8)).result.value).toMatchObject({ value: 15n });
  });

  it("rejects malformed numbers", () => {
    const diagnostic = diagnosticOf(() => inModule(num("12a")));
    expect(diagnostic.code).toBe("SX0016");
    expect(diagnostic.message).toBe("Invalid literal: 12a");
  });

  it("strips quotes from strings", () => {
    expect(inModule(str("hello")).result.value).toMatchObject({
      kind: "bytes",
      value: "hello",
    });
  });

  it("rejects unknown operators", () => {
    const diagnostic = diagnosticOf(() => inModule(bin("in", num(1), num(2))));
    expect(diagnostic.message).toBe("Invalid binary operator: in");
  });

  it("rejects expressions outside the language", () => {
    const diagnostic = diagnosticOf(() =>
      inModule({ kind: "rejected-expression", construct: "new" })
    );
    expect(diagnostic.code).toBe("SX0002");
    expect(diagnostic.message).toBe("Invalid expression syntax: new");
  });

  it("rejects named function expressions", () => {
    const diagnostic = diagnosticOf(() => inModule(build.fnExpr(["x"], [], "named")));
    expect(diagnostic.code).toBe("SX0008");
  });
});

describe("objects", () => {
  it("merges spread fields after explicit ones", () => {
    const evaluated = inModule(obj(field("a", num(1)), spread(obj(field("b", num(2))))));
    const value = evaluated.result.value;
    expect(value.kind === "object" ? value.fields.names() : []).toEqual(["a", "b"]);
  });

  it("spreads only objects", () => {
    const diagnostic = diagnosticOf(() => inModule(obj(spread(num(1)))));
    expect(diagnostic.code).toBe("TY0016");
    expect(diagnostic.message).toBe("Invalid object spread. Expected object, got: uint256");
  });

  it("rejects method fields", () => {
    const method = {
      kind: "method" as const,
      key: { kind: "ident" as const, name: "f" },
      params: [],
      body: build.block(),
    };
    const diagnostic = diagnosticOf(() => inModule(obj(method)));
    expect(diagnostic.code).toBe("SX0010");
    expect(diagnostic.hints?.[0]?.message).toBe(
      "Instead of {f() {...}}, write {f: () => {...}}."
    );
  });

  it("suggests existing fields on a bad projection", () => {
    const diagnostic = diagnosticOf(() =>
      inModule(dot(obj(field("amount", num(1)), field("owner", num(2))), "amonut"))
    );
    expect(diagnostic.code).toBe("TY0004");
    expect(diagnostic.message).toBe(
      'Invalid field: amonut. Did you mean: ["amount","owner"]'
    );
  });
});

describe("ternary", () => {
  it("keeps only the taken branch's lifts for a known condition", () => {
    const evaluated = inConsensus(
      cond(build.bool(true), call(id("digest"), num(1)), call(id("digest"), num(2)))
    );
    expect(formatStmts(evaluated.lifts)).toBe("let v0: UInt256 = digest(1);");
    expect(evaluated.result.value).toMatchObject({ kind: "dlvar", dv: { id: 0 } });
  });

  it("evaluates the untaken branch too", () => {
    const diagnostic = diagnosticOf(() =>
      inConsensus(cond(build.bool(true), num(1), id("missing")))
    );
    expect(diagnostic.code).toBe("BD0001");
  });

  it("selects with IF_THEN_ELSE when neither branch lifts", () => {
    const c = variable(99, T_Bool);
    const evaluated = inConsensus(cond(id("var99"), num(1), num(2)), withVars(c));
    expect(formatStmts(evaluated.lifts)).toBe(
      "let v0: UInt256 = IF_THEN_ELSE(v99, 1, 2);"
    );
  });

  it("wraps lifting branches in a prompt", () => {
    const c = variable(99, T_Bool);
    const evaluated = inConsensus(
      cond(id("var99"), call(id("digest"), num(1)), num(2)),
      withVars(c)
    );
    expect(formatStmts(evaluated.lifts)).toBe(
      [
        "prompt v1: UInt256 {",
        "  if (v99) {",
        "    let v0: UInt256 = digest(1);",
        "    return s1 v0;",
        "  } else {",
        "    return s1 2;",
        "  }",
        "}",
      ].join("\n")
    );
    expect(evaluated.result.value).toMatchObject({ kind: "dlvar", dv: { id: 1 } });
  });

  it("requires a boolean condition", () => {
    const diagnostic = diagnosticOf(() => inModule(cond(num(1), num(2), num(3))));
    expect(diagnostic.code).toBe("TY0005");
    expect(diagnostic.message).toBe(
      "Invalid if statement. Expected if condition to be bool, got: uint256"
    );
  });
});

describe("element references", () => {
  const triple = arr(num(1), num(2), num(3));

  it("indexes tuples at 0 through N-1", () => {
    expect(inModule(index(triple, num(2))).result.value).toMatchObject({ value: 3n });
  });

  it("rejects N and -1", () => {
    const past = diagnosticOf(() => inConsensus(index(triple, num(3))));
    expect(past.code).toBe("TY0012");
    expect(past.message).toBe("Invalid array index. Expected (0 <= ix < 3), got 3");

    const negative = diagnosticOf(() => inConsensus(index(triple, unary("-", num(1)))));
    expect(negative.code).toBe("TY0012");
    expect(negative.message).toBe("Invalid array index. Expected (0 <= ix < 3), got -1");
  });

  it("projects from tuple variables", () => {
    const t = variable(50, T_Tuple([T_UInt256, T_Bool]));
    const evaluated = inConsensus(index(id("var50"), num(1)), withVars(t));
    expect(formatStmts(evaluated.lifts)).toBe("let v0: Bool = v50[1];");
  });

  it("indexes a homogeneous tuple with a variable", () => {
    const i = variable(7, T_UInt256);
    const evaluated = inConsensus(index(triple, id("var7")), withVars(i));
    expect(formatStmts(evaluated.lifts)).toBe(
      "let v0: UInt256 = array(UInt256, [1, 2, 3])[v7];"
    );
  });
});

describe("makeEnum", () => {
  it("returns a bounds predicate followed by the members", () => {
    const members = inModule(call(id("makeEnum"), num(3))).result.value;
    expect(members.kind).toBe("tuple");
    expect(members.kind === "tuple" ? members.elements.slice(1) : []).toMatchObject([
      { kind: "int", value: 0n },
      { kind: "int", value: 1n },
      { kind: "int", value: 2n },
    ]);
  });

  it("tests membership with the predicate", () => {
    const isMember = (candidate: number) =>
      inConsensus(call(index(call(id("makeEnum"), num(3)), num(0)), num(candidate))).result
        .value;
    expect(isMember(2)).toMatchObject({ kind: "bool", value: true });
    expect(isMember(5)).toMatchObject({ kind: "bool", value: false });
  });
});
