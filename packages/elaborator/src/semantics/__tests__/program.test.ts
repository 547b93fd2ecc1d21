import { describe, expect, it } from "vitest";
import { build, type Expression, type Statement } from "../../ast/index.js";
import { T_Fun, T_UInt256 } from "../../ir/types.js";
import { formatProgram } from "../../ir/print.js";
import { compileBundle } from "../program.js";
import { appBundle, diagnosticOf } from "./support.js";

const {
  arr,
  arrow,
  bin,
  block,
  call,
  bool,
  constDecl,
  constTuple,
  dot,
  exprStmt,
  field,
  id,
  ifStmt,
  invoke,
  num,
  obj,
  ret,
} = build;

const stmt = (expression: Expression): Statement => exprStmt(expression);

const only = (who: string, body: readonly Statement[]): Statement =>
  stmt(invoke(id(who), "only", arrow([], body)));

const getter = (name: string, range: string) =>
  obj(field(name, call(id("Fun"), arr(), id(range))));

const compile = (body: readonly Statement[], iface = obj()) =>
  formatProgram(compileBundle(appBundle(body, iface)));

describe("consensus rounds", () => {
  it("publishes a value computed in a local step", () => {
    const program = compile([
      only("A", [constDecl("x", num(1))]),
      stmt(invoke(id("A"), "publish", id("x"))),
      stmt(call(id("assert"), bin("==", id("x"), num(1)))),
    ]);
    expect(program).toBe(
      [
        "participant A {}",
        "only(A) {",
        "  prompt s0 {",
        "  }",
        "}",
        "only(A) {",
        "}",
        "toConsensus(A, join v2) publish [v1 = 1] pay 0 {",
        "  let v3: UInt256 = TXN_VALUE();",
        "  let v4: Bool = PEQ(0, v3);",
        "  require(v4);",
        "  let v5: Bool = PEQ(v1, 1);",
        "  assert(v5);",
        "}",
      ].join("\n")
    );
  });

  it("makes bindings from the round visible to every participant after commit", () => {
    const program = compile([
      only("A", [constDecl("y", num(7))]),
      stmt(invoke(id("A"), "publish")),
      constDecl("z", num(5)),
      stmt(call(id("commit"))),
      only("A", [constDecl("w", bin("+", id("z"), id("y")))]),
      stmt(invoke(id("A"), "publish", id("w"))),
    ]);
    expect(program).toBe(
      [
        "participant A {}",
        "only(A) {",
        "  prompt s0 {",
        "  }",
        "}",
        "only(A) {",
        "}",
        "toConsensus(A, join v1) publish [] pay 0 {",
        "  let v2: UInt256 = TXN_VALUE();",
        "  let v3: Bool = PEQ(0, v2);",
        "  require(v3);",
        "  commit {",
        "    only(A) {",
        "      prompt s4 {",
        "      }",
        "    }",
        "    only(A) {",
        "    }",
        "    toConsensus(A, again v1) publish [v5 = 12] pay 0 {",
        "      let v6: UInt256 = TXN_VALUE();",
        "      let v7: Bool = PEQ(0, v6);",
        "      require(v7);",
        "    }",
        "  }",
        "}",
      ].join("\n")
    );
  });

  it("reads interact results and declassifies them for publication", () => {
    const compiled = compileBundle(
      appBundle(
        [
          only("A", [
            constDecl("x", call(id("declassify"), call(dot(id("interact"), "getX")))),
          ]),
          stmt(invoke(id("A"), "publish", id("x"))),
        ],
        getter("getX", "UInt256")
      )
    );
    expect(compiled.participants).toEqual({ A: { getX: T_Fun([], T_UInt256) } });
    expect(formatProgram(compiled)).toBe(
      [
        "participant A { getX: Fun([], UInt256) }",
        "only(A) {",
        "  prompt s0 {",
        "    let v1: UInt256 = interact(A.getX)();",
        "  }",
        "}",
        "only(A) {",
        "}",
        "toConsensus(A, join v3) publish [v2 = v1] pay 0 {",
        "  let v4: UInt256 = TXN_VALUE();",
        "  let v5: Bool = PEQ(0, v4);",
        "  require(v5);",
        "}",
      ].join("\n")
    );
  });

  it("refuses to publish a secret", () => {
    const diagnostic = diagnosticOf(() =>
      compile(
        [
          only("A", [constDecl("s", call(dot(id("interact"), "getX")))]),
          stmt(invoke(id("A"), "publish", id("s"))),
        ],
        getter("getX", "UInt256")
      )
    );
    expect(diagnostic.code).toBe("TY0014");
    expect(diagnostic.message).toBe("Invalid access of secret value (uint256)");
  });

  it("rejects publishing twice in one round", () => {
    const diagnostic = diagnosticOf(() =>
      compile([stmt(invoke(invoke(id("A"), "publish"), "publish"))])
    );
    expect(diagnostic.code).toBe("TY0029");
    expect(diagnostic.message).toBe("Invalid double publish.");
  });

  it("rejects paying twice in one round", () => {
    const diagnostic = diagnosticOf(() =>
      compile([stmt(invoke(invoke(id("A"), "pay", num(1)), "pay", num(2)))])
    );
    expect(diagnostic.message).toBe("Invalid double toConsensus.");
  });

  it("accepts pay followed by publish", () => {
    const program = compile([stmt(invoke(invoke(id("A"), "pay", num(3)), "publish"))]);
    expect(program).toBe(
      [
        "participant A {}",
        "only(A) {",
        "}",
        "toConsensus(A, join v0) publish [] pay 3 {",
        "  let v1: UInt256 = TXN_VALUE();",
        "  let v2: Bool = PEQ(3, v1);",
        "  require(v2);",
        "}",
      ].join("\n")
    );
  });

  it("transfers to a participant that has joined", () => {
    const program = compile([
      stmt(invoke(id("A"), "pay", num(5))),
      stmt(invoke(call(id("transfer"), num(5)), "to", id("A"))),
      stmt(call(id("commit"))),
    ]);
    expect(program).toBe(
      [
        "participant A {}",
        "only(A) {",
        "}",
        "toConsensus(A, join v0) publish [] pay 5 {",
        "  let v1: UInt256 = TXN_VALUE();",
        "  let v2: Bool = PEQ(5, v1);",
        "  require(v2);",
        "  transfer(5).to(v0);",
        "  commit {",
        "  }",
        "}",
      ].join("\n")
    );
  });

  it("branches on a published value", () => {
    const finish = block(stmt(call(id("commit"))), stmt(call(id("exit"))));
    const program = compile(
      [
        only("A", [
          constDecl("flip", call(id("declassify"), call(dot(id("interact"), "getB")))),
        ]),
        stmt(invoke(id("A"), "publish", id("flip"))),
        ifStmt(id("flip"), finish, finish),
      ],
      getter("getB", "Bool")
    );
    expect(program).toBe(
      [
        "participant A { getB: Fun([], Bool) }",
        "only(A) {",
        "  prompt s0 {",
        "    let v1: Bool = interact(A.getB)();",
        "  }",
        "}",
        "only(A) {",
        "}",
        "toConsensus(A, join v3) publish [v2 = v1] pay 0 {",
        "  let v4: UInt256 = TXN_VALUE();",
        "  let v5: Bool = PEQ(0, v4);",
        "  require(v5);",
        "  if (v2) {",
        "    commit {",
        "      exit();",
        "    }",
        "  } else {",
        "    commit {",
        "      exit();",
        "    }",
        "  }",
        "}",
      ].join("\n")
    );
  });
});

describe("mode checks", () => {
  it("keeps transfer inside consensus steps", () => {
    const diagnostic = diagnosticOf(() =>
      compile([stmt(invoke(call(id("transfer"), num(1)), "to", id("A")))])
    );
    expect(diagnostic.code).toBe("MO0001");
    expect(diagnostic.message).toBe(
      "Invalid operation. `transfer` cannot be used in context: step"
    );
  });

  it("requires exit to end the program", () => {
    const diagnostic = diagnosticOf(() =>
      compile([stmt(call(id("exit"))), stmt(invoke(id("A"), "publish"))])
    );
    expect(diagnostic.code).toBe("SX0017");
    expect(diagnostic.message).toBe(
      "Invalid statement block. Expected empty tail, but found 1 more statements"
    );
  });

  it("rejects a return at the top of the program", () => {
    const diagnostic = diagnosticOf(() => compile([ret(num(1))]));
    expect(diagnostic.code).toBe("MO0003");
    expect(diagnostic.message).toBe("Nowhere to return to");
  });

  it("checks the shape of only", () => {
    const diagnostic = diagnosticOf(() =>
      compile([stmt(invoke(id("A"), "only", arrow([], []), arrow([], [])))])
    );
    expect(diagnostic.code).toBe("SX0022");
    expect(diagnostic.message).toBe("Invalid args for only. Expected 1 but got 2");
  });

  it("rejects arguments to exit", () => {
    const diagnostic = diagnosticOf(() => compile([stmt(call(id("exit"), num(1)))]));
    expect(diagnostic.code).toBe("TY0017");
    expect(diagnostic.message).toBe("Invalid args for exit. got: [uint256]");
  });

  it("requires only blocks to produce null", () => {
    const diagnostic = diagnosticOf(() =>
      compile([stmt(invoke(id("A"), "only", arrow([], num(1))))])
    );
    expect(diagnostic.code).toBe("TY0018");
    expect(diagnostic.message).toBe("Invalid block result type. Expected Null, got uint256");
  });
});

describe("timeouts", () => {
  const exitHandler = arrow([], [stmt(call(id("exit")))]);

  it("lifts the delay before the round and runs the handler in the timeout branch", () => {
    const program = compile([
      stmt(invoke(invoke(id("A"), "publish"), "timeout", call(id("digest"), num(1)), exitHandler)),
    ]);
    expect(program).toBe(
      [
        "participant A {}",
        "let v3: UInt256 = digest(1);",
        "only(A) {",
        "}",
        "toConsensus(A, join v0) publish [] pay 0 {",
        "  let v1: UInt256 = TXN_VALUE();",
        "  let v2: Bool = PEQ(0, v1);",
        "  require(v2);",
        "}",
        "timeout(v3) {",
        "  exit();",
        "}",
      ].join("\n")
    );
  });

  it("requires a UInt256 delay", () => {
    const diagnostic = diagnosticOf(() =>
      compile([stmt(invoke(invoke(id("A"), "publish"), "timeout", bool(true), exitHandler))])
    );
    expect(diagnostic.code).toBe("TY0022");
    expect(diagnostic.message).toBe("Type mismatch. Expected uint256, but got bool");
  });
});

describe("closures in consensus", () => {
  const publishFlip = [
    only("A", [constDecl("flip", call(id("declassify"), call(dot(id("interact"), "getB"))))]),
    stmt(invoke(id("A"), "publish", id("flip"))),
  ];

  it("joins several returns in a prompt variable", () => {
    const pick = arrow(["c"], [ifStmt(id("c"), block(ret(num(1))), block(ret(num(2))))]);
    const program = compile(
      [...publishFlip, constDecl("pick", pick), constDecl("r", call(id("pick"), id("flip")))],
      getter("getB", "Bool")
    );
    expect(program).toBe(
      [
        "participant A { getB: Fun([], Bool) }",
        "only(A) {",
        "  prompt s0 {",
        "    let v1: Bool = interact(A.getB)();",
        "  }",
        "}",
        "only(A) {",
        "}",
        "toConsensus(A, join v3) publish [v2 = v1] pay 0 {",
        "  let v4: UInt256 = TXN_VALUE();",
        "  let v5: Bool = PEQ(0, v4);",
        "  require(v5);",
        "  prompt v6: UInt256 {",
        "    if (v2) {",
        "      return s6 1;",
        "    } else {",
        "      return s6 2;",
        "    }",
        "  }",
        "}",
      ].join("\n")
    );
  });

  it("requires every return to have the same type", () => {
    const pick = arrow(["c"], [ifStmt(id("c"), block(ret(num(1))), block(ret(bool(true))))]);
    const diagnostic = diagnosticOf(() =>
      compile(
        [...publishFlip, constDecl("pick", pick), constDecl("r", call(id("pick"), id("flip")))],
        getter("getB", "Bool")
      )
    );
    expect(diagnostic.code).toBe("TY0025");
  });

  it("inlines a closure with a single trailing return", () => {
    const program = compile([
      stmt(invoke(id("A"), "publish")),
      constDecl("five", arrow([], num(5))),
      stmt(call(id("assert"), bin("==", call(id("five")), num(5)))),
    ]);
    expect(program).toBe(
      [
        "participant A {}",
        "only(A) {",
        "}",
        "toConsensus(A, join v0) publish [] pay 0 {",
        "  let v1: UInt256 = TXN_VALUE();",
        "  let v2: Bool = PEQ(0, v1);",
        "  require(v2);",
        "  assert(true);",
        "}",
      ].join("\n")
    );
  });
});

describe("destructuring", () => {
  const publishPair = [
    only("A", [constDecl("p", arr(num(1), bool(true)))]),
    stmt(invoke(id("A"), "publish", id("p"))),
  ];

  it("projects each element of a tuple variable", () => {
    const program = compile([...publishPair, constTuple(["a", "b"], id("p"))]);
    expect(program).toBe(
      [
        "participant A {}",
        "only(A) {",
        "  prompt s0 {",
        "  }",
        "}",
        "only(A) {",
        "}",
        "toConsensus(A, join v2) publish [v1 = [1, true]] pay 0 {",
        "  let v3: UInt256 = TXN_VALUE();",
        "  let v4: Bool = PEQ(0, v3);",
        "  require(v4);",
        "  let v5: UInt256 = v1[0];",
        "  let v6: Bool = v1[1];",
        "}",
      ].join("\n")
    );
  });

  it("requires one name per element", () => {
    const diagnostic = diagnosticOf(() =>
      compile([...publishPair, constTuple(["a", "b", "c"], id("p"))])
    );
    expect(diagnostic.code).toBe("TY0003");
    expect(diagnostic.message).toBe(
      "Invalid array binding. nIdents:3 does not match nVals:2"
    );
  });
});

describe("compileBundle", () => {
  it("elaborates the binding named by top", () => {
    const alias = build.exportItem(constDecl("other", id("main")));
    const renamed = {
      modules: appBundle([]).modules.map((source) => ({
        ...source,
        items: [...source.items, alias],
      })),
    };
    expect(formatProgram(compileBundle(renamed, { top: "other" }))).toBe("participant A {}");
  });
});
