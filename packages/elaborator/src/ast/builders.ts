import type {
  BlockStmt,
  Declarator,
  Expression,
  ModuleItem,
  ObjectProperty,
  Radix,
  Statement,
} from "./nodes.js";

// Terse constructors for surface trees. Spans are left unset.

export const id = (name: string): Expression => ({ kind: "identifier", name });

export const num = (value: number | bigint | string, radix: Radix = 10): Expression => ({
  kind: "number",
  raw: String(value),
  radix,
});

export const bool = (value: boolean): Expression => ({
  kind: "literal",
  value: value ? "true" : "false",
});

export const nul = (): Expression => ({ kind: "literal", value: "null" });

export const str = (text: string): Expression => ({
  kind: "string",
  raw: JSON.stringify(text),
});

export const arr = (...elements: Expression[]): Expression => ({
  kind: "array",
  elements,
});

export const obj = (...properties: ObjectProperty[]): Expression => ({
  kind: "object",
  properties,
});

export const field = (name: string, value: Expression): ObjectProperty => ({
  kind: "init",
  key: { kind: "ident", name },
  value,
});

export const spread = (argument: Expression): ObjectProperty => ({
  kind: "spread",
  argument,
});

export const call = (callee: Expression, ...args: Expression[]): Expression => ({
  kind: "call",
  callee,
  arguments: args,
});

export const dot = (object: Expression, name: string): Expression => ({
  kind: "member",
  object,
  property: id(name),
});

/** `receiver.method(args)`. */
export const invoke = (
  receiver: Expression,
  method: string,
  ...args: Expression[]
): Expression => call(dot(receiver, method), ...args);

export const index = (object: Expression, idx: Expression): Expression => ({
  kind: "index",
  object,
  index: idx,
});

export const bin = (operator: string, left: Expression, right: Expression): Expression => ({
  kind: "binary",
  operator,
  left,
  right,
});

export const unary = (operator: string, argument: Expression): Expression => ({
  kind: "unary",
  operator,
  argument,
});

export const cond = (
  test: Expression,
  consequent: Expression,
  alternate: Expression
): Expression => ({ kind: "conditional", test, consequent, alternate });

export const arrow = (
  params: readonly string[],
  body: readonly Statement[] | Expression
): Expression => ({
  kind: "arrow",
  params,
  body: isStatementList(body) ? block(...body) : body,
});

export const fnExpr = (
  params: readonly string[],
  body: readonly Statement[],
  name?: string
): Expression => ({ kind: "function", name, params, body: block(...body) });

export const block = (...body: Statement[]): BlockStmt => ({ kind: "block", body });

export const decl = (target: Expression, init: Expression): Declarator => ({
  target,
  init,
});

export const constDecl = (name: string, init: Expression): Statement => ({
  kind: "const",
  declarations: [decl(id(name), init)],
});

export const constTuple = (names: readonly string[], init: Expression): Statement => ({
  kind: "const",
  declarations: [decl(arr(...names.map(id)), init)],
});

export const varDecl = (names: readonly string[], init: Expression): Statement => ({
  kind: "var",
  declarations: [decl(arr(...names.map(id)), init)],
});

export const exprStmt = (expression: Expression): Statement => ({
  kind: "expression",
  expression,
});

export const methodCall = (callee: Expression, ...args: Expression[]): Statement => ({
  kind: "method-call",
  callee,
  arguments: args,
});

export const ret = (argument?: Expression): Statement => ({ kind: "return", argument });

export const ifStmt = (
  test: Expression,
  consequent: Statement,
  alternate?: Statement
): Statement => ({ kind: "if", test, consequent, alternate });

export const fnDecl = (
  name: string | undefined,
  params: readonly string[],
  body: readonly Statement[]
): Statement => ({
  kind: "function-declaration",
  name,
  params,
  body: block(...body),
});

export const assign = (target: Expression, value: Expression, operator = "="): Statement => ({
  kind: "assign",
  operator,
  target,
  value,
});

export const cont = (): Statement => ({ kind: "continue" });

export const whileStmt = (test: Expression, body: readonly Statement[]): Statement => ({
  kind: "while",
  test,
  body: block(...body),
});

/**
 * The only admitted loop shape:
 * `var [vars] = init; invariant(inv); while (test) { body }`.
 */
export const loop = ({
  vars,
  init,
  invariant,
  test,
  body,
}: {
  vars: readonly string[];
  init: Expression;
  invariant: Expression;
  test: Expression;
  body: readonly Statement[];
}): Statement[] => [
  varDecl(vars, init),
  methodCall(id("invariant"), invariant),
  whileStmt(test, body),
];

/** `[vars] = [values]; continue;` */
export const continueWith = (
  vars: readonly string[],
  values: readonly Expression[]
): Statement[] => [assign(arr(...vars.map(id)), arr(...values)), cont()];

export const header = (text: string): ModuleItem => ({
  kind: "statement",
  statement: exprStmt({ kind: "string", raw: JSON.stringify(text) }),
});

export const stmtItem = (statement: Statement): ModuleItem => ({
  kind: "statement",
  statement,
});

export const exportItem = (statement: Statement): ModuleItem => ({
  kind: "export",
  statement,
});

export const importItem = (source: string): ModuleItem => ({ kind: "import", source });

const isStatementList = (
  body: readonly Statement[] | Expression
): body is readonly Statement[] => Array.isArray(body);
