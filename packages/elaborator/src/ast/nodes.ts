import type { SourceSpan } from "../diagnostics/index.js";

/**
 * Surface syntax accepted by the elaborator. Trees are produced by an external
 * parser and are never mutated. Shapes the language does not admit are kept as
 * `rejected` nodes so the elaborator can name them in its diagnostics.
 */
interface NodeBase {
  span?: SourceSpan;
}

export type Radix = 10 | 16 | 8;

export interface IdentifierExpr extends NodeBase {
  kind: "identifier";
  name: string;
}

export interface NumberExpr extends NodeBase {
  kind: "number";
  /** Literal text as written, including any `0x` / `0o` / `0` prefix. */
  raw: string;
  radix: Radix;
}

export interface LiteralExpr extends NodeBase {
  kind: "literal";
  /** `null`, `true` or `false`; anything else is rejected. */
  value: string;
}

export interface StringExpr extends NodeBase {
  kind: "string";
  /** Literal text as written, quotes included. */
  raw: string;
}

export interface ArrayExpr extends NodeBase {
  kind: "array";
  elements: readonly Expression[];
}

export type PropertyName =
  | { kind: "ident"; name: string; span?: SourceSpan }
  | { kind: "string"; raw: string; span?: SourceSpan }
  | { kind: "number"; raw: string; span?: SourceSpan }
  | { kind: "computed"; expression: Expression; span?: SourceSpan };

export type ObjectProperty =
  | { kind: "init"; key: PropertyName; value: Expression; span?: SourceSpan }
  | { kind: "shorthand"; name: string; span?: SourceSpan }
  | { kind: "spread"; argument: Expression; span?: SourceSpan }
  | {
      kind: "method";
      key: PropertyName;
      params: readonly string[];
      body: BlockStmt;
      span?: SourceSpan;
    };

export interface ObjectExpr extends NodeBase {
  kind: "object";
  properties: readonly ObjectProperty[];
}

export interface CallExpr extends NodeBase {
  kind: "call";
  callee: Expression;
  arguments: readonly Expression[];
}

export interface MemberExpr extends NodeBase {
  kind: "member";
  object: Expression;
  property: Expression;
}

export interface IndexExpr extends NodeBase {
  kind: "index";
  object: Expression;
  index: Expression;
}

export interface BinaryExpr extends NodeBase {
  kind: "binary";
  operator: string;
  left: Expression;
  right: Expression;
}

export interface UnaryExpr extends NodeBase {
  kind: "unary";
  operator: string;
  argument: Expression;
}

export interface ParenExpr extends NodeBase {
  kind: "paren";
  expression: Expression;
}

export interface ConditionalExpr extends NodeBase {
  kind: "conditional";
  test: Expression;
  consequent: Expression;
  alternate: Expression;
}

export interface ArrowExpr extends NodeBase {
  kind: "arrow";
  params: readonly string[];
  body: BlockStmt | Expression;
}

export interface FunctionExpr extends NodeBase {
  kind: "function";
  name?: string;
  params: readonly string[];
  body: BlockStmt;
}

export type RejectedExpressionConstruct =
  | "assign"
  | "await"
  | "class"
  | "comma"
  | "generator"
  | "new"
  | "postfix"
  | "regex"
  | "spread"
  | "template"
  | "var-init"
  | "yield";

export interface RejectedExpr extends NodeBase {
  kind: "rejected-expression";
  construct: RejectedExpressionConstruct;
}

export type Expression =
  | IdentifierExpr
  | NumberExpr
  | LiteralExpr
  | StringExpr
  | ArrayExpr
  | ObjectExpr
  | CallExpr
  | MemberExpr
  | IndexExpr
  | BinaryExpr
  | UnaryExpr
  | ParenExpr
  | ConditionalExpr
  | ArrowExpr
  | FunctionExpr
  | RejectedExpr;

export interface Declarator extends NodeBase {
  /** Binding target: an identifier or an array of identifiers. */
  target: Expression;
  init?: Expression;
}

export interface BlockStmt extends NodeBase {
  kind: "block";
  body: readonly Statement[];
}

export interface ConstStmt extends NodeBase {
  kind: "const";
  declarations: readonly Declarator[];
}

export interface VarStmt extends NodeBase {
  kind: "var";
  declarations: readonly Declarator[];
}

export interface ContinueStmt extends NodeBase {
  kind: "continue";
}

export interface FunctionStmt extends NodeBase {
  kind: "function-declaration";
  name?: string;
  params: readonly string[];
  body: BlockStmt;
}

export interface IfStmt extends NodeBase {
  kind: "if";
  test: Expression;
  consequent: Statement;
  alternate?: Statement;
}

export interface EmptyStmt extends NodeBase {
  kind: "empty";
}

export interface ExpressionStmt extends NodeBase {
  kind: "expression";
  expression: Expression;
}

/** `f(args);` written as a statement. */
export interface MethodCallStmt extends NodeBase {
  kind: "method-call";
  callee: Expression;
  arguments: readonly Expression[];
}

export interface AssignStmt extends NodeBase {
  kind: "assign";
  operator: string;
  target: Expression;
  value: Expression;
}

export interface ReturnStmt extends NodeBase {
  kind: "return";
  argument?: Expression;
}

export interface WhileStmt extends NodeBase {
  kind: "while";
  test: Expression;
  body: Statement;
}

export type RejectedStatementConstruct =
  | "async function"
  | "break"
  | "class"
  | "do while"
  | "for"
  | "for in"
  | "for of"
  | "for var"
  | "for var in"
  | "for var of"
  | "for let"
  | "for let in"
  | "for let of"
  | "for const"
  | "for const in"
  | "for const of"
  | "generator"
  | "labelled"
  | "let"
  | "switch"
  | "throw"
  | "try"
  | "with";

export interface RejectedStmt extends NodeBase {
  kind: "rejected-statement";
  construct: RejectedStatementConstruct;
}

export type Statement =
  | BlockStmt
  | ConstStmt
  | VarStmt
  | ContinueStmt
  | FunctionStmt
  | IfStmt
  | EmptyStmt
  | ExpressionStmt
  | MethodCallStmt
  | AssignStmt
  | ReturnStmt
  | WhileStmt
  | RejectedStmt;

export type ModuleItem =
  | { kind: "import"; source: string; span?: SourceSpan }
  | { kind: "rejected-import"; construct: string; span?: SourceSpan }
  | { kind: "export"; statement: Statement; span?: SourceSpan }
  | { kind: "rejected-export"; construct: string; span?: SourceSpan }
  | { kind: "statement"; statement: Statement; span?: SourceSpan };

export interface SourceModule {
  /** Stable module identity; imports refer to it verbatim. */
  id: string;
  items: readonly ModuleItem[];
}

/** Modules in dependency order. The last one is the entry module. */
export interface Bundle {
  modules: readonly SourceModule[];
}
