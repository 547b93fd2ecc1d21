import { z } from "zod";
import type {
  BlockStmt,
  Bundle,
  Expression,
  ObjectProperty,
  PropertyName,
  Statement,
} from "@rsh/elaborator";

// Shape of the JSON bundle an external parser hands to the CLI.

const span = z
  .object({
    file: z.string(),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  })
  .optional();

const names = z.array(z.string());

const expression: z.ZodType<Expression> = z.lazy(() => expressionUnion);
const statement: z.ZodType<Statement> = z.lazy(() => statementUnion);

const blockObject = z.object({
  kind: z.literal("block"),
  body: z.array(statement),
  span,
});
const block: z.ZodType<BlockStmt> = blockObject;

const propertyName: z.ZodType<PropertyName> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ident"), name: z.string(), span }),
  z.object({ kind: z.literal("string"), raw: z.string(), span }),
  z.object({ kind: z.literal("number"), raw: z.string(), span }),
  z.object({ kind: z.literal("computed"), expression, span }),
]);

const objectProperty: z.ZodType<ObjectProperty> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("init"), key: propertyName, value: expression, span }),
  z.object({ kind: z.literal("shorthand"), name: z.string(), span }),
  z.object({ kind: z.literal("spread"), argument: expression, span }),
  z.object({
    kind: z.literal("method"),
    key: propertyName,
    params: names,
    body: block,
    span,
  }),
]);

const expressionUnion = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("identifier"), name: z.string(), span }),
  z.object({
    kind: z.literal("number"),
    raw: z.string(),
    radix: z.union([z.literal(10), z.literal(16), z.literal(8)]),
    span,
  }),
  z.object({ kind: z.literal("literal"), value: z.string(), span }),
  z.object({ kind: z.literal("string"), raw: z.string(), span }),
  z.object({ kind: z.literal("array"), elements: z.array(expression), span }),
  z.object({ kind: z.literal("object"), properties: z.array(objectProperty), span }),
  z.object({
    kind: z.literal("call"),
    callee: expression,
    arguments: z.array(expression),
    span,
  }),
  z.object({ kind: z.literal("member"), object: expression, property: expression, span }),
  z.object({ kind: z.literal("index"), object: expression, index: expression, span }),
  z.object({
    kind: z.literal("binary"),
    operator: z.string(),
    left: expression,
    right: expression,
    span,
  }),
  z.object({ kind: z.literal("unary"), operator: z.string(), argument: expression, span }),
  z.object({ kind: z.literal("paren"), expression, span }),
  z.object({
    kind: z.literal("conditional"),
    test: expression,
    consequent: expression,
    alternate: expression,
    span,
  }),
  z.object({
    kind: z.literal("arrow"),
    params: names,
    body: z.union([block, expression]),
    span,
  }),
  z.object({
    kind: z.literal("function"),
    name: z.string().optional(),
    params: names,
    body: block,
    span,
  }),
  z.object({
    kind: z.literal("rejected-expression"),
    construct: z.enum([
      "assign",
      "await",
      "class",
      "comma",
      "generator",
      "new",
      "postfix",
      "regex",
      "spread",
      "template",
      "var-init",
      "yield",
    ]),
    span,
  }),
]);

const declarator = z.object({ target: expression, init: expression.optional(), span });

const statementUnion = z.discriminatedUnion("kind", [
  blockObject,
  z.object({ kind: z.literal("const"), declarations: z.array(declarator), span }),
  z.object({ kind: z.literal("var"), declarations: z.array(declarator), span }),
  z.object({ kind: z.literal("continue"), span }),
  z.object({
    kind: z.literal("function-declaration"),
    name: z.string().optional(),
    params: names,
    body: block,
    span,
  }),
  z.object({
    kind: z.literal("if"),
    test: expression,
    consequent: statement,
    alternate: statement.optional(),
    span,
  }),
  z.object({ kind: z.literal("empty"), span }),
  z.object({ kind: z.literal("expression"), expression, span }),
  z.object({
    kind: z.literal("method-call"),
    callee: expression,
    arguments: z.array(expression),
    span,
  }),
  z.object({
    kind: z.literal("assign"),
    operator: z.string(),
    target: expression,
    value: expression,
    span,
  }),
  z.object({ kind: z.literal("return"), argument: expression.optional(), span }),
  z.object({ kind: z.literal("while"), test: expression, body: statement, span }),
  z.object({
    kind: z.literal("rejected-statement"),
    construct: z.enum([
      "async function",
      "break",
      "class",
      "do while",
      "for",
      "for in",
      "for of",
      "for var",
      "for var in",
      "for var of",
      "for let",
      "for let in",
      "for let of",
      "for const",
      "for const in",
      "for const of",
      "generator",
      "labelled",
      "let",
      "switch",
      "throw",
      "try",
      "with",
    ]),
    span,
  }),
]);

const moduleItem = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("import"), source: z.string(), span }),
  z.object({ kind: z.literal("rejected-import"), construct: z.string(), span }),
  z.object({ kind: z.literal("export"), statement, span }),
  z.object({ kind: z.literal("rejected-export"), construct: z.string(), span }),
  z.object({ kind: z.literal("statement"), statement, span }),
]);

export const bundleSchema: z.ZodType<Bundle> = z.object({
  modules: z.array(z.object({ id: z.string(), items: z.array(moduleItem) })),
});

export class BundleFormatError extends Error {
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`invalid bundle ${source}:\n${issues.map((issue) => `  ${issue}`).join("\n")}`);
    this.issues = issues;
  }
}

const formatIssue = (issue: z.ZodIssue): string => {
  const path = issue.path.length ? issue.path.join(".") : "<root>";
  return `${path}: ${issue.message}`;
};

/** Validates decoded JSON against the bundle shape. `source` names the input in errors. */
export const parseBundle = (json: unknown, source: string): Bundle => {
  const parsed = bundleSchema.safeParse(json);
  if (!parsed.success) {
    throw new BundleFormatError(source, parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
};
