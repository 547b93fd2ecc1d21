import { build, type BlockStmt, type Expression, type Statement } from "../../ast/index.js";
import { emitDiagnostic } from "../errors.js";
import type { SrcLoc } from "../srcloc.js";

export const trimQuotes = (raw: string): string => raw.slice(1, -1);

/** Statements of an arrow body; an expression body returns its value. */
export const arrowStatements = (body: BlockStmt | Expression): readonly Statement[] =>
  body.kind === "block" ? body.body : [build.ret(body)];

export const expectIdentifier = (at: SrcLoc, expr: Expression): string =>
  expr.kind === "identifier"
    ? expr.name
    : emitDiagnostic({ at, code: "SX0023", params: { construct: expr.kind } });

export const dropEmpty = (stmts: readonly Statement[]): readonly Statement[] =>
  stmts.filter((stmt) => stmt.kind !== "empty");

export const expectEmptyTail = (at: SrcLoc, rest: readonly Statement[]): void => {
  if (rest.length > 0) {
    emitDiagnostic({ at, code: "SX0017", params: { remaining: rest.length } });
  }
};
