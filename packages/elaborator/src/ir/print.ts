import { typeOfMaybe } from "../semantics/types.js";
import type { Value } from "../semantics/values.js";
import type {
  DLArg,
  DLAssignment,
  DLBlock,
  DLConstant,
  DLExpr,
  DLStmt,
  DLStmts,
  DLVar,
  Program,
  SLType,
} from "./types.js";

const INDENT = "  ";

export const formatType = (type: SLType): string => {
  switch (type.kind) {
    case "null":
      return "Null";
    case "bool":
      return "Bool";
    case "uint256":
      return "UInt256";
    case "bytes":
      return "Bytes";
    case "address":
      return "Address";
    case "fun":
      return `Fun([${type.domain.map(formatType).join(", ")}], ${formatType(type.range)})`;
    case "array":
      return `Array(${formatType(type.element)}, ${type.size})`;
    case "tuple":
      return `Tuple(${type.elements.map(formatType).join(", ")})`;
    case "object": {
      const fields = Object.entries(type.fields).map(
        ([name, field]) => `${name}: ${formatType(field)}`
      );
      return `Object({${fields.join(", ")}})`;
    }
    case "forall":
      return `Forall(${type.variable}, ${formatType(type.body)})`;
    case "var":
      return type.name;
  }
};

export const formatVar = (dv: DLVar): string => `v${dv.id}`;

const formatConstant = (constant: DLConstant): string => {
  switch (constant.kind) {
    case "null":
      return "null";
    case "bool":
    case "int":
      return String(constant.value);
    case "bytes":
      return JSON.stringify(constant.value);
  }
};

const formatArgs = (args: readonly DLArg[]): string => args.map(formatArg).join(", ");

export const formatArg = (arg: DLArg): string => {
  switch (arg.kind) {
    case "var":
      return formatVar(arg.dv);
    case "con":
      return formatConstant(arg.constant);
    case "array":
      return `array(${formatType(arg.element)}, [${formatArgs(arg.elements)}])`;
    case "tuple":
      return `[${formatArgs(arg.elements)}]`;
    case "object": {
      const fields = Object.entries(arg.fields).map(
        ([name, field]) => `${name}: ${formatArg(field)}`
      );
      return `{${fields.join(", ")}}`;
    }
    case "interact":
      return `interact(${arg.who}.${arg.method})`;
  }
};

export const formatExpr = (expr: DLExpr): string => {
  switch (expr.kind) {
    case "arg":
      return formatArg(expr.arg);
    case "prim-op":
      return `${expr.op}(${formatArgs(expr.args)})`;
    case "array-ref":
      return `${formatArg(expr.array)}[${formatArg(expr.index)}]`;
    case "tuple-ref":
      return `${formatArg(expr.tuple)}[${expr.index}]`;
    case "object-ref":
      return `${formatArg(expr.object)}.${expr.field}`;
    case "interact":
      return `interact(${expr.who}.${expr.method})(${formatArgs(expr.args)})`;
    case "digest":
      return `digest(${formatArgs(expr.args)})`;
  }
};

/** Returned values are still elaborator values; those with no runtime form print by kind. */
const formatReturned = (value: Value): string => {
  const typed = typeOfMaybe(value);
  return typed ? formatArg(typed[1]) : `<${value.kind}>`;
};

const formatAssignment = (assignment: DLAssignment): string =>
  `[${assignment.map(([dv, arg]) => `${formatVar(dv)} = ${formatArg(arg)}`).join(", ")}]`;

const pad = (depth: number): string => INDENT.repeat(depth);

const blockLines = (block: DLBlock, depth: number): string[] => [
  ...stmtsLines(block.stmts, depth),
  `${pad(depth)}${formatArg(block.result)}`,
];

const stmtLines = (stmt: DLStmt, depth: number): string[] => {
  const line = (text: string): string => `${pad(depth)}${text}`;
  const nested = (head: string, stmts: DLStmts): string[] => [
    line(`${head} {`),
    ...stmtsLines(stmts, depth + 1),
    line("}"),
  ];

  switch (stmt.kind) {
    case "let":
      return [
        line(
          `let ${formatVar(stmt.dv)}: ${formatType(stmt.dv.type)} = ${formatExpr(stmt.expr)};`
        ),
      ];
    case "claim":
      return [line(`${stmt.claim}(${formatArg(stmt.arg)});`)];
    case "transfer":
      return [line(`transfer(${formatArg(stmt.amount)}).to(${formatArg(stmt.to)});`)];
    case "stop":
      return [line("exit();")];
    case "only":
      return nested(`only(${stmt.who})`, stmt.stmts);
    case "to-consensus": {
      const published = stmt.msgVars.map((dv, index) => {
        const arg = stmt.msgArgs[index];
        return arg ? `${formatVar(dv)} = ${formatArg(arg)}` : formatVar(dv);
      });
      const head =
        `toConsensus(${stmt.who}, ${stmt.from.kind} ${formatVar(stmt.from.address)})` +
        ` publish [${published.join(", ")}] pay ${formatArg(stmt.amount)}`;
      const lines = nested(head, stmt.stmts);
      if (!stmt.timeout) return lines;
      return [
        ...lines,
        ...nested(`timeout(${formatArg(stmt.timeout.delay)})`, stmt.timeout.stmts),
      ];
    }
    case "from-consensus":
      return nested("commit", stmt.stmts);
    case "if":
      return [
        line(`if (${formatArg(stmt.cond)}) {`),
        ...stmtsLines(stmt.then, depth + 1),
        line("} else {"),
        ...stmtsLines(stmt.else, depth + 1),
        line("}"),
      ];
    case "return":
      return [line(`return s${stmt.slot} ${formatReturned(stmt.value)};`)];
    case "prompt": {
      const target =
        stmt.target.kind === "slot"
          ? `s${stmt.target.slot}`
          : `${formatVar(stmt.target.dv)}: ${formatType(stmt.target.dv.type)}`;
      return nested(`prompt ${target}`, stmt.stmts);
    }
    case "while":
      return [
        line(`loop ${formatAssignment(stmt.assignment)}`),
        line(`invariant {`),
        ...blockLines(stmt.invariant, depth + 1),
        line("}"),
        line(`while {`),
        ...blockLines(stmt.cond, depth + 1),
        line("}"),
        ...nested("do", stmt.body),
      ];
    case "continue":
      return [line(`continue ${formatAssignment(stmt.assignment)};`)];
  }
};

const stmtsLines = (stmts: DLStmts, depth: number): string[] =>
  stmts.flatMap((stmt) => stmtLines(stmt, depth));

export const formatStmts = (stmts: DLStmts): string => stmtsLines(stmts, 0).join("\n");

/** Participant interfaces followed by the statement tree, one statement per line. */
export const formatProgram = (program: Program): string => {
  const participants = Object.entries(program.participants).map(([who, iface]) => {
    const fields = Object.entries(iface).map(([name, type]) => `${name}: ${formatType(type)}`);
    return `participant ${who} {${fields.length ? ` ${fields.join(", ")} ` : ""}}`;
  });
  return [...participants, ...stmtsLines(program.stmts, 0)].join("\n");
};
