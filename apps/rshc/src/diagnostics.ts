import { readFileSync } from "node:fs";
import type { Diagnostic, DiagnosticSeverity, SourceSpan } from "@rsh/elaborator";

type Position = { index: number; line: number; column: number };

type SpanContext = {
  start: Position;
  end: Position;
  lineText?: string;
};

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const clampIndex = (value: number, max: number): number => Math.min(Math.max(value, 0), max);

const positionAt = (source: string, index: number): Position => {
  const before = source.slice(0, index);
  const lineStart = before.lastIndexOf("\n") + 1;
  return { index, line: before.split("\n").length, column: index - lineStart };
};

/** Reads the span's file; spans into files that cannot be read get no context. */
const resolveSpanContext = (
  span: SourceSpan,
  readSource: (file: string) => string | undefined
): SpanContext | undefined => {
  const source = readSource(span.file);
  if (source === undefined) return undefined;

  const boundedStart = clampIndex(span.start, source.length);
  const boundedEnd = clampIndex(span.end, source.length);
  const start = positionAt(source, boundedStart);
  const end = positionAt(source, Math.max(boundedEnd, boundedStart));
  return { start, end, lineText: source.split("\n")[start.line - 1] };
};

const readSourceFile = (file: string): string | undefined => {
  try {
    return readFileSync(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error) return undefined;
    throw error;
  }
};

const colorForSeverity = (severity: DiagnosticSeverity): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    case "error":
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) => bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const formatSnippet = ({
  diagnostic,
  span,
  color,
}: {
  diagnostic: Diagnostic;
  span: SpanContext;
  color: Colorizer;
}): string | undefined => {
  if (!span.lineText) return undefined;

  const { lineText, start, end } = span;
  const lineEnd = start.index - start.column + lineText.length;
  const highlightEnd = Math.min(Math.max(end.index, start.index + 1), lineEnd);
  const pointerLength = Math.max(1, highlightEnd - start.index);
  const gutter = `${start.line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column)}${color.pointer(
    diagnostic.severity,
    "^".repeat(pointerLength)
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

export type CliDiagnosticOptions = {
  color?: boolean;
  /** Source lookup for snippets; defaults to reading the span's file from disk. */
  readSource?: (file: string) => string | undefined;
};

/**
 * One header line per diagnostic (`file:line:col SEVERITY [phase] CODE: message`),
 * followed by a source snippet when the file is readable and any hints.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: CliDiagnosticOptions = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const context = resolveSpanContext(diagnostic.span, options.readSource ?? readSourceFile);
  const { span } = diagnostic;
  const location = context
    ? `${span.file}:${context.start.line}:${context.start.column + 1}`
    : `${span.file}:${span.start}-${span.end}`;
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const inContext = diagnostic.context ? ` (in ${diagnostic.context})` : "";
  const header =
    `${location} ${color.severityLabel(diagnostic.severity)}${phase} ` +
    `${color.accent(diagnostic.code)}: ${diagnostic.message}${inContext}`;
  const snippet = context ? formatSnippet({ diagnostic, span: context, color }) : undefined;
  const hints = (diagnostic.hints ?? []).map((hint) => `  hint: ${hint.message}`);

  return [header, snippet, ...hints].filter((line) => line !== undefined).join("\n");
};
