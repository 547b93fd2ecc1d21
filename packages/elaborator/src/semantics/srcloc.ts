import type { SourceSpan } from "../diagnostics/index.js";

/**
 * Where something happened: the innermost labelled construct and the best
 * source span known for it. Nodes without a span inherit their parent's.
 */
export interface SrcLoc {
  readonly label?: string;
  readonly span?: SourceSpan;
}

export const srclocTop: SrcLoc = { label: "top" };

export const srclocFile = (file: string): SrcLoc => ({
  label: file,
  span: { file, start: 0, end: 0 },
});

export const srclocAt = (
  label: string,
  span: SourceSpan | undefined,
  parent: SrcLoc
): SrcLoc => ({ label, span: span ?? parent.span });

export const srclocAfter = (
  label: string,
  span: SourceSpan | undefined,
  parent: SrcLoc
): SrcLoc => {
  const anchor = span ?? parent.span;
  return {
    label: `after ${label}`,
    span: anchor ? { ...anchor, start: anchor.end } : undefined,
  };
};

export const displaySrcLoc = (at: SrcLoc): string => {
  const where = at.span ? `${at.span.file}:${at.span.start}` : "<unknown>";
  return at.label ? `${where} (${at.label})` : where;
};
