import {
  DiagnosticError,
  InternalError,
  diagnosticFromCode,
  normalizeSpan,
  type DiagnosticCode,
  type DiagnosticParams,
} from "../diagnostics/index.js";
import type { SrcLoc } from "./srcloc.js";

type EmitDiagnosticOptions<K extends DiagnosticCode> = {
  at: SrcLoc;
  code: K;
  params: DiagnosticParams<K>;
};

export const emitDiagnostic = <K extends DiagnosticCode>({
  at,
  code,
  params,
}: EmitDiagnosticOptions<K>): never => {
  throw new DiagnosticError(
    diagnosticFromCode({
      code,
      params,
      span: normalizeSpan(at.span),
      context: at.label,
    })
  );
};

/** Reports an inconsistency in the elaborator's own inputs or state. */
export const emitInternal = <K extends "IN0001" | "IN9999">({
  at,
  code,
  params,
}: EmitDiagnosticOptions<K>): never => {
  throw new InternalError(
    diagnosticFromCode({
      code,
      params,
      span: normalizeSpan(at.span),
      context: at.label,
    })
  );
};

/** Reports a state that well-formed input cannot reach. */
export const impossible = (at: SrcLoc, message: string): never =>
  emitInternal({ at, code: "IN9999", params: { message } });
