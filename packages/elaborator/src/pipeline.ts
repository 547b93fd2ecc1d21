import type { Bundle } from "./ast/index.js";
import {
  diagnosticFromCode,
  DiagnosticError,
  type Diagnostic,
} from "./diagnostics/index.js";
import type { Program } from "./ir/types.js";
import { compileBundle, type CompileOptions } from "./semantics/program.js";

export type ElaborateResult = {
  program?: Program;
  diagnostics: Diagnostic[];
};

/**
 * Elaborates a bundle and reports failure as diagnostics instead of throwing.
 * Elaboration stops at the first error, so at most one diagnostic is returned.
 */
export const elaborate = (bundle: Bundle, options: CompileOptions = {}): ElaborateResult => {
  try {
    return { program: compileBundle(bundle, options), diagnostics: [] };
  } catch (error) {
    if (error instanceof DiagnosticError) {
      return { diagnostics: [error.diagnostic] };
    }
    const entry = bundle.modules.at(-1)?.id ?? "<bundle>";
    const fallback = diagnosticFromCode({
      code: "IN9999",
      params: { message: error instanceof Error ? error.message : String(error) },
      span: { file: entry, start: 0, end: 0 },
    });
    return { diagnostics: [fallback] };
  }
};
