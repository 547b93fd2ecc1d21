import type { Ctxt } from "./semantics/context.js";

export const traceEnabledByDefault = (): boolean =>
  process.env.DEBUG_ELAB === "1";

export const trace = (
  ctxt: Pick<Ctxt, "trace">,
  scope: string,
  detail?: Record<string, unknown>
): void => {
  if (!ctxt.trace) return;
  if (detail) {
    console.log(`[elab] ${scope}`, detail);
    return;
  }
  console.log(`[elab] ${scope}`);
};
