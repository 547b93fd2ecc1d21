import { displayValueType } from "./display.js";
import { emitDiagnostic } from "./errors.js";
import type { SrcLoc } from "./srcloc.js";
import type { SecurityLevel, SVal, Value } from "./values.js";

export const meet = (left: SecurityLevel, right: SecurityLevel): SecurityLevel =>
  left === "secret" || right === "secret" ? "secret" : "public";

export const meetAll = (levels: Iterable<SecurityLevel>): SecurityLevel => {
  let level: SecurityLevel = "public";
  for (const next of levels) {
    level = meet(level, next);
  }
  return level;
};

/** Raises the level of `sval` to at least `level`. */
export const meetWith = (level: SecurityLevel, sval: SVal): SVal => ({
  level: meet(level, sval.level),
  value: sval.value,
});

export const ensurePublic = (at: SrcLoc, { level, value }: SVal): Value => {
  if (level === "secret") {
    return emitDiagnostic({
      at,
      code: "TY0014",
      params: { valueType: displayValueType(value) },
    });
  }
  return value;
};

export const ensurePublics = (at: SrcLoc, svals: readonly SVal[]): Value[] =>
  svals.map((sval) => ensurePublic(at, sval));

export const declassify = (at: SrcLoc, { level, value }: SVal): SVal => {
  if (level === "public") {
    return emitDiagnostic({
      at,
      code: "TY0013",
      params: { valueType: displayValueType(value) },
    });
  }
  return { level: "public", value };
};
