import type { DLArg, SLType } from "../../ir/types.js";
import { liftExpr, type Ctxt } from "../context.js";
import { displayValueType } from "../display.js";
import { emitDiagnostic } from "../errors.js";
import { pure, res, type Res } from "../result.js";
import type { SrcLoc } from "../srcloc.js";
import {
  dlvarValue,
  formValue,
  publicVal,
  type SecurityLevel,
  type SVal,
  type ToConsensusMode,
  type Value,
} from "../values.js";

const participantMethods = ["only", "publish", "pay"];
const toConsensusMethods: readonly ToConsensusMode[] = ["publish", "pay", "timeout"];

const isToConsensusMode = (field: string): field is ToConsensusMode =>
  toConsensusMethods.some((mode) => mode === field);

/** `obj.field`. The level of the receiver is applied by the caller. */
export const evalDot = (
  ctxt: Ctxt,
  at: SrcLoc,
  obj: Value,
  field: string
): Res<SVal> => {
  const invalidField = (valid: readonly string[]): never =>
    emitDiagnostic({ at, code: "TY0004", params: { field, valid } });

  const projectField = (
    fields: Readonly<Record<string, SLType>>,
    object: DLArg,
    level: SecurityLevel
  ): Res<SVal> => {
    if (!Object.hasOwn(fields, field)) return invalidField(Object.keys(fields));
    const type = fields[field];
    const [dv, lifts] = liftExpr(ctxt, at, "object ref", type, {
      kind: "object-ref",
      at,
      object,
      field,
    });
    return res(lifts, { level, value: dlvarValue(dv) });
  };

  switch (obj.kind) {
    case "object": {
      const found = obj.fields.get(field);
      return found ? pure(found) : invalidField(obj.fields.names());
    }
    case "dlvar":
      if (obj.dv.type.kind !== "object") break;
      return projectField(obj.dv.type.fields, { kind: "var", dv: obj.dv }, "public");
    case "prim": {
      const prim = obj.prim;
      if (prim.kind !== "interact" || prim.type.kind !== "object") break;
      return projectField(
        prim.type.fields,
        { kind: "interact", who: prim.who, method: prim.method, type: prim.type },
        "secret"
      );
    }
    case "participant":
      if (field === "only") {
        return pure(publicVal(formValue({ kind: "part-only", participant: obj })));
      }
      if (field === "publish" || field === "pay") {
        return pure(
          publicVal(
            formValue({
              kind: "to-consensus",
              at,
              who: obj.who,
              displayVar: obj.displayVar,
              pending: field,
            })
          )
        );
      }
      return invalidField(participantMethods);
    case "form": {
      const form = obj.form;
      if (form.kind !== "to-consensus" || form.pending !== undefined) break;
      if (!isToConsensusMode(field)) return invalidField(toConsensusMethods);
      return pure(publicVal(formValue({ ...form, pending: field })));
    }
    default:
      break;
  }

  return emitDiagnostic({
    at,
    code: "TY0008",
    params: { valueType: displayValueType(obj) },
  });
};
