import { T_Address, T_Bool, T_Bytes, T_Null, T_UInt256 } from "../ir/types.js";
import { Env } from "./env.js";
import { srclocTop } from "./srcloc.js";
import {
  formValue,
  primValue,
  publicVal,
  typeValue,
  type SVal,
} from "./values.js";

/**
 * `__txn.value__` cannot be written as an identifier in source, so only the
 * elaborator's own synthesized code can reach it.
 */
export const TXN_VALUE_NAME = "__txn.value__";

const reachObject: SVal = publicVal({
  kind: "object",
  at: srclocTop,
  fields: Env.fromEntries(srclocTop, [["App", publicVal(formValue({ kind: "app" }))]]),
});

export const baseEnv: Env = Env.fromEntries(srclocTop, [
  ["makeEnum", publicVal(primValue({ kind: "make-enum" }))],
  ["declassify", publicVal(primValue({ kind: "declassify" }))],
  ["commit", publicVal(primValue({ kind: "commit" }))],
  ["digest", publicVal(primValue({ kind: "digest" }))],
  ["transfer", publicVal(primValue({ kind: "transfer" }))],
  ["assert", publicVal(primValue({ kind: "claim", claim: "assert" }))],
  ["assume", publicVal(primValue({ kind: "claim", claim: "assume" }))],
  ["require", publicVal(primValue({ kind: "claim", claim: "require" }))],
  ["possible", publicVal(primValue({ kind: "claim", claim: "possible" }))],
  [TXN_VALUE_NAME, publicVal(primValue({ kind: "op", op: "TXN_VALUE" }))],
  ["balance", publicVal(primValue({ kind: "op", op: "BALANCE" }))],
  ["Null", publicVal(typeValue(T_Null))],
  ["Bool", publicVal(typeValue(T_Bool))],
  ["UInt256", publicVal(typeValue(T_UInt256))],
  ["Bytes", publicVal(typeValue(T_Bytes))],
  ["Address", publicVal(typeValue(T_Address))],
  ["Array", publicVal(primValue({ kind: "array-type" }))],
  ["Tuple", publicVal(primValue({ kind: "tuple-type" }))],
  ["Object", publicVal(primValue({ kind: "object-type" }))],
  ["Fun", publicVal(primValue({ kind: "fun-type" }))],
  ["exit", publicVal(primValue({ kind: "exit" }))],
  ["Reach", reachObject],
]);
