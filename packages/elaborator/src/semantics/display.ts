import type { Mode } from "./context.js";
import { displayType, typeOfMaybe } from "./types.js";
import type { Value } from "./values.js";

/** Type of a value for messages, or its kind when it has no runtime type. */
export const displayValueType = (value: Value): string => {
  const typed = typeOfMaybe(value);
  return typed ? displayType(typed[0]) : value.kind;
};

export const displayMode = (mode: Mode): string => {
  switch (mode.kind) {
    case "module":
      return "module";
    case "step":
      return "step";
    case "local":
      return "pure computation";
    case "local-step":
      return "local step";
    case "consensus-step":
      return "consensus step";
  }
};
