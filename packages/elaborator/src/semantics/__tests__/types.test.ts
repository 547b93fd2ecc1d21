import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  T_Array,
  T_Bool,
  T_Bytes,
  T_Fun,
  T_Null,
  T_Tuple,
  T_UInt256,
} from "../../ir/types.js";
import { srclocTop } from "../srcloc.js";
import {
  checkAndConvert,
  checkType,
  primOpType,
  typeMeet,
  typeMeets,
  typeOf,
  typeOfAsArray,
} from "../types.js";
import type { Value } from "../values.js";
import { diagnosticOf } from "./support.js";

const int = (value: bigint): Value => ({ kind: "int", at: srclocTop, value });
const bool = (value: boolean): Value => ({ kind: "bool", at: srclocTop, value });
const bytes = (value: string): Value => ({ kind: "bytes", at: srclocTop, value });

describe("checkAndConvert", () => {
  it("returns one argument per domain entry", () => {
    const converted = checkAndConvert(srclocTop, T_Fun([T_UInt256, T_Bool], T_Null), [
      int(2n),
      bool(true),
    ]);
    expect(converted.range).toEqual(T_Null);
    expect(converted.args).toEqual([
      { kind: "con", constant: { kind: "int", value: 2n } },
      { kind: "con", constant: { kind: "bool", value: true } },
    ]);
  });

  it("checks the count before any argument", () => {
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom(T_UInt256, T_Bool, T_Bytes), { maxLength: 4 }),
        fc.array(fc.constantFrom(int(1n), bool(false), bytes("b")), { maxLength: 4 }),
        (domain, values) => {
          fc.pre(domain.length !== values.length);
          const diagnostic = diagnosticOf(() =>
            checkAndConvert(srclocTop, T_Fun(domain, T_Null), values)
          );
          expect(diagnostic.code).toBe("TY0024");
          expect(diagnostic.message).toBe(
            `Invalid argument count. Expected ${domain.length}, got ${values.length}`
          );
        }
      )
    );
  });

  it("binds quantified variables at their first use", () => {
    const converted = checkAndConvert(srclocTop, primOpType("PEQ"), [bytes("a"), bytes("b")]);
    expect(converted.range).toEqual(T_Bool);

    const diagnostic = diagnosticOf(() =>
      checkAndConvert(srclocTop, primOpType("PEQ"), [bytes("a"), int(1n)])
    );
    expect(diagnostic.code).toBe("TY0022");
    expect(diagnostic.message).toBe("Type mismatch. Expected bytes, but got uint256");
  });

  it("substitutes the bound variable into the result", () => {
    const converted = checkAndConvert(srclocTop, primOpType("IF_THEN_ELSE"), [
      bool(true),
      bytes("yes"),
      bytes("no"),
    ]);
    expect(converted.range).toEqual(T_Bytes);
  });

  it("rejects applying a non-function type", () => {
    const diagnostic = diagnosticOf(() => checkAndConvert(srclocTop, T_Bool, []));
    expect(diagnostic.code).toBe("TY0027");
  });
});

describe("checkType", () => {
  it("accepts a tuple of the right size as an array", () => {
    const tuple: Value = { kind: "tuple", at: srclocTop, elements: [int(1n), int(2n)] };
    expect(checkType(srclocTop, T_Array(T_UInt256, 2), tuple)).toEqual({
      kind: "array",
      element: T_UInt256,
      elements: [
        { kind: "con", constant: { kind: "int", value: 1n } },
        { kind: "con", constant: { kind: "int", value: 2n } },
      ],
    });
    const diagnostic = diagnosticOf(() => checkType(srclocTop, T_Array(T_UInt256, 3), tuple));
    expect(diagnostic.message).toBe("Type mismatch. Expected array, but got tuple");
  });

  it("rejects values with no runtime representation", () => {
    const typeOnly: Value = { kind: "type", type: T_UInt256 };
    const diagnostic = diagnosticOf(() => typeOf(srclocTop, typeOnly));
    expect(diagnostic.code).toBe("TY0023");
    expect(diagnostic.message).toBe("Value cannot exist at runtime: type");
  });
});

describe("typeOfAsArray", () => {
  it("views homogeneous tuples as arrays", () => {
    const tuple: Value = { kind: "tuple", at: srclocTop, elements: [int(1n), int(2n)] };
    expect(typeOfAsArray(srclocTop, tuple)[0]).toEqual(T_Array(T_UInt256, 2));
  });

  it("leaves mixed tuples alone", () => {
    const tuple: Value = { kind: "tuple", at: srclocTop, elements: [int(1n), bool(true)] };
    expect(typeOfAsArray(srclocTop, tuple)[0]).toEqual(T_Tuple([T_UInt256, T_Bool]));
  });
});

describe("typeMeet", () => {
  it("unifies equal types", () => {
    expect(
      typeMeets(srclocTop, [
        [srclocTop, T_UInt256],
        [srclocTop, T_UInt256],
        [srclocTop, T_UInt256],
      ])
    ).toEqual(T_UInt256);
  });

  it("reports both sides of a mismatch", () => {
    const diagnostic = diagnosticOf(() =>
      typeMeet(srclocTop, [{ label: "left" }, T_Bool], [{ label: "right" }, T_UInt256])
    );
    expect(diagnostic.code).toBe("TY0025");
    expect(diagnostic.message).toBe(
      "Types do not unify: bool at <unknown> (left) and uint256 at <unknown> (right)"
    );
  });

  it("needs at least one type", () => {
    expect(diagnosticOf(() => typeMeets(srclocTop, [])).code).toBe("TY0026");
  });
});
