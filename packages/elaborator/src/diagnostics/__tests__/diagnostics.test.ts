import { describe, expect, it } from "vitest";
import {
  closestNames,
  diagnosticCodes,
  diagnosticFromCode,
  DiagnosticError,
  didYouMean,
  editDistance,
  formatDiagnostic,
  InternalError,
  isDiagnosticCode,
  isInternalDiagnostic,
  normalizeSpan,
} from "../index.js";

const span = { file: "app.rsh", start: 1, end: 5 };

describe("diagnostic utilities", () => {
  it("formats diagnostics with the registry phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "BD0001",
      params: { name: "x", known: [] },
      span,
    });
    expect(formatDiagnostic(diagnostic)).toBe(
      "app.rsh:1-5 ERROR [binding] BD0001: Invalid unbound identifier: x"
    );
  });

  it("appends the elaboration context", () => {
    const diagnostic = diagnosticFromCode({
      code: "MO0003",
      params: {},
      span,
      context: "return",
    });
    expect(formatDiagnostic(diagnostic)).toBe(
      "app.rsh:1-5 ERROR [mode] MO0003: Nowhere to return to (in return)"
    );
  });

  it("suggests the closest bound names", () => {
    const diagnostic = diagnosticFromCode({
      code: "BD0001",
      params: { name: "mian", known: ["zzz", "min", "mean", "main"] },
      span,
    });
    expect(diagnostic.message).toBe(
      'Invalid unbound identifier: mian. Did you mean: ["main","mean","min","zzz"]'
    );
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "TY0029",
      params: { mode: "publish" },
      span,
    });
    expect(diagnostic.message).toBe("Invalid double publish.");
    expect(diagnostic.hints?.[0]?.message).toContain("commit()");
  });

  it("normalizes to the first available span", () => {
    const fallback = { file: "fallback", start: 0, end: 0 };
    expect(normalizeSpan(undefined, fallback)).toEqual(fallback);
    expect(normalizeSpan()).toEqual({ file: "<unknown>", start: 0, end: 0 });
  });

  it("marks internal diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "IN0001",
      params: { moduleId: "lib" },
      span,
    });
    const error = new InternalError(diagnostic);
    expect(error).toBeInstanceOf(DiagnosticError);
    expect(error.code).toBe("IN0001");
    expect(isInternalDiagnostic(diagnostic)).toBe(true);
    expect(error.message).toBe(
      "app.rsh:1-5 ERROR [internal] IN0001: dependency lib was not elaborated before its importer"
    );
  });

  it("lists every registered code", () => {
    const codes = diagnosticCodes();
    expect(codes).toContain("SX0001");
    expect(codes).toContain("IN9999");
    expect(isDiagnosticCode("ZZ0000")).toBe(false);
  });
});

describe("name suggestions", () => {
  it("counts adjacent transpositions as one edit", () => {
    expect(editDistance("ab", "ba")).toBe(1);
    expect(editDistance("kitten", "sitting")).toBe(3);
    expect(editDistance("", "abc")).toBe(3);
    expect(editDistance("same", "same")).toBe(0);
  });

  it("orders by distance and then lexically", () => {
    expect(closestNames("mian", ["zzz", "min", "mean", "main"], 2)).toEqual([
      "main",
      "mean",
    ]);
  });

  it("caps suggestions at five", () => {
    const options = ["a1", "a2", "a3", "a4", "a5", "a6"];
    expect(closestNames("a", options)).toEqual(["a1", "a2", "a3", "a4", "a5"]);
  });

  it("renders nothing without candidates", () => {
    expect(didYouMean("x", [])).toBe("");
  });
});
