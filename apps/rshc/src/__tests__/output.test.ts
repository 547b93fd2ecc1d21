import { Env } from "@rsh/elaborator";
import { describe, expect, it, vi } from "vitest";
import { normalizeOutput, printJson, stringifyOutput } from "../output.js";

describe("cli output", () => {
  it("turns bigints into decimal strings and maps into objects", () => {
    const value = {
      constant: { kind: "int", value: 12n },
      table: new Map([["A", [1n, 2n]]]),
    };
    expect(normalizeOutput({ value })).toEqual({
      constant: { kind: "int", value: "12" },
      table: { A: ["1", "2"] },
    });
  });

  it("replaces environments with a placeholder", () => {
    expect(normalizeOutput({ value: { kind: "closure", env: Env.empty } })).toEqual({
      kind: "closure",
      env: "[Env]",
    });
  });

  it("marks circular references", () => {
    const value: { self?: unknown } = {};
    value.self = value;
    expect(JSON.parse(stringifyOutput(value))).toEqual({ self: "[Circular]" });
  });

  it("keeps shared references that are not circular", () => {
    const shared = { id: 3 };
    expect(normalizeOutput({ value: [shared, shared] })).toEqual([{ id: 3 }, { id: 3 }]);
  });

  it("prints indented JSON", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      printJson({ total: 7n });
      expect(logSpy).toHaveBeenCalledWith('{\n  "total": "7"\n}');
    } finally {
      logSpy.mockRestore();
    }
  });
});
