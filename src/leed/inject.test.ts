import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { InputError } from "./errors.js";
import {
  formatFortranF74,
  placeholderToken,
  substituteParameters,
  writeFitFile,
} from "./inject.js";

describe("leed/inject", () => {
  it("formats values as F7.4", () => {
    expect(formatFortranF74(1.5)).toBe(" 1.5000");
    expect(formatFortranF74(-2.25)).toBe("-2.2500");
    expect(formatFortranF74(0)).toBe(" 0.0000");
    expect(formatFortranF74(0.12345678)).toBe(" 0.1235");
  });

  it("writes wide values whole instead of truncating", () => {
    expect(formatFortranF74(123.5)).toBe("123.5000");
    expect(formatFortranF74(-1234.5)).toBe("-1234.5000");
  });

  it("zero-pads placeholder indices to four digits", () => {
    expect(placeholderToken(0)).toBe("opt0000");
    expect(placeholderToken(42)).toBe("opt0042");
  });

  it("replaces every occurrence of each token", () => {
    const template = "  opt0000  opt0001\n  opt0000\n";

    expect(substituteParameters(template, [1.5, -2.25])).toBe(
      "   1.5000  -2.2500\n   1.5000\n",
    );
  });

  it("leaves tokens without a parameter untouched", () => {
    expect(substituteParameters("opt0000 opt0003", [0.5])).toBe(" 0.5000 opt0003");
  });

  it("does not match the head of a longer token", () => {
    expect(substituteParameters("opt00010 opt0001", [9, 1])).toBe("opt00010  1.0000");
  });

  it("rejects non-finite values and oversized vectors", () => {
    expect(() => substituteParameters("opt0000", [Number.NaN])).toThrow(InputError);
    expect(() => substituteParameters("opt0000", [Infinity])).toThrow(
      "ERROR: parameter 0 is not a finite number (Infinity)",
    );
    expect(() => substituteParameters("", new Array<number>(10_001).fill(0))).toThrow(
      InputError,
    );
  });

  it("rewrites the file in place and is idempotent", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "leedfit-inject-"));
    const file = path.join(dir, "tleed5.i");
    await fs.writeFile(file, "X opt0000 Y opt0001 Z opt0000\n", "utf-8");

    await writeFitFile(file, [0.25, 3]);
    const once = await fs.readFile(file, "utf-8");
    await writeFitFile(file, [0.25, 3]);
    const twice = await fs.readFile(file, "utf-8");

    expect(once).toBe("X  0.2500 Y  3.0000 Z  0.2500\n");
    expect(twice).toBe(once);
    expect(once).not.toMatch(/opt\d{4}/);
  });
});
