import { describe, expect, test } from "vitest";
import { CODE_ALPHABET, DEFAULT_CODE_LENGTH, generateCode } from "../../src/code_generator.js";

describe("generateCode", () => {
  test("alphabet is the 62 alphanumerics", () => {
    expect(CODE_ALPHABET).toHaveLength(62);
    expect(new Set(CODE_ALPHABET).size).toBe(62);
    expect(CODE_ALPHABET).toMatch(/^[a-zA-Z0-9]+$/);
  });

  test("defaults to six characters", () => {
    expect(DEFAULT_CODE_LENGTH).toBe(6);
    expect(generateCode()).toMatch(/^[a-zA-Z0-9]{6}$/);
  });

  test("honours the requested length", () => {
    expect(generateCode(1)).toMatch(/^[a-zA-Z0-9]$/);
    expect(generateCode(12)).toMatch(/^[a-zA-Z0-9]{12}$/);
  });

  test("rejects non-positive or fractional lengths", () => {
    expect(() => generateCode(0)).toThrow(RangeError);
    expect(() => generateCode(-3)).toThrow(RangeError);
    expect(() => generateCode(2.5)).toThrow(RangeError);
  });

  test("draws across the alphabet", () => {
    const seen = new Set<string>();
    for (let i = 0; i < 200; i++) for (const ch of generateCode(10)) seen.add(ch);
    // 2000 draws over 62 symbols; missing more than a handful would mean a skewed source
    expect(seen.size).toBeGreaterThan(55);
  });
});
