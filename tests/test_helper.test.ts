import { describe, it, expect } from "vitest";
import { camelToSnakeCase, csv, isInt, seqGet, toBool } from "../src/helper.js";

describe("Helper", () => {
  it("converts class names to SQL names", () => {
    expect(camelToSnakeCase("RegexpReplace")).toBe("REGEXP_REPLACE");
    expect(camelToSnakeCase("Upper")).toBe("UPPER");
  });

  it("reads sequences from either end", () => {
    expect(seqGet([1, 2, 3], 0)).toBe(1);
    expect(seqGet([1, 2, 3], -1)).toBe(3);
    expect(seqGet([1, 2, 3], 3)).toBeUndefined();
    expect(seqGet([1, 2, 3], -4)).toBeUndefined();
  });

  it("joins non-empty parts", () => {
    expect(csv(["a", "", "b"])).toBe("a, b");
    expect(csv(["CREATE", "", "TABLE"], " ")).toBe("CREATE TABLE");
  });

  it("recognizes integers", () => {
    expect(isInt("42")).toBe(true);
    expect(isInt(" -7 ")).toBe(true);
    expect(isInt("1.5")).toBe(false);
    expect(isInt("x")).toBe(false);
  });

  it("reads booleans from the environment", () => {
    expect(toBool(undefined, true)).toBe(true);
    expect(toBool("", false)).toBe(false);
    expect(toBool("TRUE", false)).toBe(true);
    expect(toBool("1", false)).toBe(true);
    expect(toBool("no", true)).toBe(false);
  });
});
