import { describe, expect, it } from "vitest";
import { classifyAtom, parseFloatToken } from "../../src/core/reader/atom";
import { exprToString, type Expression } from "../../src/core/reader/expression";
import { slice, sliceText } from "../../src/core/reader/slice";

const classify = (text: string): Expression => classifyAtom(slice(text, 0, text.length));

describe("classifyAtom", () => {
  describe("numbers", () => {
    it("parses integers and decimals", () => {
      expect(classify("42")).toEqual({ tag: "Number", value: 42 });
      expect(classify("-3.14")).toEqual({ tag: "Number", value: -3.14 });
      expect(classify("+7")).toEqual({ tag: "Number", value: 7 });
      expect(classify("1.")).toEqual({ tag: "Number", value: 1 });
      expect(classify("1e3")).toEqual({ tag: "Number", value: 1000 });
      expect(classify("-2.5E-1")).toEqual({ tag: "Number", value: -0.25 });
    });

    it("parses signed infinities and nan", () => {
      expect(classify("-inf")).toEqual({ tag: "Number", value: -Infinity });
      expect(classify("+Infinity")).toEqual({ tag: "Number", value: Infinity });
      const n = classify("+NaN");
      expect(n.tag).toBe("Number");
      expect(n.tag === "Number" && Number.isNaN(n.value)).toBe(true);
    });

    it("only tries numbers when the first character is a digit or sign", () => {
      expect(classify("inf")).toEqual({ tag: "Symbol", slice: slice("inf", 0, 3) });
      expect(classify(".5").tag).toBe("Symbol");
    });

    it("falls back to symbol when numeric parsing fails", () => {
      expect(classify("12abc").tag).toBe("Symbol");
      expect(classify("0x10").tag).toBe("Symbol");
      expect(classify("-foo").tag).toBe("Symbol");
      expect(classify("1-2").tag).toBe("Symbol");
    });
  });

  describe("single-character tokens", () => {
    it("reads a lone digit as a number", () => {
      expect(classify("5")).toEqual({ tag: "Number", value: 5 });
      expect(classify("0")).toEqual({ tag: "Number", value: 0 });
    });

    it("reads other single characters as symbols", () => {
      for (const c of ["a", "+", "-", "'", "\"", "*"]) {
        const e = classify(c);
        expect(e.tag).toBe("Symbol");
        expect(exprToString(e)).toBe(c);
      }
    });
  });

  it("recognises literal keywords exactly", () => {
    expect(classify("true")).toEqual({ tag: "Bool", value: true });
    expect(classify("false")).toEqual({ tag: "Bool", value: false });
    expect(classify("null")).toEqual({ tag: "Null" });
    expect(classify("True").tag).toBe("Symbol");
  });

  describe("strings", () => {
    it("strips the surrounding quotes without copying", () => {
      const src = "\"hi\"";
      const e = classifyAtom(slice(src, 0, 4));
      expect(e).toEqual({ tag: "Str", slice: { source: src, start: 1, end: 3 } });
    });

    it("accepts the empty string literal", () => {
      const e = classify("\"\"");
      expect(e.tag === "Str" && sliceText(e.slice)).toBe("");
    });

    it("needs both quotes", () => {
      expect(classify("\"abc").tag).toBe("Symbol");
      expect(classify("abc\"").tag).toBe("Symbol");
    });
  });

  it("keeps any other token verbatim as a symbol", () => {
    const e = classify("std::vector");
    expect(e.tag === "Symbol" && sliceText(e.slice)).toBe("std::vector");
  });
});

describe("parseFloatToken", () => {
  it("rejects text outside the decimal grammar", () => {
    expect(parseFloatToken("")).toBeUndefined();
    expect(parseFloatToken("1_000")).toBeUndefined();
    expect(parseFloatToken("1e")).toBeUndefined();
    expect(parseFloatToken("--1")).toBeUndefined();
  });

  it("accepts exponents with signs", () => {
    expect(parseFloatToken("6.02e+23")).toBe(6.02e23);
    expect(parseFloatToken("-.5")).toBe(-0.5);
  });
});
