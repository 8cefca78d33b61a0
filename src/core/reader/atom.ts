// src/core/reader/atom.ts
// Classify a non-structural token as Number, Bool, Null, Str or Symbol

import type { Expression } from "./expression";
import { bool, nil, num, strAt, symAt } from "./expression";
import type { Slice } from "./slice";
import { slice, sliceLength, sliceText } from "./slice";

// Decimal float grammar: sign, digits with optional fraction (or a bare
// fraction), optional exponent; plus inf/infinity/nan in any case.
const FLOAT = /^[+-]?(?:(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?|inf|infinity|nan)$/i;

export function parseFloatToken(text: string): number | undefined {
  if (!FLOAT.test(text)) return undefined;
  const body = text.replace(/^[+-]/, "").toLowerCase();
  const negative = text.startsWith("-");
  if (body === "nan") return NaN;
  if (body === "inf" || body === "infinity") return negative ? -Infinity : Infinity;
  return Number(text);
}

/**
 * Never fails: anything that is not a number, keyword or quoted string is a
 * Symbol. Numeric parsing is tried for every token starting with a digit,
 * `+` or `-`, single characters included, so `5` reads as a Number while `+`
 * and `-` fall through to Symbol.
 */
export function classifyAtom(tok: Slice): Expression {
  const text = sliceText(tok);
  const first = text[0];

  if (first !== undefined && (isAsciiDigit(first) || first === "+" || first === "-")) {
    const n = parseFloatToken(text);
    if (n !== undefined) return num(n);
  }

  switch (text) {
    case "true": return bool(true);
    case "false": return bool(false);
    case "null": return nil;
  }

  if (sliceLength(tok) >= 2 && text.startsWith("\"") && text.endsWith("\"")) {
    return strAt(slice(tok.source, tok.start + 1, tok.end - 1));
  }

  return symAt(tok);
}

function isAsciiDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}
