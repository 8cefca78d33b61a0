// src/core/reader/expression.ts
// Zero-copy expression tree: constructors, structural equality, printer

import type { Slice } from "./slice";
import { slice, sliceText } from "./slice";

export type Expression =
  | { readonly tag: "Number"; readonly value: number }
  | { readonly tag: "Bool"; readonly value: boolean }
  | { readonly tag: "Str"; readonly slice: Slice }
  | { readonly tag: "Symbol"; readonly slice: Slice }
  | { readonly tag: "List"; readonly items: readonly Expression[] }
  | { readonly tag: "Null" };

export type ExpressionTag = Expression["tag"];

export const num = (value: number): Expression => ({ tag: "Number", value });
export const bool = (value: boolean): Expression => ({ tag: "Bool", value });
export const list = (items: readonly Expression[]): Expression => ({ tag: "List", items });
export const nil: Expression = { tag: "Null" };

/** Str/Symbol over an existing slice. */
export const strAt = (s: Slice): Expression => ({ tag: "Str", slice: s });
export const symAt = (s: Slice): Expression => ({ tag: "Symbol", slice: s });

/** Str/Symbol backed by their own text, for building trees by hand. */
export const str = (text: string): Expression => strAt(slice(text, 0, text.length));
export const sym = (text: string): Expression => symAt(slice(text, 0, text.length));

/** Structural equality; Str and Symbol compare by text, not by slice position. */
export function exprEq(a: Expression, b: Expression): boolean {
  switch (a.tag) {
    case "Number": return b.tag === "Number" && numEq(a.value, b.value);
    case "Bool": return b.tag === "Bool" && a.value === b.value;
    case "Str": return b.tag === "Str" && sliceText(a.slice) === sliceText(b.slice);
    case "Symbol": return b.tag === "Symbol" && sliceText(a.slice) === sliceText(b.slice);
    case "Null": return b.tag === "Null";
    case "List": {
      if (b.tag !== "List" || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) if (!exprEq(a.items[i], b.items[i])) return false;
      return true;
    }
  }
}

// NaN is equal to itself here so that a parsed `nan` compares equal to its copy.
export function numEq(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export function numToString(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (Object.is(n, -0)) return "-0";
  return String(n);
}

export function exprToString(x: Expression): string {
  switch (x.tag) {
    case "Number": return numToString(x.value);
    case "Bool": return x.value ? "true" : "false";
    case "Str": return `"${sliceText(x.slice)}"`;
    case "Symbol": return sliceText(x.slice);
    case "Null": return "null";
    case "List": return `(${x.items.map(exprToString).join(" ")})`;
  }
}
