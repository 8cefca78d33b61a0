// src/core/reader/owned.ts
// Owned expression trees, generic over the symbol representation

import type { Expression } from "./expression";
import { numEq, numToString } from "./expression";
import { sliceText } from "./slice";

/**
 * How a symbol is built from its source text and rendered back. Parsing and
 * printing stay uniform whatever `S` is.
 */
export interface OwnedSymbol<S> {
  fromText(text: string): S;
  render(symbol: S): string;
}

export type OwnedExpression<S = string> =
  | { readonly tag: "Number"; readonly value: number }
  | { readonly tag: "Bool"; readonly value: boolean }
  | { readonly tag: "Str"; readonly value: string }
  | { readonly tag: "Symbol"; readonly symbol: S }
  | { readonly tag: "List"; readonly items: readonly OwnedExpression<S>[] }
  | { readonly tag: "Null" };

/** Plain text passthrough; the default codec. */
export const stringSymbols: OwnedSymbol<string> = {
  fromText: (text) => text,
  render: (symbol) => symbol,
};

/**
 * Deep-copy a zero-copy tree into owned text. Total: every node converts,
 * symbols through `codec.fromText`.
 */
export function toOwned(expr: Expression): OwnedExpression<string>;
export function toOwned<S>(expr: Expression, codec: OwnedSymbol<S>): OwnedExpression<S>;
export function toOwned<S>(expr: Expression, codec?: OwnedSymbol<S>): OwnedExpression<S> | OwnedExpression<string> {
  return codec ? convert(expr, codec) : convert(expr, stringSymbols);
}

function convert<S>(expr: Expression, codec: OwnedSymbol<S>): OwnedExpression<S> {
  switch (expr.tag) {
    case "Number": return { tag: "Number", value: expr.value };
    case "Bool": return { tag: "Bool", value: expr.value };
    case "Str": return { tag: "Str", value: sliceText(expr.slice) };
    case "Symbol": return { tag: "Symbol", symbol: codec.fromText(sliceText(expr.slice)) };
    case "Null": return { tag: "Null" };
    case "List": return { tag: "List", items: expr.items.map((e) => convert(e, codec)) };
  }
}

export function ownedToString<S>(x: OwnedExpression<S>, codec: OwnedSymbol<S>): string;
export function ownedToString(x: OwnedExpression<string>): string;
export function ownedToString<S>(x: OwnedExpression<S>, codec?: OwnedSymbol<S>): string {
  return render(x, (s) => (codec ? codec.render(s) : String(s)));
}

function render<S>(x: OwnedExpression<S>, sym: (s: S) => string): string {
  switch (x.tag) {
    case "Number": return numToString(x.value);
    case "Bool": return x.value ? "true" : "false";
    case "Str": return `"${x.value}"`;
    case "Symbol": return sym(x.symbol);
    case "Null": return "null";
    case "List": return `(${x.items.map((e) => render(e, sym)).join(" ")})`;
  }
}

/** Symbols compare by their rendered text. */
export function ownedEq<S>(a: OwnedExpression<S>, b: OwnedExpression<S>, codec: OwnedSymbol<S>): boolean;
export function ownedEq(a: OwnedExpression<string>, b: OwnedExpression<string>): boolean;
export function ownedEq<S>(a: OwnedExpression<S>, b: OwnedExpression<S>, codec?: OwnedSymbol<S>): boolean {
  return eqWith(a, b, (s) => (codec ? codec.render(s) : String(s)));
}

function eqWith<S>(a: OwnedExpression<S>, b: OwnedExpression<S>, sym: (s: S) => string): boolean {
  switch (a.tag) {
    case "Number": return b.tag === "Number" && numEq(a.value, b.value);
    case "Bool": return b.tag === "Bool" && a.value === b.value;
    case "Str": return b.tag === "Str" && a.value === b.value;
    case "Symbol": return b.tag === "Symbol" && sym(a.symbol) === sym(b.symbol);
    case "Null": return b.tag === "Null";
    case "List": {
      if (b.tag !== "List" || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) if (!eqWith(a.items[i], b.items[i], sym)) return false;
      return true;
    }
  }
}

/**
 * Whether an owned tree mirrors a borrowed one node for node. Borrowed
 * symbols are compared after a round trip through `codec`.
 */
export function sameStructure<S>(expr: Expression, owned: OwnedExpression<S>, codec: OwnedSymbol<S>): boolean;
export function sameStructure(expr: Expression, owned: OwnedExpression<string>): boolean;
export function sameStructure<S>(expr: Expression, owned: OwnedExpression<S>, codec?: OwnedSymbol<S>): boolean {
  const sym = (s: S) => (codec ? codec.render(s) : String(s));
  const symText = (text: string) => (codec ? codec.render(codec.fromText(text)) : text);
  return mirror(expr, owned, sym, symText);
}

function mirror<S>(
  e: Expression,
  o: OwnedExpression<S>,
  sym: (s: S) => string,
  symText: (text: string) => string,
): boolean {
  switch (e.tag) {
    case "Number": return o.tag === "Number" && numEq(e.value, o.value);
    case "Bool": return o.tag === "Bool" && e.value === o.value;
    case "Str": return o.tag === "Str" && sliceText(e.slice) === o.value;
    case "Symbol": return o.tag === "Symbol" && symText(sliceText(e.slice)) === sym(o.symbol);
    case "Null": return o.tag === "Null";
    case "List": {
      if (o.tag !== "List" || e.items.length !== o.items.length) return false;
      for (let i = 0; i < e.items.length; i++) if (!mirror(e.items[i], o.items[i], sym, symText)) return false;
      return true;
    }
  }
}
