// src/core/reader/symbols.ts
// Richer symbol codecs for owned trees

import type { OwnedSymbol } from "./owned";

// ----- Namespaced: `ns::name` -----

export type NamespacedSymbol = { namespace?: string; name: string };

/** Splits on the first `::`; a symbol without one has no namespace. */
export const namespacedSymbols: OwnedSymbol<NamespacedSymbol> = {
  fromText(text) {
    const at = text.indexOf("::");
    if (at === -1) return { name: text };
    return { namespace: text.slice(0, at), name: text.slice(at + 2) };
  },
  render(symbol) {
    return symbol.namespace === undefined ? symbol.name : `${symbol.namespace}::${symbol.name}`;
  },
};

// ----- Categorized: `fn:name`, `var:name`, `type:name`, `macro:name` -----

export type SymbolCategory = "function" | "variable" | "type" | "macro";

export type CategorizedSymbol = { category: SymbolCategory; name: string };

const PREFIX_TO_CATEGORY: Record<string, SymbolCategory | undefined> = {
  fn: "function",
  var: "variable",
  type: "type",
  macro: "macro",
};

const CATEGORY_TO_PREFIX: Record<SymbolCategory, string> = {
  function: "fn",
  variable: "var",
  type: "type",
  macro: "macro",
};

/**
 * Splits on the first `:`. An unknown prefix still splits but falls back to
 * `variable`; no colon at all means a plain variable. Rendering always writes
 * the prefix, so `x` renders as `var:x`.
 */
export const categorizedSymbols: OwnedSymbol<CategorizedSymbol> = {
  fromText(text) {
    const at = text.indexOf(":");
    if (at === -1) return { category: "variable", name: text };
    const category = PREFIX_TO_CATEGORY[text.slice(0, at)] ?? "variable";
    return { category, name: text.slice(at + 1) };
  },
  render(symbol) {
    return `${CATEGORY_TO_PREFIX[symbol.category]}:${symbol.name}`;
  },
};
