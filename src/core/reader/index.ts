// src/core/reader/index.ts
// S-expression reader

export { type Slice, slice, sliceText, sliceLength } from "./slice";
export { type Tok, type TokTag, tokenize } from "./tokenize";
export { classifyAtom, parseFloatToken } from "./atom";
export { type Cursor, cursor, parseOne, parseAll } from "./parse";
export { type ParseErrorKind, ParseError, isParseError, parseErrorToDiagnostic } from "./errors";
export {
  type Expression,
  type ExpressionTag,
  num,
  bool,
  str,
  sym,
  strAt,
  symAt,
  list,
  nil,
  exprEq,
  exprToString,
} from "./expression";
export {
  type OwnedExpression,
  type OwnedSymbol,
  stringSymbols,
  toOwned,
  ownedToString,
  ownedEq,
  sameStructure,
} from "./owned";
export {
  type NamespacedSymbol,
  type CategorizedSymbol,
  type SymbolCategory,
  namespacedSymbols,
  categorizedSymbols,
} from "./symbols";
export { read, readAll, readUnchecked } from "./read";
