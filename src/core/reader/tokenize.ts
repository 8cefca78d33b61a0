// src/core/reader/tokenize.ts
// Whitespace/delimiter tokenizer producing zero-copy token slices

import type { ReaderConfig } from "../config/config";
import { DEFAULT_READER_CONFIG } from "../config/config";
import type { Slice } from "./slice";
import { slice } from "./slice";

export type TokTag = "LParen" | "RParen" | "Quote" | "Atom";

export type Tok = { tag: TokTag; slice: Slice };

const WS = /\p{White_Space}/u;

const STRUCTURAL: Record<string, TokTag | undefined> = {
  "(": "LParen",
  ")": "RParen",
  "'": "Quote",
};

export function tokenize(src: string, config: ReaderConfig = DEFAULT_READER_CONFIG): Tok[] {
  const toks: Tok[] = [];
  const comments = config.lineComments;
  let i = 0;

  const isWS = (c: string) => WS.test(c);

  while (i < src.length) {
    const c = src[i];

    if (isWS(c)) { i++; continue; }

    if (comments && c === ";") {
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }

    const structural = STRUCTURAL[c];
    if (structural) {
      toks.push({ tag: structural, slice: slice(src, i, i + 1) });
      i++;
      continue;
    }

    // atom: run until whitespace or a structural delimiter
    const start = i;
    while (i < src.length) {
      const d = src[i];
      if (isWS(d) || STRUCTURAL[d] || (comments && d === ";")) break;
      i++;
    }
    toks.push({ tag: "Atom", slice: slice(src, start, i) });
  }

  return toks;
}
