// src/core/reader/slice.ts
// Borrowed spans of the source text

/**
 * A view into `source` covering `[start, end)`. The parsed tree holds these
 * instead of copied strings; the text is only materialised by `sliceText`.
 */
export type Slice = {
  readonly source: string;
  readonly start: number;
  readonly end: number;
};

export const slice = (source: string, start: number, end: number): Slice => ({ source, start, end });

export function sliceText(s: Slice): string {
  return s.source.slice(s.start, s.end);
}

export function sliceLength(s: Slice): number {
  return s.end - s.start;
}
