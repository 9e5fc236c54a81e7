// src/normalize/locations.ts
import type { ConstantSpan } from './types.ts';

// 位置の昇順に並べ替える（その場で）。重複はここでは除かない。
export function sortConstantSpans(spans: ConstantSpan[]): void {
  if (spans.length > 1) spans.sort((a, b) => a.location - b.location);
}
