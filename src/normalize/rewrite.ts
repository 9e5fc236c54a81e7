// src/normalize/rewrite.ts
import type { ConstantSpan, RewriteResult } from './types.ts';
import { failInvariant } from './normalizeErrors.ts';

export const PLACEHOLDER = '?';

/**
 * 長さの決まった定数を ? に置き換え、それ以外（空白・コメント含む）はそのまま写す。
 * spans は位置順であること。出力は入力より長くならない。
 */
export function generateNormalizedQuery(spans: readonly ConstantSpan[], query: string): RewriteResult {
  let out = '';
  let sourceCursor = 0;
  let lastOffset = 0;
  let lastTokenLength = 0;

  for (const { location, length } of spans) {
    if (length === undefined) continue;

    const copyLength = location - lastOffset - lastTokenLength;
    if (copyLength < 0) {
      failInvariant(
        `Constant at ${location} overlaps the previous constant ending at ${lastOffset + lastTokenLength}.`,
      );
    }
    out += query.slice(sourceCursor, sourceCursor + copyLength);
    out += PLACEHOLDER;

    sourceCursor = location + length;
    lastOffset = location;
    lastTokenLength = length;
  }

  out += query.slice(sourceCursor);
  return { query: out, length: out.length };
}
