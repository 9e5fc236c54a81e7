// src/normalize/lengths.ts
// 定数の長さは構文木から分からないため、クエリを再度字句解析して求める。

import { createSqlScanner } from '../lexer/scanner.ts';
import type { ScanToken, ScannerFactory } from '../lexer/scanner.ts';
import { sortConstantSpans } from './locations.ts';
import type { ConstantSpan, ResolveOutcome } from './types.ts';

/**
 * spans を位置順に並べ、各定数の length を埋める。
 *
 * スキャナは1つだけ作り、先頭から末尾へ前進させるだけ（巻き戻さない）。
 * 位置が直前と同じ定数は重複として飛ばす。
 * スキャナが入力末尾に達した時点で打ち切り、残りは unresolved として返す。
 */
export function fillInConstantLengths(
  spans: ConstantSpan[],
  query: string,
  createScanner: ScannerFactory = createSqlScanner,
): ResolveOutcome {
  sortConstantSpans(spans);

  const scanner = createScanner(query);
  let lastLocation = -1;
  let stoppedAt = spans.length;

  for (let i = 0; i < spans.length; i++) {
    const span = spans[i];
    if (span === undefined) continue;
    const location = span.location;

    if (location <= lastLocation) continue;

    let token: ScanToken | undefined = scanner.next();
    while (token !== undefined && token.start < location) {
      token = scanner.next();
    }
    if (token === undefined) {
      stoppedAt = i;
      break;
    }

    // 負の数: '-' と数値は別トークンなので、もう1つ読む
    if (query.charAt(location) === '-') {
      token = scanner.next();
      if (token === undefined) {
        stoppedAt = i;
        break;
      }
    }

    span.length = token.end - location;
    lastLocation = location;
  }

  return { unresolved: unresolvedLocations(spans.slice(stoppedAt), lastLocation) };
}

function unresolvedLocations(remaining: ConstantSpan[], lastLocation: number): number[] {
  const out: number[] = [];
  for (const span of remaining) {
    if (span.location > lastLocation && out[out.length - 1] !== span.location) out.push(span.location);
  }
  return out;
}
