// test/lengths.test.ts
import { describe, it, expect } from 'vitest';
import { parse } from '../src/parser/index.ts';
import { collectConstants } from '../src/normalize/constants.ts';
import { fillInConstantLengths } from '../src/normalize/lengths.ts';
import { createSqlScanner } from '../src/lexer/scanner.ts';
import type { ScannerFactory } from '../src/lexer/scanner.ts';
import type { ConstantSpan } from '../src/normalize/types.ts';

function spansOf(sql: string): ConstantSpan[] {
  return collectConstants(parse(sql).tree).spans;
}

function pending(...locations: number[]): ConstantSpan[] {
  return locations.map((location) => ({ location, length: undefined }));
}

// 先頭 n トークンで打ち切るスキャナ
function truncatedScanner(limit: number): ScannerFactory {
  return (text) => {
    const inner = createSqlScanner(text);
    let count = 0;
    return {
      next: () => (count++ < limit ? inner.next() : undefined),
    };
  };
}

describe('fillInConstantLengths', () => {
  it('トークンの終端までを長さとする', () => {
    const spans = spansOf("SELECT 1, 'x'");
    expect(fillInConstantLengths(spans, "SELECT 1, 'x'")).toEqual({ unresolved: [] });
    expect(spans).toEqual([
      { location: 7, length: 1 },
      { location: 10, length: 3 },
    ]);
  });

  it('負の数は - と数値の両方を含む', () => {
    const spans = spansOf('SELECT -5');
    fillInConstantLengths(spans, 'SELECT -5');
    expect(spans).toEqual([{ location: 7, length: 2 }]);

    const spaced = spansOf('SELECT - 5');
    fillInConstantLengths(spaced, 'SELECT - 5');
    expect(spaced).toEqual([{ location: 7, length: 3 }]);
  });

  it('未ソートの入力を並べ替えてから解決する', () => {
    const spans = pending(10, 7);
    fillInConstantLengths(spans, "SELECT 1, 'x'");
    expect(spans).toEqual([
      { location: 7, length: 1 },
      { location: 10, length: 3 },
    ]);
  });

  it('重複した位置は2つ目以降を未定のまま残す', () => {
    const sql = 'SELECT * FROM t WHERE 5 BETWEEN lo AND hi';
    const spans = spansOf(sql);
    expect(fillInConstantLengths(spans, sql)).toEqual({ unresolved: [] });
    expect(spans).toEqual([
      { location: 22, length: 1 },
      { location: 22, length: undefined },
    ]);
  });

  it('スキャナが尽きたら残りは unresolved', () => {
    const spans = pending(7, 10);
    const outcome = fillInConstantLengths(spans, 'SELECT 1, 2', truncatedScanner(3));
    expect(outcome).toEqual({ unresolved: [10] });
    expect(spans).toEqual([
      { location: 7, length: 1 },
      { location: 10, length: undefined },
    ]);
  });

  it('- の直後で入力が終わる', () => {
    const spans = pending(7);
    expect(fillInConstantLengths(spans, 'SELECT -')).toEqual({ unresolved: [7] });
    expect(spans[0]?.length).toBeUndefined();
  });

  it('入力末尾より後ろの位置', () => {
    expect(fillInConstantLengths(pending(50), 'SELECT 1')).toEqual({ unresolved: [50] });
  });

  it('スキャナは1回だけ作る', () => {
    let created = 0;
    const factory: ScannerFactory = (text) => {
      created++;
      return createSqlScanner(text);
    };
    fillInConstantLengths(pending(7, 10, 13), 'SELECT 1, 2, 3', factory);
    expect(created).toBe(1);
  });

  it('定数がなくても成功する', () => {
    expect(fillInConstantLengths([], 'SELECT a FROM t')).toEqual({ unresolved: [] });
  });
});
