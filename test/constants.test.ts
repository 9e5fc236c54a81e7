// test/constants.test.ts
import { describe, it, expect } from 'vitest';
import { parse } from '../src/parser/index.ts';
import { collectConstants } from '../src/normalize/constants.ts';
import { sortConstantSpans } from '../src/normalize/locations.ts';
import type { Expression, SelectStatement } from '../src/ast/types.ts';

function locations(sql: string): number[] {
  return collectConstants(parse(sql).tree).spans.map((s) => s.location);
}

describe('collectConstants', () => {
  it('位置を持つ定数を走査順に記録する（長さは未定）', () => {
    const { spans, walkFailures } = collectConstants(parse("SELECT * FROM t WHERE a = 1 AND b = 'x'").tree);
    expect(spans).toEqual([
      { location: 26, length: undefined },
      { location: 36, length: undefined },
    ]);
    expect(walkFailures).toEqual([]);
  });

  it('走査順のまま（ソートしない）', () => {
    // OFFSET は LIMIT より先に辿る
    expect(locations('SELECT 1 FROM t LIMIT 5 OFFSET 3')).toEqual([7, 31, 22]);
  });

  it('BETWEEN の左辺は同じ位置で二度現れる', () => {
    expect(locations('SELECT * FROM t WHERE 5 BETWEEN lo AND hi')).toEqual([22, 22]);
  });

  it('位置 -1 の暗黙の定数は記録しない', () => {
    expect(locations('SELECT a FROM t FETCH FIRST ROW ONLY')).toEqual([]);
  });

  it('パラメータは定数ではない', () => {
    expect(locations('SELECT * FROM t WHERE a = $1 AND b = ?')).toEqual([]);
  });

  it('複数文', () => {
    expect(locations("SELECT 1; SELECT 'a'")).toEqual([7, 17]);
  });

  it('失敗したサブツリーだけを記録し、兄弟の走査は続ける', () => {
    const constant = (location: number): Expression => ({ type: 'Constant', kind: 'integer', value: '1', location });
    const mystery = { type: 'Mystery', location: 12 } as unknown as Expression;
    const stmt: SelectStatement = {
      type: 'SelectStatement',
      distinct: false,
      targets: [
        { type: 'ResTarget', value: constant(7), location: 7 },
        { type: 'ResTarget', value: mystery, location: 12 },
        { type: 'ResTarget', value: constant(20), location: 20 },
      ],
      from: [],
      groupBy: [],
      values: [],
      orderBy: [],
      location: 0,
    };
    const { spans, walkFailures } = collectConstants([stmt]);
    expect(spans.map((s) => s.location)).toEqual([7, 20]);
    expect(walkFailures).toEqual([{ nodeType: 'Mystery', message: "Unsupported node 'Mystery'." }]);
  });
});

describe('sortConstantSpans', () => {
  it('位置の昇順に並べ、重複は残す', () => {
    const spans = [
      { location: 31, length: undefined },
      { location: 7, length: undefined },
      { location: 22, length: undefined },
      { location: 7, length: undefined },
    ];
    sortConstantSpans(spans);
    expect(spans.map((s) => s.location)).toEqual([7, 7, 22, 31]);
  });
});
