// test/rewrite.test.ts
import { describe, it, expect } from 'vitest';
import { generateNormalizedQuery } from '../src/normalize/rewrite.ts';
import { NormalizeError } from '../src/errors/errors.ts';

describe('generateNormalizedQuery', () => {
  it('定数を ? に置き換え、それ以外はそのまま写す', () => {
    const spans = [
      { location: 7, length: 1 },
      { location: 10, length: 3 },
    ];
    expect(generateNormalizedQuery(spans, "SELECT 1, 'x'")).toEqual({ query: 'SELECT ?, ?', length: 11 });
  });

  it('長さ未定の定数は元のテキストのまま', () => {
    const spans = [
      { location: 7, length: 1 },
      { location: 10, length: undefined },
    ];
    expect(generateNormalizedQuery(spans, "SELECT 1, 'x'").query).toBe("SELECT ?, 'x'");
  });

  it('定数がなければ入力と同じ', () => {
    expect(generateNormalizedQuery([], 'SELECT a FROM t')).toEqual({ query: 'SELECT a FROM t', length: 15 });
  });

  it('先頭と末尾の定数', () => {
    expect(generateNormalizedQuery([{ location: 0, length: 3 }], "'a'").query).toBe('?');
  });

  it('重なった定数は不変条件違反', () => {
    const spans = [
      { location: 0, length: 5 },
      { location: 2, length: 1 },
    ];
    expect(() => generateNormalizedQuery(spans, 'SELECT 1')).toThrow(NormalizeError);
  });
});
