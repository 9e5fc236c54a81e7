// test/stats.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { QueryStatsStore } from '../src/adapters/sqlite/index.ts';
import { AdapterError, ParseError } from '../src/errors/errors.ts';

describe('QueryStatsStore', () => {
  let store: QueryStatsStore;

  beforeEach(() => {
    store = new QueryStatsStore(new Database(':memory:'));
  });

  it('正規化後の形ごとに回数と時間を集計する', () => {
    expect(store.record('SELECT * FROM t WHERE id = 1', 5)).toBe('SELECT * FROM t WHERE id = ?');
    store.record('SELECT * FROM t WHERE id = 2', 7);
    store.record('SELECT 1');

    expect(store.top()).toEqual([
      { query: 'SELECT * FROM t WHERE id = ?', calls: 2, totalTime: 12, sample: 'SELECT * FROM t WHERE id = 1' },
      { query: 'SELECT ?', calls: 1, totalTime: 0, sample: 'SELECT 1' },
    ]);
  });

  it('同数なら合計時間、次にクエリ文字列の順', () => {
    store.record('SELECT b FROM t', 1);
    store.record('SELECT a FROM t', 1);
    store.record('SELECT c FROM t', 3);
    expect(store.top().map((s) => s.query)).toEqual(['SELECT c FROM t', 'SELECT a FROM t', 'SELECT b FROM t']);
    expect(store.top(1)).toHaveLength(1);
  });

  it('reset で全件削除', () => {
    store.record('SELECT 1');
    store.reset();
    expect(store.top()).toEqual([]);
  });

  it('解析できないクエリは記録しない', () => {
    expect(() => store.record('SELECT FROM WHERE')).toThrow(ParseError);
    expect(store.top()).toEqual([]);
  });

  it('不正な引数は AdapterError', () => {
    expect(() => store.top(1.5)).toThrow(AdapterError);
    expect(() => store.record('SELECT 1', -1)).toThrow(AdapterError);
  });
});
