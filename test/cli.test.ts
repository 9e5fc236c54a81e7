// test/cli.test.ts
import { describe, it, expect, vi } from 'vitest';
import Database from 'better-sqlite3';
import { QueryStatsStore } from '../src/adapters/sqlite/index.ts';
import { UsageError, parseArgs, replConfigFromEnv } from '../src/cli/args.ts';
import { render, renderAndRecord, renderStats } from '../src/cli/output.ts';

describe('parseArgs', () => {
  it('実行オプション', () => {
    expect(parseArgs(['--query', 'SELECT 1', '--print', 'tree'])).toEqual({
      cmd: 'run',
      query: 'SELECT 1',
      print: 'tree',
    });
    expect(parseArgs(['--query-file', 'q.sql'])).toEqual({ cmd: 'run', queryFile: 'q.sql' });
    expect(parseArgs([])).toEqual({ cmd: 'run' });
  });

  it('サブコマンドとヘルプ', () => {
    expect(parseArgs(['repl'])).toEqual({ cmd: 'repl' });
    expect(parseArgs(['--help'])).toEqual({ cmd: 'help' });
    expect(parseArgs(['-h'])).toEqual({ cmd: 'help' });
  });

  it('不正な指定は UsageError', () => {
    expect(() => parseArgs(['--print', 'xml'])).toThrow(
      new UsageError('--print must be one of "normalized" | "tree" | "constants" | "tokens" (got "xml")'),
    );
    expect(() => parseArgs(['--query'])).toThrow(new UsageError('--query requires a value'));
    expect(() => parseArgs(['--bogus'])).toThrow(new UsageError('Unknown option: --bogus'));
    expect(() => parseArgs(['--query', 'SELECT 1', '--query-file', 'q.sql'])).toThrow(UsageError);
  });
});

describe('replConfigFromEnv', () => {
  it('既定値と環境変数', () => {
    expect(replConfigFromEnv({})).toEqual({ mode: 'normalized' });
    expect(replConfigFromEnv({ SQLSHAPE_PRINT: 'constants', SQLSHAPE_STATS_DB: 'stats.db' })).toEqual({
      mode: 'constants',
      statsDb: 'stats.db',
    });
    expect(() => replConfigFromEnv({ SQLSHAPE_PRINT: 'xml' })).toThrow(UsageError);
  });
});

describe('render', () => {
  it('normalized', () => {
    expect(render('SELECT 1', 'normalized')).toBe('SELECT ?');
  });

  it('constants は解決済みの定数とその元テキスト', () => {
    expect(render("SELECT 1, 'ab'", 'constants')).toBe(
      JSON.stringify(
        [
          { location: 7, length: 1, text: '1' },
          { location: 10, length: 4, text: "'ab'" },
        ],
        null,
        2,
      ),
    );
  });

  it('tree は構文木の JSON', () => {
    const tree: unknown = JSON.parse(render('SELECT 1', 'tree'));
    expect(tree).toMatchObject([{ type: 'SelectStatement', targets: [{ value: { type: 'Constant', value: '1' } }] }]);
  });

  it('tokens は字句解析結果を1行1トークンで', () => {
    expect(render("SELECT -(1), 'a'", 'tokens')).toBe(
      [
        '0\tSelect\tSELECT',
        '7\tMinus\t-',
        '8\tLParen\t(',
        '9\tIntegerLiteral\t1',
        '10\tRParen\t)',
        '11\tComma\t,',
        "13\tStringLiteral\t'a'",
      ].join('\n'),
    );
  });

  it('renderStats', () => {
    expect(renderStats([])).toBe('(no statements recorded)');
    expect(renderStats([{ query: 'SELECT ?', calls: 2, totalTime: 1.5, sample: 'SELECT 1' }])).toBe(
      '     2' + '  ' + '      1.5' + ' ms  SELECT ?',
    );
  });
});

describe('renderAndRecord', () => {
  it('集計なしなら render と同じ', () => {
    expect(renderAndRecord('SELECT 1', 'normalized')).toBe('SELECT ?');
  });

  it('normalized では record が返した正規化結果を表示する', () => {
    const store = new QueryStatsStore(new Database(':memory:'));
    const record = vi.spyOn(store, 'record');
    expect(renderAndRecord('SELECT * FROM t WHERE id = 7', 'normalized', store)).toBe('SELECT * FROM t WHERE id = ?');
    expect(record).toHaveBeenCalledTimes(1);
    expect(record).toHaveReturnedWith('SELECT * FROM t WHERE id = ?');

    record.mockReturnValueOnce('recorded shape');
    expect(renderAndRecord('SELECT 2', 'normalized', store)).toBe('recorded shape');
  });

  it('他のモードでも集計される', () => {
    const store = new QueryStatsStore(new Database(':memory:'));
    expect(renderAndRecord("SELECT 'a'", 'tokens', store)).toBe("0\tSelect\tSELECT\n7\tStringLiteral\t'a'");
    expect(store.top()).toEqual([{ query: 'SELECT ?', calls: 1, totalTime: 0, sample: "SELECT 'a'" }]);
  });
});
