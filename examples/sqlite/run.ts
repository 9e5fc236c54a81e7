// examples/sqlite/run.ts
// 目的: workload.tsv のクエリをインメモリの統計ストアに流し、形ごとの上位を表示する。
// 各行は "<実行時間ms><TAB><SQL>"。空行と # で始まる行は読み飛ばす。
import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { QueryStatsStore } from '../../src/adapters/sqlite/index.ts';
import { renderStats } from '../../src/cli/output.ts';

function readWorkload(file: string): Array<{ durationMs: number; sql: string }> {
  const text = readFileSync(resolve(file), 'utf-8');
  const out: Array<{ durationMs: number; sql: string }> = [];
  for (const line of text.split('\n')) {
    if (line.trim() === '' || line.startsWith('#')) continue;
    const tab = line.indexOf('\t');
    if (tab < 0) throw new Error(`workload: missing duration column: ${line}`);
    out.push({ durationMs: Number(line.slice(0, tab)), sql: line.slice(tab + 1) });
  }
  return out;
}

function main() {
  const store = new QueryStatsStore(new Database(':memory:'));
  for (const { durationMs, sql } of readWorkload('./examples/sqlite/workload.tsv')) {
    store.record(sql, durationMs);
  }
  console.log(renderStats(store.top(5)));
}

main();
