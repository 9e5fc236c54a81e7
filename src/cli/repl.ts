/**
 * sqlshape REPL (簡易)
 *
 * 目的:
 * - 1行の SQL を入力し、正規化結果を即時表示する。:q で終了。
 * - SQLSHAPE_STATS_DB が設定されていれば、入力したクエリを形ごとに集計する。
 *
 * コマンド:
 *   :q                                        終了
 *   :mode normalized|tree|constants|tokens    出力モードの変更
 *   :stats                                    集計結果の上位を表示
 */

import process from 'node:process';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import Database from 'better-sqlite3';
import { QueryStatsStore } from '../adapters/sqlite/index.ts';
import { SqlshapeError } from '../errors/errors.ts';
import { PRINT_MODES, isPrintMode, replConfigFromEnv } from './args.ts';
import type { PrintMode } from './args.ts';
import { renderAndRecord, renderStats } from './output.ts';

export async function startRepl(): Promise<void> {
  const config = replConfigFromEnv(process.env);
  let mode: PrintMode = config.mode;

  const db = config.statsDb !== undefined ? new Database(config.statsDb) : undefined;
  const store = db ? new QueryStatsStore(db) : undefined;

  const rl = readline.createInterface({ input, output, prompt: 'sqlshape> ' });
  rl.prompt();

  for await (const line of rl) {
    const text = line.trim();
    if (text === '') { rl.prompt(); continue; }
    if (text === ':q') { break; }

    // 設定コマンド
    if (text.startsWith(':mode ')) {
      const m = text.slice(6).trim();
      if (isPrintMode(m)) {
        mode = m;
        console.log(`mode = ${mode}`);
      } else {
        console.log(`usage: :mode ${PRINT_MODES.join('|')}`);
      }
      rl.prompt();
      continue;
    }
    if (text === ':stats') {
      console.log(store ? renderStats(store.top()) : 'stats: SQLSHAPE_STATS_DB is not set');
      rl.prompt();
      continue;
    }

    try {
      console.log(renderAndRecord(text, mode, store));
    } catch (err) {
      if (!(err instanceof SqlshapeError)) throw err;
      console.error(`ERROR: ${err.message}`);
    }

    rl.prompt();
  }

  rl.close();
  db?.close();
}
