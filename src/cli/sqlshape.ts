/// <reference types="node" />
/**
 * sqlshape CLI
 *
 * 目的:
 * - SQL を受け取り、定数を ? に置き換えた正規化クエリ / 構文木 / 定数位置を出力する最小CLI。
 * - 入力は --query／--query-file／STDIN のいずれか。
 *
 * 使い方:
 *   echo "SELECT * FROM t WHERE id = 42" | sqlshape
 *   sqlshape --query-file query.sql --print constants
 *   sqlshape repl   // 対話モード（簡易REPL）
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { ParseError } from '../errors/errors.ts';
import { HELP, UsageError, parseArgs } from './args.ts';
import type { Args } from './args.ts';
import { render } from './output.ts';

async function readSql(args: Args): Promise<string> {
  if (args.query !== undefined) return args.query;
  if (args.queryFile !== undefined) return fs.readFile(path.resolve(args.queryFile), 'utf8');
  // STDIN
  if (!process.stdin.isTTY) {
    return await new Promise<string>((resolve, reject) => {
      let buf = '';
      process.stdin.setEncoding('utf8');
      process.stdin.on('data', (chunk) => { buf += chunk; });
      process.stdin.on('end', () => resolve(buf));
      process.stdin.on('error', reject);
    });
  }
  throw new UsageError('--query or --query-file or STDIN is required');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.cmd === 'help') {
    console.log(HELP);
    return;
  }
  if (args.cmd === 'repl') {
    const { startRepl } = await import('./repl.ts');
    await startRepl();
    return;
  }
  const sql = await readSql(args);
  console.log(render(sql, args.print ?? 'normalized'));
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    console.error(HELP);
  } else if (err instanceof ParseError) {
    console.error(`ERROR: ${err.message} (position ${err.cursorPosition})`);
  } else {
    console.error('sqlshape error:', err);
  }
  process.exit(1);
});
