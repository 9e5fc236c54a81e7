// src/cli/args.ts
// CLI 引数と環境変数の解釈。process.exit はせず UsageError を投げ、終了は呼び出し側で行う。

export type PrintMode = 'normalized' | 'tree' | 'constants' | 'tokens';

export const PRINT_MODES: readonly PrintMode[] = ['normalized', 'tree', 'constants', 'tokens'];

export function isPrintMode(value: string): value is PrintMode {
  return PRINT_MODES.some((m) => m === value);
}

export type Args = {
  cmd: 'run' | 'repl' | 'help';
  query?: string;
  queryFile?: string;
  print?: PrintMode;
};

export type ReplConfig = {
  mode: PrintMode;
  // 統計を集計する SQLite ファイル（未設定なら集計しない）
  statsDb?: string;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const HELP = `sqlshape CLI

Usage:
  echo "SELECT * FROM t WHERE id = 42" | sqlshape
  sqlshape --query "SELECT * FROM t WHERE id = 42" --print constants
  sqlshape --query-file query.sql --print tree
  sqlshape repl

Options:
  --query "<sql>"                       Inline SQL string
  --query-file <path>                   File containing SQL
  --print normalized|tree|constants|tokens
                                        Output mode (default: normalized)
  -h, --help                            Show this help

REPL environment:
  SQLSHAPE_PRINT      Initial output mode
  SQLSHAPE_STATS_DB   SQLite file to aggregate query statistics in
`;

function nextValue(argv: readonly string[], index: number, flag: string): string {
  const v = argv[index];
  if (typeof v === 'string' && v.length > 0 && !v.startsWith('--')) return v;
  throw new UsageError(`${flag} requires a value`);
}

function printMode(value: string, source: string): PrintMode {
  if (isPrintMode(value)) return value;
  throw new UsageError(`${source} must be one of ${PRINT_MODES.map((m) => `"${m}"`).join(' | ')} (got "${value}")`);
}

/** argv はコマンド名より後ろ（process.argv.slice(2)） */
export function parseArgs(argv: readonly string[]): Args {
  // サブコマンド風に "repl" を認識
  if (argv[0] === 'repl') {
    if (argv.length > 1) throw new UsageError(`Unknown option: ${argv[1]}`);
    return { cmd: 'repl' };
  }
  const args: Args = { cmd: 'run' };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--query') args.query = nextValue(argv, ++i, '--query');
    else if (a === '--query-file') args.queryFile = nextValue(argv, ++i, '--query-file');
    else if (a === '--print') args.print = printMode(nextValue(argv, ++i, '--print'), '--print');
    else if (a === '--help' || a === '-h') return { cmd: 'help' };
    else throw new UsageError(`Unknown option: ${a}`);
  }
  if (args.query !== undefined && args.queryFile !== undefined) {
    throw new UsageError('--query and --query-file cannot be used together');
  }
  return args;
}

export function replConfigFromEnv(env: Readonly<Record<string, string | undefined>>): ReplConfig {
  const print = env.SQLSHAPE_PRINT;
  const config: ReplConfig = {
    mode: print ? printMode(print, 'SQLSHAPE_PRINT') : 'normalized',
  };
  const statsDb = env.SQLSHAPE_STATS_DB;
  if (statsDb) config.statsDb = statsDb;
  return config;
}
