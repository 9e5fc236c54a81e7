// src/cli/output.ts
// CLI / REPL 共通の出力整形。
import { parse } from '../parser/index.ts';
import { normalizeQuery } from '../normalize/index.ts';
import type { QueryStat, QueryStatsStore } from '../adapters/sqlite/index.ts';
import type { PrintMode } from './args.ts';

export interface ResolvedConstant {
  location: number;
  length: number;
  text: string;
}

export function resolvedConstants(sql: string): ResolvedConstant[] {
  const out: ResolvedConstant[] = [];
  for (const { location, length } of normalizeQuery(sql).constants) {
    if (length === undefined) continue;
    out.push({ location, length, text: sql.slice(location, location + length) });
  }
  return out;
}

export function render(sql: string, mode: PrintMode): string {
  switch (mode) {
    case 'normalized':
      return normalizeQuery(sql).query;
    case 'tree':
      return JSON.stringify(parse(sql).tree, null, 2);
    case 'constants':
      return JSON.stringify(resolvedConstants(sql), null, 2);
    case 'tokens':
      // オフセット、トークン種別、元テキストをタブ区切りで1行ずつ
      return parse(sql)
        .tokens.map((t) => `${t.startOffset}\t${t.tokenType.name}\t${t.image}`)
        .join('\n');
  }
}

// 集計ありの normalized モードでは record の戻り値をそのまま表示する（正規化は1回）
export function renderAndRecord(sql: string, mode: PrintMode, store?: QueryStatsStore): string {
  if (!store) return render(sql, mode);
  if (mode === 'normalized') return store.record(sql);
  const out = render(sql, mode);
  store.record(sql);
  return out;
}

export function renderStats(stats: readonly QueryStat[]): string {
  if (stats.length === 0) return '(no statements recorded)';
  return stats
    .map((s) => `${String(s.calls).padStart(6)}  ${s.totalTime.toFixed(1).padStart(9)} ms  ${s.query}`)
    .join('\n');
}
