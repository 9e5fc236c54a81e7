// src/adapters/sqlite/index.ts

// 目的: 実行されたクエリを正規化後の形ごとに SQLite（better-sqlite3）へ集計する。
//       定数だけが異なるクエリは同じ行にまとまり、呼び出し回数と合計時間が加算される。
//
// 主な制約事項:
// - テーブル名 ('query_stats') は固定。
// - 解析できないクエリは記録せず、ParseError をそのまま呼び出し側へ返す。

import type Database from 'better-sqlite3';
import { normalize } from '../../normalize/index.ts';
import { failInvalidArgument } from '../adapterErrors.ts';

const TARGET = 'sqlite';

export interface QueryStat {
  query: string;
  calls: number;
  totalTime: number;
  // 最初に記録された生のクエリ
  sample: string;
}

interface QueryStatRow {
  query: string;
  calls: number;
  total_time: number;
  sample: string;
}

interface RecordParams {
  query: string;
  duration: number;
  sample: string;
}

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS query_stats (
    query      TEXT PRIMARY KEY,
    calls      INTEGER NOT NULL,
    total_time REAL    NOT NULL,
    sample     TEXT    NOT NULL
  )`;

const UPSERT = `
  INSERT INTO query_stats (query, calls, total_time, sample)
  VALUES (@query, 1, @duration, @sample)
  ON CONFLICT(query) DO UPDATE SET
    calls = calls + 1,
    total_time = total_time + excluded.total_time`;

const SELECT_TOP = `
  SELECT query, calls, total_time, sample
  FROM query_stats
  ORDER BY calls DESC, total_time DESC, query ASC
  LIMIT ?`;

export class QueryStatsStore {
  constructor(private readonly db: Database.Database) {
    this.db.exec(CREATE_TABLE);
  }

  /** クエリを正規化して1回分を加算し、正規化後のテキストを返す */
  record(sql: string, durationMs = 0): string {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      failInvalidArgument(TARGET, 'duration', durationMs);
    }
    const query = normalize(sql);
    this.db.prepare<RecordParams>(UPSERT).run({ query, duration: durationMs, sample: sql });
    return query;
  }

  top(limit = 10): QueryStat[] {
    if (!Number.isInteger(limit) || limit <= 0) {
      failInvalidArgument(TARGET, 'limit', limit);
    }
    const rows = this.db.prepare<[number], QueryStatRow>(SELECT_TOP).all(limit);
    return rows.map((row) => ({
      query: row.query,
      calls: row.calls,
      totalTime: row.total_time,
      sample: row.sample,
    }));
  }

  reset(): void {
    this.db.exec('DELETE FROM query_stats');
  }
}
