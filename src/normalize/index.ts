// src/normalize/index.ts
// 公開API: クエリ中の定数を ? に置き換えた正規化クエリを返します。
// 解析失敗は ParseError として投げ、それ以外の失敗は結果の診断情報に残す。

import { parse } from '../parser/index.ts';
import { collectConstants } from './constants.ts';
import { fillInConstantLengths } from './lengths.ts';
import { generateNormalizedQuery } from './rewrite.ts';
import type { NormalizeOptions, NormalizeResult } from './types.ts';

export function normalizeQuery(query: string, options: NormalizeOptions = {}): NormalizeResult {
  const { tree } = parse(query);

  // 作業状態はすべて呼び出しごとに作る
  const { spans, walkFailures } = collectConstants(tree);
  const { unresolved } = fillInConstantLengths(spans, query, options.createScanner);
  const rewritten = generateNormalizedQuery(spans, query);

  return { ...rewritten, constants: spans, unresolved, walkFailures };
}

export function normalize(query: string): string {
  return normalizeQuery(query).query;
}

export { collectConstants, recordConstants } from './constants.ts';
export { sortConstantSpans } from './locations.ts';
export { fillInConstantLengths } from './lengths.ts';
export { generateNormalizedQuery, PLACEHOLDER } from './rewrite.ts';
export type {
  ConstantCollection,
  ConstantSpan,
  NormalizeOptions,
  NormalizeResult,
  ResolveOutcome,
  RewriteResult,
  WalkFailure,
} from './types.ts';
