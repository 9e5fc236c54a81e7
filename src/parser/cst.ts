// src/parser/cst.ts
// CST の子要素（ノード/トークン混在の配列）から型付きで取り出すための小道具。
// Visitor 側で any を使わずに済むよう、キーごとにノードかトークンかを絞り込む。

import type { CstChildrenDictionary, CstElement, CstNode, IToken } from 'chevrotain';
import { failMalformedCst } from './parserErrors.ts';

export type Ctx = CstChildrenDictionary;

export function isCstNode(el: CstElement): el is CstNode {
  return 'children' in el;
}

export function nodesOf(ctx: Ctx, key: string): CstNode[] {
  return (ctx[key] ?? []).filter(isCstNode);
}

export function tokensOf(ctx: Ctx, key: string): IToken[] {
  return (ctx[key] ?? []).filter((el): el is IToken => !isCstNode(el));
}

export function optionalNode(ctx: Ctx, key: string): CstNode | undefined {
  return nodesOf(ctx, key)[0];
}

export function firstNode(ctx: Ctx, key: string): CstNode {
  return optionalNode(ctx, key) ?? failMalformedCst(key);
}

export function optionalToken(ctx: Ctx, key: string): IToken | undefined {
  return tokensOf(ctx, key)[0];
}

export function firstToken(ctx: Ctx, key: string): IToken {
  return optionalToken(ctx, key) ?? failMalformedCst(key);
}

// 子要素の中で最も前にあるオフセット。空なら -1。
export function startOffsetOf(ctx: Ctx): number {
  let min = Number.POSITIVE_INFINITY;
  for (const key of Object.keys(ctx)) {
    for (const el of ctx[key] ?? []) {
      const offset = isCstNode(el) ? el.location?.startOffset : el.startOffset;
      if (offset !== undefined && !Number.isNaN(offset) && offset < min) min = offset;
    }
  }
  return Number.isFinite(min) ? min : -1;
}
