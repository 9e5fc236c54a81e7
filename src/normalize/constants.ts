// src/normalize/constants.ts
// 構文木を深さ優先で辿り、位置を持つ定数ノードを出現順に記録する。

import type { Node, ParseTree } from '../ast/types.ts';
import { describeNode } from '../ast/walkErrors.ts';
import { walkChildren } from '../ast/walker.ts';
import type { ConstantCollection, ConstantSpan, WalkFailure } from './types.ts';

export function collectConstants(tree: ParseTree): ConstantCollection {
  const collection: ConstantCollection = { spans: [], walkFailures: [] };
  for (const statement of tree) {
    recordConstants(statement, collection);
  }
  return collection;
}

/**
 * node 以下の定数を collection.spans に追加する。
 * サブツリーごとに失敗を閉じ込め、失敗したサブツリーは false を返す
 * （兄弟のサブツリーは引き続き走査され、それまでに記録した定数も残る）。
 */
export function recordConstants(node: Node, collection: ConstantCollection): boolean {
  if (node.type === 'Constant') {
    // 位置 -1 は暗黙の定数（FETCH FIRST ROW ONLY の 1 など）
    if (node.location >= 0) {
      const span: ConstantSpan = { location: node.location, length: undefined };
      collection.spans.push(span);
    }
    return false;
  }
  try {
    return walkChildren(node, (child) => recordConstants(child, collection));
  } catch (err) {
    collection.walkFailures.push(toWalkFailure(node, err));
    return false;
  }
}

function toWalkFailure(node: Node, err: unknown): WalkFailure {
  const message = err instanceof Error ? err.message : String(err);
  return { nodeType: describeNode(node), message };
}
