// src/ast/walkErrors.ts
import { WalkError } from '../errors/errors.ts';

export function failUnsupportedNode(nodeType: string, detail?: string): never {
  const msg = detail ? `Unsupported node '${nodeType}': ${detail}` : `Unsupported node '${nodeType}'.`;
  throw new WalkError(msg, nodeType, 'E_WALK_UNSUPPORTED_NODE');
}

// 不正なノードから型名を取り出す（型が分からなければ 'Unknown'）
export function describeNode(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'type' in node && typeof node.type === 'string') {
    return node.type;
  }
  return 'Unknown';
}
