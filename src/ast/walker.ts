// src/ast/walker.ts
// 目的: 構文木の直下の子ノードを列挙する汎用ウォーカー。
// 定数収集（normalize/constants.ts）はこのウォーカーで木全体を深さ優先に辿る。

import type { Node } from './types.ts';
import { describeNode, failUnsupportedNode } from './walkErrors.ts';

/** true を返すと走査を打ち切る */
export type TreeWalker = (node: Node) => boolean;

type Child = Node | Node[] | Node[][] | undefined;

function compact(...children: Child[]): Node[] {
  const out: Node[] = [];
  for (const child of children) {
    if (child == null) continue;
    if (Array.isArray(child)) {
      // VALUES の行は二重配列
      for (const item of child) {
        if (Array.isArray(item)) out.push(...item.filter((n): n is Node => n != null));
        else if (item != null) out.push(item);
      }
      continue;
    }
    out.push(child);
  }
  return out;
}

/**
 * ノードの直下の子を、ソース上のおおよその出現順で返す。
 * 未知のノードは WalkError。
 */
export function childrenOf(node: Node): Node[] {
  switch (node.type) {
    case 'Constant':
    case 'ColumnRef':
    case 'ParamRef':
    case 'RangeVar':
      return [];
    case 'OperatorExpression':
      return compact(node.left, node.right);
    case 'BoolExpression':
      return compact(node.args);
    case 'NullTest':
    case 'BooleanTest':
      return compact(node.arg);
    case 'InList':
      return compact(node.arg, node.items);
    case 'SubLink':
      return compact(node.testExpr, node.subselect);
    case 'FuncCall':
      return compact(node.args);
    case 'TypeCast':
      return compact(node.arg, node.typeName);
    case 'TypeName':
      return compact(node.typmods);
    case 'CaseExpression':
      return compact(node.arg, node.whens, node.defaultResult);
    case 'CaseWhen':
      return compact(node.condition, node.result);
    case 'ResTarget':
      return compact(node.value);
    case 'RangeSubselect':
      return compact(node.subquery);
    case 'JoinExpr':
      return compact(node.left, node.right, node.quals);
    case 'SortBy':
      return compact(node.node);
    case 'SelectStatement':
      return compact(
        node.targets,
        node.from,
        node.where,
        node.groupBy,
        node.having,
        node.values,
        node.orderBy,
        node.limitOffset,
        node.limitCount,
      );
    case 'SetOperationStatement':
      return compact(node.left, node.right, node.orderBy, node.limitOffset, node.limitCount);
    case 'InsertStatement':
      return compact(node.relation, node.source, node.returning);
    case 'UpdateStatement':
      return compact(node.relation, node.targets, node.from, node.where, node.returning);
    case 'DeleteStatement':
      return compact(node.relation, node.where, node.returning);
    default:
      return failUnsupportedNode(describeNode(node));
  }
}

export function walkChildren(node: Node, walker: TreeWalker): boolean {
  for (const child of childrenOf(node)) {
    if (walker(child)) return true;
  }
  return false;
}
