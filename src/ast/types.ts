// src/ast/types.ts
// SQL 構文木の型定義。ノード名と構造は PostgreSQL の raw parse tree に寄せています。
// location は元クエリ文字列内のオフセット。位置が分からないノードは -1。

export interface BaseNode {
  location: number;
}

// ----- Expressions -----

export type ConstantKind = 'integer' | 'float' | 'string' | 'bitString' | 'boolean' | 'null';

// リテラル定数。正規化ではこのノードの位置だけを使う。
export interface Constant extends BaseNode {
  type: 'Constant';
  kind: ConstantKind;
  // 数値はソース表記のまま（負数は '-' 付き）、文字列はクォートを外した値
  value: string | null;
}

export interface ColumnRef extends BaseNode {
  type: 'ColumnRef';
  fields: string[];
  // t.* / *
  star: boolean;
}

// $1 は number あり、? は number なし
export interface ParamRef extends BaseNode {
  type: 'ParamRef';
  number?: number;
}

// 二項/単項演算子、LIKE/ILIKE
export interface OperatorExpression extends BaseNode {
  type: 'OperatorExpression';
  operator: string;
  left?: Expression;
  right: Expression;
}

// AND / OR は連鎖を1ノードに平坦化、NOT は args が1要素
export interface BoolExpression extends BaseNode {
  type: 'BoolExpression';
  operator: 'AND' | 'OR' | 'NOT';
  args: Expression[];
}

export interface NullTest extends BaseNode {
  type: 'NullTest';
  arg: Expression;
  negated: boolean;
}

export interface BooleanTest extends BaseNode {
  type: 'BooleanTest';
  arg: Expression;
  test: 'IS TRUE' | 'IS NOT TRUE' | 'IS FALSE' | 'IS NOT FALSE';
}

// x IN (1, 2, 3)
export interface InList extends BaseNode {
  type: 'InList';
  arg: Expression;
  negated: boolean;
  items: Expression[];
}

// EXISTS (...) / x IN (SELECT ...) / (SELECT ...)
export interface SubLink extends BaseNode {
  type: 'SubLink';
  kind: 'EXISTS' | 'ANY' | 'EXPR';
  testExpr?: Expression;
  subselect: QueryStatement;
}

export interface FuncCall extends BaseNode {
  type: 'FuncCall';
  name: string[];
  args: Expression[];
  star: boolean;
  distinct: boolean;
}

export interface TypeCast extends BaseNode {
  type: 'TypeCast';
  arg: Expression;
  typeName: TypeName;
}

// varchar(10) の 10 は typmods に整数定数として入る
export interface TypeName extends BaseNode {
  type: 'TypeName';
  names: string[];
  typmods: Constant[];
}

export interface CaseExpression extends BaseNode {
  type: 'CaseExpression';
  arg?: Expression;
  whens: CaseWhen[];
  defaultResult?: Expression;
}

export interface CaseWhen extends BaseNode {
  type: 'CaseWhen';
  condition: Expression;
  result: Expression;
}

export type Expression =
  | Constant
  | ColumnRef
  | ParamRef
  | OperatorExpression
  | BoolExpression
  | NullTest
  | BooleanTest
  | InList
  | SubLink
  | FuncCall
  | TypeCast
  | CaseExpression;

// ----- Clauses -----

// SELECT の出力列 / UPDATE の SET 句 / RETURNING
export interface ResTarget extends BaseNode {
  type: 'ResTarget';
  name?: string;
  value: Expression;
}

export interface RangeVar extends BaseNode {
  type: 'RangeVar';
  schema?: string;
  name: string;
  alias?: string;
}

export interface RangeSubselect extends BaseNode {
  type: 'RangeSubselect';
  subquery: QueryStatement;
  alias: string;
}

export interface JoinExpr extends BaseNode {
  type: 'JoinExpr';
  joinType: 'INNER' | 'LEFT' | 'RIGHT' | 'FULL' | 'CROSS';
  left: FromItem;
  right: FromItem;
  quals?: Expression;
}

export type FromItem = RangeVar | RangeSubselect | JoinExpr;

export interface SortBy extends BaseNode {
  type: 'SortBy';
  node: Expression;
  direction: 'ASC' | 'DESC' | 'DEFAULT';
  nulls: 'FIRST' | 'LAST' | 'DEFAULT';
}

// ----- Statements -----

export interface SelectStatement extends BaseNode {
  type: 'SelectStatement';
  distinct: boolean;
  targets: ResTarget[];
  from: FromItem[];
  where?: Expression;
  groupBy: Expression[];
  having?: Expression;
  // VALUES (...), (...) の場合のみ使う
  values: Expression[][];
  orderBy: SortBy[];
  limitCount?: Expression;
  limitOffset?: Expression;
}

export interface SetOperationStatement extends BaseNode {
  type: 'SetOperationStatement';
  operator: 'UNION' | 'INTERSECT' | 'EXCEPT';
  all: boolean;
  left: QueryStatement;
  right: QueryStatement;
  orderBy: SortBy[];
  limitCount?: Expression;
  limitOffset?: Expression;
}

export type QueryStatement = SelectStatement | SetOperationStatement;

export interface InsertStatement extends BaseNode {
  type: 'InsertStatement';
  relation: RangeVar;
  columns: string[];
  source: QueryStatement;
  returning: ResTarget[];
}

export interface UpdateStatement extends BaseNode {
  type: 'UpdateStatement';
  relation: RangeVar;
  targets: ResTarget[];
  from: FromItem[];
  where?: Expression;
  returning: ResTarget[];
}

export interface DeleteStatement extends BaseNode {
  type: 'DeleteStatement';
  relation: RangeVar;
  where?: Expression;
  returning: ResTarget[];
}

export type Statement = QueryStatement | InsertStatement | UpdateStatement | DeleteStatement;

// ";" 区切りの文の並び。空入力は空配列。
export type ParseTree = Statement[];

export type Node =
  | Statement
  | Expression
  | ResTarget
  | FromItem
  | SortBy
  | TypeName
  | CaseWhen;
