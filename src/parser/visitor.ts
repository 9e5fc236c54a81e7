// src/parser/visitor.ts
// 目的: Chevrotain の CST を構文木（ast/types.ts）へ変換する Visitor 実装
// 命名規約: メソッド名は CST ルール名に一致。ヘルパーはモジュール関数として外に置く
// （validateVisitor がルール以外のメソッドを持たないように）。

import { tokenMatcher } from 'chevrotain';
import type { IToken } from 'chevrotain';
import type {
  BoolExpression,
  BooleanTest,
  CaseExpression,
  CaseWhen,
  Constant,
  Expression,
  FromItem,
  FuncCall,
  JoinExpr,
  ParseTree,
  QueryStatement,
  RangeVar,
  ResTarget,
  SelectStatement,
  SetOperationStatement,
  SortBy,
  Statement,
  SubLink,
  TypeCast,
  TypeName,
  InsertStatement,
  UpdateStatement,
  DeleteStatement,
} from '../ast/types.ts';
import { BitStringConstant, NumericConstant, StringConstant } from '../lexer/categories.ts';
import {
  Asc,
  DollarStringLiteral,
  EscapeStringLiteral,
  False,
  First,
  Full,
  HexStringLiteral,
  Ilike,
  Inner,
  IntegerLiteral,
  Intersect,
  Left,
  Minus,
  NationalStringLiteral,
  NotEquals,
  Null,
  QuotedIdentifier,
  Right,
  True,
  Union,
} from '../lexer/tokens.ts';
import { sqlParser } from './parser.ts';
import {
  firstNode,
  firstToken,
  nodesOf,
  optionalNode,
  optionalToken,
  startOffsetOf,
  tokensOf,
} from './cst.ts';
import type { Ctx } from './cst.ts';
import { failGenericParse, failMalformedCst } from './parserErrors.ts';

const BaseCstVisitor = sqlParser.getBaseCstVisitorConstructor();

interface JoinPart {
  joinType: JoinExpr['joinType'];
  right: FromItem;
  quals?: Expression;
  location: number;
}

interface LimitPart {
  count: Expression;
  location: number;
}

export class AstBuilderVisitor extends BaseCstVisitor {
  constructor() {
    super();
    // 実装された Visitor メソッドがパーサーの全ルールをカバーしているか検証
    this.validateVisitor();
  }

  // ===== Statements =====

  statementList(ctx: Ctx): ParseTree {
    return nodesOf(ctx, 'statement').map((n) => this.statement(n.children));
  }

  statement(ctx: Ctx): Statement {
    const select = optionalNode(ctx, 'selectStatement');
    if (select) return this.selectStatement(select.children);
    const insert = optionalNode(ctx, 'insertStatement');
    if (insert) return this.insertStatement(insert.children);
    const update = optionalNode(ctx, 'updateStatement');
    if (update) return this.updateStatement(update.children);
    return this.deleteStatement(firstNode(ctx, 'deleteStatement').children);
  }

  selectStatement(ctx: Ctx): QueryStatement {
    let result: QueryStatement = this.selectCore(firstNode(ctx, 'lhs').children);

    // 集合演算は左結合
    const rhs = nodesOf(ctx, 'rhs');
    nodesOf(ctx, 'setOperator').forEach((opNode, i) => {
      const right = rhs[i] ?? failMalformedCst('rhs');
      const op = this.setOperator(opNode.children);
      const combined: SetOperationStatement = {
        type: 'SetOperationStatement',
        operator: op.operator,
        all: op.all,
        left: result,
        right: this.selectCore(right.children),
        orderBy: [],
        location: op.location,
      };
      result = combined;
    });

    const orderBy = optionalNode(ctx, 'orderByClause');
    if (orderBy) result.orderBy = this.orderByClause(orderBy.children);

    const limit = optionalNode(ctx, 'limitClause');
    const fetch = optionalNode(ctx, 'fetchClause');
    if (limit && fetch) {
      const fetchPart = this.fetchClause(fetch.children);
      failGenericParse('multiple LIMIT clauses not allowed', fetchPart.location);
    }
    if (limit) result.limitCount = this.limitClause(limit.children).count;
    if (fetch) result.limitCount = this.fetchClause(fetch.children).count;

    const offset = optionalNode(ctx, 'offsetClause');
    if (offset) result.limitOffset = this.offsetClause(offset.children);

    return result;
  }

  selectCore(ctx: Ctx): SelectStatement {
    const values = optionalNode(ctx, 'valuesClause');
    if (values) {
      return {
        ...emptySelect(startOffsetOf(ctx)),
        values: this.valuesClause(values.children),
      };
    }

    const from = optionalNode(ctx, 'fromClause');
    const where = optionalNode(ctx, 'whereClause');
    const groupBy = optionalNode(ctx, 'groupByClause');
    const having = optionalNode(ctx, 'havingClause');
    const select: SelectStatement = {
      ...emptySelect(firstToken(ctx, 'Select').startOffset),
      distinct: optionalToken(ctx, 'Distinct') !== undefined,
      targets: this.targetList(firstNode(ctx, 'targetList').children),
      from: from ? this.fromClause(from.children) : [],
      groupBy: groupBy ? this.groupByClause(groupBy.children) : [],
    };
    if (where) select.where = this.whereClause(where.children);
    if (having) select.having = this.havingClause(having.children);
    return select;
  }

  setOperator(ctx: Ctx): { operator: SetOperationStatement['operator']; all: boolean; location: number } {
    const token = firstToken(ctx, 'operator');
    const operator = tokenMatcher(token, Union) ? 'UNION' : tokenMatcher(token, Intersect) ? 'INTERSECT' : 'EXCEPT';
    return { operator, all: optionalToken(ctx, 'All') !== undefined, location: token.startOffset };
  }

  valuesClause(ctx: Ctx): Expression[][] {
    return nodesOf(ctx, 'valuesRow').map((n) => this.valuesRow(n.children));
  }

  valuesRow(ctx: Ctx): Expression[] {
    return this.exprList(firstNode(ctx, 'exprList').children);
  }

  exprList(ctx: Ctx): Expression[] {
    return nodesOf(ctx, 'expression').map((n) => this.expression(n.children));
  }

  targetList(ctx: Ctx): ResTarget[] {
    return nodesOf(ctx, 'targetElement').map((n) => this.targetElement(n.children));
  }

  targetElement(ctx: Ctx): ResTarget {
    const star = optionalToken(ctx, 'Star');
    if (star) {
      return {
        type: 'ResTarget',
        value: { type: 'ColumnRef', fields: [], star: true, location: star.startOffset },
        location: star.startOffset,
      };
    }
    const target: ResTarget = {
      type: 'ResTarget',
      value: this.expression(firstNode(ctx, 'expression').children),
      location: startOffsetOf(ctx),
    };
    const alias = optionalNode(ctx, 'alias');
    if (alias) target.name = this.alias(alias.children);
    return target;
  }

  alias(ctx: Ctx): string {
    return this.identifier(firstNode(ctx, 'identifier').children);
  }

  fromClause(ctx: Ctx): FromItem[] {
    return nodesOf(ctx, 'tableReference').map((n) => this.tableReference(n.children));
  }

  tableReference(ctx: Ctx): FromItem {
    let left = this.tablePrimary(firstNode(ctx, 'tablePrimary').children);
    for (const joinNode of nodesOf(ctx, 'joinClause')) {
      const join = this.joinClause(joinNode.children);
      const expr: JoinExpr = {
        type: 'JoinExpr',
        joinType: join.joinType,
        left,
        right: join.right,
        location: join.location,
      };
      if (join.quals) expr.quals = join.quals;
      left = expr;
    }
    return left;
  }

  tablePrimary(ctx: Ctx): FromItem {
    const alias = optionalNode(ctx, 'alias');
    const name = optionalNode(ctx, 'qualifiedName');
    if (name) {
      const relation = this.qualifiedName(name.children);
      if (alias) relation.alias = this.alias(alias.children);
      return relation;
    }
    return {
      type: 'RangeSubselect',
      subquery: this.selectStatement(firstNode(ctx, 'selectStatement').children),
      alias: this.alias(firstNode(ctx, 'alias').children),
      location: firstToken(ctx, 'LParen').startOffset,
    };
  }

  joinClause(ctx: Ctx): JoinPart {
    const right = this.tablePrimary(firstNode(ctx, 'tablePrimary').children);
    const cross = optionalToken(ctx, 'Cross');
    if (cross) return { joinType: 'CROSS', right, location: cross.startOffset };

    const joinType = optionalNode(ctx, 'joinType');
    return {
      joinType: joinType ? this.joinType(joinType.children) : 'INNER',
      right,
      quals: this.expression(firstNode(ctx, 'expression').children),
      location: firstToken(ctx, 'Join').startOffset,
    };
  }

  joinType(ctx: Ctx): Exclude<JoinExpr['joinType'], 'CROSS'> {
    const kind = firstToken(ctx, 'kind');
    if (tokenMatcher(kind, Inner)) return 'INNER';
    if (tokenMatcher(kind, Left)) return 'LEFT';
    if (tokenMatcher(kind, Right)) return 'RIGHT';
    if (tokenMatcher(kind, Full)) return 'FULL';
    return failMalformedCst('kind');
  }

  whereClause(ctx: Ctx): Expression {
    return this.expression(firstNode(ctx, 'expression').children);
  }

  groupByClause(ctx: Ctx): Expression[] {
    return this.exprList(firstNode(ctx, 'exprList').children);
  }

  havingClause(ctx: Ctx): Expression {
    return this.expression(firstNode(ctx, 'expression').children);
  }

  orderByClause(ctx: Ctx): SortBy[] {
    return nodesOf(ctx, 'sortItem').map((n) => this.sortItem(n.children));
  }

  sortItem(ctx: Ctx): SortBy {
    const direction = optionalToken(ctx, 'direction');
    const nulls = optionalToken(ctx, 'nulls');
    return {
      type: 'SortBy',
      node: this.expression(firstNode(ctx, 'expression').children),
      direction: direction ? (tokenMatcher(direction, Asc) ? 'ASC' : 'DESC') : 'DEFAULT',
      nulls: nulls ? (tokenMatcher(nulls, First) ? 'FIRST' : 'LAST') : 'DEFAULT',
      location: -1,
    };
  }

  limitClause(ctx: Ctx): LimitPart {
    const location = firstToken(ctx, 'Limit').startOffset;
    const all = optionalToken(ctx, 'All');
    // LIMIT ALL は NULL 定数（位置は ALL）
    if (all) {
      return { count: { type: 'Constant', kind: 'null', value: null, location: all.startOffset }, location };
    }
    return { count: this.expression(firstNode(ctx, 'expression').children), location };
  }

  offsetClause(ctx: Ctx): Expression {
    return this.expression(firstNode(ctx, 'expression').children);
  }

  fetchClause(ctx: Ctx): LimitPart {
    const location = firstToken(ctx, 'Fetch').startOffset;
    const count = optionalToken(ctx, 'count');
    if (count) return { count: buildConstant(count), location };
    // 件数省略時は暗黙の 1。ソース上に存在しないので位置は -1。
    return { count: { type: 'Constant', kind: 'integer', value: '1', location: -1 }, location };
  }

  insertStatement(ctx: Ctx): InsertStatement {
    const columns = optionalNode(ctx, 'identifierList');
    const returning = optionalNode(ctx, 'returningClause');
    return {
      type: 'InsertStatement',
      relation: this.qualifiedName(firstNode(ctx, 'qualifiedName').children),
      columns: columns ? this.identifierList(columns.children) : [],
      source: this.selectStatement(firstNode(ctx, 'selectStatement').children),
      returning: returning ? this.returningClause(returning.children) : [],
      location: firstToken(ctx, 'Insert').startOffset,
    };
  }

  identifierList(ctx: Ctx): string[] {
    return nodesOf(ctx, 'identifier').map((n) => this.identifier(n.children));
  }

  updateStatement(ctx: Ctx): UpdateStatement {
    const relation = this.qualifiedName(firstNode(ctx, 'qualifiedName').children);
    const alias = optionalNode(ctx, 'alias');
    if (alias) relation.alias = this.alias(alias.children);
    const from = optionalNode(ctx, 'fromClause');
    const where = optionalNode(ctx, 'whereClause');
    const returning = optionalNode(ctx, 'returningClause');
    const update: UpdateStatement = {
      type: 'UpdateStatement',
      relation,
      targets: nodesOf(ctx, 'setClause').map((n) => this.setClause(n.children)),
      from: from ? this.fromClause(from.children) : [],
      returning: returning ? this.returningClause(returning.children) : [],
      location: firstToken(ctx, 'Update').startOffset,
    };
    if (where) update.where = this.whereClause(where.children);
    return update;
  }

  setClause(ctx: Ctx): ResTarget {
    const column = firstNode(ctx, 'identifier');
    return {
      type: 'ResTarget',
      name: this.identifier(column.children),
      value: this.expression(firstNode(ctx, 'expression').children),
      location: startOffsetOf(column.children),
    };
  }

  deleteStatement(ctx: Ctx): DeleteStatement {
    const relation = this.qualifiedName(firstNode(ctx, 'qualifiedName').children);
    const alias = optionalNode(ctx, 'alias');
    if (alias) relation.alias = this.alias(alias.children);
    const where = optionalNode(ctx, 'whereClause');
    const returning = optionalNode(ctx, 'returningClause');
    const del: DeleteStatement = {
      type: 'DeleteStatement',
      relation,
      returning: returning ? this.returningClause(returning.children) : [],
      location: firstToken(ctx, 'Delete').startOffset,
    };
    if (where) del.where = this.whereClause(where.children);
    return del;
  }

  returningClause(ctx: Ctx): ResTarget[] {
    return this.targetList(firstNode(ctx, 'targetList').children);
  }

  qualifiedName(ctx: Ctx): RangeVar {
    const names = nodesOf(ctx, 'identifier').map((n) => this.identifier(n.children));
    const location = startOffsetOf(ctx);
    const [first, second] = names;
    if (first === undefined || names.length > 2) {
      return failGenericParse(`improper qualified name (too many dotted names): ${names.join('.')}`, location);
    }
    if (second === undefined) return { type: 'RangeVar', name: first, location };
    return { type: 'RangeVar', schema: first, name: second, location };
  }

  identifier(ctx: Ctx): string {
    return identifierText(firstToken(ctx, 'name'));
  }

  // ===== Expressions =====

  expression(ctx: Ctx): Expression {
    return this.orExpression(firstNode(ctx, 'orExpression').children);
  }

  orExpression(ctx: Ctx): Expression {
    const args = [...nodesOf(ctx, 'lhs'), ...nodesOf(ctx, 'rhs')].map((n) => this.andExpression(n.children));
    return boolChain('OR', args, tokensOf(ctx, 'Or'));
  }

  andExpression(ctx: Ctx): Expression {
    const args = [...nodesOf(ctx, 'lhs'), ...nodesOf(ctx, 'rhs')].map((n) => this.notExpression(n.children));
    return boolChain('AND', args, tokensOf(ctx, 'And'));
  }

  notExpression(ctx: Ctx): Expression {
    const not = optionalToken(ctx, 'Not');
    if (not) {
      return {
        type: 'BoolExpression',
        operator: 'NOT',
        args: [this.notExpression(firstNode(ctx, 'argument').children)],
        location: not.startOffset,
      };
    }
    return this.predicate(firstNode(ctx, 'predicate').children);
  }

  predicate(ctx: Ctx): Expression {
    const left = this.additiveExpression(firstNode(ctx, 'lhs').children);

    const comparison = optionalNode(ctx, 'comparisonOperator');
    if (comparison) {
      const op = this.comparisonOperator(comparison.children);
      return {
        type: 'OperatorExpression',
        operator: op.operator,
        left,
        right: this.additiveExpression(firstNode(ctx, 'rhs').children),
        location: op.location,
      };
    }
    const isPredicate = optionalNode(ctx, 'isPredicate');
    if (isPredicate) return this.isPredicate(isPredicate.children, left);
    const inPredicate = optionalNode(ctx, 'inPredicate');
    if (inPredicate) return this.inPredicate(inPredicate.children, left);
    const between = optionalNode(ctx, 'betweenPredicate');
    if (between) return this.betweenPredicate(between.children, left);
    const like = optionalNode(ctx, 'likePredicate');
    if (like) return this.likePredicate(like.children, left);
    return left;
  }

  comparisonOperator(ctx: Ctx): { operator: string; location: number } {
    const token = firstToken(ctx, 'operator');
    // != と <> は同じ演算子
    return { operator: tokenMatcher(token, NotEquals) ? '<>' : token.image, location: token.startOffset };
  }

  isPredicate(ctx: Ctx, arg: Expression): Expression {
    const location = firstToken(ctx, 'Is').startOffset;
    const negated = optionalToken(ctx, 'Not') !== undefined;
    const test = firstToken(ctx, 'test');
    if (tokenMatcher(test, Null)) return { type: 'NullTest', arg, negated, location };
    const kind: BooleanTest['test'] = tokenMatcher(test, True)
      ? (negated ? 'IS NOT TRUE' : 'IS TRUE')
      : (negated ? 'IS NOT FALSE' : 'IS FALSE');
    return { type: 'BooleanTest', arg, test: kind, location };
  }

  inPredicate(ctx: Ctx, arg: Expression): Expression {
    const location = firstToken(ctx, 'In').startOffset;
    const not = optionalToken(ctx, 'Not');
    const subquery = optionalNode(ctx, 'selectStatement');
    if (subquery) {
      const link: SubLink = {
        type: 'SubLink',
        kind: 'ANY',
        testExpr: arg,
        subselect: this.selectStatement(subquery.children),
        location,
      };
      if (!not) return link;
      return { type: 'BoolExpression', operator: 'NOT', args: [link], location: not.startOffset };
    }
    return {
      type: 'InList',
      arg,
      negated: not !== undefined,
      items: this.exprList(firstNode(ctx, 'exprList').children),
      location,
    };
  }

  // a BETWEEN x AND y は (a >= x AND a <= y) に展開する。
  // a は両側で同じノードを共有するため、a の定数は同じ位置で二度現れる。
  betweenPredicate(ctx: Ctx, arg: Expression): Expression {
    const location = firstToken(ctx, 'Between').startOffset;
    const low = this.additiveExpression(firstNode(ctx, 'low').children);
    const high = this.additiveExpression(firstNode(ctx, 'high').children);
    const negated = optionalToken(ctx, 'Not') !== undefined;
    return {
      type: 'BoolExpression',
      operator: negated ? 'OR' : 'AND',
      args: [
        { type: 'OperatorExpression', operator: negated ? '<' : '>=', left: arg, right: low, location },
        { type: 'OperatorExpression', operator: negated ? '>' : '<=', left: arg, right: high, location },
      ],
      location,
    };
  }

  likePredicate(ctx: Ctx, arg: Expression): Expression {
    const token = firstToken(ctx, 'operator');
    const word = tokenMatcher(token, Ilike) ? 'ILIKE' : 'LIKE';
    return {
      type: 'OperatorExpression',
      operator: optionalToken(ctx, 'Not') ? `NOT ${word}` : word,
      left: arg,
      right: this.additiveExpression(firstNode(ctx, 'pattern').children),
      location: token.startOffset,
    };
  }

  additiveExpression(ctx: Ctx): Expression {
    const operands = [...nodesOf(ctx, 'lhs'), ...nodesOf(ctx, 'rhs')].map((n) =>
      this.multiplicativeExpression(n.children),
    );
    return binaryChain(operands, tokensOf(ctx, 'operator'));
  }

  multiplicativeExpression(ctx: Ctx): Expression {
    const operands = [...nodesOf(ctx, 'lhs'), ...nodesOf(ctx, 'rhs')].map((n) =>
      this.unaryExpression(n.children),
    );
    return binaryChain(operands, tokensOf(ctx, 'operator'));
  }

  unaryExpression(ctx: Ctx): Expression {
    const operator = optionalToken(ctx, 'operator');
    if (!operator) return this.postfixExpression(firstNode(ctx, 'postfixExpression').children);

    const operandNode = firstNode(ctx, 'operand');
    const operand = this.unaryExpression(operandNode.children);
    // '-' の直後が符号なし数値リテラルのときだけ負の定数に畳み込む（位置は '-' の位置）。
    // -(1) や - -1 は演算子のまま残す。
    if (tokenMatcher(operator, Minus) && operand.type === 'Constant' && isBareNumericLiteral(operandNode.children)) {
      return { ...operand, value: `-${operand.value ?? ''}`, location: operator.startOffset };
    }
    return { type: 'OperatorExpression', operator: operator.image, right: operand, location: operator.startOffset };
  }

  postfixExpression(ctx: Ctx): Expression {
    let result = this.primaryExpression(firstNode(ctx, 'primaryExpression').children);
    const casts = tokensOf(ctx, 'TypeCast');
    nodesOf(ctx, 'typeName').forEach((typeNode, i) => {
      const cast: TypeCast = {
        type: 'TypeCast',
        arg: result,
        typeName: this.typeName(typeNode.children),
        location: casts[i]?.startOffset ?? -1,
      };
      result = cast;
    });
    return result;
  }

  typeName(ctx: Ctx): TypeName {
    const identifier = optionalNode(ctx, 'identifier');
    const name = identifier ? this.identifier(identifier.children) : firstToken(ctx, 'builtin').image.toLowerCase();
    return {
      type: 'TypeName',
      names: [name],
      typmods: tokensOf(ctx, 'typmod').map(buildConstant),
      location: startOffsetOf(ctx),
    };
  }

  primaryExpression(ctx: Ctx): Expression {
    const literal = optionalNode(ctx, 'literal');
    if (literal) return this.literal(literal.children);

    const param = optionalToken(ctx, 'Param');
    if (param) return { type: 'ParamRef', number: Number.parseInt(param.image.slice(1), 10), location: param.startOffset };
    const placeholder = optionalToken(ctx, 'QuestionMark');
    if (placeholder) return { type: 'ParamRef', location: placeholder.startOffset };

    const typed = optionalNode(ctx, 'typedLiteral');
    if (typed) return this.typedLiteral(typed.children);
    const caseExpr = optionalNode(ctx, 'caseExpression');
    if (caseExpr) return this.caseExpression(caseExpr.children);
    const exists = optionalNode(ctx, 'existsExpression');
    if (exists) return this.existsExpression(exists.children);
    const paren = optionalNode(ctx, 'parenthesizedExpression');
    if (paren) return this.parenthesizedExpression(paren.children);
    return this.columnOrFunction(firstNode(ctx, 'columnOrFunction').children);
  }

  literal(ctx: Ctx): Constant {
    return buildConstant(firstToken(ctx, 'value'));
  }

  // DATE '2024-01-01' → '2024-01-01'::date（定数の位置は文字列側）
  typedLiteral(ctx: Ctx): TypeCast {
    const typeToken = firstToken(ctx, 'typeName');
    return {
      type: 'TypeCast',
      arg: buildConstant(firstToken(ctx, 'value')),
      typeName: { type: 'TypeName', names: [typeToken.image.toLowerCase()], typmods: [], location: typeToken.startOffset },
      location: typeToken.startOffset,
    };
  }

  caseExpression(ctx: Ctx): CaseExpression {
    const arg = optionalNode(ctx, 'arg');
    const defaultResult = optionalNode(ctx, 'defaultResult');
    const expr: CaseExpression = {
      type: 'CaseExpression',
      whens: nodesOf(ctx, 'caseWhen').map((n) => this.caseWhen(n.children)),
      location: firstToken(ctx, 'Case').startOffset,
    };
    if (arg) expr.arg = this.expression(arg.children);
    if (defaultResult) expr.defaultResult = this.expression(defaultResult.children);
    return expr;
  }

  caseWhen(ctx: Ctx): CaseWhen {
    return {
      type: 'CaseWhen',
      condition: this.expression(firstNode(ctx, 'condition').children),
      result: this.expression(firstNode(ctx, 'result').children),
      location: firstToken(ctx, 'When').startOffset,
    };
  }

  existsExpression(ctx: Ctx): SubLink {
    return {
      type: 'SubLink',
      kind: 'EXISTS',
      subselect: this.selectStatement(firstNode(ctx, 'selectStatement').children),
      location: firstToken(ctx, 'Exists').startOffset,
    };
  }

  parenthesizedExpression(ctx: Ctx): Expression {
    const subquery = optionalNode(ctx, 'selectStatement');
    if (subquery) {
      return {
        type: 'SubLink',
        kind: 'EXPR',
        subselect: this.selectStatement(subquery.children),
        location: firstToken(ctx, 'LParen').startOffset,
      };
    }
    return this.expression(firstNode(ctx, 'expression').children);
  }

  columnOrFunction(ctx: Ctx): Expression {
    const names = nodesOf(ctx, 'identifier').map((n) => this.identifier(n.children));
    const location = startOffsetOf(ctx);
    const star = optionalToken(ctx, 'Star');
    const args = optionalNode(ctx, 'functionArguments');
    if (args) {
      if (star) return failGenericParse(`syntax error at or near "("`, firstToken(args.children, 'LParen').startOffset);
      return { type: 'FuncCall', name: names, ...this.functionArguments(args.children), location };
    }
    return { type: 'ColumnRef', fields: names, star: star !== undefined, location };
  }

  functionArguments(ctx: Ctx): Pick<FuncCall, 'args' | 'star' | 'distinct'> {
    const list = optionalNode(ctx, 'exprList');
    return {
      args: list ? this.exprList(list.children) : [],
      star: optionalToken(ctx, 'Star') !== undefined,
      distinct: optionalToken(ctx, 'Distinct') !== undefined,
    };
  }
}

// ---- ユーティリティ ----

function emptySelect(location: number): SelectStatement {
  return {
    type: 'SelectStatement',
    distinct: false,
    targets: [],
    from: [],
    groupBy: [],
    values: [],
    orderBy: [],
    location,
  };
}

// a AND b AND c は1つの BoolExpression に平坦化（位置は最初の演算子）
function boolChain(operator: 'AND' | 'OR', args: Expression[], operators: IToken[]): Expression {
  const [first] = args;
  if (first === undefined) return failMalformedCst('lhs');
  if (args.length === 1) return first;
  const expr: BoolExpression = { type: 'BoolExpression', operator, args, location: operators[0]?.startOffset ?? -1 };
  return expr;
}

// 左結合の二項演算（位置は演算子）
function binaryChain(operands: Expression[], operators: IToken[]): Expression {
  const [first, ...rest] = operands;
  if (first === undefined) return failMalformedCst('lhs');
  return rest.reduce<Expression>((left, right, i) => {
    const token = operators[i] ?? failMalformedCst('operator');
    return { type: 'OperatorExpression', operator: token.image, left, right, location: token.startOffset };
  }, first);
}

// unaryExpression の CST が、キャストも括弧も単項演算子も挟まない数値リテラル1個か
function isBareNumericLiteral(ctx: Ctx): boolean {
  if (optionalToken(ctx, 'operator')) return false;
  const postfix = optionalNode(ctx, 'postfixExpression');
  if (!postfix || tokensOf(postfix.children, 'TypeCast').length > 0) return false;
  const primary = optionalNode(postfix.children, 'primaryExpression');
  const literal = primary && optionalNode(primary.children, 'literal');
  const token = literal && optionalToken(literal.children, 'value');
  return token !== undefined && tokenMatcher(token, NumericConstant);
}

// トークンから定数ノードを構築
function buildConstant(token: IToken): Constant {
  const location = token.startOffset;
  if (tokenMatcher(token, NumericConstant)) {
    return { type: 'Constant', kind: tokenMatcher(token, IntegerLiteral) ? 'integer' : 'float', value: token.image, location };
  }
  if (tokenMatcher(token, StringConstant)) {
    return { type: 'Constant', kind: 'string', value: unquoteString(token), location };
  }
  if (tokenMatcher(token, BitStringConstant)) {
    // B'0101' → b0101, X'1F' → x1F
    const prefix = tokenMatcher(token, HexStringLiteral) ? 'x' : 'b';
    return { type: 'Constant', kind: 'bitString', value: prefix + token.image.slice(2, -1), location };
  }
  if (tokenMatcher(token, True)) return { type: 'Constant', kind: 'boolean', value: 'true', location };
  if (tokenMatcher(token, False)) return { type: 'Constant', kind: 'boolean', value: 'false', location };
  if (tokenMatcher(token, Null)) return { type: 'Constant', kind: 'null', value: null, location };
  return failGenericParse(`syntax error at or near "${token.image}"`, location);
}

const ESCAPES: Record<string, string> = { b: '\b', f: '\f', n: '\n', r: '\r', t: '\t' };

// クォートを外し、エスケープを復元
function unquoteString(token: IToken): string {
  const raw = token.image;
  if (tokenMatcher(token, DollarStringLiteral)) {
    const tag = raw.slice(0, raw.indexOf('$', 1) + 1);
    return raw.slice(tag.length, raw.length - tag.length);
  }
  if (tokenMatcher(token, EscapeStringLiteral)) {
    return raw.slice(2, -1).replace(/''|\\([\s\S])/g, (match: string, ch: string | undefined) =>
      ch === undefined ? "'" : (ESCAPES[ch] ?? ch),
    );
  }
  const body = tokenMatcher(token, NationalStringLiteral) ? raw.slice(2, -1) : raw.slice(1, -1);
  return body.replace(/''/g, "'");
}

// クォートなしは小文字化、"..." はクォートを外して "" を " に戻す
function identifierText(token: IToken): string {
  if (tokenMatcher(token, QuotedIdentifier)) return token.image.slice(1, -1).replace(/""/g, '"');
  return token.image.toLowerCase();
}

// ビジターのシングルトンインスタンスをエクスポート
export const astBuilderVisitor = new AstBuilderVisitor();
