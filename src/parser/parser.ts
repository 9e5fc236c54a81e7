// src/parser/parser.ts
// 目的: lexer/tokens.ts のトークンを用いてCSTを生成するChevrotainパーサーを提供。
// 文法は PostgreSQL の SELECT / INSERT / UPDATE / DELETE の主要部分。

import { CstParser } from 'chevrotain';
import { BitStringConstant, NumericConstant, StringConstant } from '../lexer/categories.ts';
import {
  allTokens,
  All,
  And,
  As,
  Asc,
  Between,
  By,
  Case,
  Comma,
  Concat,
  Cross,
  DateKeyword,
  Delete,
  Desc,
  Distinct,
  Dot,
  Else,
  End,
  Equals,
  Except,
  Exists,
  False,
  Fetch,
  First,
  From,
  Full,
  GreaterThan,
  GreaterThanOrEqual,
  Group,
  Having,
  Identifier,
  Ilike,
  In,
  Inner,
  Insert,
  IntegerLiteral,
  Intersect,
  Interval,
  Into,
  Is,
  Join,
  Last,
  Left,
  LessThan,
  LessThanOrEqual,
  Like,
  Limit,
  LParen,
  Minus,
  Next,
  Not,
  NotEquals,
  Null,
  Nulls,
  Offset,
  On,
  Only,
  Or,
  Order,
  Outer,
  Param,
  Percent,
  Plus,
  QuestionMark,
  QuotedIdentifier,
  Returning,
  Right,
  Row,
  Rows,
  RParen,
  Select,
  Semicolon,
  SetKeyword,
  Slash,
  Star,
  Then,
  Timestamp,
  True,
  TypeCast,
  Union,
  Update,
  Values,
  When,
  Where,
} from '../lexer/tokens.ts';

export class SqlParser extends CstParser {
  constructor() {
    super(allTokens, {
      // エラー回復は行わず、最初のエラーで ParseError にする
      recoveryEnabled: false,
      nodeLocationTracking: 'onlyOffset',
    });
    this.performSelfAnalysis();
  }

  // ===== Statements =====

  // 空文も許容する（"SELECT 1;" や空入力）
  public statementList = this.RULE('statementList', () => {
    this.OPTION(() => this.SUBRULE(this.statement));
    this.MANY(() => {
      this.CONSUME(Semicolon);
      this.OPTION2(() => this.SUBRULE2(this.statement));
    });
  });

  public statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.selectStatement) },
      { ALT: () => this.SUBRULE(this.insertStatement) },
      { ALT: () => this.SUBRULE(this.updateStatement) },
      { ALT: () => this.SUBRULE(this.deleteStatement) },
    ]);
  });

  // 集合演算は左結合。ORDER BY / LIMIT は最外側に付く。
  public selectStatement = this.RULE('selectStatement', () => {
    this.SUBRULE(this.selectCore, { LABEL: 'lhs' });
    this.MANY(() => {
      this.SUBRULE(this.setOperator);
      this.SUBRULE2(this.selectCore, { LABEL: 'rhs' });
    });
    this.OPTION(() => this.SUBRULE(this.orderByClause));
    this.OPTION2(() => this.SUBRULE(this.limitClause));
    this.OPTION3(() => this.SUBRULE(this.offsetClause));
    this.OPTION4(() => this.SUBRULE(this.fetchClause));
  });

  public selectCore = this.RULE('selectCore', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Select);
          this.OPTION(() => this.CONSUME(Distinct));
          this.SUBRULE(this.targetList);
          this.OPTION2(() => this.SUBRULE(this.fromClause));
          this.OPTION3(() => this.SUBRULE(this.whereClause));
          this.OPTION4(() => this.SUBRULE(this.groupByClause));
          this.OPTION5(() => this.SUBRULE(this.havingClause));
        },
      },
      { ALT: () => this.SUBRULE(this.valuesClause) },
    ]);
  });

  public setOperator = this.RULE('setOperator', () => {
    this.OR([
      { ALT: () => this.CONSUME(Union, { LABEL: 'operator' }) },
      { ALT: () => this.CONSUME(Intersect, { LABEL: 'operator' }) },
      { ALT: () => this.CONSUME(Except, { LABEL: 'operator' }) },
    ]);
    this.OPTION(() => this.CONSUME(All));
  });

  public valuesClause = this.RULE('valuesClause', () => {
    this.CONSUME(Values);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.valuesRow),
    });
  });

  public valuesRow = this.RULE('valuesRow', () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.exprList);
    this.CONSUME(RParen);
  });

  public exprList = this.RULE('exprList', () => {
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.expression),
    });
  });

  public targetList = this.RULE('targetList', () => {
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.targetElement),
    });
  });

  public targetElement = this.RULE('targetElement', () => {
    this.OR([
      { ALT: () => this.CONSUME(Star) },
      {
        ALT: () => {
          this.SUBRULE(this.expression);
          this.OPTION(() => this.SUBRULE(this.alias));
        },
      },
    ]);
  });

  public alias = this.RULE('alias', () => {
    this.OPTION(() => this.CONSUME(As));
    this.SUBRULE(this.identifier);
  });

  public fromClause = this.RULE('fromClause', () => {
    this.CONSUME(From);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.tableReference),
    });
  });

  public tableReference = this.RULE('tableReference', () => {
    this.SUBRULE(this.tablePrimary);
    this.MANY(() => this.SUBRULE(this.joinClause));
  });

  public tablePrimary = this.RULE('tablePrimary', () => {
    this.OR([
      {
        ALT: () => {
          this.SUBRULE(this.qualifiedName);
          this.OPTION(() => this.SUBRULE(this.alias));
        },
      },
      {
        // サブクエリには別名が必須（PostgreSQL 準拠）
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.selectStatement);
          this.CONSUME(RParen);
          this.SUBRULE2(this.alias);
        },
      },
    ]);
  });

  public joinClause = this.RULE('joinClause', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Cross);
          this.CONSUME(Join);
          this.SUBRULE(this.tablePrimary);
        },
      },
      {
        ALT: () => {
          this.OPTION(() => this.SUBRULE(this.joinType));
          this.CONSUME2(Join);
          this.SUBRULE2(this.tablePrimary);
          this.CONSUME(On);
          this.SUBRULE(this.expression);
        },
      },
    ]);
  });

  public joinType = this.RULE('joinType', () => {
    this.OR([
      { ALT: () => this.CONSUME(Inner, { LABEL: 'kind' }) },
      {
        ALT: () => {
          this.OR2([
            { ALT: () => this.CONSUME(Left, { LABEL: 'kind' }) },
            { ALT: () => this.CONSUME(Right, { LABEL: 'kind' }) },
            { ALT: () => this.CONSUME(Full, { LABEL: 'kind' }) },
          ]);
          this.OPTION(() => this.CONSUME(Outer));
        },
      },
    ]);
  });

  public whereClause = this.RULE('whereClause', () => {
    this.CONSUME(Where);
    this.SUBRULE(this.expression);
  });

  public groupByClause = this.RULE('groupByClause', () => {
    this.CONSUME(Group);
    this.CONSUME(By);
    this.SUBRULE(this.exprList);
  });

  public havingClause = this.RULE('havingClause', () => {
    this.CONSUME(Having);
    this.SUBRULE(this.expression);
  });

  public orderByClause = this.RULE('orderByClause', () => {
    this.CONSUME(Order);
    this.CONSUME(By);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.sortItem),
    });
  });

  public sortItem = this.RULE('sortItem', () => {
    this.SUBRULE(this.expression);
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(Asc, { LABEL: 'direction' }) },
        { ALT: () => this.CONSUME(Desc, { LABEL: 'direction' }) },
      ]);
    });
    this.OPTION2(() => {
      this.CONSUME(Nulls);
      this.OR2([
        { ALT: () => this.CONSUME(First, { LABEL: 'nulls' }) },
        { ALT: () => this.CONSUME(Last, { LABEL: 'nulls' }) },
      ]);
    });
  });

  // LIMIT ALL は NULL 定数として扱う
  public limitClause = this.RULE('limitClause', () => {
    this.CONSUME(Limit);
    this.OR([
      { ALT: () => this.CONSUME(All) },
      { ALT: () => this.SUBRULE(this.expression) },
    ]);
  });

  public offsetClause = this.RULE('offsetClause', () => {
    this.CONSUME(Offset);
    this.SUBRULE(this.expression);
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(Row) },
        { ALT: () => this.CONSUME(Rows) },
      ]);
    });
  });

  // FETCH FIRST [n] ROW(S) ONLY。n を省略すると位置を持たない暗黙の 1。
  public fetchClause = this.RULE('fetchClause', () => {
    this.CONSUME(Fetch);
    this.OR([
      { ALT: () => this.CONSUME(First) },
      { ALT: () => this.CONSUME(Next) },
    ]);
    this.OPTION(() => this.CONSUME(IntegerLiteral, { LABEL: 'count' }));
    this.OR2([
      { ALT: () => this.CONSUME(Row) },
      { ALT: () => this.CONSUME(Rows) },
    ]);
    this.CONSUME(Only);
  });

  public insertStatement = this.RULE('insertStatement', () => {
    this.CONSUME(Insert);
    this.CONSUME(Into);
    this.SUBRULE(this.qualifiedName);
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.SUBRULE(this.identifierList);
      this.CONSUME(RParen);
    });
    // VALUES も selectCore の一形態として受ける
    this.SUBRULE(this.selectStatement);
    this.OPTION2(() => this.SUBRULE(this.returningClause));
  });

  public identifierList = this.RULE('identifierList', () => {
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.identifier),
    });
  });

  public updateStatement = this.RULE('updateStatement', () => {
    this.CONSUME(Update);
    this.SUBRULE(this.qualifiedName);
    this.OPTION(() => this.SUBRULE(this.alias));
    this.CONSUME(SetKeyword);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.setClause),
    });
    this.OPTION2(() => this.SUBRULE(this.fromClause));
    this.OPTION3(() => this.SUBRULE(this.whereClause));
    this.OPTION4(() => this.SUBRULE(this.returningClause));
  });

  public setClause = this.RULE('setClause', () => {
    this.SUBRULE(this.identifier);
    this.CONSUME(Equals);
    this.SUBRULE(this.expression);
  });

  public deleteStatement = this.RULE('deleteStatement', () => {
    this.CONSUME(Delete);
    this.CONSUME(From);
    this.SUBRULE(this.qualifiedName);
    this.OPTION(() => this.SUBRULE(this.alias));
    this.OPTION2(() => this.SUBRULE(this.whereClause));
    this.OPTION3(() => this.SUBRULE(this.returningClause));
  });

  public returningClause = this.RULE('returningClause', () => {
    this.CONSUME(Returning);
    this.SUBRULE(this.targetList);
  });

  // schema.table
  public qualifiedName = this.RULE('qualifiedName', () => {
    this.SUBRULE(this.identifier);
    this.MANY(() => {
      this.CONSUME(Dot);
      this.SUBRULE2(this.identifier);
    });
  });

  public identifier = this.RULE('identifier', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier, { LABEL: 'name' }) },
      { ALT: () => this.CONSUME(QuotedIdentifier, { LABEL: 'name' }) },
    ]);
  });

  // ===== Expressions =====
  // 優先順位: OR < AND < NOT < 述語 < + - || < * / % < 単項 < ::

  public expression = this.RULE('expression', () => {
    this.SUBRULE(this.orExpression);
  });

  public orExpression = this.RULE('orExpression', () => {
    this.SUBRULE(this.andExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.andExpression, { LABEL: 'rhs' });
    });
  });

  public andExpression = this.RULE('andExpression', () => {
    this.SUBRULE(this.notExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.notExpression, { LABEL: 'rhs' });
    });
  });

  public notExpression = this.RULE('notExpression', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Not);
          this.SUBRULE(this.notExpression, { LABEL: 'argument' });
        },
      },
      { ALT: () => this.SUBRULE(this.predicate) },
    ]);
  });

  public predicate = this.RULE('predicate', () => {
    this.SUBRULE(this.additiveExpression, { LABEL: 'lhs' });
    this.OPTION(() => {
      this.OR([
        {
          ALT: () => {
            this.SUBRULE(this.comparisonOperator);
            this.SUBRULE2(this.additiveExpression, { LABEL: 'rhs' });
          },
        },
        { ALT: () => this.SUBRULE(this.isPredicate) },
        { ALT: () => this.SUBRULE(this.inPredicate) },
        { ALT: () => this.SUBRULE(this.betweenPredicate) },
        { ALT: () => this.SUBRULE(this.likePredicate) },
      ]);
    });
  });

  public comparisonOperator = this.RULE('comparisonOperator', () => {
    this.OR([
      { ALT: () => this.CONSUME(Equals, { LABEL: 'operator' }) },
      { ALT: () => this.CONSUME(NotEquals, { LABEL: 'operator' }) },
      { ALT: () => this.CONSUME(LessThanOrEqual, { LABEL: 'operator' }) },
      { ALT: () => this.CONSUME(GreaterThanOrEqual, { LABEL: 'operator' }) },
      { ALT: () => this.CONSUME(LessThan, { LABEL: 'operator' }) },
      { ALT: () => this.CONSUME(GreaterThan, { LABEL: 'operator' }) },
    ]);
  });

  public isPredicate = this.RULE('isPredicate', () => {
    this.CONSUME(Is);
    this.OPTION(() => this.CONSUME(Not));
    this.OR([
      { ALT: () => this.CONSUME(Null, { LABEL: 'test' }) },
      { ALT: () => this.CONSUME(True, { LABEL: 'test' }) },
      { ALT: () => this.CONSUME(False, { LABEL: 'test' }) },
    ]);
  });

  public inPredicate = this.RULE('inPredicate', () => {
    this.OPTION(() => this.CONSUME(Not));
    this.CONSUME(In);
    this.CONSUME(LParen);
    this.OR([
      { ALT: () => this.SUBRULE(this.selectStatement) },
      { ALT: () => this.SUBRULE(this.exprList) },
    ]);
    this.CONSUME(RParen);
  });

  public betweenPredicate = this.RULE('betweenPredicate', () => {
    this.OPTION(() => this.CONSUME(Not));
    this.CONSUME(Between);
    this.SUBRULE(this.additiveExpression, { LABEL: 'low' });
    this.CONSUME(And);
    this.SUBRULE2(this.additiveExpression, { LABEL: 'high' });
  });

  public likePredicate = this.RULE('likePredicate', () => {
    this.OPTION(() => this.CONSUME(Not));
    this.OR([
      { ALT: () => this.CONSUME(Like, { LABEL: 'operator' }) },
      { ALT: () => this.CONSUME(Ilike, { LABEL: 'operator' }) },
    ]);
    this.SUBRULE(this.additiveExpression, { LABEL: 'pattern' });
  });

  public additiveExpression = this.RULE('additiveExpression', () => {
    this.SUBRULE(this.multiplicativeExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Plus, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(Minus, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(Concat, { LABEL: 'operator' }) },
      ]);
      this.SUBRULE2(this.multiplicativeExpression, { LABEL: 'rhs' });
    });
  });

  public multiplicativeExpression = this.RULE('multiplicativeExpression', () => {
    this.SUBRULE(this.unaryExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(Slash, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(Percent, { LABEL: 'operator' }) },
      ]);
      this.SUBRULE2(this.unaryExpression, { LABEL: 'rhs' });
    });
  });

  public unaryExpression = this.RULE('unaryExpression', () => {
    this.OR([
      {
        ALT: () => {
          this.OR2([
            { ALT: () => this.CONSUME(Minus, { LABEL: 'operator' }) },
            { ALT: () => this.CONSUME(Plus, { LABEL: 'operator' }) },
          ]);
          this.SUBRULE(this.unaryExpression, { LABEL: 'operand' });
        },
      },
      { ALT: () => this.SUBRULE(this.postfixExpression) },
    ]);
  });

  // :: は単項マイナスより強く結合する（-5::text は -(5::text)）
  public postfixExpression = this.RULE('postfixExpression', () => {
    this.SUBRULE(this.primaryExpression);
    this.MANY(() => {
      this.CONSUME(TypeCast);
      this.SUBRULE(this.typeName);
    });
  });

  public typeName = this.RULE('typeName', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.identifier) },
      { ALT: () => this.CONSUME(DateKeyword, { LABEL: 'builtin' }) },
      { ALT: () => this.CONSUME(Timestamp, { LABEL: 'builtin' }) },
      { ALT: () => this.CONSUME(Interval, { LABEL: 'builtin' }) },
    ]);
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.AT_LEAST_ONE_SEP({
        SEP: Comma,
        DEF: () => this.CONSUME(IntegerLiteral, { LABEL: 'typmod' }),
      });
      this.CONSUME(RParen);
    });
  });

  public primaryExpression = this.RULE('primaryExpression', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.literal) },
      { ALT: () => this.CONSUME(Param) },
      { ALT: () => this.CONSUME(QuestionMark) },
      { ALT: () => this.SUBRULE(this.typedLiteral) },
      { ALT: () => this.SUBRULE(this.caseExpression) },
      { ALT: () => this.SUBRULE(this.existsExpression) },
      { ALT: () => this.SUBRULE(this.parenthesizedExpression) },
      { ALT: () => this.SUBRULE(this.columnOrFunction) },
    ]);
  });

  // literal: 文字列 | ビット列 | 数値 | true | false | null
  public literal = this.RULE('literal', () => {
    this.OR([
      { ALT: () => this.CONSUME(StringConstant, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(BitStringConstant, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(NumericConstant, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(True, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(False, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(Null, { LABEL: 'value' }) },
    ]);
  });

  // DATE '2024-01-01' など。定数の位置は文字列側。
  public typedLiteral = this.RULE('typedLiteral', () => {
    this.OR([
      { ALT: () => this.CONSUME(DateKeyword, { LABEL: 'typeName' }) },
      { ALT: () => this.CONSUME(Timestamp, { LABEL: 'typeName' }) },
      { ALT: () => this.CONSUME(Interval, { LABEL: 'typeName' }) },
    ]);
    this.CONSUME(StringConstant, { LABEL: 'value' });
  });

  public caseExpression = this.RULE('caseExpression', () => {
    this.CONSUME(Case);
    this.OPTION(() => this.SUBRULE(this.expression, { LABEL: 'arg' }));
    this.AT_LEAST_ONE(() => this.SUBRULE(this.caseWhen));
    this.OPTION2(() => {
      this.CONSUME(Else);
      this.SUBRULE2(this.expression, { LABEL: 'defaultResult' });
    });
    this.CONSUME(End);
  });

  public caseWhen = this.RULE('caseWhen', () => {
    this.CONSUME(When);
    this.SUBRULE(this.expression, { LABEL: 'condition' });
    this.CONSUME(Then);
    this.SUBRULE2(this.expression, { LABEL: 'result' });
  });

  public existsExpression = this.RULE('existsExpression', () => {
    this.CONSUME(Exists);
    this.CONSUME(LParen);
    this.SUBRULE(this.selectStatement);
    this.CONSUME(RParen);
  });

  // ( SELECT ... ) はスカラーサブクエリ、それ以外はグルーピング
  public parenthesizedExpression = this.RULE('parenthesizedExpression', () => {
    this.CONSUME(LParen);
    this.OR([
      { ALT: () => this.SUBRULE(this.selectStatement) },
      { ALT: () => this.SUBRULE(this.expression) },
    ]);
    this.CONSUME(RParen);
  });

  // a / t.a / t.* / f(...) / schema.f(...)
  public columnOrFunction = this.RULE('columnOrFunction', () => {
    this.SUBRULE(this.identifier);
    this.MANY(() => {
      this.CONSUME(Dot);
      this.OR([
        { ALT: () => this.SUBRULE2(this.identifier) },
        { ALT: () => this.CONSUME(Star) },
      ]);
    });
    this.OPTION(() => this.SUBRULE(this.functionArguments));
  });

  public functionArguments = this.RULE('functionArguments', () => {
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star) },
        {
          ALT: () => {
            this.OPTION2(() => this.CONSUME(Distinct));
            this.SUBRULE(this.exprList);
          },
        },
      ]);
    });
    this.CONSUME(RParen);
  });
}

// パーサーは状態（input / errors）を持つが、input の再設定でリセットされる。
// performSelfAnalysis が重いため、モジュール単位で1つだけ生成する。
export const sqlParser = new SqlParser();
