// test/parser.test.ts
import { describe, it, expect } from 'vitest';
import { parse } from '../src/parser/index.ts';
import { childrenOf } from '../src/ast/walker.ts';
import type {
  BoolExpression,
  FuncCall,
  InList,
  InsertStatement,
  OperatorExpression,
  SelectStatement,
  SetOperationStatement,
  SubLink,
  TypeCast,
} from '../src/ast/types.ts';

function select(sql: string): SelectStatement {
  const { tree } = parse(sql);
  expect(tree).toHaveLength(1);
  return tree[0] as SelectStatement;
}

function firstTarget(sql: string) {
  return select(sql).targets[0]?.value;
}

describe('parser', () => {
  it('空入力と ; 区切り', () => {
    expect(parse('').tree).toEqual([]);
    expect(parse('SELECT 1;').tree).toHaveLength(1);
    expect(parse('SELECT 1; SELECT 2').tree).toHaveLength(2);
  });

  it('単項マイナスは数値定数に畳み込む（位置は - ）', () => {
    expect(firstTarget('SELECT -5')).toEqual({ type: 'Constant', kind: 'integer', value: '-5', location: 7 });
    expect(firstTarget('SELECT - 2.5')).toEqual({ type: 'Constant', kind: 'float', value: '-2.5', location: 7 });
  });

  it('括弧内や負の定数への単項マイナスは畳み込まない', () => {
    expect(firstTarget('SELECT -(1)')).toEqual({
      type: 'OperatorExpression',
      operator: '-',
      right: { type: 'Constant', kind: 'integer', value: '1', location: 9 },
      location: 7,
    });
    expect(firstTarget('SELECT - -1')).toEqual({
      type: 'OperatorExpression',
      operator: '-',
      right: { type: 'Constant', kind: 'integer', value: '-1', location: 9 },
      location: 7,
    });
  });

  it('数値以外への単項マイナスは演算子のまま', () => {
    const expr = firstTarget('SELECT -a') as OperatorExpression;
    expect(expr.type).toBe('OperatorExpression');
    expect(expr.operator).toBe('-');
    expect(expr.left).toBeUndefined();
  });

  it('リテラルの種類と値', () => {
    expect(firstTarget("SELECT 'it''s'")).toMatchObject({ kind: 'string', value: "it's" });
    expect(firstTarget("SELECT E'a\\nb'")).toMatchObject({ kind: 'string', value: 'a\nb' });
    expect(firstTarget("SELECT $q$it's$q$")).toMatchObject({ kind: 'string', value: "it's" });
    expect(firstTarget("SELECT B'0101'")).toMatchObject({ kind: 'bitString', value: 'b0101' });
    expect(firstTarget("SELECT X'1F'")).toMatchObject({ kind: 'bitString', value: 'x1F' });
    expect(firstTarget('SELECT TRUE')).toMatchObject({ kind: 'boolean', value: 'true' });
    expect(firstTarget('SELECT NULL')).toMatchObject({ kind: 'null', value: null });
  });

  it('$n と ? はパラメータ参照', () => {
    expect(firstTarget('SELECT $2')).toEqual({ type: 'ParamRef', number: 2, location: 7 });
    expect(firstTarget('SELECT ?')).toEqual({ type: 'ParamRef', location: 7 });
  });

  it('識別子: クォートなしは小文字化、"..." はそのまま', () => {
    const stmt = select('SELECT "Mixed""Case", Foo FROM S.T');
    expect(stmt.targets.map((t) => t.value)).toEqual([
      { type: 'ColumnRef', fields: ['Mixed"Case'], star: false, location: 7 },
      { type: 'ColumnRef', fields: ['foo'], star: false, location: 22 },
    ]);
    expect(stmt.from[0]).toEqual({ type: 'RangeVar', schema: 's', name: 't', location: 31 });
  });

  it('AND / OR の連鎖は1ノードに平坦化', () => {
    const where = select('SELECT * FROM t WHERE a = 1 OR b = 2 OR c = 3').where as BoolExpression;
    expect(where.operator).toBe('OR');
    expect(where.args).toHaveLength(3);
  });

  it('BETWEEN は >= AND <= に展開し、左辺を共有する', () => {
    const where = select('SELECT * FROM t WHERE 5 BETWEEN lo AND hi').where as BoolExpression;
    expect(where.operator).toBe('AND');
    const [low, high] = where.args as OperatorExpression[];
    expect(low?.operator).toBe('>=');
    expect(high?.operator).toBe('<=');
    expect(low?.left).toBe(high?.left);
    expect(low?.left).toMatchObject({ type: 'Constant', location: 22 });
  });

  it('NOT BETWEEN は < OR > に展開', () => {
    const where = select('SELECT * FROM t WHERE x NOT BETWEEN 1 AND 2').where as BoolExpression;
    expect(where.operator).toBe('OR');
    expect((where.args as OperatorExpression[]).map((a) => a.operator)).toEqual(['<', '>']);
  });

  it('IN (サブクエリ) と NOT IN (リスト)', () => {
    const sub = select('SELECT * FROM t WHERE x IN (SELECT id FROM u)').where as SubLink;
    expect(sub.type).toBe('SubLink');
    expect(sub.kind).toBe('ANY');

    const list = select('SELECT * FROM t WHERE x NOT IN (1, 2)').where as InList;
    expect(list.type).toBe('InList');
    expect(list.negated).toBe(true);
    expect(list.items).toHaveLength(2);
  });

  it('IS [NOT] NULL / TRUE と LIKE', () => {
    expect(select('SELECT * FROM t WHERE x IS NOT NULL').where).toMatchObject({ type: 'NullTest', negated: true });
    expect(select('SELECT * FROM t WHERE x IS TRUE').where).toMatchObject({ type: 'BooleanTest', test: 'IS TRUE' });
    expect(select("SELECT * FROM t WHERE x NOT ILIKE 'a%'").where).toMatchObject({
      type: 'OperatorExpression',
      operator: 'NOT ILIKE',
    });
  });

  it('型キャストと型修飾子', () => {
    const cast = firstTarget("SELECT 'abc'::varchar(10)") as TypeCast;
    expect(cast.type).toBe('TypeCast');
    expect(cast.typeName.names).toEqual(['varchar']);
    expect(cast.typeName.typmods).toEqual([{ type: 'Constant', kind: 'integer', value: '10', location: 22 }]);
  });

  it('DATE リテラルは文字列定数のキャスト', () => {
    const cast = firstTarget("SELECT DATE '2024-01-01'") as TypeCast;
    expect(cast.arg).toEqual({ type: 'Constant', kind: 'string', value: '2024-01-01', location: 12 });
    expect(cast.typeName.names).toEqual(['date']);
  });

  it('LIMIT ALL は NULL 定数、FETCH FIRST ROW ONLY は位置を持たない 1', () => {
    expect(select('SELECT a FROM t LIMIT ALL').limitCount).toEqual({
      type: 'Constant',
      kind: 'null',
      value: null,
      location: 22,
    });
    expect(select('SELECT a FROM t FETCH FIRST ROW ONLY').limitCount).toEqual({
      type: 'Constant',
      kind: 'integer',
      value: '1',
      location: -1,
    });
  });

  it('集合演算と ORDER BY', () => {
    const stmt = parse('SELECT a FROM t UNION ALL SELECT b FROM u ORDER BY 1 DESC NULLS LAST').tree[0] as SetOperationStatement;
    expect(stmt.type).toBe('SetOperationStatement');
    expect(stmt.operator).toBe('UNION');
    expect(stmt.all).toBe(true);
    expect(stmt.orderBy).toEqual([
      {
        type: 'SortBy',
        node: { type: 'Constant', kind: 'integer', value: '1', location: 51 },
        direction: 'DESC',
        nulls: 'LAST',
        location: -1,
      },
    ]);
  });

  it('JOIN', () => {
    const stmt = select('SELECT * FROM a LEFT OUTER JOIN b ON a.id = b.id CROSS JOIN c');
    expect(stmt.from).toHaveLength(1);
    expect(stmt.from[0]).toMatchObject({
      type: 'JoinExpr',
      joinType: 'CROSS',
      left: { type: 'JoinExpr', joinType: 'LEFT', right: { type: 'RangeVar', name: 'b' } },
      right: { type: 'RangeVar', name: 'c' },
    });
  });

  it('関数呼び出し', () => {
    const stmt = select('SELECT count(*), max(DISTINCT x) FROM t');
    const [count, max] = stmt.targets.map((t) => t.value) as FuncCall[];
    expect(count).toMatchObject({ type: 'FuncCall', name: ['count'], args: [], star: true, distinct: false });
    expect(max).toMatchObject({ type: 'FuncCall', name: ['max'], star: false, distinct: true });
    expect(max?.args).toHaveLength(1);
  });

  it('INSERT ... VALUES ... RETURNING', () => {
    const stmt = parse("INSERT INTO users (name, age) VALUES ('Ann', 30) RETURNING id").tree[0] as InsertStatement;
    expect(stmt.type).toBe('InsertStatement');
    expect(stmt.relation.name).toBe('users');
    expect(stmt.columns).toEqual(['name', 'age']);
    expect((stmt.source as SelectStatement).values).toHaveLength(1);
    expect(stmt.returning).toHaveLength(1);
  });

  it('UPDATE / DELETE', () => {
    expect(parse('UPDATE t SET a = 1, b = b + 1 WHERE id = 2').tree[0]).toMatchObject({
      type: 'UpdateStatement',
      targets: [{ name: 'a' }, { name: 'b' }],
    });
    expect(parse('DELETE FROM t x WHERE x.id = 1 RETURNING *').tree[0]).toMatchObject({
      type: 'DeleteStatement',
      relation: { name: 't', alias: 'x' },
    });
  });

  it('ウォーカーは SelectStatement の子をソース順に列挙する', () => {
    const stmt = select('SELECT a FROM t WHERE b = 1 LIMIT 5 OFFSET 2');
    expect(childrenOf(stmt).map((n) => n.type)).toEqual([
      'ResTarget',
      'RangeVar',
      'OperatorExpression',
      'Constant',
      'Constant',
    ]);
  });
});
