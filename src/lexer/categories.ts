// src/lexer/categories.ts
import { createToken, Lexer } from 'chevrotain';

// カテゴリはパーサー側のフィルタリング用。Lexer.NA なので字句解析では直接マッチしない。

// 予約語。Identifier より優先されるが、longer_alt により長い識別子には負ける。
export const Keyword = createToken({ name: 'Keyword', pattern: Lexer.NA });

// 比較/算術/連結/型キャスト演算子
export const Operator = createToken({ name: 'Operator', pattern: Lexer.NA });

// 括弧、カンマ、セミコロン、ドット
export const Separator = createToken({ name: 'Separator', pattern: Lexer.NA });

// すべてのリテラル。正規化で ? に置き換わる候補。
export const Literal = createToken({ name: 'Literal', pattern: Lexer.NA });

// 'abc' / E'abc' / N'abc' / $$abc$$
export const StringConstant = createToken({ name: 'StringConstant', pattern: Lexer.NA });

// B'0101' / X'1F'
export const BitStringConstant = createToken({ name: 'BitStringConstant', pattern: Lexer.NA });

// 整数・小数（符号は含まない）
export const NumericConstant = createToken({ name: 'NumericConstant', pattern: Lexer.NA });

export const tokenCategories = [
  Keyword,
  Operator,
  Separator,
  Literal,
  StringConstant,
  BitStringConstant,
  NumericConstant,
];
