// src/lexer/tokens.ts
// 目的: PostgreSQL の字句規則に沿った SQL トークン定義。
// パーサーと、定数長を求めるスキャナ（scanner.ts）の両方がこの定義を共有します。
import { createToken, Lexer } from 'chevrotain';
import type { TokenType } from 'chevrotain';
import {
  Keyword,
  Operator,
  Separator,
  Literal,
  StringConstant,
  BitStringConstant,
  NumericConstant,
  tokenCategories,
} from './categories.ts';

// ----- Skipped -----
// 空白とコメントはパーサーに渡さない。位置は元テキストのオフセットで保持されるため、
// 書き換え時にはそのままコピーされます。
export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

export const LineComment = createToken({
  name: 'LineComment',
  pattern: /--[^\n\r]*/,
  group: Lexer.SKIPPED,
});

// /* ... */ は入れ子可能（PostgreSQL 準拠）
function matchBlockComment(text: string, offset: number): [string] | null {
  if (!text.startsWith('/*', offset)) return null;
  let depth = 1;
  let i = offset + 2;
  while (i < text.length) {
    if (text.startsWith('/*', i)) {
      depth++;
      i += 2;
    } else if (text.startsWith('*/', i)) {
      depth--;
      i += 2;
      if (depth === 0) return [text.slice(offset, i)];
    } else {
      i++;
    }
  }
  return null;
}

export const BlockComment = createToken({
  name: 'BlockComment',
  pattern: matchBlockComment,
  group: Lexer.SKIPPED,
  line_breaks: true,
  start_chars_hint: ['/'],
});

// ----- Literals -----
// 接頭辞付き文字列（E'', N'', B'', X''）は Identifier より先に並べる。
export const EscapeStringLiteral = createToken({
  name: 'EscapeStringLiteral',
  pattern: /[eE]'(?:[^'\\]|''|\\[\s\S])*'/,
  categories: [StringConstant, Literal],
  line_breaks: true,
});

export const NationalStringLiteral = createToken({
  name: 'NationalStringLiteral',
  pattern: /[nN]'(?:[^']|'')*'/,
  categories: [StringConstant, Literal],
  line_breaks: true,
});

export const BitStringLiteral = createToken({
  name: 'BitStringLiteral',
  pattern: /[bB]'[^']*'/,
  categories: [BitStringConstant, Literal],
  line_breaks: true,
});

export const HexStringLiteral = createToken({
  name: 'HexStringLiteral',
  pattern: /[xX]'[^']*'/,
  categories: [BitStringConstant, Literal],
  line_breaks: true,
});

export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /'(?:[^']|'')*'/,
  categories: [StringConstant, Literal],
  line_breaks: true,
});

// $tag$ ... $tag$（タグは空でもよい）
const dollarTag = /\$(?:[A-Za-z_\u0080-\uffff][A-Za-z0-9_\u0080-\uffff]*)?\$/y;

function matchDollarString(text: string, offset: number): [string] | null {
  dollarTag.lastIndex = offset;
  const open = dollarTag.exec(text);
  if (!open) return null;
  const tag = open[0];
  const close = text.indexOf(tag, offset + tag.length);
  if (close < 0) return null;
  return [text.slice(offset, close + tag.length)];
}

export const DollarStringLiteral = createToken({
  name: 'DollarStringLiteral',
  pattern: matchDollarString,
  categories: [StringConstant, Literal],
  line_breaks: true,
  start_chars_hint: ['$'],
});

// 数値は符号を含まない。負数は構文解析で単項マイナスと畳み込まれる。
// Float は Integer より先に並べる（"1.5" の "1" だけを取らないように）。
export const FloatLiteral = createToken({
  name: 'FloatLiteral',
  pattern: /(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?|\d+[eE][+-]?\d+/,
  categories: [NumericConstant, Literal],
});

export const IntegerLiteral = createToken({
  name: 'IntegerLiteral',
  pattern: /\d+/,
  categories: [NumericConstant, Literal],
});

// ----- Parameters -----
export const Param = createToken({ name: 'Param', pattern: /\$\d+/ });

// 正規化済みクエリを再度解析できるよう、プレースホルダ ? もパラメータとして受け付ける。
export const QuestionMark = createToken({ name: 'QuestionMark', pattern: /\?/ });

// ----- Identifiers -----
export const Identifier = createToken({
  name: 'Identifier',
  pattern: /[A-Za-z_\u0080-\uffff][A-Za-z0-9_$\u0080-\uffff]*/,
});

export const QuotedIdentifier = createToken({
  name: 'QuotedIdentifier',
  pattern: /"(?:[^"]|"")+"/,
  line_breaks: true,
});

// ----- Keywords -----
// longer_alt: Identifier により "selection" が SELECT + ion にならない。
function keyword(name: string, word: string = name.toUpperCase()): TokenType {
  return createToken({
    name,
    pattern: new RegExp(word, 'i'),
    longer_alt: Identifier,
    categories: Keyword,
  });
}

export const Select = keyword('Select');
export const From = keyword('From');
export const Where = keyword('Where');
export const And = keyword('And');
export const Or = keyword('Or');
export const Not = keyword('Not');
export const As = keyword('As');
export const Distinct = keyword('Distinct');
export const All = keyword('All');
export const Insert = keyword('Insert');
export const Into = keyword('Into');
export const Values = keyword('Values');
export const Update = keyword('Update');
// グローバルの Set / Date と衝突しないよう変数名のみ変える
export const SetKeyword = keyword('Set');
export const Delete = keyword('Delete');
export const Returning = keyword('Returning');
export const Join = keyword('Join');
export const Inner = keyword('Inner');
export const Left = keyword('Left');
export const Right = keyword('Right');
export const Full = keyword('Full');
export const Outer = keyword('Outer');
export const Cross = keyword('Cross');
export const On = keyword('On');
export const Group = keyword('Group');
export const By = keyword('By');
export const Having = keyword('Having');
export const Order = keyword('Order');
export const Asc = keyword('Asc');
export const Desc = keyword('Desc');
export const Nulls = keyword('Nulls');
export const First = keyword('First');
export const Last = keyword('Last');
export const Limit = keyword('Limit');
export const Offset = keyword('Offset');
export const Fetch = keyword('Fetch');
export const Next = keyword('Next');
export const Row = keyword('Row');
export const Rows = keyword('Rows');
export const Only = keyword('Only');
export const Union = keyword('Union');
export const Intersect = keyword('Intersect');
export const Except = keyword('Except');
export const In = keyword('In');
export const Is = keyword('Is');
export const Null = keyword('Null');
export const True = keyword('True');
export const False = keyword('False');
export const Between = keyword('Between');
export const Like = keyword('Like');
export const Ilike = keyword('Ilike');
export const Case = keyword('Case');
export const When = keyword('When');
export const Then = keyword('Then');
export const Else = keyword('Else');
export const End = keyword('End');
export const Exists = keyword('Exists');
export const DateKeyword = keyword('Date');
export const Timestamp = keyword('Timestamp');
export const Interval = keyword('Interval');

// Chevrotain は配列順に最初にマッチしたトークンを採用するため、
// "IN" が "INSERT" の先頭を取らないよう長い語から並べる。
const keywordTokens = [
  Select, From, Where, And, Or, Not, As, Distinct, All,
  Insert, Into, Values, Update, SetKeyword, Delete, Returning,
  Join, Inner, Left, Right, Full, Outer, Cross, On,
  Group, By, Having, Order, Asc, Desc, Nulls, First, Last,
  Limit, Offset, Fetch, Next, Row, Rows, Only,
  Union, Intersect, Except,
  In, Is, Null, True, False, Between, Like, Ilike,
  Case, When, Then, Else, End, Exists,
  DateKeyword, Timestamp, Interval,
].sort((a, b) => patternLength(b) - patternLength(a));

function patternLength(token: TokenType): number {
  return token.PATTERN instanceof RegExp ? token.PATTERN.source.length : 0;
}

// ----- Operators & Separators -----
// 2文字以上の演算子を1文字より先に。
export const TypeCast = createToken({ name: 'TypeCast', pattern: /::/, categories: Operator, start_chars_hint: [':'] });
export const NotEquals = createToken({ name: 'NotEquals', pattern: /<>|!=/, categories: Operator, start_chars_hint: ['<', '!'] });
export const LessThanOrEqual = createToken({ name: 'LessThanOrEqual', pattern: /<=/, categories: Operator, start_chars_hint: ['<'] });
export const GreaterThanOrEqual = createToken({ name: 'GreaterThanOrEqual', pattern: />=/, categories: Operator, start_chars_hint: ['>'] });
export const Concat = createToken({ name: 'Concat', pattern: /\|\|/, categories: Operator, start_chars_hint: ['|'] });

export const LessThan = createToken({ name: 'LessThan', pattern: /</, categories: Operator, start_chars_hint: ['<'] });
export const GreaterThan = createToken({ name: 'GreaterThan', pattern: />/, categories: Operator, start_chars_hint: ['>'] });
export const Equals = createToken({ name: 'Equals', pattern: /=/, categories: Operator, start_chars_hint: ['='] });
export const Plus = createToken({ name: 'Plus', pattern: /\+/, categories: Operator, start_chars_hint: ['+'] });
export const Minus = createToken({ name: 'Minus', pattern: /-/, categories: Operator, start_chars_hint: ['-'] });
export const Star = createToken({ name: 'Star', pattern: /\*/, categories: Operator, start_chars_hint: ['*'] });
export const Slash = createToken({ name: 'Slash', pattern: /\//, categories: Operator, start_chars_hint: ['/'] });
export const Percent = createToken({ name: 'Percent', pattern: /%/, categories: Operator, start_chars_hint: ['%'] });

export const LParen = createToken({ name: 'LParen', pattern: /\(/, categories: Separator, start_chars_hint: ['('] });
export const RParen = createToken({ name: 'RParen', pattern: /\)/, categories: Separator, start_chars_hint: [')'] });
export const Comma = createToken({ name: 'Comma', pattern: /,/, categories: Separator, start_chars_hint: [','] });
export const Semicolon = createToken({ name: 'Semicolon', pattern: /;/, categories: Separator, start_chars_hint: [';'] });
export const Dot = createToken({ name: 'Dot', pattern: /\./, categories: Separator, start_chars_hint: ['.'] });

// ----- Token order (priority) -----
// 1) カテゴリ（Lexer.NA、実際にはマッチしない）
// 2) 空白・コメント（-- と /* は Minus / Slash より先）
// 3) リテラル（接頭辞付き文字列、Float は Integer と Dot より先）
// 4) パラメータ（$1 は DollarString が失敗した後に試す）
// 5) キーワード（長い語から）
// 6) 演算子（2文字以上 → 1文字）、区切り
// 7) 識別子（最後）
export const allTokens: TokenType[] = [
  ...tokenCategories,

  WhiteSpace, LineComment, BlockComment,

  EscapeStringLiteral, NationalStringLiteral, BitStringLiteral, HexStringLiteral,
  StringLiteral, DollarStringLiteral, FloatLiteral, IntegerLiteral,

  Param, QuestionMark,

  ...keywordTokens,

  TypeCast, NotEquals, LessThanOrEqual, GreaterThanOrEqual, Concat,
  LessThan, GreaterThan, Equals, Plus, Minus, Star, Slash, Percent,

  LParen, RParen, Comma, Semicolon, Dot,

  QuotedIdentifier, Identifier,
];
