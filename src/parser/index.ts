// src/parser/index.ts
// 公開API: SQL 文字列を構文木へ変換します（CST は内部実装に隠蔽）。
// ライブラリ内ではログを出さず、エラーはすべて ParseError に正規化する。

import type { IToken } from 'chevrotain';
import type { ParseTree } from '../ast/types.ts';
import { sqlLexer } from '../lexer/lexer.ts';
import { sqlParser } from './parser.ts';
import { astBuilderVisitor } from './visitor.ts';
import { failLexing, failSyntax } from './parserErrors.ts';

export interface ParseResult {
  tree: ParseTree;
  // 字句解析結果（CLI の --print tokens で表示）
  tokens: IToken[];
}

export function parse(input: string): ParseResult {
  // 1) Lexing
  const lexResult = sqlLexer.tokenize(input);
  const lexError = lexResult.errors[0];
  if (lexError) failLexing(lexError, input);

  // 2) Parsing (CST)。input の再設定でパーサーの状態はリセットされる。
  sqlParser.input = lexResult.tokens;
  const cst = sqlParser.statementList();
  const parseError = sqlParser.errors[0];
  if (parseError) failSyntax(parseError, input);

  // 3) CST -> 構文木（Visitor）
  return { tree: astBuilderVisitor.statementList(cst.children), tokens: lexResult.tokens };
}
