// src/parser/parserErrors.ts
import { EOF, tokenMatcher } from 'chevrotain';
import type { ILexingError, IRecognitionException } from 'chevrotain';
import { ParseError } from '../errors/errors.ts';

// 構文エラー。位置は 1 始まり、入力末尾なら length + 1。
export function failSyntax(error: IRecognitionException, input: string): never {
  const token = error.token;
  if (tokenMatcher(token, EOF) || Number.isNaN(token.startOffset)) {
    throw new ParseError('syntax error at end of input', input.length + 1);
  }
  throw new ParseError(
    `syntax error at or near "${token.image}"`,
    token.startOffset + 1,
    token.startLine,
    token.startColumn,
    token.image,
    'E_PARSE_GENERIC',
  );
}

// 字句エラー。閉じられていないリテラルは専用のメッセージにする。
export function failLexing(error: ILexingError, input: string): never {
  const rest = input.slice(error.offset);
  const ch = input.charAt(error.offset);
  const position = error.offset + 1;
  const unterminated =
    ch === "'" ? 'unterminated quoted string'
    : ch === '"' ? 'unterminated quoted identifier'
    : ch === '$' ? 'unterminated dollar-quoted string'
    : undefined;
  if (unterminated) {
    throw new ParseError(
      `${unterminated} at or near "${rest}"`,
      position,
      error.line,
      error.column,
      rest,
      'E_PARSE_UNTERMINATED_LITERAL',
    );
  }
  throw new ParseError(
    `syntax error at or near "${ch}"`,
    position,
    error.line,
    error.column,
    ch,
    'E_PARSE_UNEXPECTED_TOKEN',
  );
}

// 文法上は通るが意味的に受け付けない構文（位置は 1 始まり）
export function failGenericParse(message: string, offset: number): never {
  throw new ParseError(message, offset + 1);
}

// パーサーと Visitor のラベルが食い違っている場合のみ到達する
export function failMalformedCst(key: string): never {
  throw new ParseError(`Malformed syntax tree: missing '${key}'`, 0);
}
