// src/lexer/scanner.ts
// 目的: 定数長の解決に使う前進専用スキャナ。
// 1回の正規化につき1つ生成し、巻き戻さずに先頭から末尾へ進めるだけ。

import type { IToken } from 'chevrotain';
import { sqlLexer } from './lexer.ts';

export interface ScanToken {
  /** トークン先頭のオフセット */
  start: number;
  /** トークン末尾の直後のオフセット（排他的） */
  end: number;
}

export interface Scanner {
  /** 次のトークン。入力末尾なら undefined */
  next(): ScanToken | undefined;
}

export type ScannerFactory = (text: string) => Scanner;

export class SqlScanner implements Scanner {
  private readonly tokens: IToken[];
  private cursor = 0;

  constructor(text: string) {
    const result = sqlLexer.tokenize(text);
    // 字句エラー以降のトークンは返さない（そこを入力末尾とみなす）
    const firstError = result.errors[0];
    const limit = firstError ? firstError.offset : Number.POSITIVE_INFINITY;
    this.tokens = result.tokens.filter((t) => t.startOffset < limit);
  }

  next(): ScanToken | undefined {
    const token: IToken | undefined = this.tokens[this.cursor];
    if (!token) return undefined;
    this.cursor++;
    return {
      start: token.startOffset,
      end: token.startOffset + token.image.length,
    };
  }
}

export const createSqlScanner: ScannerFactory = (text) => new SqlScanner(text);
