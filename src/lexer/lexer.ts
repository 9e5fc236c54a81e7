// src/lexer/lexer.ts
// Lexer はステートレスなので、パーサーとスキャナで単一インスタンスを共有します。
import { Lexer } from 'chevrotain';
import { allTokens } from './tokens.ts';

export const sqlLexer = new Lexer(allTokens, { positionTracking: 'full' });
