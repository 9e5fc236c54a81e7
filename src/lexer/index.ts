// src/lexer/index.ts
export { sqlLexer } from './lexer.ts';
export { allTokens } from './tokens.ts';
export * from './scanner.ts';
