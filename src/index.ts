// src/index.ts
export * from './parser/index.ts';
export * from './normalize/index.ts';
export * from './lexer/index.ts';
export type * from './ast/types.ts';
export { childrenOf, walkChildren } from './ast/walker.ts';
export type { TreeWalker } from './ast/walker.ts';
export { QueryStatsStore } from './adapters/sqlite/index.ts';
export type { QueryStat } from './adapters/sqlite/index.ts';
export { SqlshapeError, ParseError, WalkError, NormalizeError, AdapterError } from './errors/errors.ts';
export type { ErrorCode } from './errors/errors.ts';
