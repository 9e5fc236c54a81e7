// src/normalize/types.ts
import type { ScannerFactory } from '../lexer/scanner.ts';

// 定数1つ分の位置。length は LengthResolver が埋めるまで undefined。
export interface ConstantSpan {
  location: number;
  length: number | undefined;
}

// 走査中に失敗したサブツリー（呼び出し元へは例外として伝えない）
export interface WalkFailure {
  nodeType: string;
  message: string;
}

export interface ConstantCollection {
  spans: ConstantSpan[];
  walkFailures: WalkFailure[];
}

export interface ResolveOutcome {
  // スキャナが入力末尾に達して長さを決められなかった位置
  unresolved: number[];
}

export interface RewriteResult {
  query: string;
  length: number;
}

export interface NormalizeOptions {
  createScanner?: ScannerFactory;
}

export interface NormalizeResult extends RewriteResult {
  // 位置順に並んだ定数。重複位置や未解決の定数は length が undefined のまま残る。
  constants: ConstantSpan[];
  unresolved: number[];
  walkFailures: WalkFailure[];
}
