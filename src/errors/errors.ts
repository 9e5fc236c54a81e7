// sqlshape - error types and helpers
// 目的: 層ごとに例外型を分離し、呼び出し側が分類しやすい構造を提供
// ログはライブラリ層では行わず、呼び出し側で処理する方針

export type ErrorCode =
  | 'E_PARSE_UNEXPECTED_TOKEN'
  | 'E_PARSE_UNTERMINATED_LITERAL'
  | 'E_PARSE_GENERIC'
  | 'E_WALK_UNSUPPORTED_NODE'
  | 'E_NORMALIZE_INVARIANT'
  | 'E_ADAPTER_GENERIC';

export abstract class SqlshapeError extends Error {
  public abstract readonly code: ErrorCode;
  constructor(message: string) {
    super(message);
    // Errorのプロトタイプ連鎖調整（Babel/TS互換）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Parser: トークナイズ/構文解析
// cursorPosition は 1 始まりの文字位置（入力末尾のエラーは length + 1）
export class ParseError extends SqlshapeError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly cursorPosition: number,
    public readonly line?: number,
    public readonly column?: number,
    public readonly snippet?: string,
    code: Extract<ErrorCode, 'E_PARSE_UNEXPECTED_TOKEN' | 'E_PARSE_UNTERMINATED_LITERAL' | 'E_PARSE_GENERIC'> = 'E_PARSE_GENERIC',
  ) {
    super(message);
    this.name = 'ParseError';
    this.code = code;
  }
}

// Walker: 構文木の走査中に未知/不正なノードに遭遇した
export class WalkError extends SqlshapeError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly nodeType?: string,
    code: Extract<ErrorCode, 'E_WALK_UNSUPPORTED_NODE'> = 'E_WALK_UNSUPPORTED_NODE',
  ) {
    super(message);
    this.name = 'WalkError';
    this.code = code;
  }
}

// Normalizer: 定数位置の解決とクエリの書き換え
export class NormalizeError extends SqlshapeError {
  public readonly code: ErrorCode;
  constructor(message: string, code: Extract<ErrorCode, 'E_NORMALIZE_INVARIANT'> = 'E_NORMALIZE_INVARIANT') {
    super(message);
    this.name = 'NormalizeError';
    this.code = code;
  }
}

// adapters 用
export class AdapterError extends SqlshapeError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly target?: string, // 例: 'sqlite'
    code: Extract<ErrorCode, 'E_ADAPTER_GENERIC'> = 'E_ADAPTER_GENERIC',
  ) {
    super(message);
    this.name = 'AdapterError';
    this.code = code;
  }
}

