// src/normalize/normalizeErrors.ts
import { NormalizeError } from '../errors/errors.ts';

// 内部不変条件の破れ（呼び出し側の誤り。回復不能）
export function failInvariant(message: string): never {
  throw new NormalizeError(message, 'E_NORMALIZE_INVARIANT');
}

