// src/adapters/adapterErrors.ts
import { AdapterError } from '../errors/errors.ts';

export function failAdapter(message: string, target?: string): never {
  throw new AdapterError(message, target, 'E_ADAPTER_GENERIC');
}

export function failInvalidArgument(target: string, name: string, value: unknown): never {
  failAdapter(`[${target}] Invalid ${name}: ${String(value)}`, target);
}
