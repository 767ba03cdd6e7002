export type ErrorCode = 'MALFORMED_ADDRESS' | 'POLICY_REJECTED';

export type Result<T> = { ok: true; value: T } | { ok: false; code: ErrorCode; message: string };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(code: ErrorCode, message: string): Result<T> {
  return { ok: false, code, message };
}
