/**
 * Error Outcome
 * 錯誤分類 - 所有可失敗的核心操作都回傳 Result，而不是拋出例外
 */

export type ErrorKind =
  | 'BadRequest'
  | 'UnprocessableEntity'
  | 'NotFound'
  | 'Unauthorized'
  | 'ServiceUnavailable';

export interface ErrorOutcome {
  readonly kind: ErrorKind;
  /** 簡短、可直接回給呼叫端的訊息 */
  readonly message: string;
  /** 上游原始回應或例外細節 */
  readonly detail?: unknown;
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ErrorOutcome };

/** 對外 HTTP 狀態碼（僅供 glue 層轉換使用） */
const STATUS_BY_KIND: Record<ErrorKind, number> = {
  BadRequest: 400,
  Unauthorized: 401,
  NotFound: 404,
  UnprocessableEntity: 422,
  ServiceUnavailable: 503,
};

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string, detail?: unknown): Result<T> {
  return { ok: false, error: outcome(kind, message, detail) };
}

/**
 * 建立不可變的 ErrorOutcome
 */
export function outcome(kind: ErrorKind, message: string, detail?: unknown): ErrorOutcome {
  const value: ErrorOutcome = detail === undefined ? { kind, message } : { kind, message, detail };
  return Object.freeze(value);
}

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/**
 * 將任意例外轉為可放入 detail 的字串
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
