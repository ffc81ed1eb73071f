/**
 * Response Envelopes
 * 統一的成功 / 錯誤回應格式
 */

import type { Response } from 'express';
import { statusForKind, type ErrorOutcome } from './outcome.js';

export interface SuccessEnvelope<T> {
  success: true;
  message: string;
  status_code: number;
  data: T | Record<string, never>;
}

export interface ErrorEnvelope {
  success: false;
  error_message: string;
  status_code: number;
  data: unknown;
}

export function buildSuccessResponse<T>(message: string, status = 200, data?: T): SuccessEnvelope<T> {
  return {
    success: true,
    message,
    status_code: status,
    data: data ?? {},
  };
}

export function buildErrorResponse(message: string, status = 400, data?: unknown): ErrorEnvelope {
  return {
    success: false,
    error_message: message,
    status_code: status,
    data: data ?? {},
  };
}

export function sendSuccess<T>(res: Response, message: string, status = 200, data?: T): void {
  res.status(status).json(buildSuccessResponse(message, status, data));
}

export function sendError(res: Response, message: string, status = 400, data?: unknown): void {
  res.status(status).json(buildErrorResponse(message, status, data));
}

/**
 * 依錯誤分類決定 HTTP 狀態碼，detail 放在 data
 */
export function sendOutcome(res: Response, error: ErrorOutcome): void {
  sendError(res, error.message, statusForKind(error.kind), error.detail);
}
