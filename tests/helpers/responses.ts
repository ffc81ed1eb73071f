/**
 * Upstream Response Helpers
 * 建立 ofetch.raw 會回傳的 FetchResponse（responseType: 'text'）
 */

import type { FetchResponse } from 'ofetch';

export function textResponse(status: number, body = ''): FetchResponse<string> {
  const response: FetchResponse<string> = new Response(body.length > 0 ? body : null, { status });
  response._data = body;
  return response;
}

export function jsonResponse(status: number, data: unknown): FetchResponse<string> {
  return textResponse(status, JSON.stringify(data));
}
