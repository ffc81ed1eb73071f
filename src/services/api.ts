/**
 * CRM API Client
 * CRM API 客戶端 - 所有對 HubSpot REST API 的呼叫都經過這裡
 * 負責注入認證、退避重試，並把傳輸與 HTTP 結果歸類為 ErrorOutcome
 */

import { ofetch, type FetchResponse } from 'ofetch';
import { parseJson } from '../lib/json.js';
import { loggers } from '../lib/logger.js';
import {
  statusClass,
  upstreamRequestDurationSeconds,
  upstreamRequestsTotal,
  upstreamRetriesTotal,
} from '../lib/metrics.js';
import { describeError, fail, ok, type Result } from '../lib/outcome.js';
import { TokenManager } from './auth.js';
import { RetryState, isRetryableStatus, type RetryConfig } from './retry.js';

export const DEFAULT_API_BASE = 'https://api.hubapi.com';

const DEFAULT_TIMEOUT_MS = 10 * 1000;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * business glue 只依賴這個介面，測試可替換為假實作
 */
export interface CrmRequester {
  request<T = unknown>(
    method: HttpMethod,
    path: string,
    body?: unknown,
    query?: QueryParams
  ): Promise<Result<T>>;
}

export interface CrmApiClientOptions {
  baseUrl?: string;
  /** 單次 HTTP 呼叫逾時，不涵蓋整個重試迴圈 */
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
}

export class CrmApiClient implements CrmRequester {
  private readonly auth: TokenManager;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryConfig: Partial<RetryConfig>;

  constructor(auth: TokenManager, options: CrmApiClientOptions = {}) {
    this.auth = auth;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryConfig = options.retry ?? {};
  }

  /**
   * 發送帶認證的 API 請求
   *
   * - 200/201：回傳解析後的 JSON
   * - 401：更新 token 後立即重試（消耗嘗試次數，不等待）
   * - 429、5xx：退避後重試，延遲每次加倍
   * - 404、其他 4xx、未知狀態：立即失敗
   * - 傳輸錯誤（DNS、連線拒絕、逾時）：立即失敗，不重試；
   *   這通常代表設定錯誤而非上游暫時性負載
   */
  async request<T = unknown>(
    method: HttpMethod,
    path: string,
    body?: unknown,
    query?: QueryParams
  ): Promise<Result<T>> {
    const startTime = Date.now();
    const result = await this.execute<T>(method, path, body, query);

    upstreamRequestDurationSeconds.observe(
      { method, outcome: result.ok ? 'success' : result.error.kind },
      (Date.now() - startTime) / 1000
    );

    return result;
  }

  private async execute<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    query: QueryParams | undefined
  ): Promise<Result<T>> {
    const url = `${this.baseUrl}${path}`;
    const state = new RetryState(this.retryConfig);
    let lastStatus: number | undefined;
    let lastBody = '';

    while (state.canAttempt()) {
      const attempt = state.consume();

      const token = await this.auth.getToken();
      if (!token.ok) {
        return token;
      }

      let response: FetchResponse<string>;
      try {
        response = await ofetch.raw<string, 'text'>(url, {
          method,
          headers: {
            Authorization: `Bearer ${token.value}`,
            Accept: 'application/json',
            'Content-Type': 'application/json',
          },
          body: body === undefined ? undefined : JSON.stringify(body),
          query,
          responseType: 'text',
          timeout: this.timeoutMs,
          retry: 0,
          ignoreResponseError: true,
        });
      } catch (error) {
        upstreamRequestsTotal.inc({ method, status_class: statusClass(undefined) });
        loggers.api.error('Request error to CRM API', error instanceof Error ? error : null, {
          method,
          url: path,
          attempt,
        });
        return fail('ServiceUnavailable', 'Failed to connect to CRM API.', describeError(error));
      }

      const status = response.status;
      const text = response._data ?? '';
      lastStatus = status;
      lastBody = text;
      upstreamRequestsTotal.inc({ method, status_class: statusClass(status) });

      if (status === 200 || status === 201) {
        loggers.api.debug('CRM API request completed', { method, url: path, statusCode: status, attempt });
        return parseSuccessBody<T>(text);
      }

      if (status === 401) {
        loggers.api.warn('CRM API responded with 401, refreshing token and retrying', {
          method,
          url: path,
          attempt,
        });
        upstreamRetriesTotal.inc({ reason: 'unauthorized' });
        const refreshed = await this.auth.refresh();
        if (!refreshed.ok) {
          return refreshed;
        }
        continue;
      }

      if (status === 404) {
        loggers.api.error('CRM resource not found', null, { method, url: path, statusCode: status, body: text });
        return fail('NotFound', 'Resource not found in CRM', text);
      }

      if (isRetryableStatus(status)) {
        const reason = status === 429 ? 'rate_limited' : 'server_error';
        upstreamRetriesTotal.inc({ reason });
        loggers.api.warn(
          status === 429 ? 'Rate-limited by CRM API, backing off' : 'CRM API server error, backing off',
          { method, url: path, statusCode: status, attempt, delayMs: state.getCurrentDelay() }
        );
        await state.backoff();
        continue;
      }

      if (status >= 400 && status < 500) {
        loggers.api.error('CRM API client error', null, { method, url: path, statusCode: status, body: text });
        return fail('BadRequest', extractUpstreamMessage(text), text);
      }

      loggers.api.error('Unexpected CRM API response', null, { method, url: path, statusCode: status, body: text });
      return fail('ServiceUnavailable', 'Unexpected CRM API response.', { status, body: text });
    }

    loggers.api.error('Exceeded max retries for CRM API request', null, {
      method,
      url: path,
      attempt: state.getAttempts(),
      statusCode: lastStatus,
    });
    return fail(
      'ServiceUnavailable',
      `Exceeded max retries (${state.getMaxAttempts()}) for CRM API request.`,
      { status: lastStatus, body: lastBody }
    );
  }
}

/**
 * 成功回應的 JSON 主體；空主體視為 {}
 */
function parseSuccessBody<T>(text: string): Result<T> {
  try {
    const data: T = JSON.parse(text.trim().length > 0 ? text : '{}');
    return ok(data);
  } catch (error) {
    return fail('ServiceUnavailable', 'CRM API returned an invalid JSON body.', describeError(error));
  }
}

/**
 * HubSpot 通常把錯誤說明放在 message 欄位；非 JSON 時使用原始文字
 */
function extractUpstreamMessage(text: string): string {
  const parsed = parseJson(text);
  if (typeof parsed === 'object' && parsed !== null && 'message' in parsed) {
    const message = parsed.message;
    if (typeof message === 'string' && message.length > 0) {
      return message;
    }
  }
  // 只有 JSON 物件缺少 message 時才用通用訊息，純量或非 JSON 則回傳原文
  const isObject = typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed);
  return isObject ? 'Client error from CRM' : text;
}
