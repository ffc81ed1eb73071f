/**
 * Token Manager
 * OAuth2 認證服務 - 以 refresh token 取得、快取並自動更新 CRM access token
 */

import { ofetch, type FetchResponse } from 'ofetch';
import { z } from 'zod';
import { parseJson } from '../lib/json.js';
import { loggers } from '../lib/logger.js';
import { tokenRefreshesTotal } from '../lib/metrics.js';
import { describeError, fail, ok, type ErrorOutcome, type Result } from '../lib/outcome.js';
import type { Credential, TokenState } from '../types/auth.js';

export const DEFAULT_TOKEN_URL = 'https://api.hubapi.com/oauth/v1/token';

// Token 提前 60 秒視為過期，避免在上游判定失效的瞬間仍在使用
const TOKEN_EXPIRY_BUFFER_MS = 60 * 1000;

// 上游未回傳 expires_in 時的預設壽命（秒）
const DEFAULT_TOKEN_LIFETIME_SEC = 1800;

const DEFAULT_TIMEOUT_MS = 10 * 1000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().nullish(),
  expires_in: z.number().positive().optional(),
  token_type: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

// null 或空字串都代表上游沒有輪替 refresh token
function isRotatedToken(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.length > 0;
}

export interface TokenManagerOptions {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  tokenUrl?: string;
  /** 呼叫 token endpoint 的逾時 */
  timeoutMs?: number;
  /** 提前過期的安全邊際 */
  expiryBufferMs?: number;
}

export class TokenManager {
  private credential: Credential;
  private readonly tokenUrl: string;
  private readonly timeoutMs: number;
  private readonly expiryBufferMs: number;

  // 單一飛行請求：同一時間只允許一個 refresh 寫入憑證
  private inFlightRefresh: Promise<Result<void>> | null = null;
  private lastRefreshError: ErrorOutcome | null = null;

  constructor(options: TokenManagerOptions) {
    this.credential = {
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      refreshToken: options.refreshToken,
      accessToken: null,
      expiresAt: 0,
    };
    this.tokenUrl = options.tokenUrl ?? DEFAULT_TOKEN_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.expiryBufferMs = options.expiryBufferMs ?? TOKEN_EXPIRY_BUFFER_MS;
  }

  /**
   * 取得有效的 Access Token
   * - 快取有效：直接返回，不發任何網路請求
   * - 快取無效或不存在：更新一次後返回
   */
  async getToken(): Promise<Result<string>> {
    const cached = this.validToken();
    if (cached !== null) {
      return ok(cached);
    }

    loggers.auth.info('Access token is missing or expired, refreshing');

    const refreshed = await this.refresh();
    if (!refreshed.ok) {
      return refreshed;
    }

    // 剛更新完的 token 即使壽命短於安全邊際也直接使用
    const token = this.credential.accessToken;
    if (token === null) {
      return fail('Unauthorized', 'CRM token endpoint returned no access token.');
    }
    return ok(token);
  }

  /**
   * 無條件以 refresh token 換取新的 access token
   * 上游以 401 拒絕請求時由 CrmApiClient 呼叫，即使本地時鐘認為 token 仍有效
   * 進行中的 refresh 會被共用，不會重複發出
   */
  refresh(): Promise<Result<void>> {
    if (!this.inFlightRefresh) {
      this.inFlightRefresh = this.exchangeRefreshToken()
        .then((result) => {
          this.lastRefreshError = result.ok ? null : result.error;
          return result;
        })
        .finally(() => {
          this.inFlightRefresh = null;
        });
    }
    return this.inFlightRefresh;
  }

  isTokenValid(): boolean {
    return this.validToken() !== null;
  }

  /**
   * 清除快取的 access token（refresh token 保留）
   */
  clearCache(): void {
    this.credential.accessToken = null;
    this.credential.expiresAt = 0;
  }

  getState(): TokenState {
    return {
      hasAccessToken: this.credential.accessToken !== null,
      valid: this.isTokenValid(),
      expiresAt: this.credential.accessToken !== null ? new Date(this.credential.expiresAt).toISOString() : null,
      refreshInFlight: this.inFlightRefresh !== null,
      lastRefreshError: this.lastRefreshError,
    };
  }

  private validToken(): string | null {
    const { accessToken, expiresAt } = this.credential;
    if (accessToken === null || Date.now() >= expiresAt) {
      return null;
    }
    return accessToken;
  }

  private async exchangeRefreshToken(): Promise<Result<void>> {
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.credential.clientId,
      client_secret: this.credential.clientSecret,
      refresh_token: this.credential.refreshToken,
    }).toString();

    let response: FetchResponse<string>;
    try {
      response = await ofetch.raw<string, 'text'>(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body,
        responseType: 'text',
        timeout: this.timeoutMs,
        retry: 0,
        ignoreResponseError: true,
      });
    } catch (error) {
      loggers.auth.error(
        'OAuth request failed before reaching the token endpoint',
        error instanceof Error ? error : null,
        { url: this.tokenUrl }
      );
      tokenRefreshesTotal.inc({ result: 'unreachable' });
      return fail('ServiceUnavailable', 'Failed to reach CRM token endpoint.', describeError(error));
    }

    const rawBody = response._data ?? '';

    if (response.status !== 200) {
      loggers.auth.error('Failed to refresh access token', null, {
        statusCode: response.status,
        body: rawBody,
      });
      tokenRefreshesTotal.inc({ result: 'rejected' });
      return fail('Unauthorized', 'Invalid or expired CRM refresh token.', {
        status: response.status,
        body: rawBody,
      });
    }

    const parsed = TokenResponseSchema.safeParse(parseJson(rawBody));
    if (!parsed.success) {
      loggers.auth.error('Token endpoint returned an unusable body', null, { body: rawBody });
      tokenRefreshesTotal.inc({ result: 'rejected' });
      return fail('Unauthorized', 'CRM token endpoint returned no access token.', rawBody);
    }

    this.store(parsed.data);
    tokenRefreshesTotal.inc({ result: 'success' });
    loggers.auth.info('Access token refreshed', {
      expiresAt: new Date(this.credential.expiresAt).toISOString(),
      rotatedRefreshToken: isRotatedToken(parsed.data.refresh_token),
    });

    return ok(undefined);
  }

  private store(data: TokenResponse): void {
    const lifetimeSec = data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SEC;

    this.credential.accessToken = data.access_token;
    // 上游沒有給新的 refresh token 時沿用舊的，絕不丟棄
    if (isRotatedToken(data.refresh_token)) {
      this.credential.refreshToken = data.refresh_token;
    }
    this.credential.expiresAt = Date.now() + lifetimeSec * 1000 - this.expiryBufferMs;
  }
}
