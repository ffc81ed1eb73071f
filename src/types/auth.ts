import type { ErrorOutcome } from '../lib/outcome.js';

/**
 * OAuth 憑證（僅存在於記憶體）
 */
export interface Credential {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  accessToken: string | null;
  expiresAt: number; // Unix timestamp (ms)
}

/**
 * 可對外顯示的憑證狀態（不含任何秘密）
 */
export interface TokenState {
  hasAccessToken: boolean;
  valid: boolean;
  expiresAt: string | null;
  refreshInFlight: boolean;
  /** 最近一次 refresh 的失敗結果，成功後清除 */
  lastRefreshError: ErrorOutcome | null;
}
