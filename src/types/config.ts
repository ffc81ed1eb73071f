/**
 * Gateway 設定結構
 * 所有值都在啟動時讀入，執行期間不再動態讀取
 */
export interface GatewayConfig {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** CRM REST API base URL */
  apiBaseUrl: string;
  /** OAuth token endpoint */
  tokenUrl: string;
  /** 單一邏輯請求的最大嘗試次數 */
  maxAttempts: number;
  /** 退避起始延遲（毫秒） */
  backoffBaseMs: number;
  /** 退避上限（毫秒），0 表示不設上限 */
  backoffMaxMs: number;
  /** 單次 HTTP 呼叫逾時（毫秒） */
  requestTimeoutMs: number;
  /** 每個視窗允許的入站請求數 */
  rateLimitMax: number;
  /** 入站限流視窗長度（毫秒） */
  rateLimitWindowMs: number;
  host: string;
  port: number;
}

export type ConfigKey = keyof GatewayConfig;
