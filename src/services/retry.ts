/**
 * Retry State
 * 單一邏輯請求的嘗試計數與指數退避（無 jitter）
 */

export interface RetryConfig {
  /** 最大嘗試次數，包含第一次 (default: 3) */
  maxAttempts: number;
  /** 起始退避延遲 (default: 5000) */
  baseDelayMs: number;
  /** 退避上限，0 表示不設上限 (default: 60000) */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 5000,
  maxDelayMs: 60000,
};

/** 上游會被重試的狀態（401 另外處理：先更新 token） */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * 一次 request() 呼叫內的重試狀態，呼叫結束即丟棄
 *
 * 429 與 5xx 共用同一個加倍中的延遲；401 只消耗嘗試次數，不等待。
 */
export class RetryState {
  private attempt = 0;
  private delayMs: number;
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.delayMs = this.config.baseDelayMs;
  }

  /** 是否還有嘗試額度 */
  canAttempt(): boolean {
    return this.attempt < this.config.maxAttempts;
  }

  /** 消耗一次嘗試額度，回傳目前是第幾次（1-based） */
  consume(): number {
    this.attempt += 1;
    return this.attempt;
  }

  getAttempts(): number {
    return this.attempt;
  }

  getMaxAttempts(): number {
    return this.config.maxAttempts;
  }

  /** 下一次退避會等待的時間 */
  getCurrentDelay(): number {
    return this.delayMs;
  }

  /**
   * 等待目前的延遲後將其加倍
   * @returns 實際等待的毫秒數
   */
  async backoff(): Promise<number> {
    const waited = this.delayMs;
    await sleep(waited);

    const doubled = this.delayMs * 2;
    this.delayMs = this.config.maxDelayMs > 0 ? Math.min(doubled, this.config.maxDelayMs) : doubled;

    return waited;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
