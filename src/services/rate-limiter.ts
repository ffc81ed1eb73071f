/**
 * Inbound Rate Limiter
 * 固定視窗計數器 - 以呼叫端識別（例如來源 IP）保護本服務
 */

import { loggers } from '../lib/logger.js';

export interface RateLimiterConfig {
  /** 每個視窗允許的請求數 (default: 100) */
  limit: number;
  /** 視窗長度（毫秒） (default: 60000) */
  windowMs: number;
}

export const DEFAULT_RATE_LIMIT: RateLimiterConfig = {
  limit: 100,
  windowMs: 60 * 1000,
};

export interface RateWindow {
  count: number;
  startedAt: number; // Unix timestamp (ms)
}

/**
 * 每個 key 一個視窗，第一次出現時建立，之後不回收
 * （key 基數有限的部署可接受）
 *
 * 檢查本身就是計數：即使判定未限流，也會記錄這次請求。
 * 比較採嚴格大於，所以第 limit 個請求仍放行，第 limit+1 個才被拒絕。
 * Node 單執行緒下整個判斷是同步完成的，不會有遺失的遞增。
 */
export class InboundRateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly windows = new Map<string, RateWindow>();

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...config };
    if (this.config.limit < 1 || this.config.windowMs <= 0) {
      throw new Error('Rate limit and window length must be positive');
    }
  }

  isRateLimited(key: string): boolean {
    const now = Date.now();
    const current = this.windows.get(key);

    if (!current || now - current.startedAt >= this.config.windowMs) {
      // 視窗整個替換，而不是在舊視窗上遞增
      this.windows.set(key, { count: 1, startedAt: now });
      return false;
    }

    current.count += 1;
    if (current.count > this.config.limit) {
      // 不回滾計數：飽和期間持續累積，直到視窗自然翻轉
      if (current.count === this.config.limit + 1) {
        loggers.rateLimit.warn('Caller exceeded inbound rate limit', {
          key,
          limit: this.config.limit,
          windowMs: this.config.windowMs,
        });
      }
      return true;
    }

    return false;
  }

  /**
   * 目前視窗剩餘的毫秒數（供 Retry-After 使用）
   */
  getRetryAfterMs(key: string): number {
    const current = this.windows.get(key);
    if (!current) {
      return 0;
    }
    return Math.max(0, this.config.windowMs - (Date.now() - current.startedAt));
  }

  getWindow(key: string): Readonly<RateWindow> | undefined {
    const current = this.windows.get(key);
    return current ? { ...current } : undefined;
  }

  getConfig(): Readonly<RateLimiterConfig> {
    return this.config;
  }

  /** 追蹤中的 key 數量 */
  size(): number {
    return this.windows.size;
  }

  reset(): void {
    this.windows.clear();
  }
}
