/**
 * Health Check Service - 系統健康狀態檢查
 * 只讀取記憶體中的狀態，不對上游發出任何請求
 */

import type { TokenManager } from './auth.js';
import type { InboundRateLimiter } from './rate-limiter.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  details: string;
}

export interface HealthCheckResult {
  status: HealthStatus;
  timestamp: string;
  uptimeSeconds: number;
  components: {
    auth: ComponentHealth;
    rateLimiter: ComponentHealth;
  };
}

const STATUS_SEVERITY: Record<HealthStatus, number> = {
  healthy: 0,
  degraded: 1,
  unhealthy: 2,
};

export class HealthCheckService {
  constructor(
    private readonly tokens: TokenManager,
    private readonly rateLimiter: InboundRateLimiter
  ) {}

  performHealthCheck(): HealthCheckResult {
    const auth = this.checkAuthHealth();
    const rateLimiter = this.checkRateLimiterHealth();

    return {
      status: worstOf([auth.status, rateLimiter.status]),
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.round(process.uptime()),
      components: { auth, rateLimiter },
    };
  }

  /**
   * 認證狀態
   * - 上次 refresh 被拒絕：unhealthy（refresh token 需要更換）
   * - 上次 refresh 無法連線：degraded
   * - 其他情況都視為 healthy，token 會在下一個請求時自動取得
   */
  private checkAuthHealth(): ComponentHealth {
    const state = this.tokens.getState();

    if (state.lastRefreshError) {
      return {
        status: state.lastRefreshError.kind === 'Unauthorized' ? 'unhealthy' : 'degraded',
        details: `Last token refresh failed: ${state.lastRefreshError.message}`,
      };
    }
    if (state.valid && state.expiresAt !== null) {
      return { status: 'healthy', details: `Access token valid until ${state.expiresAt}` };
    }
    if (state.hasAccessToken) {
      return { status: 'healthy', details: 'Access token expired, refreshes on next request' };
    }
    return { status: 'healthy', details: 'No access token cached yet' };
  }

  private checkRateLimiterHealth(): ComponentHealth {
    const { limit, windowMs } = this.rateLimiter.getConfig();
    return {
      status: 'healthy',
      details: `${this.rateLimiter.size()} callers tracked (${limit} requests / ${windowMs}ms)`,
    };
  }
}

export function worstOf(statuses: HealthStatus[]): HealthStatus {
  return statuses.reduce<HealthStatus>(
    (worst, status) => (STATUS_SEVERITY[status] > STATUS_SEVERITY[worst] ? status : worst),
    'healthy'
  );
}

/**
 * 健康狀態對應的 HTTP 狀態碼
 */
export function getHttpStatusCode(status: HealthStatus): number {
  return status === 'unhealthy' ? 503 : 200;
}
