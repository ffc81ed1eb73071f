/**
 * Gateway Bootstrap
 * 由已驗證的設定組出 TokenManager → CrmApiClient → CrmService 與入站限流器
 */

import { CrmApiClient } from '../services/api.js';
import { TokenManager } from '../services/auth.js';
import { CrmService } from '../services/crm.js';
import { InboundRateLimiter } from '../services/rate-limiter.js';
import type { GatewayConfig } from '../types/config.js';
import type { AppDependencies } from './app.js';

export interface Gateway extends AppDependencies {
  api: CrmApiClient;
}

export function createTokenManager(config: GatewayConfig): TokenManager {
  return new TokenManager({
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    refreshToken: config.refreshToken,
    tokenUrl: config.tokenUrl,
    timeoutMs: config.requestTimeoutMs,
  });
}

export function buildGateway(config: GatewayConfig): Gateway {
  const tokens = createTokenManager(config);
  const api = new CrmApiClient(tokens, {
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    retry: {
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.backoffBaseMs,
      maxDelayMs: config.backoffMaxMs,
    },
  });

  return {
    tokens,
    api,
    crm: new CrmService(api),
    rateLimiter: new InboundRateLimiter({
      limit: config.rateLimitMax,
      windowMs: config.rateLimitWindowMs,
    }),
  };
}
