/**
 * Health Check Service Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthCheckService, getHttpStatusCode, worstOf } from '../../src/services/health.js';
import { TokenManager } from '../../src/services/auth.js';
import { InboundRateLimiter } from '../../src/services/rate-limiter.js';
import { outcome } from '../../src/lib/outcome.js';
import type { TokenState } from '../../src/types/auth.js';

describe('HealthCheckService', () => {
  let tokens: TokenManager;
  let limiter: InboundRateLimiter;
  let service: HealthCheckService;

  const baseState: TokenState = {
    hasAccessToken: false,
    valid: false,
    expiresAt: null,
    refreshInFlight: false,
    lastRefreshError: null,
  };

  beforeEach(() => {
    tokens = new TokenManager({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      refreshToken: 'test-refresh-token',
    });
    limiter = new InboundRateLimiter({ limit: 10, windowMs: 1000 });
    service = new HealthCheckService(tokens, limiter);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should be healthy before the first token is fetched', () => {
    const result = service.performHealthCheck();

    expect(result.status).toBe('healthy');
    expect(result.components.auth).toEqual({ status: 'healthy', details: 'No access token cached yet' });
    expect(result.components.rateLimiter).toEqual({
      status: 'healthy',
      details: '0 callers tracked (10 requests / 1000ms)',
    });
    expect(Number.isNaN(Date.parse(result.timestamp))).toBe(false);
  });

  it('should report when the cached token is valid', () => {
    vi.spyOn(tokens, 'getState').mockReturnValue({
      ...baseState,
      hasAccessToken: true,
      valid: true,
      expiresAt: '2026-01-01T00:29:00.000Z',
    });

    expect(service.performHealthCheck().components.auth).toEqual({
      status: 'healthy',
      details: 'Access token valid until 2026-01-01T00:29:00.000Z',
    });
  });

  it('should report an expired token as healthy', () => {
    vi.spyOn(tokens, 'getState').mockReturnValue({
      ...baseState,
      hasAccessToken: true,
      expiresAt: '2026-01-01T00:29:00.000Z',
    });

    expect(service.performHealthCheck().components.auth.details).toBe(
      'Access token expired, refreshes on next request'
    );
  });

  it('should be unhealthy after the refresh token was rejected', () => {
    vi.spyOn(tokens, 'getState').mockReturnValue({
      ...baseState,
      lastRefreshError: outcome('Unauthorized', 'Invalid or expired CRM refresh token.'),
    });

    const result = service.performHealthCheck();

    expect(result.status).toBe('unhealthy');
    expect(result.components.auth.details).toBe(
      'Last token refresh failed: Invalid or expired CRM refresh token.'
    );
    expect(getHttpStatusCode(result.status)).toBe(503);
  });

  it('should be degraded when the token endpoint was unreachable', () => {
    vi.spyOn(tokens, 'getState').mockReturnValue({
      ...baseState,
      lastRefreshError: outcome('ServiceUnavailable', 'Failed to reach CRM token endpoint.'),
    });

    const result = service.performHealthCheck();

    expect(result.status).toBe('degraded');
    expect(getHttpStatusCode(result.status)).toBe(200);
  });
});

describe('worstOf', () => {
  it('should pick the most severe status', () => {
    expect(worstOf([])).toBe('healthy');
    expect(worstOf(['healthy', 'degraded'])).toBe('degraded');
    expect(worstOf(['degraded', 'unhealthy', 'healthy'])).toBe('unhealthy');
  });
});
