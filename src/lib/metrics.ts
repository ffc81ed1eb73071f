/**
 * Prometheus 指標收集
 * 追蹤上游請求、重試、Token 更新與入站限流
 */

import { register, Counter, Histogram } from 'prom-client';

/**
 * 上游 CRM API 指標
 */
export const upstreamRequestsTotal = new Counter({
  name: 'crm_upstream_requests_total',
  help: '上游 CRM API 請求總數（每次嘗試計一次）',
  labelNames: ['method', 'status_class'],
});

export const upstreamRequestDurationSeconds = new Histogram({
  name: 'crm_upstream_request_duration_seconds',
  help: '單一邏輯請求（含重試）延遲（秒）',
  labelNames: ['method', 'outcome'],
  buckets: [0.05, 0.1, 0.5, 1.0, 2.0, 5.0, 15.0, 60.0],
});

export const upstreamRetriesTotal = new Counter({
  name: 'crm_upstream_retries_total',
  help: '上游重試次數',
  labelNames: ['reason'], // 'unauthorized' | 'rate_limited' | 'server_error'
});

/**
 * 認證指標
 */
export const tokenRefreshesTotal = new Counter({
  name: 'crm_token_refreshes_total',
  help: 'Token 更新次數',
  labelNames: ['result'], // 'success' | 'rejected' | 'unreachable'
});

/**
 * 入站限流指標
 */
export const inboundRateLimitedTotal = new Counter({
  name: 'inbound_rate_limited_total',
  help: '被入站限流拒絕的請求數',
});

/**
 * 將狀態碼歸類為 2xx / 4xx / 5xx / transport
 */
export function statusClass(status: number | undefined): string {
  if (status === undefined) return 'transport';
  return `${Math.floor(status / 100)}xx`;
}

export function metricsContentType(): string {
  return register.contentType;
}

export async function renderMetrics(): Promise<string> {
  return register.metrics();
}
