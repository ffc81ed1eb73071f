/**
 * HTTP Server
 * express 應用程式組裝：入站限流 → JSON 解析 → 路由 → 錯誤處理
 * 所有依賴都由呼叫端注入，測試可替換為假實作
 */

import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { loggers } from '../lib/logger.js';
import { inboundRateLimitedTotal, metricsContentType, renderMetrics } from '../lib/metrics.js';
import { sendError, sendSuccess } from '../lib/responses.js';
import type { CrmService } from '../services/crm.js';
import { HealthCheckService, getHttpStatusCode } from '../services/health.js';
import type { InboundRateLimiter } from '../services/rate-limiter.js';
import type { TokenManager } from '../services/auth.js';
import { asyncHandler, createCrmRouter } from './routes.js';

export const API_PREFIX = '/api/v1';

export interface AppDependencies {
  crm: CrmService;
  tokens: TokenManager;
  rateLimiter: InboundRateLimiter;
}

/**
 * 取得呼叫端識別（來源位址）
 */
export function callerKey(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const requestId = randomUUID();
    const startTime = Date.now();
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      loggers.server.info('Request handled', {
        requestId,
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      });
    });
    next();
  };
}

export function rateLimitMiddleware(rateLimiter: InboundRateLimiter): RequestHandler {
  return (req, res, next) => {
    const key = callerKey(req);
    if (rateLimiter.isRateLimited(key)) {
      inboundRateLimitedTotal.inc();
      res.setHeader('Retry-After', String(Math.ceil(rateLimiter.getRetryAfterMs(key) / 1000)));
      sendError(res, 'Too many requests', 429);
      return;
    }
    next();
  };
}

function isBodyParserError(error: unknown): error is Error & { type: string } {
  return error instanceof Error && 'type' in error && typeof error.type === 'string';
}

/**
 * 未分類的例外一律視為內部錯誤
 */
function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isBodyParserError(error) && error.type === 'entity.parse.failed') {
    sendError(res, 'Malformed JSON payload', 400, error.message);
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  loggers.server.error('Unhandled exception', error instanceof Error ? error : new Error(message), {
    method: req.method,
    url: req.originalUrl,
  });
  sendError(res, 'Internal Server Error', 500, message);
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const health = new HealthCheckService(deps.tokens, deps.rateLimiter);

  app.disable('x-powered-by');
  app.use(requestLogger());
  app.use(cors());
  app.use(rateLimitMiddleware(deps.rateLimiter));
  app.use(express.json());

  app.get('/favicon.ico', (_req, res) => {
    res.status(204).end();
  });

  app.get('/health', (_req, res) => {
    const result = health.performHealthCheck();
    res.status(getHttpStatusCode(result.status)).json(result);
  });

  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      res.setHeader('Content-Type', metricsContentType());
      res.send(await renderMetrics());
    })
  );

  app.get(API_PREFIX, (_req, res) => {
    sendSuccess(res, 'Welcome to crm-gateway');
  });

  app.use(`${API_PREFIX}/hubspot`, createCrmRouter(deps.crm));

  app.use((_req, res) => {
    sendError(res, 'Route not found', 404);
  });

  app.use(errorHandler);

  return app;
}

/**
 * 啟動 HTTP 伺服器，listen 完成後才 resolve
 */
export function startServer(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}
