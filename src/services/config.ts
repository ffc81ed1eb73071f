/**
 * Config Service
 * 設定管理服務 - 合併設定檔與環境變數（環境變數優先），啟動時驗證一次
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ConfigKey, GatewayConfig } from '../types/config.js';
import { DEFAULT_API_BASE } from './api.js';
import { DEFAULT_TOKEN_URL } from './auth.js';
import { DEFAULT_RATE_LIMIT } from './rate-limiter.js';
import { DEFAULT_RETRY_CONFIG } from './retry.js';

export const DEFAULT_CONFIG_FILE = 'crm-gateway.config.json';

/** 每個設定鍵對應的環境變數 */
export const ENV_VARS: Record<ConfigKey, string> = {
  clientId: 'CRM_CLIENT_ID',
  clientSecret: 'CRM_CLIENT_SECRET',
  refreshToken: 'CRM_REFRESH_TOKEN',
  apiBaseUrl: 'CRM_API_BASE_URL',
  tokenUrl: 'CRM_TOKEN_URL',
  maxAttempts: 'CRM_MAX_ATTEMPTS',
  backoffBaseMs: 'CRM_BACKOFF_BASE_MS',
  backoffMaxMs: 'CRM_BACKOFF_MAX_MS',
  requestTimeoutMs: 'CRM_REQUEST_TIMEOUT_MS',
  rateLimitMax: 'RATE_LIMIT_MAX',
  rateLimitWindowMs: 'RATE_LIMIT_WINDOW_MS',
  host: 'APP_HOST',
  port: 'APP_PORT',
};

export const CONFIG_KEYS: ConfigKey[] = Object.keys(ENV_VARS).filter(isConfigKey);

const SECRET_KEYS: ReadonlySet<ConfigKey> = new Set<ConfigKey>(['clientSecret', 'refreshToken']);

const GatewayConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  refreshToken: z.string().min(1),
  apiBaseUrl: z.string().url().default(DEFAULT_API_BASE),
  tokenUrl: z.string().url().default(DEFAULT_TOKEN_URL),
  maxAttempts: z.coerce.number().int().min(1).default(DEFAULT_RETRY_CONFIG.maxAttempts),
  backoffBaseMs: z.coerce.number().int().min(0).default(DEFAULT_RETRY_CONFIG.baseDelayMs),
  backoffMaxMs: z.coerce.number().int().min(0).default(DEFAULT_RETRY_CONFIG.maxDelayMs),
  requestTimeoutMs: z.coerce.number().int().positive().default(10000),
  rateLimitMax: z.coerce.number().int().min(1).default(DEFAULT_RATE_LIMIT.limit),
  rateLimitWindowMs: z.coerce.number().int().positive().default(DEFAULT_RATE_LIMIT.windowMs),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(8080),
});

/**
 * 設定缺漏或格式錯誤
 */
export class ConfigError extends Error {
  public readonly code = 'CONFIG_INVALID';
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

type RawConfig = Partial<Record<ConfigKey, unknown>>;

export interface ConfigEntry {
  key: ConfigKey;
  env: string;
  value: string;
}

export class ConfigService {
  private readonly configPath: string | null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly fileConfig: RawConfig;

  /**
   * @param configPath 明確指定的設定檔；未指定時才嘗試工作目錄下的預設檔
   */
  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    if (configPath) {
      this.configPath = path.resolve(configPath);
      if (!fs.existsSync(this.configPath)) {
        throw new ConfigError(`Config file not found: ${this.configPath}`);
      }
    } else {
      const fallback = path.resolve(DEFAULT_CONFIG_FILE);
      this.configPath = fs.existsSync(fallback) ? fallback : null;
    }
    this.fileConfig = this.load();
  }

  /**
   * 載入設定檔
   */
  private load(): RawConfig {
    if (this.configPath === null) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Unable to read config file ${this.configPath}`, [reason]);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`Config file ${this.configPath} must contain a JSON object`);
    }

    const raw: RawConfig = {};
    for (const key of CONFIG_KEYS) {
      if (key in parsed) {
        raw[key] = Reflect.get(parsed, key);
      }
    }
    return raw;
  }

  /**
   * 取得單一原始值（環境變數優先）
   */
  getRaw(key: ConfigKey): unknown {
    const envValue = this.env[ENV_VARS[key]];
    if (envValue !== undefined && envValue.length > 0) {
      return envValue;
    }
    return this.fileConfig[key];
  }

  /**
   * 解析並驗證完整設定
   * @throws ConfigError 列出所有不合法的鍵
   */
  resolve(): GatewayConfig {
    const merged: RawConfig = {};
    for (const key of CONFIG_KEYS) {
      const value = this.getRaw(key);
      if (value !== undefined) {
        merged[key] = value;
      }
    }

    const result = GatewayConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const key = issue.path.join('.');
        const envName = isConfigKey(key) ? ` (${ENV_VARS[key]})` : '';
        return `${key}${envName}: ${issue.message}`;
      });
      throw new ConfigError('Invalid gateway configuration', issues);
    }

    const config: GatewayConfig = result.data;
    return config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * 可安全輸出的設定（秘密欄位遮罩）
   */
  describe(): ConfigEntry[] {
    const config = this.resolve();
    return CONFIG_KEYS.map((key) => {
      const value = String(config[key]);
      return {
        key,
        env: ENV_VARS[key],
        value: SECRET_KEYS.has(key) ? maskSecret(value) : value,
      };
    });
  }
}

function isConfigKey(value: string): value is ConfigKey {
  return Object.prototype.hasOwnProperty.call(ENV_VARS, value);
}

/**
 * 只保留前 4 個字元
 */
export function maskSecret(value: string): string {
  if (value.length <= 4) {
    return '****';
  }
  return `${value.slice(0, 4)}****`;
}
