/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，一行一筆，方便集中式日誌系統解析
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 入站請求識別碼 */
  requestId?: string;
  /** HTTP 方法 */
  method?: string;
  /** 上游路徑或入站路由 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 回應狀態碼 */
  statusCode?: number;
  /** 第幾次嘗試 */
  attempt?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: LOG_LEVEL 或 'info') */
  minLevel?: LogLevel;
  /** 是否輸出到控制台 (default: true) */
  console?: boolean;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info',
      console: config.console !== false,
      formatter: config.formatter ?? ((entry) => JSON.stringify(entry)),
      includeStack: config.includeStack !== false,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    if (!this.config.console) return;

    const formatted = this.config.formatter(entry);
    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context);
  }

  /**
   * 記錄 ERROR 級別日誌，可附帶例外物件
   */
  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry = this.buildEntry('error', message, context);
    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.output(this.buildEntry(level, message, context));
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
    };
    if (context) {
      entry.context = context;
    }
    return entry;
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行並計時非同步操作
   * 成功記 info，失敗記 error 後原樣拋出
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} completed`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        { ...context, duration: Date.now() - startTime }
      );
      throw error;
    }
  }
}

/**
 * 依組件分類的日誌記錄器
 */
export const loggers = {
  api: new StructuredLogger('API'),
  auth: new StructuredLogger('Auth'),
  rateLimit: new StructuredLogger('RateLimit', { minLevel: 'warn' }),
  crm: new StructuredLogger('CRM'),
  server: new StructuredLogger('Server'),
};

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
