/**
 * Structured Logger - 結構化日誌系統
 * 每筆日誌輸出一行 JSON 到 stderr，stdout 保留給指令輸出
 * 特性：
 *   - 日誌級別控制（WXS_LOG_LEVEL）
 *   - requestId 追蹤
 *   - 執行時間 (duration)
 *   - 錯誤堆棧記錄
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼，用於串起一次查詢的所有日誌 */
  requestId?: string;
  /** 資源路徑，例如 stations/lite.json.gz */
  resource?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 資料列數 */
  rows?: number;
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
    code?: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogSink {
  write(line: string): unknown;
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: WXS_LOG_LEVEL 或 'warn') */
  minLevel?: LogLevel;
  /** 輸出目的地 (default: process.stderr) */
  sink?: LogSink;
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

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * 從環境變數取得預設級別
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env.WXS_LOG_LEVEL?.toLowerCase();
  return isLogLevel(value) ? value : 'warn';
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 所有記錄器共用的 requestId 堆疊，一次查詢內各組件的日誌帶相同 requestId
 */
const requestIdStack: string[] = [];

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || resolveLogLevel(),
      sink: config.sink || process.stderr,
      formatter: config.formatter || ((entry) => JSON.stringify(entry)),
      includeStack: config.includeStack !== false,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    this.config.sink.write(`${this.config.formatter(entry)}\n`);
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context, metadata);
  }

  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry = this.createEntry('error', message, context, metadata);

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.output(this.createEntry(level, message, context, metadata));
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    };
  }

  /**
   * 自動補上目前的 requestId
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const requestId = this.getCurrentRequestId();

    if (!context) {
      return requestId ? { requestId } : undefined;
    }
    if (!context.requestId && requestId) {
      return { ...context, requestId };
    }
    return context;
  }

  /**
   * 推入新的 requestId（支持巢狀）
   */
  pushRequestId(requestId?: string): string {
    const id = requestId || randomUUID();
    requestIdStack.push(id);
    return id;
  }

  popRequestId(): string | undefined {
    return requestIdStack.pop();
  }

  getCurrentRequestId(): string | undefined {
    return requestIdStack[requestIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} 完成`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.error(
        `${operation} 失敗`,
        error instanceof Error ? error : new Error(String(error)),
        { ...context, duration: Date.now() - startTime }
      );
      throw error;
    }
  }

  /**
   * 執行帶日誌的同步操作
   */
  trackSync<T>(operation: string, fn: () => T, context?: Omit<LogContext, 'duration'>): T {
    const startTime = Date.now();

    try {
      const result = fn();
      this.debug(`${operation} 完成`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.warn(`${operation} 失敗`, {
        ...context,
        duration: Date.now() - startTime,
        reason: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例，按組件分類
 */
export const loggers = {
  source: new StructuredLogger('Source'),
  cache: new StructuredLogger('Cache'),
  selection: new StructuredLogger('Selection'),
  retry: new StructuredLogger('Retry'),
  config: new StructuredLogger('Config'),
};

/**
 * 套用相同級別到所有預設記錄器（CLI --verbose 使用）
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + sizes[i];
}
