/**
 * Retry Service
 * 指數退避重試 - 處理下載時的暫時性錯誤
 */

import { FetchError } from 'ofetch';
import { loggers } from '../lib/logger.js';
import { recordRetryAttempt } from '../lib/metrics.js';

export interface RetryConfig {
  /** 最大重試次數 (default: 3) */
  maxRetries: number;
  /** 基本延遲毫秒 (default: 1000) */
  baseDelayMs: number;
  /** 最大延遲毫秒 (default: 10000) */
  maxDelayMs: number;
  /** 用於日誌與指標的操作名稱 */
  operation: string;
  /** 判斷錯誤是否可重試 */
  shouldRetry: (error: unknown) => boolean;
  /** 每次重試前呼叫 */
  onRetry?: (error: unknown, attempt: number) => void;
}

export const DEFAULT_RETRY_CONFIG: Pick<RetryConfig, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
};

/** 可重試的 HTTP 狀態碼 */
export const RETRYABLE_STATUSES = [
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

/**
 * 重試次數用盡
 */
export class RetryError extends Error {
  public readonly code = 'RETRY_EXHAUSTED';
  public readonly attempts: number;

  constructor(message: string, originalError: unknown, attempts: number) {
    super(message, { cause: originalError });
    this.name = 'RetryError';
    this.attempts = attempts;
  }
}

/**
 * 計算含 jitter 的退避延遲
 * @param attempt 第幾次嘗試（從 1 開始）
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>
): number {
  if (config.baseDelayMs === 0) {
    return 0;
  }

  const normalizedAttempt = Math.max(1, attempt);
  const exponentialDelay = config.baseDelayMs * Math.pow(2, normalizedAttempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // jitter 為基本延遲的 0-10%
  const jitter = Math.random() * config.baseDelayMs * 0.1;

  return cappedDelay + jitter;
}

export function isRetryableStatus(
  status: number,
  retryableStatuses: number[] = RETRYABLE_STATUSES
): boolean {
  return retryableStatuses.includes(status);
}

/**
 * 預設判斷：可重試的 HTTP 狀態或網路錯誤
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof FetchError) {
    const status = error.statusCode ?? error.status;
    if (status !== undefined) {
      return isRetryableStatus(status);
    }
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('socket hang up') ||
      message.includes('fetch failed')
    );
  }

  return false;
}

type RetryableFunction<T> = (context: { attempt: number }) => Promise<T>;

/**
 * 執行並在暫時性錯誤時重試
 * @throws RetryError 可重試錯誤在次數用盡後
 */
export async function retry<T>(
  fn: RetryableFunction<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const fullConfig: RetryConfig = {
    ...DEFAULT_RETRY_CONFIG,
    operation: 'default',
    ...config,
    shouldRetry: config.shouldRetry ?? isTransientError,
  };

  const maxAttempts = fullConfig.maxRetries + 1;
  let attempt = 0;

  for (;;) {
    attempt++;

    try {
      return await fn({ attempt });
    } catch (error) {
      const shouldRetry = fullConfig.shouldRetry(error);

      if (!shouldRetry || attempt >= maxAttempts) {
        if (shouldRetry && fullConfig.maxRetries > 0) {
          throw new RetryError(`重試 ${attempt} 次後仍失敗`, error, attempt);
        }
        throw error;
      }

      recordRetryAttempt(fullConfig.operation, attempt);
      loggers.retry.debug('準備重試', {
        operation: fullConfig.operation,
        attempt,
        reason: error instanceof Error ? error.message : String(error),
      });
      fullConfig.onRetry?.(error, attempt);

      await sleep(calculateBackoff(attempt, fullConfig));
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
