/**
 * Prometheus 指標收集
 * 追蹤站點目錄載入、快取、篩選與重試
 */

import { register, Counter, Histogram } from 'prom-client';

/**
 * 站點目錄載入指標
 */
export const sourceLoadsTotal = new Counter({
  name: 'station_source_loads_total',
  help: '站點目錄載入次數',
  labelNames: ['origin'], // 'cache' | 'network' | 'failed'
});

export const sourceLoadDurationSeconds = new Histogram({
  name: 'station_source_load_duration_seconds',
  help: '站點目錄載入時間（秒）',
  labelNames: ['resource'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1.0, 5.0, 30.0],
});

/**
 * 快取指標
 */
export const cacheHitsTotal = new Counter({
  name: 'cache_hits_total',
  help: '快取命中次數',
  labelNames: ['cache_key_pattern'],
});

export const cacheMissesTotal = new Counter({
  name: 'cache_misses_total',
  help: '快取未命中次數',
  labelNames: ['cache_key_pattern'],
});

/**
 * 篩選指標
 */
export const filterApplicationsTotal = new Counter({
  name: 'station_filter_applications_total',
  help: '篩選套用次數',
  labelNames: ['filter'],
});

export const filterRemainingRows = new Histogram({
  name: 'station_filter_remaining_rows',
  help: '篩選後剩餘站點數',
  labelNames: ['filter'],
  buckets: [0, 1, 10, 100, 1000, 10000, 50000],
});

/**
 * 重試指標
 */
export const retryAttemptsTotal = new Counter({
  name: 'retry_attempts_total',
  help: '重試嘗試次數',
  labelNames: ['operation', 'attempt_number'],
});

/**
 * 收集所有指標的 Prometheus 格式
 */
export async function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

export function recordSourceLoad(
  resource: string,
  origin: 'cache' | 'network' | 'failed',
  durationMs: number
): void {
  sourceLoadsTotal.inc({ origin });
  sourceLoadDurationSeconds.observe({ resource }, durationMs / 1000);
}

/**
 * 以 key 的第一段作為 pattern，避免標籤數量爆增
 */
function keyPattern(key: string): string {
  return key.split('/')[0] || 'default';
}

export function recordCacheHit(key: string): void {
  cacheHitsTotal.inc({ cache_key_pattern: keyPattern(key) });
}

export function recordCacheMiss(key: string): void {
  cacheMissesTotal.inc({ cache_key_pattern: keyPattern(key) });
}

export function recordFilter(filter: string, remainingRows: number): void {
  filterApplicationsTotal.inc({ filter });
  filterRemainingRows.observe({ filter }, remainingRows);
}

export function recordRetryAttempt(operation: string, attemptNumber: number): void {
  retryAttemptsTotal.inc({
    operation,
    attempt_number: String(attemptNumber),
  });
}
