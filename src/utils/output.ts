/**
 * Output Module
 * 指令輸出 - JSON 或表格格式
 */

import Table from 'cli-table3';
import { formatBytes } from '../lib/logger.js';
import type { SerializedStationRow } from '../lib/station-selection.js';
import type { CacheStatus } from '../services/cache.js';

export type OutputFormat = 'json' | 'table';

export function resolveFormat(value: unknown): OutputFormat {
  return value === 'table' ? 'table' : 'json';
}

export function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'UNKNOWN_ERROR';
}

/**
 * 取得錯誤訊息，包含 cause 鏈
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause !== undefined) {
    return `${error.message}：${describeError(error.cause)}`;
  }
  return error.message;
}

/**
 * 輸出錯誤
 */
export function formatError(error: unknown, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify({
      success: false,
      error: {
        code: errorCode(error),
        message: describeError(error),
      },
    });
  }
  return `錯誤：${describeError(error)}`;
}

/**
 * 印出錯誤：JSON 寫到 stdout，文字寫到 stderr
 */
export function printError(error: unknown, format: OutputFormat): void {
  if (format === 'json') {
    console.log(formatError(error, format));
  } else {
    console.error(formatError(error, format));
  }
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '--';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(4);
  }
  return String(value);
}

/**
 * 站點表格
 */
export function formatStationTable(
  stations: readonly Partial<SerializedStationRow>[],
  columns: readonly (keyof SerializedStationRow)[]
): string {
  if (stations.length === 0) {
    return '沒有符合條件的站點';
  }

  const table = new Table({
    head: columns.map(String),
    style: { head: ['cyan'] },
  });

  for (const station of stations) {
    table.push(
      columns.map((column) =>
        column === 'distance' && station.distance !== undefined
          ? `${(station.distance / 1000).toFixed(1)} km`
          : formatCell(station[column])
      )
    );
  }

  return `${table.toString()}\n\n共 ${stations.length} 個站點`;
}

export function formatCacheStatus(status: CacheStatus): string {
  const table = new Table();
  table.push(
    { 目錄: status.cacheDir },
    { 檔案數: String(status.fileCount) },
    { 大小: formatBytes(status.totalSize) }
  );
  return table.toString();
}
