/**
 * Query Parser Module
 * 將 CLI 參數字串轉為篩選條件
 */

import { InvalidFilterInputError } from './errors.js';
import { parseDate } from '../services/station-source.js';
import {
  RESOLUTIONS,
  type Bounds,
  type InventoryFilter,
  type InventoryRequirement,
  type Resolution,
} from '../types/station.js';

/**
 * 解析數字參數
 */
export function parseNumber(value: string, field: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidFilterInputError(`${field} 必須是數字，收到「${value}」`, field);
  }
  return parsed;
}

/**
 * 解析 "north,east,south,west"
 */
export function parseBounds(value: string): Bounds {
  const parts = value.split(',');
  if (parts.length !== 4) {
    throw new InvalidFilterInputError(
      `bounds 格式為 north,east,south,west，收到 ${parts.length} 個值`,
      'bounds'
    );
  }

  const [north, east, south, west] = parts.map((part) => parseNumber(part, 'bounds'));
  return [north, east, south, west];
}

function parseDateArg(value: string, resolution: Resolution): Date {
  const date = /^\d{4}-\d{2}-\d{2}$/.test(value) ? parseDate(value) : null;
  if (!date) {
    throw new InvalidFilterInputError(
      `${resolution} 的日期格式應為 YYYY-MM-DD，收到「${value}」`,
      'inventory'
    );
  }
  return date;
}

function isResolution(value: string): value is Resolution {
  const names: readonly string[] = RESOLUTIONS;
  return names.includes(value);
}

/**
 * 解析涵蓋條件
 * - "hourly"                          → { hourly: true }
 * - "daily=2020-06-01"                → { daily: Date }
 * - "hourly=2010-01-01:2020-12-31"    → { hourly: [from, to] }
 */
export function parseInventory(specs: readonly string[]): InventoryFilter {
  const filter: InventoryFilter = {};

  for (const spec of specs) {
    const [name, range] = spec.split('=', 2);
    const resolution = name.trim();
    if (!isResolution(resolution)) {
      throw new InvalidFilterInputError(
        `未知的資料解析度「${resolution}」，可用：${RESOLUTIONS.join(', ')}`,
        'inventory'
      );
    }

    let requirement: InventoryRequirement = true;
    if (range !== undefined && range.trim() !== '') {
      const [from, to] = range.split(':', 2);
      requirement =
        to === undefined
          ? parseDateArg(from, resolution)
          : [parseDateArg(from, resolution), parseDateArg(to, resolution)];
    }

    filter[resolution] = requirement;
  }

  return filter;
}

/**
 * 將逗號分隔或多次指定的值展開為清單
 */
export function splitList(values: readonly string[] | undefined): string[] | undefined {
  if (!values) return undefined;
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}
