/**
 * Station Filters Module
 * 站點篩選 - 每個篩選都接收資料表並回傳新的資料表，不修改輸入
 */

import { distance } from './distance.js';
import { InvalidFilterInputError } from './errors.js';
import type { Table } from './table.js';
import {
  INVENTORY_COLUMNS,
  RESOLUTIONS,
  type Bounds,
  type IdentifierFilter,
  type InventoryFilter,
  type InventoryRequirement,
  type OneOrMany,
  type Period,
  type ProximityFilter,
  type RegionFilter,
  type Resolution,
  type StationRow,
} from '../types/station.js';

export type StationTable = Table<StationRow>;

/**
 * 正規化識別碼輸入為集合，空值回傳 null
 */
function toIdSet(value: OneOrMany<string> | undefined): Set<string> | null {
  if (value === undefined) return null;

  const list = typeof value === 'string' ? [value] : [...value];
  const ids = list.map((id) => id.trim()).filter((id) => id.length > 0);

  return ids.length > 0 ? new Set(ids) : null;
}

/**
 * 依識別碼篩選
 * 優先順序 uid → wmo → icao，只套用第一個非空的條件
 */
export function byIdentifier(table: StationTable, filter: IdentifierFilter): StationTable {
  const uids = toIdSet(filter.uid);
  if (uids) {
    return table.filterRows((row) => uids.has(row.id));
  }

  const wmoIds = toIdSet(filter.wmo);
  if (wmoIds) {
    return table.filterRows((row) => row.wmo !== null && wmoIds.has(row.wmo));
  }

  const icaoIds = toIdSet(filter.icao);
  if (icaoIds) {
    return table.filterRows((row) => row.icao !== null && icaoIds.has(row.icao));
  }

  if (filter.uid !== undefined || filter.wmo !== undefined || filter.icao !== undefined) {
    throw new InvalidFilterInputError('識別碼篩選至少需要一個非空的值', 'uid');
  }

  return table;
}

/**
 * 依國家及行政區篩選（兩者皆有時為 AND）
 */
export function byRegion(table: StationTable, filter: RegionFilter): StationTable {
  let result = table;

  if (filter.country !== undefined) {
    const country = filter.country;
    result = result.filterRows((row) => row.country === country);
  }

  if (filter.region !== undefined) {
    const region = filter.region;
    result = result.filterRows((row) => row.region === region);
  }

  return result;
}

/**
 * 依地理範圍篩選
 * @param bounds [north, east, south, west]
 */
export function byBounds(table: StationTable, bounds: Bounds): StationTable {
  const values: readonly unknown[] = bounds;
  if (!Array.isArray(values) || values.length !== 4) {
    throw new InvalidFilterInputError(
      `範圍必須是 [north, east, south, west] 四個數值，收到 ${values.length} 個`,
      'bounds'
    );
  }

  const [north, east, south, west] = bounds;
  if (![north, east, south, west].every((value) => Number.isFinite(value))) {
    throw new InvalidFilterInputError('範圍數值必須是有限數字', 'bounds');
  }
  if (north < south) {
    throw new InvalidFilterInputError(
      `北界 (${north}) 小於南界 (${south})，請確認順序為 [north, east, south, west]`,
      'bounds'
    );
  }

  return table.filterRows(
    (row) =>
      row.latitude <= north &&
      row.latitude >= south &&
      row.longitude <= east &&
      row.longitude >= west
  );
}

/**
 * 依距離篩選並排序
 * 會新增 distance 欄位，結果一定依距離遞增排列
 */
export function byProximity(table: StationTable, filter: ProximityFilter): StationTable {
  const { lat, lon, radius } = filter;

  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    throw new InvalidFilterInputError('緯度與經度必須是有限數字', 'lat');
  }
  if (radius !== undefined && (!Number.isFinite(radius) || radius < 0)) {
    throw new InvalidFilterInputError(`半徑必須是非負數，收到 ${radius}`, 'radius');
  }

  const measured = table.map(
    (row): StationRow => ({
      ...row,
      distance: distance(row.latitude, row.longitude, lat, lon),
    })
  );

  const nearby =
    radius === undefined
      ? measured
      : measured.filterRows((row) => row.distance !== undefined && row.distance <= radius);

  return nearby.sortBy('distance');
}

function isResolution(key: string): key is Resolution {
  const names: readonly string[] = RESOLUTIONS;
  return names.includes(key);
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * 將涵蓋條件轉為期間；true 回傳 null（只要求有資料）
 * 單一日期視為 [d, d]
 */
function toPeriod(resolution: Resolution, requirement: InventoryRequirement): Period | null {
  if (requirement === true) return null;

  if (requirement instanceof Date) {
    if (!isValidDate(requirement)) {
      throw new InvalidFilterInputError(`${resolution} 的日期無效`, 'inventory');
    }
    return [requirement, requirement];
  }

  const parts: readonly unknown[] = requirement;
  if (!Array.isArray(parts) || parts.length !== 2) {
    throw new InvalidFilterInputError(
      `${resolution} 的條件必須是 true、日期或 [from, to] 期間`,
      'inventory'
    );
  }

  const [from, to] = requirement;
  if (!isValidDate(from) || !isValidDate(to)) {
    throw new InvalidFilterInputError(`${resolution} 的期間包含無效日期`, 'inventory');
  }
  if (from.getTime() > to.getTime()) {
    throw new InvalidFilterInputError(`${resolution} 的期間起日晚於迄日`, 'inventory');
  }

  return [from, to];
}

/**
 * 依資料涵蓋範圍篩選
 * 多個解析度為 AND；maxAgeSeconds 加在資料迄日上作為容許時間
 */
export function byInventory(
  table: StationTable,
  filter: InventoryFilter,
  maxAgeSeconds: number
): StationTable {
  const maxAgeMs = maxAgeSeconds * 1000;
  let result = table;

  for (const [key, requirement] of Object.entries(filter)) {
    if (!isResolution(key)) {
      throw new InvalidFilterInputError(
        `未知的資料解析度「${key}」，可用：${RESOLUTIONS.join(', ')}`,
        'inventory'
      );
    }
    if (requirement === undefined) continue;

    const { start, end } = INVENTORY_COLUMNS[key];
    const period = toPeriod(key, requirement);

    if (!period) {
      result = result.filterRows((row) => row[start] !== null);
      continue;
    }

    const from = period[0].getTime();
    const to = period[1].getTime();

    result = result.filterRows((row) => {
      const startDate = row[start];
      const endDate = row[end];
      if (!startDate || !endDate) return false;
      return startDate.getTime() <= from && endDate.getTime() + maxAgeMs >= to;
    });
  }

  return result;
}
