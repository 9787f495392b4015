/**
 * Station Selection Module
 * 站點選取 - 不可變的選取結果，每次篩選或轉換都回傳新的實例
 */

import { InvalidFilterInputError, SourceUnavailableError } from './errors.js';
import { loggers } from './logger.js';
import { recordFilter } from './metrics.js';
import {
  byBounds,
  byIdentifier,
  byInventory,
  byProximity,
  byRegion,
  type StationTable,
} from './station-filters.js';
import { createSelectionConfig, getConfigService } from '../services/config.js';
import { DEFAULT_RESOURCE_KEY, StationSourceLoader } from '../services/station-source.js';
import type { SelectionConfig } from '../types/config.js';
import {
  STATION_COLUMNS,
  type Bounds,
  type IdentifierFilter,
  type InventoryFilter,
  type ProximityFilter,
  type RegionFilter,
  type StationColumn,
  type StationQuery,
  type StationRow,
  type UnitMap,
} from '../types/station.js';

/**
 * 站點資料表來源
 */
export interface StationTableLoader {
  loadStationTable(resourceKey?: string): Promise<StationTable>;
}

export interface LoadOptions {
  config?: SelectionConfig;
  loader?: StationTableLoader;
  resourceKey?: string;
}

export interface FetchOptions {
  /** 回傳列數上限 */
  limit?: number;
  /** 搭配 limit 時改為隨機抽樣 */
  sample?: boolean;
  /** 抽樣用的亂數來源 (default: Math.random) */
  random?: () => number;
}

/**
 * 日期欄位以 YYYY-MM-DD 輸出的資料列
 */
export interface SerializedStationRow
  extends Omit<StationRow, 'hourlyStart' | 'hourlyEnd' | 'dailyStart' | 'dailyEnd'> {
  hourlyStart: string | null;
  hourlyEnd: string | null;
  dailyStart: string | null;
  dailyEnd: string | null;
}

function formatDate(date: Date | null): string | null {
  return date ? date.toISOString().slice(0, 10) : null;
}

export function serializeRow(row: StationRow): SerializedStationRow {
  return {
    ...row,
    hourlyStart: formatDate(row.hourlyStart),
    hourlyEnd: formatDate(row.hourlyEnd),
    dailyStart: formatDate(row.dailyStart),
    dailyEnd: formatDate(row.dailyEnd),
  };
}

function convertColumn<K extends StationColumn>(row: StationRow, column: K, units: UnitMap): void {
  const transform: ((value: StationRow[K]) => StationRow[K]) | undefined = units[column];
  if (transform) {
    row[column] = transform(row[column]);
  }
}

export class StationSelection {
  private readonly table: StationTable;
  readonly config: SelectionConfig;

  private constructor(table: StationTable, config: SelectionConfig) {
    this.table = table;
    this.config = config;
  }

  /**
   * 從完整資料表建立選取
   * 篩選順序固定：識別碼 → 國家/行政區 → 範圍 → 距離 → 資料涵蓋
   */
  static fromTable(
    table: StationTable,
    query: StationQuery = {},
    config: SelectionConfig = createSelectionConfig()
  ): StationSelection {
    const hasLat = query.lat !== undefined;
    const hasLon = query.lon !== undefined;
    if (hasLat !== hasLon) {
      throw new InvalidFilterInputError('距離篩選需要同時提供 lat 與 lon', hasLat ? 'lon' : 'lat');
    }
    if (query.radius !== undefined && !hasLat) {
      throw new InvalidFilterInputError('指定 radius 時需要提供 lat 與 lon', 'radius');
    }

    let selection = new StationSelection(table, config);

    if (query.uid !== undefined || query.wmo !== undefined || query.icao !== undefined) {
      selection = selection.byIdentifier({ uid: query.uid, wmo: query.wmo, icao: query.icao });
    }

    if (query.country !== undefined || query.region !== undefined) {
      selection = selection.byRegion({ country: query.country, region: query.region });
    }

    if (query.bounds !== undefined) {
      selection = selection.byBounds(query.bounds);
    }

    if (query.lat !== undefined && query.lon !== undefined) {
      selection = selection.byProximity({ lat: query.lat, lon: query.lon, radius: query.radius });
    }

    if (query.inventory !== undefined) {
      selection = selection.byInventory(query.inventory);
    }

    return selection;
  }

  /**
   * 載入站點目錄後建立選取
   * @throws SourceUnavailableError 站點目錄無法載入
   */
  static async load(query: StationQuery = {}, options: LoadOptions = {}): Promise<StationSelection> {
    const config = options.config ?? getConfigService().getSelectionConfig();
    const loader = options.loader ?? new StationSourceLoader(config);
    const resourceKey = options.resourceKey ?? DEFAULT_RESOURCE_KEY;

    loggers.selection.pushRequestId();
    try {
      let table: StationTable;
      try {
        table = await loader.loadStationTable(resourceKey);
      } catch (error) {
        if (error instanceof SourceUnavailableError) {
          throw error;
        }
        throw new SourceUnavailableError('無法讀取氣象站目錄', resourceKey, error);
      }

      return StationSelection.fromTable(table, query, config);
    } finally {
      loggers.selection.popRequestId();
    }
  }

  private apply(filter: string, fn: (table: StationTable) => StationTable): StationSelection {
    const next = loggers.selection.trackSync(`篩選 ${filter}`, () => fn(this.table), {
      filter,
      rows: this.table.size,
    });
    recordFilter(filter, next.size);
    return new StationSelection(next, this.config);
  }

  byIdentifier(filter: IdentifierFilter): StationSelection {
    return this.apply('identifier', (table) => byIdentifier(table, filter));
  }

  byRegion(filter: RegionFilter): StationSelection {
    return this.apply('region', (table) => byRegion(table, filter));
  }

  /**
   * @param bounds [north, east, south, west]
   */
  byBounds(bounds: Bounds): StationSelection {
    return this.apply('bounds', (table) => byBounds(table, bounds));
  }

  byProximity(filter: ProximityFilter): StationSelection {
    return this.apply('proximity', (table) => byProximity(table, filter));
  }

  byInventory(filter: InventoryFilter): StationSelection {
    return this.apply('inventory', (table) =>
      byInventory(table, filter, this.config.maxAgeSeconds)
    );
  }

  /**
   * 目前選取的站點數
   */
  count(): number {
    return this.table.size;
  }

  /**
   * 取得選取的站點（回傳副本）
   */
  fetch(options: FetchOptions = {}): StationRow[] {
    const { limit, sample = false, random } = options;

    if (limit === undefined) {
      return this.table.rows();
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidFilterInputError(`limit 必須是正整數，收到 ${limit}`, 'limit');
    }

    const subset = sample ? this.table.sample(limit, random) : this.table.head(limit);
    return subset.rows();
  }

  /**
   * 轉換欄位值（例如海拔單位），回傳新的選取
   * 只處理站點欄位，其他 key 忽略
   */
  convert(units: UnitMap): StationSelection {
    const converted = this.table.map((row) => {
      const next = structuredClone(row);
      for (const column of STATION_COLUMNS) {
        convertColumn(next, column, units);
      }
      return next;
    });

    return new StationSelection(converted, this.config);
  }

  /**
   * 目前的資料表（不可變）
   */
  toJSON(): SerializedStationRow[] {
    return this.fetch().map(serializeRow);
  }
}
