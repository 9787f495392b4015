/**
 * Station Source Loader
 * 站點目錄載入 - 下載、解壓、驗證並快取站點目錄，轉為資料表
 */

import { gunzipSync } from 'node:zlib';
import { ofetch } from 'ofetch';
import { SourceUnavailableError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { recordSourceLoad } from '../lib/metrics.js';
import { RowTable } from '../lib/table.js';
import type { StationTable } from '../lib/station-filters.js';
import type { StationTableLoader } from '../lib/station-selection.js';
import { CacheService, keySegments } from './cache.js';
import { getConfigService } from './config.js';
import { retry } from './retry.js';
import type { SelectionConfig } from '../types/config.js';
import { RESOLUTIONS, type RawStation, type StationRecord, type StationRow } from '../types/station.js';

export const DEFAULT_RESOURCE_KEY = 'stations/lite.json.gz';

export interface SourceLoaderOptions {
  /** 自訂快取（預設使用 config.cacheDir） */
  cache?: CacheService;
  /** 略過快取讀取，一律重新下載 */
  skipCache?: boolean;
}

type LoadOrigin = 'cache' | 'network';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function optionalNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function parseNames(value: unknown): Record<string, string> {
  const names: Record<string, string> = {};
  if (typeof value === 'string') {
    names.en = value;
  } else if (isRecord(value)) {
    for (const [lang, name] of Object.entries(value)) {
      if (typeof name === 'string') names[lang] = name;
    }
  }
  return names;
}

/**
 * 驗證單筆原始資料，結構不符時回傳 null
 */
export function parseRawStation(value: unknown): RawStation | null {
  if (!isRecord(value) || typeof value.id !== 'string' || value.id.length === 0) {
    return null;
  }

  const location = isRecord(value.location) ? value.location : {};
  const latitude = optionalNumber(location.latitude);
  const longitude = optionalNumber(location.longitude);
  if (latitude === null || longitude === null) {
    return null;
  }

  const identifiers = isRecord(value.identifiers) ? value.identifiers : {};
  const inventorySource = isRecord(value.inventory) ? value.inventory : {};
  const inventory: RawStation['inventory'] = {};
  for (const resolution of RESOLUTIONS) {
    const window = inventorySource[resolution];
    if (isRecord(window)) {
      inventory[resolution] = {
        start: optionalString(window.start),
        end: optionalString(window.end),
      };
    }
  }

  return {
    id: value.id,
    name: parseNames(value.name),
    country: optionalString(value.country) ?? '',
    region: optionalString(value.region),
    identifiers: {
      national: optionalString(identifiers.national),
      wmo: optionalString(identifiers.wmo),
      icao: optionalString(identifiers.icao),
    },
    location: {
      latitude,
      longitude,
      elevation: optionalNumber(location.elevation),
    },
    timezone: optionalString(value.timezone),
    inventory,
  };
}

/**
 * 驗證站點目錄，略過結構不符的資料
 * @throws Error 內容不是陣列
 */
export function parseStationDirectory(data: unknown): RawStation[] {
  if (!Array.isArray(data)) {
    throw new Error('站點目錄格式錯誤：應為陣列');
  }

  const stations: RawStation[] = [];
  let skipped = 0;
  for (const item of data) {
    const station = parseRawStation(item);
    if (station) {
      stations.push(station);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    loggers.source.warn('略過格式不符的站點資料', { skipped });
  }
  return stations;
}

/**
 * 解析 YYYY-MM-DD（UTC）
 */
export function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(/^\d{4}-\d{2}-\d{2}$/.test(value) ? `${value}T00:00:00Z` : value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function toStationRecord(raw: RawStation): StationRecord {
  return {
    id: raw.id,
    name: raw.name.en ?? Object.values(raw.name)[0] ?? raw.id,
    country: raw.country,
    region: raw.region ?? '',
    wmo: raw.identifiers.wmo ?? null,
    icao: raw.identifiers.icao ?? null,
    latitude: raw.location.latitude,
    longitude: raw.location.longitude,
    elevation: raw.location.elevation,
    timezone: raw.timezone ?? 'UTC',
    hourlyStart: parseDate(raw.inventory.hourly?.start),
    hourlyEnd: parseDate(raw.inventory.hourly?.end),
    dailyStart: parseDate(raw.inventory.daily?.start),
    dailyEnd: parseDate(raw.inventory.daily?.end),
  };
}

/**
 * 轉為資料表；重複的 id 只保留第一筆
 */
export function buildStationTable(stations: readonly RawStation[]): StationTable {
  const seen = new Set<string>();
  const records: StationRecord[] = [];

  for (const raw of stations) {
    if (seen.has(raw.id)) {
      loggers.source.warn('站點 ID 重複，已略過', { id: raw.id });
      continue;
    }
    seen.add(raw.id);
    records.push(toStationRecord(raw));
  }

  return new RowTable<StationRow>(records);
}

export class StationSourceLoader implements StationTableLoader {
  private config: SelectionConfig;
  private cache: CacheService;
  private skipCache: boolean;

  constructor(
    config: SelectionConfig = getConfigService().getSelectionConfig(),
    options: SourceLoaderOptions = {}
  ) {
    this.config = config;
    this.cache = options.cache ?? new CacheService(config.cacheDir);
    this.skipCache = options.skipCache ?? false;
  }

  /**
   * 載入站點目錄並轉為資料表
   * @throws SourceUnavailableError 下載、解壓或解析失敗
   */
  async loadStationTable(resourceKey: string = DEFAULT_RESOURCE_KEY): Promise<StationTable> {
    const [stations] = await this.loadResources([resourceKey]);
    const table = buildStationTable(stations);

    // 順便清除同目錄下超過 max-age 的檔案
    const segments = keySegments(resourceKey);
    const prefix = segments.length > 1 ? segments[0] : undefined;
    this.cache.prune(this.config.maxAgeSeconds * 1000, prefix);

    return table;
  }

  /**
   * 載入多個資源，同時下載數不超過 maxThreads
   */
  async loadResources(resourceKeys: readonly string[]): Promise<RawStation[][]> {
    const results: RawStation[][] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < resourceKeys.length) {
        const index = next++;
        results[index] = await this.loadResource(resourceKeys[index]);
      }
    };

    const workers = Math.max(1, Math.min(this.config.maxThreads, resourceKeys.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    return results;
  }

  private async loadResource(resourceKey: string): Promise<RawStation[]> {
    const startTime = Date.now();

    try {
      const { stations, origin } = await loggers.source.trackAsync(
        '載入站點目錄',
        () => this.readThrough(resourceKey),
        { resource: resourceKey }
      );
      recordSourceLoad(resourceKey, origin, Date.now() - startTime);
      return stations;
    } catch (error) {
      recordSourceLoad(resourceKey, 'failed', Date.now() - startTime);
      throw new SourceUnavailableError('無法讀取氣象站目錄', resourceKey, error);
    }
  }

  private async readThrough(
    resourceKey: string
  ): Promise<{ stations: RawStation[]; origin: LoadOrigin }> {
    if (!this.skipCache) {
      const cached = this.cache.get(resourceKey, parseStationDirectory);
      if (cached) {
        return { stations: cached, origin: 'cache' };
      }
    }

    const stations = await this.download(resourceKey);
    this.cache.set(resourceKey, stations, this.config.maxAgeSeconds * 1000);
    return { stations, origin: 'network' };
  }

  private async download(resourceKey: string): Promise<RawStation[]> {
    const url = new URL(resourceKey, this.config.endpoint).toString();

    const body = await retry(() => ofetch(url, { responseType: 'arrayBuffer' }), {
      operation: 'download',
    });

    const buffer = Buffer.from(body);
    const text = resourceKey.endsWith('.gz')
      ? gunzipSync(buffer).toString('utf-8')
      : buffer.toString('utf-8');

    return parseStationDirectory(JSON.parse(text));
  }
}
