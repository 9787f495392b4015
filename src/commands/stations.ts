/**
 * Stations Command
 * 氣象站選取指令
 */

import { Command } from 'commander';
import { getMetricsSnapshot } from '../lib/metrics.js';
import { parseBounds, parseInventory, parseNumber, splitList } from '../lib/query-parser.js';
import { RowTable } from '../lib/table.js';
import {
  StationSelection,
  serializeRow,
  type SerializedStationRow,
} from '../lib/station-selection.js';
import { getConfigService } from '../services/config.js';
import { DEFAULT_RESOURCE_KEY, StationSourceLoader } from '../services/station-source.js';
import { formatStationTable, printError, resolveFormat, type OutputFormat } from '../utils/output.js';
import type { StationQuery } from '../types/station.js';

interface QueryOptions {
  id?: string[];
  wmo?: string[];
  icao?: string[];
  country?: string;
  region?: string;
  bounds?: string;
  lat?: string;
  lon?: string;
  radius?: string;
  inventory?: string[];
  resource: string;
  cache: boolean;
  metrics?: boolean;
}

interface FetchCommandOptions extends QueryOptions {
  limit?: string;
  sample?: boolean;
  columns?: string;
}

const DEFAULT_COLUMNS: readonly (keyof SerializedStationRow)[] = [
  'id',
  'name',
  'country',
  'region',
  'latitude',
  'longitude',
  'elevation',
];

const ALL_COLUMNS: readonly (keyof SerializedStationRow)[] = [
  'id',
  'name',
  'country',
  'region',
  'wmo',
  'icao',
  'latitude',
  'longitude',
  'elevation',
  'timezone',
  'hourlyStart',
  'hourlyEnd',
  'dailyStart',
  'dailyEnd',
  'distance',
];

function isColumn(value: string): value is keyof SerializedStationRow {
  const names: readonly string[] = ALL_COLUMNS;
  return names.includes(value);
}

/**
 * 將 CLI 參數轉為篩選條件
 */
export function buildQuery(options: QueryOptions): StationQuery {
  return {
    uid: splitList(options.id),
    wmo: splitList(options.wmo),
    icao: splitList(options.icao),
    country: options.country,
    region: options.region,
    bounds: options.bounds !== undefined ? parseBounds(options.bounds) : undefined,
    lat: options.lat !== undefined ? parseNumber(options.lat, 'lat') : undefined,
    lon: options.lon !== undefined ? parseNumber(options.lon, 'lon') : undefined,
    radius: options.radius !== undefined ? parseNumber(options.radius, 'radius') : undefined,
    inventory: options.inventory ? parseInventory(options.inventory) : undefined,
  };
}

export function parseColumns(value: string | undefined, hasDistance: boolean): (keyof SerializedStationRow)[] {
  if (value === undefined) {
    return hasDistance ? [...DEFAULT_COLUMNS, 'distance'] : [...DEFAULT_COLUMNS];
  }

  const columns = (splitList([value]) ?? []).filter(isColumn);
  return columns.length > 0 ? columns : [...DEFAULT_COLUMNS];
}

async function loadSelection(options: QueryOptions): Promise<StationSelection> {
  const query = buildQuery(options);
  const config = getConfigService().getSelectionConfig();
  const loader = new StationSourceLoader(config, { skipCache: !options.cache });

  return StationSelection.load(query, { config, loader, resourceKey: options.resource });
}

function withFilterOptions(command: Command): Command {
  return command
    .option('--id <ids...>', '站點 ID（可多個或逗號分隔）')
    .option('--wmo <ids...>', 'WMO 站號')
    .option('--icao <ids...>', 'ICAO 代碼')
    .option('--country <code>', '國碼，例如 DE')
    .option('--region <code>', '行政區代碼')
    .option('--bounds <n,e,s,w>', '地理範圍 north,east,south,west')
    .option('--lat <number>', '查詢點緯度')
    .option('--lon <number>', '查詢點經度')
    .option('--radius <meters>', '搜尋半徑（公尺）')
    .option('--inventory <spec...>', '資料涵蓋條件，例如 hourly 或 daily=2010-01-01:2020-12-31')
    .option('--resource <key>', '站點目錄資源', DEFAULT_RESOURCE_KEY)
    .option('--no-cache', '不使用快取')
    .option('--metrics', '完成後於 stderr 輸出 Prometheus 指標');
}

async function printMetrics(options: QueryOptions): Promise<void> {
  if (options.metrics) {
    process.stderr.write(`${await getMetricsSnapshot()}\n`);
  }
}

function fail(error: unknown, format: OutputFormat): never {
  printError(error, format);
  process.exit(1);
}

export const stationsCommand = new Command('stations').description('氣象站選取');

/**
 * wxs stations query
 */
withFilterOptions(
  stationsCommand
    .command('query')
    .description('依條件選取氣象站')
    .option('-l, --limit <number>', '限制結果數量')
    .option('--sample', '搭配 --limit 隨機抽樣')
    .option('--columns <list>', `輸出欄位（逗號分隔）：${ALL_COLUMNS.join(',')}`)
).action(async (_options: unknown, cmd: Command) => {
  const format = resolveFormat(cmd.optsWithGlobals().format);
  const options = cmd.opts<FetchCommandOptions>();

  try {
    const selection = await loadSelection(options);
    const limit = options.limit !== undefined ? parseNumber(options.limit, 'limit') : undefined;
    const rows = selection.fetch({ limit, sample: options.sample }).map(serializeRow);
    const columns = parseColumns(options.columns, rows.some((row) => row.distance !== undefined));
    const projected = new RowTable(rows).project(columns).rows();

    if (format === 'json') {
      console.log(
        JSON.stringify({ success: true, count: projected.length, stations: projected }, null, 2)
      );
    } else {
      console.log(formatStationTable(projected, columns));
    }

    await printMetrics(options);
  } catch (error) {
    fail(error, format);
  }
});

/**
 * wxs stations count
 */
withFilterOptions(
  stationsCommand.command('count').description('計算符合條件的氣象站數量')
).action(async (_options: unknown, cmd: Command) => {
  const format = resolveFormat(cmd.optsWithGlobals().format);
  const options = cmd.opts<QueryOptions>();

  try {
    const selection = await loadSelection(options);
    const count = selection.count();

    if (format === 'json') {
      console.log(JSON.stringify({ success: true, count }));
    } else {
      console.log(`共 ${count} 個站點`);
    }

    await printMetrics(options);
  } catch (error) {
    fail(error, format);
  }
});
