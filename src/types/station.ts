/**
 * 氣象站資料結構
 */
export interface StationRecord {
  /** 站點 ID，例如 "10637" */
  id: string;
  /** 站名，例如 "Frankfurt Airport" */
  name: string;
  /** ISO 3166-1 國碼 */
  country: string;
  /** 行政區代碼 */
  region: string;
  /** WMO 站號 */
  wmo: string | null;
  /** ICAO 機場代碼 */
  icao: string | null;
  latitude: number;
  longitude: number;
  /** 海拔（公尺） */
  elevation: number | null;
  timezone: string;
  /** 逐時資料起訖日（null 表示無此解析度資料） */
  hourlyStart: Date | null;
  hourlyEnd: Date | null;
  /** 逐日資料起訖日 */
  dailyStart: Date | null;
  dailyEnd: Date | null;
}

/**
 * 選取結果的資料列
 * distance 只在距離篩選後存在
 */
export interface StationRow extends StationRecord {
  /** 與查詢點距離（公尺） */
  distance?: number;
}

export type StationColumn = keyof StationRecord;

/**
 * 站點紀錄的欄位清單（不含暫時欄位 distance）
 */
export const STATION_COLUMNS: readonly StationColumn[] = [
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
];

/**
 * 資料解析度
 */
export type Resolution = 'hourly' | 'daily';

export const RESOLUTIONS: readonly Resolution[] = ['hourly', 'daily'];

/**
 * 各解析度對應的起訖欄位
 */
export const INVENTORY_COLUMNS: Record<
  Resolution,
  { start: 'hourlyStart' | 'dailyStart'; end: 'hourlyEnd' | 'dailyEnd' }
> = {
  hourly: { start: 'hourlyStart', end: 'hourlyEnd' },
  daily: { start: 'dailyStart', end: 'dailyEnd' },
};

/** 期間 [from, to] */
export type Period = readonly [Date, Date];

/**
 * 資料涵蓋條件
 * - true: 該解析度有任何資料
 * - Period: 涵蓋整個期間
 * - Date: 涵蓋該日
 */
export type InventoryRequirement = true | Period | Date;

export type InventoryFilter = Partial<Record<Resolution, InventoryRequirement>>;

/** 單一值或清單 */
export type OneOrMany<T> = T | readonly T[];

export interface IdentifierFilter {
  uid?: OneOrMany<string>;
  wmo?: OneOrMany<string>;
  icao?: OneOrMany<string>;
}

export interface RegionFilter {
  country?: string;
  region?: string;
}

/**
 * 地理範圍，順序固定為 [north, east, south, west]
 * 順序錯誤不會報錯，只會得到空結果或錯誤結果
 */
export type Bounds = readonly [north: number, east: number, south: number, west: number];

export interface ProximityFilter {
  lat: number;
  lon: number;
  /** 半徑（公尺） */
  radius?: number;
}

/**
 * 建立選取時可用的全部篩選條件
 */
export interface StationQuery extends IdentifierFilter, RegionFilter {
  lat?: number;
  lon?: number;
  radius?: number;
  bounds?: Bounds;
  inventory?: InventoryFilter;
}

/**
 * 欄位轉換函數對照表（例如海拔公尺轉英尺）
 */
export type UnitMap = {
  [K in StationColumn]?: (value: StationRow[K]) => StationRow[K];
};

/**
 * 原始站點目錄的單筆資料（下載檔案的 JSON 結構）
 */
export interface RawStation {
  id: string;
  /** 各語系站名，例如 { en: 'Frankfurt Airport' } */
  name: Record<string, string>;
  country: string;
  region: string | null;
  identifiers: {
    national?: string | null;
    wmo?: string | null;
    icao?: string | null;
  };
  location: {
    latitude: number;
    longitude: number;
    elevation: number | null;
  };
  timezone: string | null;
  inventory: Partial<Record<Resolution, { start: string | null; end: string | null }>>;
}
