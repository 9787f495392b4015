/**
 * 設定檔結構
 */
export interface AppConfig {
  /** 快取目錄 */
  cacheDir?: string;
  /** 快取及資料涵蓋容許時間（秒） */
  maxAge?: number;
  /** 同時下載數上限 */
  maxThreads?: number;
  /** 站點目錄下載端點 */
  endpoint?: string;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

/**
 * 選取與載入所使用的設定（建立後不可變）
 */
export interface SelectionConfig {
  readonly cacheDir: string;
  readonly maxAgeSeconds: number;
  readonly maxThreads: number;
  readonly endpoint: string;
}
