/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { loggers } from '../lib/logger.js';
import type { AppConfig, ConfigKey, SelectionConfig } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'wx-stations');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_SELECTION_CONFIG: SelectionConfig = Object.freeze({
  cacheDir: path.join(os.homedir(), '.cache', 'wx-stations'),
  maxAgeSeconds: 24 * 60 * 60, // 1 天
  maxThreads: 1,
  endpoint: 'https://bulk.meteostat.net/v2/',
});

export const CONFIG_KEYS: readonly ConfigKey[] = ['cacheDir', 'maxAge', 'maxThreads', 'endpoint'];

/**
 * 建立不可變的選取設定
 */
export function createSelectionConfig(overrides: Partial<SelectionConfig> = {}): SelectionConfig {
  return Object.freeze({ ...DEFAULT_SELECTION_CONFIG, ...overrides });
}

export function isConfigKey(value: string): value is ConfigKey {
  const keys: readonly string[] = CONFIG_KEYS;
  return keys.includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPositiveNumber(value: unknown, integer: boolean): number | undefined {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    return undefined;
  }
  if (integer && (!Number.isInteger(parsed) || parsed < 1)) {
    return undefined;
  }
  return parsed;
}

/**
 * 驗證設定檔內容，忽略無法辨識的欄位
 */
export function parseAppConfig(value: unknown): AppConfig {
  if (!isRecord(value)) return {};

  const config: AppConfig = {};
  if (typeof value.cacheDir === 'string' && value.cacheDir.length > 0) {
    config.cacheDir = value.cacheDir;
  }
  const maxAge = toPositiveNumber(value.maxAge, false);
  if (maxAge !== undefined) config.maxAge = maxAge;
  const maxThreads = toPositiveNumber(value.maxThreads, true);
  if (maxThreads !== undefined) config.maxThreads = maxThreads;
  if (typeof value.endpoint === 'string' && value.endpoint.length > 0) {
    config.endpoint = value.endpoint;
  }

  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.env = env;
    this.config = this.load();
  }

  /**
   * 載入設定檔，檔案不存在或格式錯誤時使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      return parseAppConfig(JSON.parse(content));
    } catch (error) {
      loggers.config.warn('設定檔讀取失敗，使用預設值', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  /**
   * 設定值（字串會依欄位轉型並驗證）
   * @throws Error 值不合法
   */
  set(key: ConfigKey, value: string): void {
    const parsed = parseAppConfig({ [key]: value });
    if (parsed[key] === undefined) {
      throw new Error(`設定值無效：${key}=${value}`);
    }
    this.config = { ...this.config, ...parsed };
    this.save();
  }

  delete(key: ConfigKey): void {
    const next = { ...this.config };
    delete next[key];
    this.config = next;
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得選取設定（環境變數優先於設定檔）
   * WXS_CACHE_DIR, WXS_MAX_AGE, WXS_MAX_THREADS, WXS_ENDPOINT
   */
  getSelectionConfig(): SelectionConfig {
    const fromEnv = parseAppConfig({
      cacheDir: this.env.WXS_CACHE_DIR,
      maxAge: this.env.WXS_MAX_AGE,
      maxThreads: this.env.WXS_MAX_THREADS,
      endpoint: this.env.WXS_ENDPOINT,
    });

    for (const [name, key] of [
      ['WXS_MAX_AGE', 'maxAge'],
      ['WXS_MAX_THREADS', 'maxThreads'],
    ] as const) {
      if (this.env[name] !== undefined && fromEnv[key] === undefined) {
        loggers.config.warn(`環境變數 ${name} 無效，已忽略`, { value: this.env[name] });
      }
    }

    const merged: AppConfig = { ...this.config, ...fromEnv };

    return createSelectionConfig({
      cacheDir: merged.cacheDir ?? DEFAULT_SELECTION_CONFIG.cacheDir,
      maxAgeSeconds: merged.maxAge ?? DEFAULT_SELECTION_CONFIG.maxAgeSeconds,
      maxThreads: merged.maxThreads ?? DEFAULT_SELECTION_CONFIG.maxThreads,
      endpoint: merged.endpoint ?? DEFAULT_SELECTION_CONFIG.endpoint,
    });
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
