/**
 * Cache Service
 * 檔案快取服務 - 處理下載資料的快取讀寫與 max-age 管理
 */

import fs from 'node:fs';
import path from 'node:path';
import { loggers } from '../lib/logger.js';
import { recordCacheHit, recordCacheMiss } from '../lib/metrics.js';
import { DEFAULT_SELECTION_CONFIG } from './config.js';

const DEFAULT_TTL_MS = DEFAULT_SELECTION_CONFIG.maxAgeSeconds * 1000;
const ENTRY_SUFFIX = '.json';

interface CacheEntry {
  data: unknown;
  expiresAt: number;
  createdAt: number;
}

export interface CacheStatus {
  cacheDir: string;
  fileCount: number;
  totalSize: number;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'data' in value &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number' &&
    'createdAt' in value &&
    typeof value.createdAt === 'number'
  );
}

/**
 * 將 key 拆成路徑片段，去除空片段、. 與 ..
 */
export function keySegments(key: string): string[] {
  return key.split('/').filter((part) => part.length > 0 && part !== '.' && part !== '..');
}

export class CacheService {
  private cacheDir: string;

  constructor(cacheDir: string = DEFAULT_SELECTION_CONFIG.cacheDir) {
    this.cacheDir = cacheDir;
    this.ensureDir(this.cacheDir);
  }

  private ensureDir(dir: string): void {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * 將 key 轉換為檔案路徑（/ 轉為子目錄）
   */
  private keyToPath(key: string): string {
    const parts = keySegments(key);
    const fileName = `${parts.pop() ?? 'index'}${ENTRY_SUFFIX}`;
    return path.join(this.cacheDir, ...parts, fileName);
  }

  /**
   * 前綴對應的目錄，必須位於快取目錄內
   * @throws Error 前綴清理後為空
   */
  private prefixToDir(prefix: string): string {
    const parts = keySegments(prefix);
    const dir = path.resolve(this.cacheDir, ...parts);
    const relative = path.relative(path.resolve(this.cacheDir), dir);
    if (parts.length === 0 || relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`快取前綴無效：${prefix}`);
    }
    return dir;
  }

  /**
   * 儲存資料到快取
   */
  set(key: string, data: unknown, ttlMs: number = DEFAULT_TTL_MS): void {
    const now = Date.now();
    const entry: CacheEntry = {
      data,
      expiresAt: now + ttlMs,
      createdAt: now,
    };
    const filePath = this.keyToPath(key);
    this.ensureDir(path.dirname(filePath));
    fs.writeFileSync(filePath, JSON.stringify(entry), 'utf-8');
  }

  /**
   * 從快取讀取資料，過期或內容無法解析時回傳 null
   * @param parse 將快取內容轉為目標型別，丟出錯誤視為快取失效
   */
  get<T>(key: string, parse: (data: unknown) => T): T | null {
    const filePath = this.keyToPath(key);

    if (!fs.existsSync(filePath)) {
      recordCacheMiss(key);
      return null;
    }

    try {
      const entry: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      if (!isCacheEntry(entry)) {
        throw new Error('快取格式不符');
      }

      if (Date.now() > entry.expiresAt) {
        loggers.cache.debug('快取已過期', { key });
        this.delete(key);
        recordCacheMiss(key);
        return null;
      }

      const data = parse(entry.data);
      recordCacheHit(key);
      return data;
    } catch (error) {
      loggers.cache.warn('快取內容無法讀取，將重新下載', {
        key,
        reason: error instanceof Error ? error.message : String(error),
      });
      this.delete(key);
      recordCacheMiss(key);
      return null;
    }
  }

  has(key: string): boolean {
    return this.get(key, (data) => data) !== null;
  }

  delete(key: string): void {
    const filePath = this.keyToPath(key);
    try {
      if (fs.existsSync(filePath)) {
        fs.unlinkSync(filePath);
      }
    } catch (error) {
      loggers.cache.warn('快取刪除失敗', {
        key,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * 清除快取
   * @param prefix 只清除特定前綴的快取
   */
  clear(prefix?: string): void {
    if (prefix) {
      const prefixDir = this.prefixToDir(prefix);
      if (fs.existsSync(prefixDir)) {
        fs.rmSync(prefixDir, { recursive: true });
      }
      return;
    }

    if (fs.existsSync(this.cacheDir)) {
      for (const file of fs.readdirSync(this.cacheDir)) {
        fs.rmSync(path.join(this.cacheDir, file), { recursive: true });
      }
    }
  }

  /**
   * 刪除修改時間超過 maxAgeMs 的快取檔
   * @returns 刪除的檔案數
   */
  prune(maxAgeMs: number, prefix?: string): number {
    const root = prefix ? this.prefixToDir(prefix) : this.cacheDir;
    const threshold = Date.now() - maxAgeMs;
    let removed = 0;

    for (const filePath of this.listEntries(root)) {
      if (fs.statSync(filePath).mtimeMs < threshold) {
        fs.unlinkSync(filePath);
        removed++;
      }
    }

    if (removed > 0) {
      loggers.cache.info('已清除過期快取', { removed, prefix });
    }
    return removed;
  }

  private listEntries(dir: string): string[] {
    if (!fs.existsSync(dir)) return [];

    const files: string[] = [];
    for (const item of fs.readdirSync(dir, { withFileTypes: true })) {
      const itemPath = path.join(dir, item.name);
      if (item.isDirectory()) {
        files.push(...this.listEntries(itemPath));
      } else if (item.isFile() && item.name.endsWith(ENTRY_SUFFIX)) {
        files.push(itemPath);
      }
    }
    return files;
  }

  getStatus(): CacheStatus {
    const files = this.listEntries(this.cacheDir);

    return {
      cacheDir: this.cacheDir,
      fileCount: files.length,
      totalSize: files.reduce((total, file) => total + fs.statSync(file).size, 0),
    };
  }
}
