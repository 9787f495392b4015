/**
 * Cache Command
 * 快取管理指令
 */

import { Command } from 'commander';
import { CacheService } from '../services/cache.js';
import { getConfigService } from '../services/config.js';
import { formatCacheStatus, printError, resolveFormat } from '../utils/output.js';

function getCache(): { cache: CacheService; maxAgeMs: number } {
  const config = getConfigService().getSelectionConfig();
  return {
    cache: new CacheService(config.cacheDir),
    maxAgeMs: config.maxAgeSeconds * 1000,
  };
}

export const cacheCommand = new Command('cache').description('快取管理');

/**
 * wxs cache status
 */
cacheCommand
  .command('status')
  .description('顯示快取狀態')
  .action((_options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    const status = getCache().cache.getStatus();

    if (format === 'json') {
      console.log(JSON.stringify(status, null, 2));
    } else {
      console.log(formatCacheStatus(status));
    }
  });

/**
 * wxs cache clear [prefix]
 */
cacheCommand
  .command('clear [prefix]')
  .description('清除快取（可指定前綴，例如 stations）')
  .action((prefix: string | undefined, _options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);

    try {
      getCache().cache.clear(prefix);
      if (format === 'json') {
        console.log(JSON.stringify({ success: true, cleared: prefix ?? '*' }));
      } else {
        console.log(prefix ? `已清除 ${prefix} 快取` : '已清除所有快取');
      }
    } catch (error) {
      printError(error, format);
      process.exit(1);
    }
  });

/**
 * wxs cache prune
 */
cacheCommand
  .command('prune')
  .description('刪除超過 max-age 的快取')
  .action((_options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    const { cache, maxAgeMs } = getCache();
    const removed = cache.prune(maxAgeMs);

    if (format === 'json') {
      console.log(JSON.stringify({ success: true, removed }));
    } else {
      console.log(`已刪除 ${removed} 個過期快取檔`);
    }
  });
