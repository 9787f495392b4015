/**
 * Config Command
 * 設定管理指令
 */

import { Command } from 'commander';
import { CONFIG_KEYS, getConfigService, isConfigKey } from '../services/config.js';
import { printError, resolveFormat } from '../utils/output.js';

export const configCommand = new Command('config').description('設定管理');

/**
 * wxs config show
 * 顯示實際生效的設定（含環境變數）
 */
configCommand
  .command('show')
  .description('顯示目前設定')
  .action((_options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    const service = getConfigService();
    const effective = service.getSelectionConfig();

    if (format === 'json') {
      console.log(
        JSON.stringify({ path: service.getConfigPath(), file: service.getAll(), effective }, null, 2)
      );
      return;
    }

    console.log(`設定檔：${service.getConfigPath()}\n`);
    console.log(`  cacheDir：${effective.cacheDir}`);
    console.log(`  maxAge：${effective.maxAgeSeconds} 秒`);
    console.log(`  maxThreads：${effective.maxThreads}`);
    console.log(`  endpoint：${effective.endpoint}`);
  });

/**
 * wxs config set <key> <value>
 */
configCommand
  .command('set <key> <value>')
  .description(`設定值，可用 key：${CONFIG_KEYS.join(', ')}`)
  .action((key: string, value: string, _options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);

    try {
      if (!isConfigKey(key)) {
        throw new Error(`未知的設定 key「${key}」，可用：${CONFIG_KEYS.join(', ')}`);
      }
      getConfigService().set(key, value);
      if (format === 'json') {
        console.log(JSON.stringify({ success: true, key, value: getConfigService().get(key) }));
      } else {
        console.log(`已設定 ${key}`);
      }
    } catch (error) {
      printError(error, format);
      process.exit(1);
    }
  });

/**
 * wxs config unset <key>
 */
configCommand
  .command('unset <key>')
  .description('刪除設定值')
  .action((key: string, _options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);

    if (!isConfigKey(key)) {
      printError(new Error(`未知的設定 key「${key}」`), format);
      process.exit(1);
    }

    getConfigService().delete(key);
    console.log(format === 'json' ? JSON.stringify({ success: true, key }) : `已刪除 ${key}`);
  });
