import { Command } from 'commander';
import { stationsCommand } from './commands/stations.js';
import { cacheCommand } from './commands/cache.js';
import { configCommand } from './commands/config.js';
import { setLogLevel } from './lib/logger.js';

export const cli = new Command();

cli
  .name('wxs')
  .description('Weather station selection CLI')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', '輸出格式: json (default) | table', 'json')
  .option('-v, --verbose', '詳細模式（輸出 debug 日誌到 stderr）')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose) {
      setLogLevel('debug');
    }
  });

// 註冊指令
cli.addCommand(stationsCommand);
cli.addCommand(cacheCommand);
cli.addCommand(configCommand);
