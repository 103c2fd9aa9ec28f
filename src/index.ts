#!/usr/bin/env node
/**
 * health-notifier - 主程式進入點
 *
 * 依參數選擇執行模式；也匯出核心模組與 Lambda handler 供程式呼叫。
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Main');

const HELP_MESSAGE = `
health-notifier - HTTP 健康檢查與告警通知

Usage: health-notifier [mode]

Modes:
  once     執行一次檢查後結束，exit code 表示結果（預設）
  daemon   依 SCHEDULE_CRON 定期執行（取代外部排程器）
  help     顯示此說明

Environment:
  TARGET_URL, NOTIFICATION_TYPE, SECRET_ID 為必要設定，其餘見 .env.example
`;

async function main(mode: string): Promise<void> {
  switch (mode) {
    case 'once':
      await import('./interfaces/cli.js');
      break;

    case 'daemon':
      await import('./interfaces/scheduler-daemon.js');
      break;

    case 'help':
    case '-h':
    case '--help':
      logger.raw(HELP_MESSAGE);
      break;

    default:
      logger.error(`Unknown mode: ${mode}`);
      logger.raw('Use "health-notifier help" for usage information');
      process.exitCode = 1;
  }
}

// 被當成函式庫 import 時不啟動
const entry = process.argv[1];
if (entry && fileURLToPath(import.meta.url) === realpathSync(entry)) {
  main(process.argv[2] || 'once').catch((error) => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
}

export { handler } from './interfaces/lambda.js';
export * from './core/index.js';
