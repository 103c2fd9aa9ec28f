/**
 * 單次執行模式
 *
 * 跑一輪檢查，以 exit code 回報結果（0 成功、1 失敗）。
 * 收到 SIGINT / SIGTERM 時取消進行中的請求。
 */

import { config } from 'dotenv';
import { runHealthCheck } from '../core/run.js';
import { createLogger } from '../utils/logger.js';

config();

const logger = createLogger('CLI');

const controller = new AbortController();

const cancel = (signal: NodeJS.Signals) => {
  logger.warn(`Received ${signal}, cancelling invocation...`);
  controller.abort();
};

process.once('SIGINT', cancel);
process.once('SIGTERM', cancel);

const outcome = await runHealthCheck({ signal: controller.signal });

process.off('SIGINT', cancel);
process.off('SIGTERM', cancel);
process.exitCode = outcome.success ? 0 : 1;
