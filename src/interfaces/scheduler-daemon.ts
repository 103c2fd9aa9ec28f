/**
 * 排程服務 Daemon
 *
 * 本機或自架環境中代替外部排程器：依 SCHEDULE_CRON 觸發單次檢查。
 * 上一輪還在跑時略過該次觸發；核心本身不管排程。
 *
 * 使用方式：
 *   npm run daemon
 *   或用 PM2: pm2 start dist/index.js --name health-notifier -- daemon
 */

import { config } from 'dotenv';
import cron from 'node-cron';
import { loadScheduleCron } from '../core/config.js';
import { runHealthCheck } from '../core/run.js';
import { createLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

config();

const logger = createLogger('Scheduler');

const cronExpression = loadScheduleCron();
const timezone = process.env.TZ || 'UTC';

interface InFlight {
  controller: AbortController;
  done: Promise<void>;
}

let inFlight: InFlight | null = null;

/**
 * 執行一次檢查
 */
async function invoke(controller: AbortController): Promise<void> {
  try {
    const outcome = await runHealthCheck({ signal: controller.signal });
    logger.info(`Invocation finished: ${outcome.state}${outcome.success ? '' : ' (failed)'}`);
  } finally {
    inFlight = null;
  }
}

function tick(): void {
  if (inFlight) {
    logger.warn('Previous invocation still running, skipping this tick');
    return;
  }

  const controller = new AbortController();
  const done = invoke(controller).catch((error) => logger.error('Tick failed:', error));
  inFlight = { controller, done };
}

function main(): void {
  logger.info(`Starting scheduler daemon v${VERSION}...`);

  if (!cron.validate(cronExpression)) {
    logger.error(`Invalid SCHEDULE_CRON: ${cronExpression}`);
    process.exit(1);
  }

  const task = cron.schedule(cronExpression, tick, { timezone });

  logger.info(`Schedule: ${cronExpression} (${timezone})`);
  logger.info('Daemon running. Press Ctrl+C to stop.');

  // 優雅關閉：取消進行中的檢查，等它輸出結果後再結束
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down...`);
    task.stop();
    const current = inFlight;
    if (!current) {
      process.exit(0);
    }
    current.controller.abort();
    void current.done.then(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
