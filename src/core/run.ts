import { createDeadline } from '../utils/abort.js';
import { createLogger } from '../utils/logger.js';
import { FileAlertStateStore } from './alert-state-store.js';
import { loadConfig, type MonitorConfig } from './config.js';
import { toMonitorError } from './errors.js';
import { HealthProbe } from './health-probe.js';
import { NotificationDispatcher } from './notification/dispatcher.js';
import { MonitorOrchestrator } from './orchestrator.js';
import { createErrorOutcome, toOutcomeRecord } from './outcome.js';
import { SecretResolver } from './secret-resolver.js';
import { AwsSecretsManagerStore } from './secret-stores/aws-secrets-manager.js';
import { FileSecretStore } from './secret-stores/file.js';
import type { SecretStore } from './secret-stores/types.js';
import type { InvocationOutcome } from './types.js';

const logger = createLogger('Run');

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  /** 外部排程的取消訊號 */
  signal?: AbortSignal;
  /** 外部給定的剩餘時間，與 INVOCATION_TIMEOUT_MS 取較小者 */
  deadlineMs?: number;
}

function createSecretStore(config: MonitorConfig): SecretStore {
  switch (config.secretStore) {
    case 'aws':
      return new AwsSecretsManagerStore({ region: config.awsRegion });
    case 'file':
      return new FileSecretStore(config.secretFileDir);
  }
}

/**
 * 依設定組出 orchestrator
 */
export function createOrchestrator(config: MonitorConfig): MonitorOrchestrator {
  return new MonitorOrchestrator({
    secrets: new SecretResolver(createSecretStore(config), { timeoutMs: config.secretTimeoutMs }),
    probe: new HealthProbe({
      method: config.probeMethod,
      followRedirects: config.probeFollowRedirects,
    }),
    notifier: new NotificationDispatcher({
      timeoutMs: config.notifyTimeoutMs,
      retryDelayMs: config.notifyRetryDelayMs,
    }),
    alertState: config.alertDedup ? new FileAlertStateStore(config.alertStatePath) : undefined,
  });
}

function pickDeadline(...candidates: Array<number | undefined>): number | undefined {
  const values = candidates.filter((value): value is number => value !== undefined && value > 0);
  return values.length > 0 ? Math.min(...values) : undefined;
}

/**
 * 執行一次完整的檢查，並輸出剛好一筆結果紀錄
 *
 * 不會丟出錯誤；設定錯誤也會產生一筆 classification 為 error 的紀錄。
 */
export async function runHealthCheck(options?: RunOptions): Promise<InvocationOutcome> {
  const startedAt = new Date();
  let outcome: InvocationOutcome;

  try {
    const config = loadConfig(options?.env);
    const timeoutMs = pickDeadline(config.invocationTimeoutMs, options?.deadlineMs);
    const deadline = timeoutMs !== undefined ? createDeadline(timeoutMs, options?.signal) : null;

    try {
      outcome = await createOrchestrator(config).run(
        {
          target: { url: config.targetUrl, timeoutMs: config.probeTimeoutMs },
          channel: config.notificationType,
          secretId: config.secretId,
        },
        deadline?.signal ?? options?.signal
      );
    } finally {
      deadline?.clear();
    }
  } catch (error) {
    const failure = toMonitorError(error);
    logger.error(`Invocation aborted before start (${failure.code}): ${failure.message}`);
    outcome = createErrorOutcome(failure, startedAt);
  }

  logger.record(toOutcomeRecord(outcome));
  return outcome;
}
