import { createLogger } from '../utils/logger.js';
import { redactUrl } from '../utils/url.js';
import { alertClassification, type AlertStateStore } from './alert-state-store.js';
import {
  ChannelMismatchError,
  InvocationCancelledError,
  toMonitorError,
  type MonitorError,
} from './errors.js';
import { buildAlertMessage } from './notification/message.js';
import type { NotificationResult } from './notification/types.js';
import { createOutcome } from './outcome.js';
import type {
  ChannelCredentials,
  FailedProbeResult,
  InvocationOutcome,
  InvocationState,
  NotificationChannel,
  NotificationMessage,
  ProbeResult,
  ProbeTarget,
} from './types.js';

const logger = createLogger('Monitor');

export interface CredentialSource {
  resolve(secretId: string, channel: NotificationChannel, signal?: AbortSignal): Promise<ChannelCredentials>;
}

export interface Prober {
  check(target: ProbeTarget, signal?: AbortSignal): Promise<ProbeResult>;
}

export interface Notifier {
  send(
    channel: NotificationChannel,
    credentials: ChannelCredentials,
    message: NotificationMessage,
    signal?: AbortSignal
  ): Promise<NotificationResult>;
}

export interface OrchestratorDependencies {
  secrets: CredentialSource;
  probe: Prober;
  notifier: Notifier;
  /** 設定後啟用重複告警抑制 */
  alertState?: AlertStateStore;
  clock?: () => Date;
}

export interface InvocationInput {
  target: ProbeTarget;
  channel: NotificationChannel;
  secretId: string;
}

/**
 * 單次執行的狀態機
 *
 *   Start → SecretResolved → Probed → Notified → Done
 *   任何一步失敗 → Error
 *
 * 不重入、不迴圈：一次呼叫走完一趟。run() 不會丟出錯誤，所有失敗都寫進結果。
 */
export class MonitorOrchestrator {
  private secrets: CredentialSource;
  private probe: Prober;
  private notifier: Notifier;
  private alertState: AlertStateStore | null;
  private clock: () => Date;

  constructor(deps: OrchestratorDependencies) {
    this.secrets = deps.secrets;
    this.probe = deps.probe;
    this.notifier = deps.notifier;
    this.alertState = deps.alertState ?? null;
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(input: InvocationInput, signal?: AbortSignal): Promise<InvocationOutcome> {
    const startedAt = this.clock();
    const targetUrl = input.target.url;
    const states: InvocationState[] = ['Start'];
    let probeResult: ProbeResult | null = null;
    let attempted = false;
    let sent = false;
    let suppressed = false;

    const finish = (error: MonitorError | null): InvocationOutcome =>
      createOutcome(
        {
          targetUrl,
          channel: input.channel,
          states,
          probeResult,
          notificationAttempted: attempted,
          notificationSent: sent,
          notificationSuppressed: suppressed,
          startedAt,
        },
        error
      );

    try {
      // 1. Start → SecretResolved
      this.ensureActive(signal, 'secret resolution');
      const credentials = await this.secrets.resolve(input.secretId, input.channel, signal);
      this.ensureActive(signal, 'secret resolution');
      if (credentials.type !== input.channel) {
        throw new ChannelMismatchError(input.channel, credentials.type);
      }
      states.push('SecretResolved');

      // 2. SecretResolved → Probed（不健康不算錯誤）
      probeResult = await this.probe.check(input.target, signal);
      this.ensureActive(signal, 'probe');
      states.push('Probed');

      // 3. Probed → Notified
      let deliveryError: MonitorError | null = null;
      if (probeResult.status === 'healthy') {
        await this.forgetAlert(targetUrl);
      } else if (await this.isRepeatAlert(targetUrl, probeResult)) {
        suppressed = true;
        logger.info(`Suppressed repeat ${alertClassification(probeResult)} alert for ${redactUrl(targetUrl)}`);
      } else {
        attempted = true;
        const message = buildAlertMessage(targetUrl, probeResult, this.clock());
        const result = await this.notifier.send(input.channel, credentials, message, signal);
        sent = result.sent;
        deliveryError = result.error ?? null;
        if (sent) {
          await this.rememberAlert(targetUrl, probeResult);
        }
      }
      states.push('Notified');

      // 4. Notified → Done（送出失敗只記錄，不改變探測分類）
      states.push('Done');
      return finish(deliveryError);
    } catch (error) {
      const failure = toMonitorError(error);
      states.push('Error');
      logger.error(`Invocation failed (${failure.code}): ${failure.message}`);
      return finish(failure);
    }
  }

  private ensureActive(signal: AbortSignal | undefined, step: string): void {
    if (signal?.aborted) {
      throw new InvocationCancelledError(step);
    }
  }

  /**
   * 狀態儲存失敗時照常送出告警
   */
  private async isRepeatAlert(targetUrl: string, result: FailedProbeResult): Promise<boolean> {
    if (!this.alertState) {
      return false;
    }
    try {
      const record = await this.alertState.get(targetUrl);
      return record?.classification === alertClassification(result);
    } catch (error) {
      logger.warn('Failed to read alert state, notifying anyway:', error);
      return false;
    }
  }

  private async rememberAlert(targetUrl: string, result: FailedProbeResult): Promise<void> {
    if (!this.alertState) {
      return;
    }
    try {
      await this.alertState.set(targetUrl, {
        classification: alertClassification(result),
        notifiedAt: this.clock().toISOString(),
      });
    } catch (error) {
      logger.warn('Failed to record alert state:', error);
    }
  }

  private async forgetAlert(targetUrl: string): Promise<void> {
    if (!this.alertState) {
      return;
    }
    try {
      await this.alertState.clear(targetUrl);
    } catch (error) {
      logger.warn('Failed to clear alert state:', error);
    }
  }
}
