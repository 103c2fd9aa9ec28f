import { createDeadline, sleep } from '../../utils/abort.js';
import { describeTransportError } from '../../utils/http.js';
import { createLogger } from '../../utils/logger.js';
import { ChannelMismatchError, DeliveryFailedError } from '../errors.js';
import type {
  ChannelCredentials,
  NotificationChannel,
  NotificationMessage,
  SlackCredentials,
  TelegramCredentials,
} from '../types.js';
import { SlackAdapter } from './adapters/slack.js';
import { TelegramAdapter } from './adapters/telegram.js';
import type { ChannelAdapter, NotificationResult } from './types.js';

const logger = createLogger('Dispatcher');

export const DEFAULT_NOTIFY_TIMEOUT_MS = 10_000;
export const DEFAULT_RETRY_DELAY_MS = 2_000;

// 第一次 + 一次重試
const MAX_ATTEMPTS = 2;

export interface DispatcherConfig {
  /** 單次傳送逾時 */
  timeoutMs?: number;
  /** 重試前等待時間 */
  retryDelayMs?: number;
  slack?: ChannelAdapter<SlackCredentials>;
  telegram?: ChannelAdapter<TelegramCredentials>;
}

/**
 * 通知派送
 *
 * 通道固定為 Slack 與 Telegram，依憑證型別分派。
 * 失敗時等待固定時間後重試一次，仍失敗則回報 DeliveryFailed。
 */
export class NotificationDispatcher {
  private timeoutMs: number;
  private retryDelayMs: number;
  private slack: ChannelAdapter<SlackCredentials>;
  private telegram: ChannelAdapter<TelegramCredentials>;

  constructor(config?: DispatcherConfig) {
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_NOTIFY_TIMEOUT_MS;
    this.retryDelayMs = config?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.slack = config?.slack ?? new SlackAdapter();
    this.telegram = config?.telegram ?? new TelegramAdapter();
  }

  /**
   * 傳送通知
   *
   * 憑證與通道不符時直接丟出 ChannelMismatchError，不發出任何請求。
   */
  async send(
    channel: NotificationChannel,
    credentials: ChannelCredentials,
    message: NotificationMessage,
    signal?: AbortSignal
  ): Promise<NotificationResult> {
    if (credentials.type !== channel) {
      throw new ChannelMismatchError(channel, credentials.type);
    }

    let attempts = 0;
    let reason = 'no attempt made';

    while (attempts < MAX_ATTEMPTS) {
      if (attempts > 0) {
        logger.warn(`Retrying ${channel} delivery in ${this.retryDelayMs}ms`);
        const interrupted = await sleep(this.retryDelayMs, signal).then(
          () => false,
          () => true
        );
        if (interrupted) {
          reason = 'invocation cancelled';
          break;
        }
      }

      attempts++;
      const deadline = createDeadline(this.timeoutMs, signal);
      try {
        await this.deliver(credentials, message, deadline.signal);
        logger.info(`Sent to ${channel} (attempt ${attempts})`);
        return { channel, sent: true, attempts };
      } catch (error) {
        if (deadline.timedOut()) {
          reason = `timed out after ${this.timeoutMs}ms`;
        } else if (signal?.aborted) {
          reason = 'invocation cancelled';
        } else {
          reason = describeTransportError(error);
        }
        logger.warn(`${channel} delivery attempt ${attempts} failed: ${reason}`);
      } finally {
        deadline.clear();
      }

      if (signal?.aborted) {
        break;
      }
    }

    const error = new DeliveryFailedError(channel, reason);
    logger.error(error.message);
    return { channel, sent: false, attempts, error };
  }

  private deliver(
    credentials: ChannelCredentials,
    message: NotificationMessage,
    signal: AbortSignal
  ): Promise<void> {
    switch (credentials.type) {
      case 'slack':
        return this.slack.deliver(credentials, message, signal);
      case 'telegram':
        return this.telegram.deliver(credentials, message, signal);
    }
  }
}
