import { z } from 'zod';
import { createDeadline, raceAbort } from '../utils/abort.js';
import { createLogger } from '../utils/logger.js';
import { isHttpUrl } from './config.js';
import {
  InvocationCancelledError,
  MonitorError,
  SecretMalformedError,
  SecretStoreUnavailableError,
} from './errors.js';
import type { SecretStore } from './secret-stores/types.js';
import type { ChannelCredentials, NotificationChannel } from './types.js';

const logger = createLogger('SecretResolver');

export const DEFAULT_SECRET_TIMEOUT_MS = 5_000;

export interface SecretResolverConfig {
  timeoutMs?: number;
}

const secretPayloadSchema = z.object({
  slack_webhook_url: z.string().optional(),
  telegram_bot_token: z.string().optional(),
  telegram_chat_id: z.union([z.string(), z.number()]).optional(),
});

/**
 * 將機密內容解碼為指定通道的憑證
 *
 * 只檢查所選通道需要的欄位；錯誤訊息只描述欄位，不包含內容。
 */
export function decodeCredentials(
  raw: string,
  channel: NotificationChannel,
  secretId: string
): ChannelCredentials {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new SecretMalformedError(secretId, 'content is not valid JSON');
  }

  const parsed = secretPayloadSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || 'payload');
    throw new SecretMalformedError(secretId, `unexpected shape (${fields.join(', ')})`);
  }

  const payload = parsed.data;

  switch (channel) {
    case 'slack': {
      const webhookUrl = payload.slack_webhook_url?.trim();
      if (!webhookUrl) {
        throw new SecretMalformedError(secretId, 'slack_webhook_url is missing or empty');
      }
      if (!isHttpUrl(webhookUrl)) {
        throw new SecretMalformedError(secretId, 'slack_webhook_url is not an http(s) URL');
      }
      return { type: 'slack', webhookUrl };
    }
    case 'telegram': {
      const botToken = payload.telegram_bot_token?.trim();
      const chatId =
        payload.telegram_chat_id === undefined ? '' : String(payload.telegram_chat_id).trim();
      const missing = [
        ...(botToken ? [] : ['telegram_bot_token']),
        ...(chatId ? [] : ['telegram_chat_id']),
      ];
      if (!botToken || missing.length > 0) {
        throw new SecretMalformedError(secretId, `${missing.join(', ')} missing or empty`);
      }
      return { type: 'telegram', botToken, chatId };
    }
  }
}

/**
 * 從機密儲存取得通道憑證
 *
 * 單次取值、不重試，並套用與探測分開的逾時。
 */
export class SecretResolver {
  private store: SecretStore;
  private timeoutMs: number;

  constructor(store: SecretStore, config?: SecretResolverConfig) {
    this.store = store;
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_SECRET_TIMEOUT_MS;
  }

  async resolve(
    secretId: string,
    channel: NotificationChannel,
    signal?: AbortSignal
  ): Promise<ChannelCredentials> {
    const deadline = createDeadline(this.timeoutMs, signal);
    logger.debug(`Fetching secret "${secretId}" from ${this.store.name}`);

    let raw: string;
    try {
      raw = await raceAbort(this.store.fetch(secretId, deadline.signal), deadline.signal);
    } catch (error) {
      if (deadline.timedOut()) {
        throw new SecretStoreUnavailableError(`timed out after ${this.timeoutMs}ms`);
      }
      if (signal?.aborted) {
        throw new InvocationCancelledError('secret resolution');
      }
      if (error instanceof MonitorError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new SecretStoreUnavailableError(message);
    } finally {
      deadline.clear();
    }

    const credentials = decodeCredentials(raw, channel, secretId);
    logger.info(`Resolved ${channel} credentials from ${this.store.name}`);
    return credentials;
  }
}
