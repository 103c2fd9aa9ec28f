import type { DeliveryFailedError } from '../errors.js';
import type {
  ChannelCredentials,
  NotificationChannel,
  NotificationMessage,
} from '../types.js';

/**
 * 單一通道的傳送實作，失敗時丟出錯誤
 */
export interface ChannelAdapter<C extends ChannelCredentials> {
  readonly type: C['type'];
  deliver(credentials: C, message: NotificationMessage, signal: AbortSignal): Promise<void>;
}

export interface NotificationResult {
  channel: NotificationChannel;
  sent: boolean;
  attempts: number;
  error?: DeliveryFailedError;
}
