import { readErrorBody } from '../../../utils/http.js';
import type { NotificationMessage, TelegramCredentials } from '../../types.js';
import type { ChannelAdapter } from '../types.js';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function renderTelegramText(message: NotificationMessage): string {
  const emoji = message.severity === 'critical' ? '\u{1F534}' : '\u{1F7E0}';
  return `${emoji} <b>${escapeHtml(message.title)}</b>\n\n${escapeHtml(message.body)}`;
}

/**
 * Telegram Bot API sendMessage（URL-encoded body）
 */
export class TelegramAdapter implements ChannelAdapter<TelegramCredentials> {
  readonly type = 'telegram' as const;

  async deliver(
    credentials: TelegramCredentials,
    message: NotificationMessage,
    signal: AbortSignal
  ): Promise<void> {
    const body = new URLSearchParams({
      chat_id: credentials.chatId,
      text: renderTelegramText(message),
      parse_mode: 'HTML',
      disable_web_page_preview: 'true',
    });

    const response = await fetch(`${TELEGRAM_API_BASE}/bot${credentials.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body,
      signal,
    });

    // URL 含 bot token，錯誤訊息只帶狀態碼與回應內容
    if (!response.ok) {
      const detail = await readErrorBody(response);
      throw new Error(`Telegram API responded ${response.status}${detail ? ` ${detail}` : ''}`);
    }
  }
}
