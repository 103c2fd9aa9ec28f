import { readErrorBody } from '../../../utils/http.js';
import type { NotificationMessage, SlackCredentials } from '../../types.js';
import type { ChannelAdapter } from '../types.js';

/**
 * Slack mrkdwn 需跳脫 &、<、>
 */
function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function renderSlackText(message: NotificationMessage): string {
  const emoji = message.severity === 'critical' ? ':red_circle:' : ':large_orange_circle:';
  return `${emoji} *${escapeMrkdwn(message.title)}*\n${escapeMrkdwn(message.body)}`;
}

/**
 * Slack incoming webhook
 */
export class SlackAdapter implements ChannelAdapter<SlackCredentials> {
  readonly type = 'slack' as const;

  async deliver(
    credentials: SlackCredentials,
    message: NotificationMessage,
    signal: AbortSignal
  ): Promise<void> {
    const response = await fetch(credentials.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: renderSlackText(message) }),
      signal,
    });

    if (!response.ok) {
      const body = await readErrorBody(response);
      throw new Error(`Slack webhook responded ${response.status}${body ? ` ${body}` : ''}`);
    }
  }
}
