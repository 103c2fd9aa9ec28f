export { NotificationDispatcher, type DispatcherConfig } from './dispatcher.js';
export { buildAlertMessage, formatUtc } from './message.js';
export { SlackAdapter, renderSlackText } from './adapters/slack.js';
export { TelegramAdapter, renderTelegramText, TELEGRAM_API_BASE } from './adapters/telegram.js';
export type { ChannelAdapter, NotificationResult } from './types.js';
