import { redactUrl } from '../../utils/url.js';
import type { FailedProbeResult, NotificationMessage } from '../types.js';

/**
 * 格式：YYYY-MM-DD HH:mm:ss UTC
 */
export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * 由探測結果建立告警訊息
 *
 * 內容包含目標 URL、觀察到的狀態碼或錯誤、回應時間與時間戳。
 */
export function buildAlertMessage(
  targetUrl: string,
  result: FailedProbeResult,
  now: Date = new Date()
): NotificationMessage {
  const url = redactUrl(targetUrl);
  const timestamp = formatUtc(now);

  const lines = [`URL: ${url}`];
  let title: string;

  if (result.status === 'unhealthy') {
    title = `DOWN: ${url} returned HTTP ${result.statusCode}`;
    lines.push(`Status: HTTP ${result.statusCode}`);
  } else {
    title = `UNREACHABLE: ${url}`;
    lines.push(`Error: ${result.error}`);
  }

  lines.push(`Response Time: ${result.latencyMs}ms`, `Time: ${timestamp}`);

  return {
    title,
    body: lines.join('\n'),
    severity: result.status === 'unreachable' ? 'critical' : 'warning',
    targetUrl: url,
    timestamp,
  };
}
