import { redactUrl } from '../utils/url.js';
import type { MonitorError } from './errors.js';
import type {
  InvocationOutcome,
  InvocationState,
  NotificationChannel,
  ProbeResult,
} from './types.js';

export interface OutcomeFields {
  targetUrl: string | null;
  channel: NotificationChannel | null;
  states: InvocationState[];
  probeResult: ProbeResult | null;
  notificationAttempted: boolean;
  notificationSent: boolean;
  notificationSuppressed: boolean;
  startedAt: Date;
}

/**
 * 組出執行結果
 *
 * 成功條件：到達 Done，且通知已送達或本來就不需要送。
 */
export function createOutcome(fields: OutcomeFields, error: MonitorError | null): InvocationOutcome {
  const last = fields.states[fields.states.length - 1];
  const state = last === 'Done' ? 'Done' : 'Error';
  const notificationOk = !fields.notificationAttempted || fields.notificationSent;

  return {
    targetUrl: fields.targetUrl,
    channel: fields.channel,
    state,
    states: fields.states,
    probeResult: fields.probeResult,
    notificationAttempted: fields.notificationAttempted,
    notificationSent: fields.notificationSent,
    notificationSuppressed: fields.notificationSuppressed,
    error: error ? { code: error.code, category: error.category, message: error.message } : null,
    success: state === 'Done' && notificationOk,
    elapsedMs: Date.now() - fields.startedAt.getTime(),
    timestamp: fields.startedAt.toISOString(),
  };
}

/**
 * 設定階段就失敗時的結果（尚未有目標或通道）
 */
export function createErrorOutcome(
  error: MonitorError,
  startedAt: Date,
  partial?: { targetUrl?: string; channel?: NotificationChannel }
): InvocationOutcome {
  return createOutcome(
    {
      targetUrl: partial?.targetUrl ?? null,
      channel: partial?.channel ?? null,
      states: ['Start', 'Error'],
      probeResult: null,
      notificationAttempted: false,
      notificationSent: false,
      notificationSuppressed: false,
      startedAt,
    },
    error
  );
}

/**
 * 給 log 收集器的單行紀錄
 *
 * error_detail 以執行錯誤優先；probe_error 永遠保留探測本身的診斷。
 */
export function toOutcomeRecord(outcome: InvocationOutcome): Record<string, unknown> {
  const probe = outcome.probeResult;
  const classification = outcome.state === 'Error' || !probe ? 'error' : probe.status;

  let httpStatus: number | null = null;
  let probeError: string | null = null;
  if (probe) {
    if (probe.status === 'unreachable') {
      probeError = probe.error;
    } else {
      httpStatus = probe.statusCode;
    }
  }

  return {
    event: 'health_check',
    target_url: outcome.targetUrl ? redactUrl(outcome.targetUrl) : null,
    channel: outcome.channel,
    state: outcome.state,
    classification,
    http_status: httpStatus,
    error_code: outcome.error?.code ?? null,
    error_detail: outcome.error?.message ?? probeError,
    probe_error: probeError,
    latency_ms: probe?.latencyMs ?? null,
    notify_attempted: outcome.notificationAttempted,
    notify_succeeded: outcome.notificationSent,
    notify_suppressed: outcome.notificationSuppressed,
    success: outcome.success,
    elapsed_ms: outcome.elapsedMs,
    timestamp: outcome.timestamp,
  };
}
