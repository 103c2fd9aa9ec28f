/**
 * 健康檢查核心型別
 */

export type NotificationChannel = 'slack' | 'telegram';

export type ProbeMethod = 'GET' | 'HEAD';

export interface ProbeTarget {
  readonly url: string;
  readonly timeoutMs: number;
}

export interface HealthyResult {
  status: 'healthy';
  statusCode: number;
  latencyMs: number;
}

export interface UnhealthyResult {
  status: 'unhealthy';
  statusCode: number;
  latencyMs: number;
}

export interface UnreachableResult {
  status: 'unreachable';
  /** 簡短診斷訊息，不含 stack 與機密 */
  error: string;
  latencyMs: number;
}

export type ProbeResult = HealthyResult | UnhealthyResult | UnreachableResult;

/** 需要告警的探測結果 */
export type FailedProbeResult = UnhealthyResult | UnreachableResult;

export type ProbeStatus = ProbeResult['status'];

export interface SlackCredentials {
  type: 'slack';
  webhookUrl: string;
}

export interface TelegramCredentials {
  type: 'telegram';
  botToken: string;
  chatId: string;
}

/**
 * 通道憑證，只存在於單次執行的記憶體中，不可寫入 log
 */
export type ChannelCredentials = SlackCredentials | TelegramCredentials;

export type Severity = 'critical' | 'warning';

export interface NotificationMessage {
  title: string;
  body: string;
  severity: Severity;
  targetUrl: string;
  timestamp: string;
}

export type InvocationState = 'Start' | 'SecretResolved' | 'Probed' | 'Notified' | 'Done' | 'Error';

export interface OutcomeError {
  code: string;
  category: string;
  message: string;
}

export interface InvocationOutcome {
  targetUrl: string | null;
  channel: NotificationChannel | null;
  /** 終止狀態：Done 或 Error */
  state: 'Done' | 'Error';
  /** 經過的狀態序列，由 Start 開始 */
  states: InvocationState[];
  probeResult: ProbeResult | null;
  notificationAttempted: boolean;
  notificationSent: boolean;
  notificationSuppressed: boolean;
  error: OutcomeError | null;
  success: boolean;
  elapsedMs: number;
  timestamp: string;
}
