/**
 * 錯誤分類
 *
 * configuration：同樣的設定重試也不會成功，立即回報
 * transient：上游暫時性問題，下一次排程就是外層重試
 * internal：非預期錯誤
 */

export type ErrorCategory = 'configuration' | 'transient' | 'internal';

export type ErrorCode =
  | 'ConfigInvalid'
  | 'SecretNotFound'
  | 'SecretMalformed'
  | 'SecretStoreUnavailable'
  | 'ChannelMismatch'
  | 'DeliveryFailed'
  | 'InvocationCancelled'
  | 'Unexpected';

export class MonitorError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;

  constructor(code: ErrorCode, category: ErrorCategory, message: string) {
    super(message);
    this.name = code;
    this.code = code;
    this.category = category;
  }
}

export class ConfigError extends MonitorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('ConfigInvalid', 'configuration', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class SecretNotFoundError extends MonitorError {
  constructor(secretId: string) {
    super('SecretNotFound', 'configuration', `Secret "${secretId}" not found`);
  }
}

export class SecretMalformedError extends MonitorError {
  constructor(secretId: string, reason: string) {
    super('SecretMalformed', 'configuration', `Secret "${secretId}" is malformed: ${reason}`);
  }
}

export class SecretStoreUnavailableError extends MonitorError {
  constructor(reason: string) {
    super('SecretStoreUnavailable', 'transient', `Secret store unavailable: ${reason}`);
  }
}

export class ChannelMismatchError extends MonitorError {
  constructor(expected: string, actual: string) {
    super('ChannelMismatch', 'configuration', `Channel "${expected}" selected but "${actual}" credentials supplied`);
  }
}

export class DeliveryFailedError extends MonitorError {
  constructor(channel: string, reason: string) {
    super('DeliveryFailed', 'transient', `${channel} delivery failed: ${reason}`);
  }
}

export class InvocationCancelledError extends MonitorError {
  constructor(step: string) {
    super('InvocationCancelled', 'transient', `Invocation cancelled during ${step}`);
  }
}

/**
 * 將任意錯誤轉成 MonitorError
 */
export function toMonitorError(error: unknown): MonitorError {
  if (error instanceof MonitorError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new MonitorError('Unexpected', 'internal', message);
}
