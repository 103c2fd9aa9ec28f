import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { NotificationChannel, ProbeMethod } from './types.js';

export type SecretStoreType = 'aws' | 'file';

export interface MonitorConfig {
  targetUrl: string;
  notificationType: NotificationChannel;
  secretId: string;
  secretStore: SecretStoreType;
  secretFileDir: string;
  awsRegion?: string;
  probeTimeoutMs: number;
  probeMethod: ProbeMethod;
  probeFollowRedirects: boolean;
  secretTimeoutMs: number;
  notifyTimeoutMs: number;
  notifyRetryDelayMs: number;
  invocationTimeoutMs?: number;
  alertDedup: boolean;
  alertStatePath: string;
  scheduleCron: string;
}

export const DEFAULT_SCHEDULE_CRON = '*/5 * * * *';

// 環境變數中的空字串視同未設定
const unset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

export function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const milliseconds = (fallback: number) =>
  z.preprocess(unset, z.coerce.number().int().positive().default(fallback));

const flag = (fallback: boolean) =>
  z.preprocess(
    unset,
    z
      .enum(['true', 'false', '1', '0'])
      .default(fallback ? 'true' : 'false')
      .transform((value) => value === 'true' || value === '1')
  );

const envSchema = z.object({
  TARGET_URL: z.preprocess(unset, z.string().refine(isHttpUrl, 'Must be an absolute http(s) URL')),
  NOTIFICATION_TYPE: z.preprocess(
    (value) => (typeof unset(value) === 'string' ? String(value).trim().toLowerCase() : undefined),
    z.enum(['slack', 'telegram']).default('slack')
  ),
  SECRET_ID: z.preprocess(unset, z.string()),
  SECRET_STORE: z.preprocess(unset, z.enum(['aws', 'file']).default('aws')),
  SECRET_FILE_DIR: z.preprocess(unset, z.string().default(process.cwd())),
  AWS_REGION: z.preprocess(unset, z.string().optional()),
  PROBE_TIMEOUT_MS: milliseconds(10_000),
  PROBE_METHOD: z.preprocess(
    (value) => (typeof unset(value) === 'string' ? String(value).trim().toUpperCase() : undefined),
    z.enum(['GET', 'HEAD']).default('GET')
  ),
  PROBE_FOLLOW_REDIRECTS: flag(true),
  SECRET_TIMEOUT_MS: milliseconds(5_000),
  NOTIFY_TIMEOUT_MS: milliseconds(10_000),
  NOTIFY_RETRY_DELAY_MS: z.preprocess(unset, z.coerce.number().int().min(0).default(2_000)),
  INVOCATION_TIMEOUT_MS: z.preprocess(unset, z.coerce.number().int().positive().optional()),
  ALERT_DEDUP: flag(false),
  ALERT_STATE_PATH: z.preprocess(unset, z.string().default('data/alert-state.json')),
  SCHEDULE_CRON: z.preprocess(unset, z.string().default(DEFAULT_SCHEDULE_CRON)),
});

/**
 * 從環境變數讀取設定
 *
 * SECRET_NAME 為 SECRET_ID 的別名。任何欄位不合法時丟出 ConfigError，列出所有問題。
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = envSchema.safeParse({
    ...env,
    SECRET_ID: unset(env.SECRET_ID) ?? env.SECRET_NAME,
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const data = parsed.data;
  return {
    targetUrl: data.TARGET_URL,
    notificationType: data.NOTIFICATION_TYPE,
    secretId: data.SECRET_ID,
    secretStore: data.SECRET_STORE,
    secretFileDir: data.SECRET_FILE_DIR,
    awsRegion: data.AWS_REGION,
    probeTimeoutMs: data.PROBE_TIMEOUT_MS,
    probeMethod: data.PROBE_METHOD,
    probeFollowRedirects: data.PROBE_FOLLOW_REDIRECTS,
    secretTimeoutMs: data.SECRET_TIMEOUT_MS,
    notifyTimeoutMs: data.NOTIFY_TIMEOUT_MS,
    notifyRetryDelayMs: data.NOTIFY_RETRY_DELAY_MS,
    invocationTimeoutMs: data.INVOCATION_TIMEOUT_MS,
    alertDedup: data.ALERT_DEDUP,
    alertStatePath: data.ALERT_STATE_PATH,
    scheduleCron: data.SCHEDULE_CRON,
  };
}

/**
 * daemon 模式的排程；其他設定有誤時仍用預設排程啟動，錯誤留給每次執行回報
 */
export function loadScheduleCron(env: NodeJS.ProcessEnv = process.env): string {
  try {
    return loadConfig(env).scheduleCron;
  } catch (error) {
    if (error instanceof ConfigError) {
      return DEFAULT_SCHEDULE_CRON;
    }
    throw error;
  }
}
