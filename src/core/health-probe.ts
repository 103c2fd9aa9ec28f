import { createDeadline } from '../utils/abort.js';
import { createLogger } from '../utils/logger.js';
import { describeTransportError } from '../utils/http.js';
import { redactUrl } from '../utils/url.js';
import { USER_AGENT } from '../version.js';
import type { ProbeMethod, ProbeResult, ProbeTarget } from './types.js';

const logger = createLogger('Probe');

export interface HealthProbeConfig {
  method?: ProbeMethod;
  followRedirects?: boolean;
}

/**
 * 依 HTTP 狀態碼分類：200–399 健康，其餘伺服器回應皆視為不健康
 */
export function classifyStatus(statusCode: number): 'healthy' | 'unhealthy' {
  return statusCode >= 200 && statusCode <= 399 ? 'healthy' : 'unhealthy';
}

/**
 * 將 URL 內的帳號密碼改為 Basic 認證標頭
 *
 * fetch 不接受帶帳密的 URL；回傳的 url 已去除帳密。
 */
export function extractBasicAuth(url: string): { url: string; authorization: string | null } {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { url, authorization: null };
  }
  if (!parsed.username && !parsed.password) {
    return { url, authorization: null };
  }

  const credentials = `${decodeURIComponent(parsed.username)}:${decodeURIComponent(parsed.password)}`;
  return {
    url: redactUrl(url),
    authorization: `Basic ${Buffer.from(credentials, 'utf-8').toString('base64')}`,
  };
}

/**
 * HTTP 健康探測
 *
 * 每次只發一個請求，不重試；重試節奏交給外部排程。
 * target.timeoutMs 涵蓋連線、回應標頭與讀完 body。
 */
export class HealthProbe {
  private method: ProbeMethod;
  private followRedirects: boolean;

  constructor(config?: HealthProbeConfig) {
    this.method = config?.method ?? 'GET';
    this.followRedirects = config?.followRedirects ?? true;
  }

  async check(target: ProbeTarget, signal?: AbortSignal): Promise<ProbeResult> {
    const { url, authorization } = extractBasicAuth(target.url);
    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    if (authorization) {
      headers.Authorization = authorization;
    }

    const deadline = createDeadline(target.timeoutMs, signal);
    const start = Date.now();

    logger.info(`${this.method} ${url} (timeout ${target.timeoutMs}ms)`);

    try {
      const response = await fetch(url, {
        method: this.method,
        redirect: this.followRedirects ? 'follow' : 'manual',
        signal: deadline.signal,
        headers,
      });

      // 讀完 body 才算完成
      await response.arrayBuffer();

      const latencyMs = Date.now() - start;
      const status = classifyStatus(response.status);
      logger.info(`Response ${response.status} in ${latencyMs}ms (${status})`);

      return { status, statusCode: response.status, latencyMs };
    } catch (error) {
      const latencyMs = Date.now() - start;
      let detail: string;
      if (deadline.timedOut()) {
        detail = `Timeout after ${target.timeoutMs}ms`;
      } else if (signal?.aborted) {
        detail = 'Probe cancelled';
      } else {
        detail = describeTransportError(error);
      }

      logger.warn(`Unreachable after ${latencyMs}ms: ${detail}`);
      return { status: 'unreachable', error: detail, latencyMs };
    } finally {
      deadline.clear();
    }
  }
}
