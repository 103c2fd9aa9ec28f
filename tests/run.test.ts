import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runHealthCheck } from '../src/core/run.js';

const TARGET = 'https://example.com';
const WEBHOOK = 'https://hooks.slack.example/services/test';

describe('runHealthCheck', () => {
  let dir: string;
  let fetchMock: ReturnType<typeof vi.fn>;

  function baseEnv(overrides: Record<string, string> = {}): NodeJS.ProcessEnv {
    return {
      TARGET_URL: TARGET,
      NOTIFICATION_TYPE: 'slack',
      SECRET_STORE: 'file',
      SECRET_FILE_DIR: dir,
      SECRET_ID: 'channels.json',
      NOTIFY_RETRY_DELAY_MS: '0',
      ...overrides,
    };
  }

  // 取出 stdout 上的結構化紀錄
  function outcomeRecords(): Array<Record<string, unknown>> {
    return vi
      .mocked(console.log)
      .mock.calls
      .map((call) => call[0])
      .filter((line): line is string => typeof line === 'string' && line.startsWith('{'))
      .map((line) => JSON.parse(line));
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'health-notifier-run-'));
    await writeFile(
      join(dir, 'channels.json'),
      JSON.stringify({ slack_webhook_url: WEBHOOK, telegram_bot_token: 'test-token' })
    );
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('scenario A: healthy target is not notified', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<h1>Welcome</h1>', { status: 200 }));

    const outcome = await runHealthCheck({ env: baseEnv() });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({
      state: 'Done',
      probeResult: { status: 'healthy', statusCode: 200 },
      notificationAttempted: false,
      success: true,
    });

    const records = outcomeRecords();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      event: 'health_check',
      target_url: TARGET,
      channel: 'slack',
      classification: 'healthy',
      http_status: 200,
      error_code: null,
      probe_error: null,
      notify_attempted: false,
      notify_succeeded: false,
      success: true,
    });
  });

  it('scenario B: timeout is reported through Slack', async () => {
    fetchMock.mockImplementation((url: string, init?: RequestInit) => {
      if (url === WEBHOOK) {
        return Promise.resolve(new Response('ok', { status: 200 }));
      }
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
      });
    });

    const outcome = await runHealthCheck({ env: baseEnv({ PROBE_TIMEOUT_MS: '50' }) });

    expect(outcome).toMatchObject({
      state: 'Done',
      probeResult: { status: 'unreachable', error: 'Timeout after 50ms' },
      notificationAttempted: true,
      notificationSent: true,
      success: true,
    });
    expect(outcomeRecords()[0]).toMatchObject({
      classification: 'unreachable',
      http_status: null,
      error_detail: 'Timeout after 50ms',
      probe_error: 'Timeout after 50ms',
      notify_attempted: true,
      notify_succeeded: true,
    });
  });

  it('scenario C: missing telegram_chat_id fails before probing', async () => {
    const outcome = await runHealthCheck({ env: baseEnv({ NOTIFICATION_TYPE: 'telegram' }) });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({
      state: 'Error',
      probeResult: null,
      success: false,
      error: { code: 'SecretMalformed' },
    });

    const records = outcomeRecords();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      classification: 'error',
      error_code: 'SecretMalformed',
      error_detail: 'Secret "channels.json" is malformed: telegram_chat_id missing or empty',
      notify_attempted: false,
    });
  });

  it('scenario D: HTTP 503 is reported with the status in the body', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('Service Unavailable', { status: 503 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));

    const outcome = await runHealthCheck({ env: baseEnv() });

    expect(outcome).toMatchObject({
      probeResult: { status: 'unhealthy', statusCode: 503 },
      notificationAttempted: true,
      notificationSent: true,
    });
    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe(WEBHOOK);
    expect(JSON.parse(init.body).text).toContain('HTTP 503');
  });

  it('should fail the invocation when delivery fails after one retry', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(null, { status: 500 }))
      .mockImplementation(async () => new Response('rate limited', { status: 429 }));

    const outcome = await runHealthCheck({ env: baseEnv() });

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({
      state: 'Done',
      probeResult: { status: 'unhealthy', statusCode: 500 },
      notificationSent: false,
      success: false,
      error: { code: 'DeliveryFailed' },
    });
  });

  it('should keep the probe diagnostic when delivery also fails', async () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' });
    fetchMock.mockImplementation(async (url: string) => {
      if (url === WEBHOOK) {
        return new Response(null, { status: 500 });
      }
      throw new TypeError('fetch failed', { cause });
    });

    const outcome = await runHealthCheck({ env: baseEnv() });

    expect(outcome).toMatchObject({ success: false, error: { code: 'DeliveryFailed' } });
    expect(outcomeRecords()[0]).toMatchObject({
      classification: 'unreachable',
      http_status: null,
      error_code: 'DeliveryFailed',
      error_detail: 'slack delivery failed: Slack webhook responded 500',
      probe_error: 'connect ECONNREFUSED 127.0.0.1:9',
      notify_attempted: true,
      notify_succeeded: false,
    });
  });

  it('should emit an error record for invalid configuration', async () => {
    const outcome = await runHealthCheck({ env: { NOTIFICATION_TYPE: 'slack' } });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ state: 'Error', error: { code: 'ConfigInvalid' } });

    const records = outcomeRecords();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ classification: 'error', error_code: 'ConfigInvalid', target_url: null });
  });

  it('should report an unknown secret as not found', async () => {
    const outcome = await runHealthCheck({ env: baseEnv({ SECRET_ID: 'missing.json' }) });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(outcome.error?.code).toBe('SecretNotFound');
  });

  it('should never log the webhook URL', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(null, { status: 502 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));

    await runHealthCheck({ env: baseEnv() });

    const logged = [vi.mocked(console.log), vi.mocked(console.warn), vi.mocked(console.error)]
      .flatMap((spy) => spy.mock.calls.flat())
      .map((arg) => String(arg))
      .join('\n');
    expect(logged).not.toContain(WEBHOOK);
  });

  it('should suppress repeats when de-duplication is enabled', async () => {
    fetchMock.mockImplementation(async (url: string) =>
      url === WEBHOOK ? new Response('ok', { status: 200 }) : new Response(null, { status: 503 })
    );
    const env = baseEnv({ ALERT_DEDUP: 'true', ALERT_STATE_PATH: join(dir, 'state', 'alerts.json') });

    const first = await runHealthCheck({ env });
    const second = await runHealthCheck({ env });

    expect(first.notificationSent).toBe(true);
    expect(second).toMatchObject({ notificationAttempted: false, notificationSuppressed: true, success: true });
    expect(fetchMock.mock.calls.filter(([url]) => url === WEBHOOK)).toHaveLength(1);
  });

  it('should cancel the invocation when the external deadline passes', async () => {
    fetchMock.mockImplementation(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );

    const outcome = await runHealthCheck({ env: baseEnv(), deadlineMs: 30 });

    expect(outcome).toMatchObject({
      state: 'Error',
      probeResult: { status: 'unreachable', error: 'Probe cancelled' },
      notificationAttempted: false,
      error: { code: 'InvocationCancelled' },
    });
    expect(outcomeRecords()).toHaveLength(1);
  });
});
