import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger } from '../src/utils/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-19T08:30:05.000Z'));
    vi.stubEnv('TZ', 'UTC');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should prefix messages with timestamp and module', () => {
    createLogger('Probe').info('GET https://example.com');
    expect(console.log).toHaveBeenCalledWith('[2026-10-19 08:30:05] [Probe] GET https://example.com');
  });

  it('should pass extra arguments through', () => {
    const error = new Error('disk full');
    createLogger('Monitor').warn('Failed to record alert state:', error);
    expect(console.warn).toHaveBeenCalledWith('[2026-10-19 08:30:05] [Monitor] Failed to record alert state:', error);
  });

  it('should only print debug output when DEBUG is set', () => {
    const logger = createLogger('SecretResolver');
    vi.stubEnv('DEBUG', '');
    logger.debug('hidden');
    expect(console.log).not.toHaveBeenCalled();

    vi.stubEnv('DEBUG', '1');
    logger.debug('shown');
    expect(console.log).toHaveBeenCalledWith('[2026-10-19 08:30:05] [SecretResolver] [DEBUG] shown');
  });

  it('should write records as a single JSON line', () => {
    createLogger('Run').record({ event: 'health_check', success: true, http_status: null });
    expect(console.log).toHaveBeenCalledWith('{"event":"health_check","success":true,"http_status":null}');
  });
});
