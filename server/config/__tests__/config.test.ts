import { afterEach, describe, expect, it, vi } from 'vitest';
import { refreshConfig } from '../config';

const clearEnv = () => {
  vi.stubEnv('NODE_ENV', 'test');
  for (const name of [
    'PORT',
    'SSE_HEARTBEAT_DELAY_SECONDS',
    'SSE_OUTBOUND_CAPACITY',
    'SSE_INPUT_CAPACITY',
    'CORS_ALLOW_ORIGIN',
    'LOG_LEVEL',
  ]) {
    vi.stubEnv(name, '');
  }
};

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to defaults when the environment is empty', () => {
    clearEnv();

    expect(refreshConfig()).toEqual({
      environment: 'test',
      server: { port: 3001 },
      sse: { heartbeatDelaySeconds: 10, outboundCapacity: 10, inputCapacity: 10 },
      cors: { allowOrigin: '*' },
      observability: { logLevel: 'info' },
    });
  });

  it('reads stream settings and log level from the environment', () => {
    clearEnv();
    vi.stubEnv('PORT', '8080');
    vi.stubEnv('SSE_HEARTBEAT_DELAY_SECONDS', '2.5');
    vi.stubEnv('SSE_OUTBOUND_CAPACITY', '4');
    vi.stubEnv('SSE_INPUT_CAPACITY', 'abc');
    vi.stubEnv('CORS_ALLOW_ORIGIN', ' https://app.example ');
    vi.stubEnv('LOG_LEVEL', 'TRACE');

    const config = refreshConfig();

    expect(config.server.port).toBe(8080);
    expect(config.sse).toEqual({ heartbeatDelaySeconds: 2.5, outboundCapacity: 4, inputCapacity: 10 });
    expect(config.cors.allowOrigin).toBe('https://app.example');
    expect(config.observability.logLevel).toBe('trace');
  });

  it('ignores an unknown log level', () => {
    clearEnv();
    vi.stubEnv('LOG_LEVEL', 'verbose');

    expect(refreshConfig().observability.logLevel).toBe('info');
  });

  it('rejects a negative queue capacity', () => {
    clearEnv();
    vi.stubEnv('SSE_OUTBOUND_CAPACITY', '-1');

    expect(() => refreshConfig()).toThrow();
  });
});
