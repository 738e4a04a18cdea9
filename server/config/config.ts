import { ConfigSchema, LOG_LEVELS, type AppConfig, type LogLevel, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const logLevelFromEnv = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = (value ?? '').trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? fallback;
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

const buildConfig = (): AppConfig => {
  const environment = (process.env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(process.env.PORT, 3001),
    },
    sse: {
      heartbeatDelaySeconds: numberFromEnv(process.env.SSE_HEARTBEAT_DELAY_SECONDS, 10),
      outboundCapacity: numberFromEnv(process.env.SSE_OUTBOUND_CAPACITY, 10),
      inputCapacity: numberFromEnv(process.env.SSE_INPUT_CAPACITY, 10),
    },
    cors: {
      allowOrigin: process.env.CORS_ALLOW_ORIGIN?.trim() || '*',
    },
    observability: {
      logLevel: logLevelFromEnv(process.env.LOG_LEVEL, 'info'),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
