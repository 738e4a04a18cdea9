import type { LogLevel } from '../../shared/config';

type LogMeta = Record<string, unknown>;

const levelWeights: Record<LogLevel, number> = {
  trace: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  trace: (message: string, meta?: LogMeta) => void;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  /** Returns a logger that adds `bindings` to every entry. */
  child: (bindings: LogMeta) => Logger;
}

export interface LoggerOptions {
  observability: { logLevel: LogLevel };
}

const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
  const base = {
    level,
    message,
    ts: new Date().toISOString(),
    ...meta,
  };
  const payload = JSON.stringify(base);
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

const buildLogger = (threshold: number, bindings: LogMeta): Logger => {
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;
  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (shouldLog(level)) emit(level, message, { ...bindings, ...meta });
  };
  return {
    trace: (message, meta) => write('trace', message, meta),
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    // errors always go out
    error: (message, meta) => emit('error', message, { ...bindings, ...meta }),
    child: (extra) => buildLogger(threshold, { ...bindings, ...extra }),
  };
};

export const createLogger = (config: LoggerOptions): Logger =>
  buildLogger(levelWeights[config.observability.logLevel], {});

export const errorMeta = (error: unknown): LogMeta =>
  error instanceof Error
    ? { error: error.message, stack: error.stack }
    : { error: String(error) };
