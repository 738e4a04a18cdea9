import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  sse: z.object({
    heartbeatDelaySeconds: z.number().positive(),
    outboundCapacity: z.number().int().nonnegative(),
    inputCapacity: z.number().int().nonnegative(),
  }),
  cors: z.object({
    allowOrigin: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(LOG_LEVELS),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = AppConfig['observability']['logLevel'];

export interface PublicConfig {
  sse: {
    heartbeatDelaySeconds: number;
    outboundCapacity: number;
    inputCapacity: number;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  sse: {
    heartbeatDelaySeconds: config.sse.heartbeatDelaySeconds,
    outboundCapacity: config.sse.outboundCapacity,
    inputCapacity: config.sse.inputCapacity,
  },
});

/**
 * Reads an integer query parameter and clamps it into `[min, max]`.
 * Missing or non-numeric input yields the fallback.
 */
export const parseBoundedIntParam = (
  value: unknown,
  bounds: { min: number; max: number; fallback: number },
): number => {
  if (value == null || (typeof value === 'string' && value.trim() === '')) {
    return bounds.fallback;
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    return bounds.fallback;
  }
  return Math.max(bounds.min, Math.min(bounds.max, Math.round(n)));
};
