import type { Logger } from '../obs/logger';

interface LoggedRequest {
  method: string;
  originalUrl: string;
}

interface LoggedResponse {
  statusCode: number;
  locals: Record<string, unknown>;
  on: (event: 'finish' | 'close', listener: () => void) => unknown;
}

const streamIdOf = (res: LoggedResponse): string | undefined =>
  typeof res.locals.streamId === 'string' ? res.locals.streamId : undefined;

/**
 * Debug middleware logging each request and how it ended. Event streams are
 * tagged with the id `serveEventStream` stores in `res.locals`.
 */
export const requestLogger =
  (logger: Logger, now: () => number = Date.now) =>
  (req: LoggedRequest, res: LoggedResponse, next: () => void): void => {
    const startedAt = now();
    const request = { method: req.method, path: req.originalUrl };
    logger.debug('HTTP request', request);

    let finished = false;
    res.on('finish', () => {
      finished = true;
      logger.debug('HTTP response', {
        ...request,
        status: res.statusCode,
        streamId: streamIdOf(res),
        elapsedMs: now() - startedAt,
      });
    });
    res.on('close', () => {
      if (finished) return;
      logger.debug('HTTP closed early', { ...request, streamId: streamIdOf(res), elapsedMs: now() - startedAt });
    });
    next();
  };
