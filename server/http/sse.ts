import type { OutgoingHttpHeaders } from 'node:http';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { errorMeta, type Logger } from '../obs/logger';
import type { StreamManager } from '../sse/streamManager';
import type { ProducerSetup, SseResponse, StreamContext, StreamOptions } from '../sse/types';
import { onceAny } from '../utils/async';

/** The slice of `http.ServerResponse` the writer needs. */
export interface SseResponseTarget {
  writeHead: (statusCode: number, headers: Record<string, string>) => unknown;
  write: (chunk: Uint8Array) => boolean;
  end: () => unknown;
  on: (event: string, listener: () => void) => unknown;
  once: (event: string, listener: () => void) => unknown;
  off: (event: string, listener: () => void) => unknown;
  flushHeaders?: () => void;
  readonly destroyed: boolean;
}

export interface PipeOptions {
  onDisconnect: () => void;
  logger: Logger;
}

export interface RequestStreamContext extends StreamContext {
  request: Request;
}

/** Collects the `Access-Control-*` headers an earlier middleware already set. */
export const corsHeadersFrom = (res: { getHeaders: () => OutgoingHttpHeaders }): Record<string, string> => {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(res.getHeaders())) {
    if (!name.toLowerCase().startsWith('access-control-') || value == null) continue;
    headers[name] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return headers;
};

/**
 * Writes the response description and every outbound frame to `res`, honoring
 * `drain`. When the client goes away early, `onDisconnect` is called once and
 * the remaining frames are discarded until the queue closes.
 */
export const pipeEventStream = async (
  res: SseResponseTarget,
  response: SseResponse,
  { onDisconnect, logger }: PipeOptions,
): Promise<void> => {
  let finished = false;
  let disconnected = false;
  const onClose = () => {
    if (finished || disconnected) return;
    disconnected = true;
    logger.debug('SSE client disconnected');
    onDisconnect();
  };

  res.writeHead(response.status, response.headers);
  res.flushHeaders?.();
  res.on('close', onClose);

  let frames = 0;
  try {
    for (;;) {
      const next = await response.body.take();
      if (next.done) break;
      if (disconnected || res.destroyed) continue;

      frames += 1;
      if (!res.write(next.value.bytes)) {
        await onceAny(res, ['drain', 'close']);
      }
    }
  } finally {
    finished = true;
    res.off('close', onClose);
  }

  if (!res.destroyed) {
    res.end();
  }
  logger.debug('SSE response finished', { frames, disconnected });
};

export type EventStreamTarget = SseResponseTarget & {
  getHeaders: () => OutgoingHttpHeaders;
  locals: Record<string, unknown>;
};

export interface ServeOptions {
  logger: Logger;
  options?: Partial<StreamOptions>;
}

/**
 * Opens a stream for `context` and writes it to `res`. `res.locals.streamId`
 * is set before the body starts. If writing fails the stream is torn down
 * and the error is rethrown.
 */
export const serveEventStream = async <C extends StreamContext>(
  manager: StreamManager,
  producer: ProducerSetup<C>,
  res: EventStreamTarget,
  context: C,
  { logger, options = {} }: ServeOptions,
): Promise<void> => {
  const { context: started, end, stream } = manager.startStream<C>(
    producer,
    { ...context, corsHeaders: { ...corsHeadersFrom(res), ...context.corsHeaders } },
    options,
  );
  res.locals.streamId = started.streamId;
  const streamLogger = logger.child({ streamId: started.streamId });

  try {
    await pipeEventStream(res, started.response, { onDisconnect: end, logger: streamLogger });
  } catch (error) {
    streamLogger.error('SSE response failed', errorMeta(error));
    stream.teardown('write-failed');
    throw error;
  }
};

/** Express handler that opens a stream for each request and streams it back. */
export const eventStreamHandler = (
  manager: StreamManager,
  producer: ProducerSetup<RequestStreamContext>,
  logger: Logger,
  options: Partial<StreamOptions> = {},
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    serveEventStream<RequestStreamContext>(
      manager,
      producer,
      res,
      { request: req },
      { logger: logger.child({ path: req.path }), options },
    ).catch(next);
  };
};
