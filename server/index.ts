import 'dotenv/config';
import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import { loadConfig, getPublicConfig } from './config/config';
import { parseBoundedIntParam } from '../shared/config';
import { requestLogger } from './http/requestLog';
import { eventStreamHandler } from './http/sse';
import { createLogger } from './obs/logger';
import { runClock } from './producers/clockProducer';
import { HeartbeatScheduler } from './sse/heartbeatScheduler';
import { StreamManager } from './sse/streamManager';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  sse: config.sse,
  corsAllowOrigin: config.cors.allowOrigin,
});

const scheduler = new HeartbeatScheduler(logger.child({ component: 'heartbeat' }));
const manager = new StreamManager({
  scheduler,
  logger: logger.child({ component: 'sse' }),
  defaults: config.sse,
});

const app = express();

app.use(cors({ origin: config.cors.allowOrigin }));
app.use(express.json({ limit: '1mb' }));

if (config.observability.logLevel === 'debug' || config.observability.logLevel === 'trace') {
  app.use(requestLogger(logger.child({ component: 'http' })));
}

app.get('/api/healthz', (_req: Request, res: Response) => {
  res.json({ ok: true, ts: new Date().toISOString(), streams: manager.stats() });
});

app.get('/api/config', (_req: Request, res: Response) => {
  res.json(getPublicConfig(config));
});

app.get('/api/streams', (_req: Request, res: Response) => {
  res.json({ streams: manager.list() });
});

app.delete('/api/streams/:id', (req: Request, res: Response) => {
  const id = String(req.params.id || '').trim();
  if (!manager.endStream(id)) {
    res.status(404).json({ error: 'Not found' });
    return;
  }
  res.status(204).end();
});

app.get(
  '/api/events/clock',
  eventStreamHandler(
    manager,
    (events, context) =>
      runClock(events, {
        count: parseBoundedIntParam(context.request.query.count, { min: 1, max: 1000, fallback: 10 }),
        intervalMs: parseBoundedIntParam(context.request.query.intervalMs, { min: 100, max: 60_000, fallback: 1000 }),
        logger: logger.child({ streamId: context.streamId, producer: 'clock' }),
      }),
    logger,
  ),
);

const port = config.server.port;

const server = app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});

let stopping = false;
const stop = (signal: string) => {
  if (stopping) return;
  stopping = true;
  logger.info('Shutting down', { signal });
  manager
    .shutdown()
    .then(() => {
      scheduler.shutdown();
      server.close((error) => {
        if (error) {
          logger.error('Server close failed', { error: error.message });
          process.exitCode = 1;
        }
      });
    })
    .catch((error: unknown) => {
      logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
};

process.on('SIGINT', () => stop('SIGINT'));
process.on('SIGTERM', () => stop('SIGTERM'));
