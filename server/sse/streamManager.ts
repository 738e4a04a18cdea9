import { randomId } from '../../shared/crypto';
import { errorMeta, type Logger } from '../obs/logger';
import { EventStream } from './eventStream';
import { buildResponseHeaders } from './frameEncoder';
import type { HeartbeatScheduler } from './heartbeatScheduler';
import { runStreamPump } from './streamPump';
import {
  END_EVENT_STREAM,
  type ProducerSetup,
  type StartedContext,
  type StreamContext,
  type StreamOptions,
  type StreamState,
} from './types';

export const DEFAULT_STREAM_OPTIONS: StreamOptions = {
  heartbeatDelaySeconds: 10,
  outboundCapacity: 10,
  inputCapacity: 10,
};

export interface StreamManagerArgs {
  scheduler: HeartbeatScheduler;
  logger: Logger;
  defaults?: Partial<StreamOptions>;
}

export interface StartedStream<C extends StreamContext> {
  context: StartedContext<C>;
  end: () => void;
  stream: EventStream;
}

export interface StreamSummary {
  id: string;
  state: StreamState;
  ageMs: number;
  queuedFrames: number;
  queuedEvents: number;
}

export interface StreamManagerStats {
  activeStreams: number;
  startedStreams: number;
  heartbeatTasks: number;
}

export class StreamManager {
  private readonly streams = new Map<string, EventStream>();
  private readonly pumps = new Map<string, Promise<void>>();
  private readonly scheduler: HeartbeatScheduler;
  private readonly logger: Logger;
  private readonly defaults: StreamOptions;
  private started = 0;
  private stopped = false;

  constructor(args: StreamManagerArgs) {
    this.scheduler = args.scheduler;
    this.logger = args.logger;
    this.defaults = { ...DEFAULT_STREAM_OPTIONS, ...args.defaults };
  }

  /**
   * Opens a stream for `context` and returns the context augmented with the
   * response description and an `endEventStream` function. The producer is
   * called on a later turn of the event loop, never inline.
   */
  startStream<C extends StreamContext>(
    producer: ProducerSetup<C>,
    context: C,
    options: Partial<StreamOptions> = {},
  ): StartedStream<C> {
    if (this.stopped) {
      throw new Error('Stream manager has been shut down');
    }
    const settings = { ...this.defaults, ...options };
    const id = randomId();
    const logger = this.logger.child({ streamId: id });

    logger.trace('switching to sse');
    const stream = new EventStream({
      id,
      inputCapacity: settings.inputCapacity,
      outboundCapacity: settings.outboundCapacity,
      logger,
      onClosed: (closed) => {
        this.streams.delete(closed.id);
      },
    });
    // Throws once the scheduler is shut down; nothing is registered yet.
    const heartbeat = this.scheduler.schedule(stream.outbound, settings.heartbeatDelaySeconds, { streamId: id });
    stream.attachHeartbeat(heartbeat);
    this.streams.set(id, stream);
    this.started += 1;

    const response = {
      status: 200,
      headers: buildResponseHeaders(context.corsHeaders),
      body: stream.outbound,
    };

    const end = () => stream.end();
    const started: StartedContext<C> = {
      ...context,
      response,
      streamId: id,
      [END_EVENT_STREAM]: end,
    };

    setImmediate(() => {
      Promise.resolve()
        .then(() => producer(stream.sink, started))
        .catch((error: unknown) => {
          logger.error('producer setup failed', errorMeta(error));
          stream.end();
        });
    });

    const pump = runStreamPump(stream, logger)
      .catch((error: unknown) => {
        logger.error('stream pump failed', errorMeta(error));
        stream.teardown('pump-failed');
      })
      .finally(() => {
        this.pumps.delete(id);
      });
    this.pumps.set(id, pump);

    logger.debug('event stream started', {
      heartbeatDelaySeconds: settings.heartbeatDelaySeconds,
      outboundCapacity: settings.outboundCapacity,
      activeStreams: this.streams.size,
    });

    return { context: started, end, stream };
  }

  get(id: string): EventStream | undefined {
    return this.streams.get(id);
  }

  list(): StreamSummary[] {
    const now = Date.now();
    return [...this.streams.values()].map((stream) => ({
      id: stream.id,
      state: stream.state,
      ageMs: now - stream.startedAt,
      queuedFrames: stream.outbound.size,
      queuedEvents: stream.input.size,
    }));
  }

  /** Returns `false` when no live stream has this id. */
  endStream(id: string): boolean {
    const stream = this.streams.get(id);
    if (!stream) {
      return false;
    }
    stream.end();
    return true;
  }

  stats(): StreamManagerStats {
    return {
      activeStreams: this.streams.size,
      startedStreams: this.started,
      heartbeatTasks: this.scheduler.activeTasks,
    };
  }

  /**
   * Closes every live stream without waiting for producers, and resolves once
   * their pumps have returned. The heartbeat scheduler is left to its owner.
   */
  async shutdown(): Promise<void> {
    this.stopped = true;
    const pending = [...this.pumps.values()];
    for (const stream of [...this.streams.values()]) {
      stream.teardown('shutdown');
    }
    await Promise.all(pending);
    this.logger.info('Stream manager stopped', { startedStreams: this.started });
  }
}

export const endEventStream = <C extends StreamContext>(context: StartedContext<C>): void => {
  context[END_EVENT_STREAM]();
};
