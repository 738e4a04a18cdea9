import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HeartbeatScheduler } from '../heartbeatScheduler';
import { StreamManager, endEventStream } from '../streamManager';
import type { PutResult } from '../../utils/concurrency';
import type { Logger } from '../../obs/logger';
import { collectFrames, createTestLogger, decodeFrame, flush } from '../../__tests__/helpers';

describe('StreamManager', () => {
  let logger: Logger;
  let scheduler: HeartbeatScheduler;
  let manager: StreamManager;

  beforeEach(() => {
    logger = createTestLogger();
    scheduler = new HeartbeatScheduler(logger);
    manager = new StreamManager({ scheduler, logger });
  });

  afterEach(async () => {
    await manager.shutdown();
    scheduler.shutdown();
    vi.useRealTimers();
  });

  it('describes the response with the stream headers and caller CORS headers', () => {
    const { context } = manager.startStream(() => undefined, {
      corsHeaders: { 'Access-Control-Allow-Origin': 'https://app.example' },
    });

    expect(context.response.status).toBe(200);
    expect(context.response.headers).toEqual({
      'Content-Type': 'text/event-stream; charset=UTF-8',
      Connection: 'close',
      'Cache-Control': 'no-cache',
      'Access-Control-Allow-Origin': 'https://app.example',
    });
    expect(context.corsHeaders).toEqual({ 'Access-Control-Allow-Origin': 'https://app.example' });
    expect(typeof context.endEventStream).toBe('function');
    expect(typeof context.streamId).toBe('string');
  });

  it('writes a heartbeat first and calls the producer on a later turn', async () => {
    const producer = vi.fn();
    const { context } = manager.startStream(producer, {});

    expect(producer).not.toHaveBeenCalled();
    expect(await context.response.body.take()).toEqual({
      done: false,
      value: { kind: 'heartbeat', bytes: new Uint8Array([13, 10]) },
    });

    await flush();
    expect(producer).toHaveBeenCalledTimes(1);
    expect(producer).toHaveBeenCalledWith(expect.objectContaining({ put: expect.any(Function) }), context);
  });

  it('streams every produced event in order and then closes', async () => {
    const { context } = manager.startStream(async (events) => {
      for (const n of [1, 2, 3]) {
        await events.put({ name: 'n', data: n });
      }
      events.close();
    }, {});

    const frames = await collectFrames(context.response.body);

    expect(frames.map((frame) => frame.kind)).toEqual(['heartbeat', 'event', 'event', 'event']);
    expect(frames.filter((frame) => frame.kind === 'event').map(decodeFrame)).toEqual(
      [1, 2, 3].map((n) => `event: n\r\ndata: ${n}\r\n\r\n`),
    );
    expect(manager.stats()).toEqual({ activeStreams: 0, startedStreams: 1, heartbeatTasks: 0 });
  });

  it('tears down once however many times end is called', async () => {
    let cancelCalls = 0;
    const schedule = scheduler.schedule.bind(scheduler);
    vi.spyOn(scheduler, 'schedule').mockImplementation((target, delaySeconds, meta) => {
      const task = schedule(target, delaySeconds, meta);
      return {
        get cancelled() {
          return task.cancelled;
        },
        cancel: () => {
          cancelCalls += 1;
          return task.cancel();
        },
      };
    });

    const { context, end, stream } = manager.startStream(() => undefined, {});
    const close = vi.spyOn(context.response.body, 'close');

    end();
    endEventStream(context);
    await collectFrames(context.response.body);
    end();

    expect(stream.state).toBe('closed');
    expect(cancelCalls).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('ends the stream when the producer throws', async () => {
    const { context, stream } = manager.startStream(() => {
      throw new Error('boom');
    }, {});

    const frames = await collectFrames(context.response.body);

    expect(frames.map((frame) => frame.kind)).toEqual(['heartbeat']);
    expect(stream.state).toBe('closed');
    expect(logger.error).toHaveBeenCalledWith('producer setup failed', expect.objectContaining({ error: 'boom' }));
  });

  it('flushes buffered events before ending a stream whose producer rejects', async () => {
    const { context } = manager.startStream(async (events) => {
      await events.put('before');
      throw new Error('late');
    }, {});

    const frames = await collectFrames(context.response.body);

    expect(frames.map(decodeFrame)).toEqual(['\r\n', 'event: event\r\ndata: before\r\n\r\n']);
    expect(logger.error).toHaveBeenCalledWith('producer setup failed', expect.objectContaining({ error: 'late' }));
  });

  it('parks the producer while the writer is not draining', async () => {
    const puts: PutResult[] = [];
    const { context, stream } = manager.startStream(
      async (events) => {
        puts.push(await events.put('a'));
        puts.push(await events.put('b'));
      },
      {},
      { outboundCapacity: 1, inputCapacity: 0 },
    );
    await flush();

    expect(puts).toEqual([{ ok: true }]);
    expect(stream.outbound.pendingPuts).toBe(1);

    const heartbeat = await context.response.body.take();
    expect(heartbeat.done).toBe(false);
    await flush();

    expect(puts).toEqual([{ ok: true }, { ok: true }]);
  });

  it('leaves no heartbeat task behind once the producer closes', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const { context } = manager.startStream((events) => events.close(), {}, { heartbeatDelaySeconds: 1 });

    await collectFrames(context.response.body);
    await vi.advanceTimersByTimeAsync(5000);

    expect(scheduler.activeTasks).toBe(0);
    expect(context.response.body.size).toBe(0);
  });

  it('lists live streams and ends them by id', async () => {
    const { stream } = manager.startStream(() => undefined, {});

    expect(manager.list()).toEqual([
      expect.objectContaining({ id: stream.id, state: 'open', queuedFrames: 1, queuedEvents: 0 }),
    ]);
    expect(manager.get(stream.id)).toBe(stream);
    expect(manager.endStream('missing')).toBe(false);
    expect(manager.endStream(stream.id)).toBe(true);

    await collectFrames(stream.outbound);
    expect(manager.list()).toEqual([]);
  });

  it('closes live streams on shutdown and refuses new ones', async () => {
    const { context, stream } = manager.startStream(() => undefined, {});

    await manager.shutdown();

    expect(stream.state).toBe('closed');
    expect(context.response.body.closed).toBe(true);
    expect(manager.stats()).toEqual({ activeStreams: 0, startedStreams: 1, heartbeatTasks: 0 });
    expect(() => manager.startStream(() => undefined, {})).toThrow('Stream manager has been shut down');
  });

  it('registers nothing when the heartbeat scheduler is already stopped', () => {
    scheduler.shutdown();

    expect(() => manager.startStream(() => undefined, {})).toThrow('Heartbeat scheduler has been shut down');
    expect(manager.list()).toEqual([]);
    expect(manager.stats()).toEqual({ activeStreams: 0, startedStreams: 0, heartbeatTasks: 0 });
  });
});
