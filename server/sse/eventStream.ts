import { toSseEvent, type EventInput, type SseEvent } from '../../shared/sse';
import type { Logger } from '../obs/logger';
import { BoundedQueue, type PutResult } from '../utils/concurrency';
import type { HeartbeatTask } from './heartbeatScheduler';
import type { EventSink, Frame, StreamState, TeardownReason } from './types';

export interface EventStreamArgs {
  id: string;
  inputCapacity: number;
  outboundCapacity: number;
  logger: Logger;
  onClosed?: (stream: EventStream) => void;
}

/**
 * One client's stream: the producer-facing input queue, the outbound frame
 * queue and the heartbeat task. Moves from `open` to `closed` once.
 */
export class EventStream {
  readonly id: string;
  readonly startedAt = Date.now();
  readonly input: BoundedQueue<SseEvent>;
  readonly outbound: BoundedQueue<Frame>;
  readonly sink: EventSink;
  private stateValue: StreamState = 'open';
  private heartbeat: HeartbeatTask | null = null;
  private readonly logger: Logger;
  private readonly onClosed?: (stream: EventStream) => void;

  constructor(args: EventStreamArgs) {
    this.id = args.id;
    this.logger = args.logger;
    this.onClosed = args.onClosed;
    this.outbound = new BoundedQueue<Frame>(args.outboundCapacity);
    this.input = new BoundedQueue<SseEvent>(args.inputCapacity);

    const input = this.input;
    this.sink = {
      // resolved to a tagged event here, once
      put: (event: EventInput): Promise<PutResult> => input.put(toSseEvent(event)),
      close: () => {
        input.close();
      },
      get closed() {
        return input.closed;
      },
    };
  }

  get state(): StreamState {
    return this.stateValue;
  }

  attachHeartbeat(task: HeartbeatTask): void {
    if (this.stateValue === 'closed') {
      task.cancel();
      return;
    }
    this.heartbeat = task;
  }

  /** Asks the pump to finish; buffered events are still written. */
  end(): void {
    if (this.input.close()) {
      this.logger.debug('event stream end requested');
    }
  }

  /** Returns `true` for the call that closed the stream. */
  teardown(reason: TeardownReason): boolean {
    if (this.stateValue === 'closed') {
      return false;
    }
    this.stateValue = 'closed';
    this.heartbeat?.cancel();
    this.heartbeat = null;
    this.input.close();
    this.outbound.close();
    this.logger.debug('event stream closed', { reason, durationMs: Date.now() - this.startedAt });
    this.onClosed?.(this);
    return true;
  }
}
