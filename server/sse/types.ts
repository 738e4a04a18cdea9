import type { EventInput } from '../../shared/sse';
import type { BoundedQueue, PutResult } from '../utils/concurrency';

export type FrameKind = 'event' | 'heartbeat';

export interface Frame {
  readonly kind: FrameKind;
  readonly bytes: Uint8Array;
}

export type StreamState = 'open' | 'closed';

export type TeardownReason = 'completed' | 'write-failed' | 'pump-failed' | 'shutdown';

/** Producer-facing end of a stream's input queue. */
export interface EventSink {
  /** Suspends while the input queue is full. */
  put: (event: EventInput) => Promise<PutResult>;
  close: () => void;
  readonly closed: boolean;
}

export interface SseResponse {
  status: number;
  headers: Record<string, string>;
  /** Drained by the response writer; the pump and heartbeat task are its only writers. */
  body: BoundedQueue<Frame>;
}

export interface StreamContext {
  corsHeaders?: Record<string, string>;
}

export const END_EVENT_STREAM = 'endEventStream';

export type StartedContext<C extends StreamContext> = C & {
  response: SseResponse;
  streamId: string;
  [END_EVENT_STREAM]: () => void;
};

export type ProducerSetup<C extends StreamContext> = (
  events: EventSink,
  context: StartedContext<C>,
) => void | Promise<void>;

export interface StreamOptions {
  heartbeatDelaySeconds: number;
  outboundCapacity: number;
  inputCapacity: number;
}
