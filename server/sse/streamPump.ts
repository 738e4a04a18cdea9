import { eventNameOf } from '../../shared/sse';
import type { Logger } from '../obs/logger';
import type { EventStream } from './eventStream';
import { encodeEvent } from './frameEncoder';

/**
 * Drains the stream's input queue into its outbound queue until the producer
 * side closes, then tears the stream down. A full outbound queue parks the
 * pump, which in turn lets the input queue fill and parks the producer.
 */
export const runStreamPump = async (stream: EventStream, logger: Logger): Promise<void> => {
  for (;;) {
    const next = await stream.input.take();
    if (next.done) break;

    const event = next.value;
    const name = eventNameOf(event);
    logger.trace('writing event to stream', { name, data: event.data });

    const result = await stream.outbound.put(encodeEvent(event));
    if (!result.ok) {
      if (stream.state === 'open') {
        logger.error('exception sending event', { name, reason: result.reason });
      }
      stream.teardown('write-failed');
      return;
    }
  }

  stream.teardown('completed');
};
