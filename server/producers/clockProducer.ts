import type { Logger } from '../obs/logger';
import type { EventSink } from '../sse/types';
import { sleep } from '../utils/async';

export interface ClockOptions {
  count: number;
  intervalMs: number;
  logger: Logger;
  now?: () => Date;
}

/** Emits `count` `tick` events `intervalMs` apart, then closes the sink. */
export const runClock = async (events: EventSink, { count, intervalMs, logger, now = () => new Date() }: ClockOptions) => {
  for (let seq = 1; seq <= count; seq += 1) {
    const result = await events.put({ name: 'tick', data: { seq, ts: now().toISOString() } });
    if (!result.ok) {
      logger.debug('clock stopped early', { seq, reason: result.reason });
      return;
    }
    if (seq < count) {
      await sleep(intervalMs);
    }
  }
  events.close();
};
