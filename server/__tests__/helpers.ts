import { vi } from 'vitest';
import type { Logger } from '../obs/logger';
import type { Frame } from '../sse/types';
import type { BoundedQueue } from '../utils/concurrency';

export const createTestLogger = (): Logger => {
  const logger: Logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
};

/** Lets every pending callback and promise chain run. */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

export const decodeFrame = (frame: Frame): string => new TextDecoder().decode(frame.bytes);

/** Takes frames until the queue reports closed. */
export const collectFrames = async (queue: BoundedQueue<Frame>): Promise<Frame[]> => {
  const frames: Frame[] = [];
  for (;;) {
    const next = await queue.take();
    if (next.done) return frames;
    frames.push(next.value);
  }
};
