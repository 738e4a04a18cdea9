import type { Logger } from '../obs/logger';
import type { PutResult } from '../utils/concurrency';
import { createHeartbeatFrame } from './frameEncoder';
import type { Frame } from './types';

export interface HeartbeatTarget {
  put: (frame: Frame, signal?: AbortSignal) => Promise<PutResult>;
}

export interface HeartbeatTask {
  readonly cancelled: boolean;
  /** Idempotent. Returns `true` for the call that cancelled the task. */
  cancel: () => boolean;
}

class ScheduledHeartbeat implements HeartbeatTask {
  timer: ReturnType<typeof setTimeout> | null = null;
  inFlight: AbortController | null = null;
  private cancelledFlag = false;

  constructor(
    readonly target: HeartbeatTarget,
    readonly delayMs: number,
    readonly meta: Record<string, unknown>,
    private readonly onCancel: (task: ScheduledHeartbeat) => void,
  ) {}

  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  cancel(): boolean {
    if (this.cancelledFlag) {
      return false;
    }
    this.cancelledFlag = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.inFlight?.abort();
    this.inFlight = null;
    this.onCancel(this);
    return true;
  }
}

/**
 * Keep-alive timers for every live stream in the process. Owned by the server
 * entry point, which calls `shutdown()` on exit.
 *
 * Each task runs with fixed delay: the first heartbeat is written inside
 * `schedule`, and the next one is timed from the completion of the previous
 * write. A write parked on a full queue holds back only its own task.
 */
export class HeartbeatScheduler {
  private readonly tasks = new Set<ScheduledHeartbeat>();
  private stopped = false;

  constructor(private readonly logger: Logger) {}

  get activeTasks(): number {
    return this.tasks.size;
  }

  get isShutdown(): boolean {
    return this.stopped;
  }

  schedule(target: HeartbeatTarget, delaySeconds: number, meta: Record<string, unknown> = {}): HeartbeatTask {
    if (this.stopped) {
      throw new Error('Heartbeat scheduler has been shut down');
    }
    const task = new ScheduledHeartbeat(target, Math.max(0, delaySeconds * 1000), meta, (t) => this.tasks.delete(t));
    this.tasks.add(task);
    this.dispatch(task);
    return task;
  }

  shutdown(): void {
    if (this.stopped) return;
    this.stopped = true;
    for (const task of [...this.tasks]) {
      task.cancel();
    }
    this.logger.debug('Heartbeat scheduler stopped');
  }

  private dispatch(task: ScheduledHeartbeat) {
    task.timer = null;
    if (task.cancelled) return;
    this.fire(task).catch((error: unknown) => {
      this.logger.error('heartbeat task failed', {
        ...task.meta,
        error: error instanceof Error ? error.message : String(error),
      });
      task.cancel();
    });
  }

  private async fire(task: ScheduledHeartbeat): Promise<void> {
    const controller = new AbortController();
    task.inFlight = controller;
    this.logger.trace('writing heartbeat to stream', task.meta);

    const result = await task.target.put(createHeartbeatFrame(), controller.signal);
    if (task.inFlight === controller) {
      task.inFlight = null;
    }
    if (task.cancelled) return;

    if (!result.ok) {
      this.logger.error('exception sending heartbeat', { ...task.meta, reason: result.reason });
      task.cancel();
      return;
    }

    const timer = setTimeout(() => this.dispatch(task), task.delayMs);
    timer.unref?.();
    task.timer = timer;
  }
}
