export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/** Resolves once `emitter` fires any of `events`, whichever comes first. */
export const onceAny = (
  emitter: {
    once: (event: string, listener: () => void) => unknown;
    off: (event: string, listener: () => void) => unknown;
  },
  events: string[],
): Promise<string> =>
  new Promise<string>((resolve) => {
    const listeners = events.map((event) => {
      const listener = () => {
        for (const [name, fn] of listeners) {
          emitter.off(name, fn);
        }
        resolve(event);
      };
      return [event, listener] as const;
    });
    for (const [name, fn] of listeners) {
      emitter.once(name, fn);
    }
  });
