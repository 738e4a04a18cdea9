import { createEventStreamDecoder, type DecodedEvent } from '../shared/sse';

type StreamEventsArgs = {
  url: string;
  method?: 'GET' | 'POST';
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  onEvent: (event: DecodedEvent) => void;
};

/**
 * Reads an event stream until the server closes it, calling `onEvent` for
 * every record. Heartbeats are not reported.
 */
export const streamEvents = async ({
  url,
  method = 'GET',
  body,
  headers,
  signal,
  onEvent,
}: StreamEventsArgs): Promise<number> => {
  const res = await fetch(url, {
    method,
    headers: {
      Accept: 'text/event-stream',
      ...(body != null ? { 'Content-Type': 'application/json' } : {}),
      ...(headers ?? {}),
    },
    body: body != null ? JSON.stringify(body) : undefined,
    signal,
  });

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new Error(text || `Request failed (${res.status})`);
  }

  if (!res.body) {
    throw new Error('Streaming response body not available');
  }

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  const events = createEventStreamDecoder();
  let received = 0;

  const deliver = (batch: DecodedEvent[]) => {
    for (const event of batch) {
      received += 1;
      onEvent(event);
    }
  };

  while (true) {
    const { value, done } = await reader.read();
    if (done) break;
    deliver(events.push(decoder.decode(value, { stream: true })));
  }
  deliver(events.push(decoder.decode()));
  deliver(events.flush());

  return received;
};
