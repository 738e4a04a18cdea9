import { afterEach, describe, expect, it, vi } from 'vitest';
import { streamEvents } from '../sseClient';
import type { DecodedEvent } from '../../shared/sse';

describe('streamEvents', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reports each record and skips heartbeats', async () => {
    const body = '\r\nevent: tick\r\ndata: {"seq":1}\r\n\r\n\r\nevent: note\r\ndata: a\r\ndata: b\r\n\r\n';
    const fetchMock = vi.fn(async () => new Response(body, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const events: DecodedEvent[] = [];

    const count = await streamEvents({ url: 'http://localhost/api/events/clock', onEvent: (event) => events.push(event) });

    expect(count).toBe(2);
    expect(events).toEqual([
      { name: 'tick', data: '{"seq":1}' },
      { name: 'note', data: 'a\nb' },
    ]);
    expect(fetchMock).toHaveBeenCalledWith(
      'http://localhost/api/events/clock',
      expect.objectContaining({ method: 'GET', headers: { Accept: 'text/event-stream' } }),
    );
  });

  it('rejects with the response text on an error status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('stream limit reached', { status: 503 })),
    );

    await expect(streamEvents({ url: 'http://localhost/api/events/clock', onEvent: vi.fn() })).rejects.toThrow(
      'stream limit reached',
    );
  });
});
