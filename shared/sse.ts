export const DEFAULT_EVENT_NAME = 'event';

export type SseEvent =
  | { kind: 'named'; name: string; data: string }
  | { kind: 'anonymous'; data: string };

/** Anything a producer may hand to a stream: a `{ name, data }` record or a bare value. */
export type EventInput = unknown;

export interface DecodedEvent {
  name: string;
  data: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const hasOwn = (value: Record<string, unknown>, key: string) => Object.prototype.hasOwnProperty.call(value, key);

export const stringifyData = (value: unknown): string => {
  if (value == null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value) ?? String(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
};

export const toSseEvent = (value: EventInput): SseEvent => {
  if (isRecord(value) && hasOwn(value, 'name')) {
    return {
      kind: 'named',
      name: value.name == null ? DEFAULT_EVENT_NAME : String(value.name),
      data: stringifyData(value.data),
    };
  }
  if (isRecord(value) && hasOwn(value, 'data')) {
    return { kind: 'anonymous', data: stringifyData(value.data) };
  }
  return { kind: 'anonymous', data: stringifyData(value) };
};

export const eventNameOf = (event: SseEvent): string =>
  event.kind === 'named' ? event.name : DEFAULT_EVENT_NAME;

export interface EventStreamDecoder {
  /** Feeds a text chunk and returns the records it completed. */
  push: (chunk: string) => DecodedEvent[];
  /** Completes a trailing record that never received its blank line. */
  flush: () => DecodedEvent[];
}

export const createEventStreamDecoder = (): EventStreamDecoder => {
  let buffer = '';
  let name: string | null = null;
  let dataLines: string[] = [];

  const dispatch = (out: DecodedEvent[]) => {
    if (name === null && dataLines.length === 0) {
      // heartbeat
      return;
    }
    out.push({ name: name ?? 'message', data: dataLines.join('\n') });
    name = null;
    dataLines = [];
  };

  const readLine = (line: string, out: DecodedEvent[]) => {
    if (line === '') {
      dispatch(out);
      return;
    }
    if (line.startsWith(':')) return;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    if (field === 'event') {
      name = value;
    } else if (field === 'data') {
      dataLines.push(value);
    }
  };

  return {
    push: (chunk) => {
      buffer += chunk;
      const out: DecodedEvent[] = [];
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        readLine(line, out);
      }
      return out;
    },
    flush: () => {
      const out: DecodedEvent[] = [];
      if (buffer !== '') {
        readLine(buffer.endsWith('\r') ? buffer.slice(0, -1) : buffer, out);
        buffer = '';
      }
      dispatch(out);
      return out;
    },
  };
};
