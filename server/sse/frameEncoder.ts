import { eventNameOf, type SseEvent } from '../../shared/sse';
import type { Frame } from './types';

const CRLF = '\r\n';
const LINE_BREAK = /\r?\n/;
const encoder = new TextEncoder();

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream; charset=UTF-8',
  Connection: 'close',
  'Cache-Control': 'no-cache',
};

/** Caller-supplied CORS values are merged in verbatim and win over the defaults. */
export const buildResponseHeaders = (corsHeaders?: Record<string, string>): Record<string, string> => ({
  ...SSE_HEADERS,
  ...corsHeaders,
});

/**
 * Lines of `data`, with trailing empty lines dropped. Empty data is still one
 * empty line; data made only of line breaks has none.
 */
const dataLines = (data: string): string[] => {
  if (data === '') return [''];
  const lines = data.split(LINE_BREAK);
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
};

export const encodeEvent = (event: SseEvent): Frame => {
  let text = `event: ${eventNameOf(event)}${CRLF}`;
  for (const line of dataLines(event.data)) {
    text += `data: ${line}${CRLF}`;
  }
  text += CRLF;
  return { kind: 'event', bytes: encoder.encode(text) };
};

export const createHeartbeatFrame = (): Frame => ({ kind: 'heartbeat', bytes: encoder.encode(CRLF) });
