import type { StreamEvent } from '../domain/generation/stream-event.js';

/**
 * Frames one event as a server-sent event. JSON never contains a raw
 * newline, so the data always fits on one line.
 */
export function formatSseEvent(event: StreamEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

export const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
};
