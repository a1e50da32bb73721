import { formatSseEvent } from '../../src/gateway/sse.js';

describe('formatSseEvent', () => {
  it('should frame the event type and JSON payload', () => {
    expect(formatSseEvent({ type: 'token_delta', text: 'Line one\nline two' })).toBe(
      'event: token_delta\ndata: {"type":"token_delta","text":"Line one\\nline two"}\n\n'
    );
  });

  it('should frame terminal events', () => {
    expect(formatSseEvent({ type: 'failed', kind: 'Cancelled', message: 'The request was cancelled.' })).toBe(
      'event: failed\ndata: {"type":"failed","kind":"Cancelled","message":"The request was cancelled."}\n\n'
    );
  });
});
