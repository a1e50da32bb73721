import { GenerationSession } from '../../../src/app/generation/generation-session.js';
import { AssistantError } from '../../../src/domain/generation/errors.js';
import type { ConversationTurn } from '../../../src/domain/conversation/turn.js';

describe('GenerationSession', () => {
  const logger = { debug: jest.fn(), error: jest.fn() };

  beforeEach(() => {
    logger.debug.mockReset();
    logger.error.mockReset();
  });

  it('should start idle with the query as the current turn', () => {
    const session = new GenerationSession('conv-1', 'What is dengue?', [], { logger });

    expect(session.getCurrentState()).toBe('idle');
    expect(session.isTerminal()).toBe(false);
    expect(session.turn).toEqual([{ role: 'user', content: 'What is dengue?' }]);
    expect(session.id).toMatch(/^conv-1#\d+$/);
  });

  it('should give each session a distinct id', () => {
    const first = new GenerationSession('conv-1', 'a', [], { logger });
    const second = new GenerationSession('conv-1', 'b', [], { logger });

    expect(first.id).not.toBe(second.id);
  });

  it('should own a copy of the history', () => {
    const history: ConversationTurn[] = [{ role: 'user', content: 'I have a fever.' }];
    const session = new GenerationSession('conv-1', 'Is it serious?', history, { logger });

    history.push({ role: 'assistant', content: 'added later' });

    expect(session.history).toEqual([{ role: 'user', content: 'I have a fever.' }]);
    expect(session.history[0]).not.toBe(history[0]);
  });

  it('should follow the happy path and record transitions', () => {
    const session = new GenerationSession('conv-1', 'q', [], { logger });

    session.transition('retrieving', 'query');
    session.transition('assembling', 'retrieved');
    session.transition('generating', 'plan');
    session.transition('tool_pending', 'tool_call_detected');
    session.transition('generating', 'tool_results');
    session.transition('completing', 'stream_end');
    session.transition('completed', 'done');

    expect(session.isTerminal()).toBe(true);
    expect(session.getStatePath()).toEqual([
      'idle',
      'retrieving',
      'assembling',
      'generating',
      'tool_pending',
      'generating',
      'completing',
      'completed',
    ]);
    expect(session.getTransitionHistory()[0]).toMatchObject({ from: 'idle', to: 'retrieving', trigger: 'query' });
  });

  it('should reject transitions the rules do not allow', () => {
    const session = new GenerationSession('conv-1', 'q', [], { logger });

    expect(() => session.transition('generating', 'skip')).toThrow(AssistantError);
    expect(() => session.transition('generating', 'skip')).toThrow('Invalid transition: idle -> generating (skip)');
  });

  it('should not leave a terminal state', () => {
    const session = new GenerationSession('conv-1', 'q', [], { logger });
    session.transition('failed', 'Cancelled');

    expect(() => session.transition('retrieving', 'retry')).toThrow(AssistantError);
  });

  it('should notify listeners until they unsubscribe', () => {
    const session = new GenerationSession('conv-1', 'q', [], { logger });
    const seen: string[] = [];
    const unsubscribe = session.onStateChange((event) => seen.push(`${event.from}->${event.to}`));

    session.transition('retrieving', 'query');
    unsubscribe();
    session.transition('assembling', 'retrieved');

    expect(seen).toEqual(['idle->retrieving']);
  });

  it('should log listener errors without interrupting the transition', () => {
    const session = new GenerationSession('conv-1', 'q', [], { logger });
    session.onStateChange(() => {
      throw new Error('listener broke');
    });

    session.transition('retrieving', 'query');

    expect(session.getCurrentState()).toBe('retrieving');
    expect(logger.error).toHaveBeenCalledWith('[GenerationSession] Callback error:', expect.any(Error));
  });
});
