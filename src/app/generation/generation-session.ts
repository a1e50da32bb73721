/**
 * Generation Session
 * State and transition log for one user turn
 */

import type {
  GenerationState,
  IStateTransitionEvent,
} from '../../domain/generation/state-machine-rules.js';
import { TERMINAL_STATES, canTransitionGeneration } from '../../domain/generation/state-machine-rules.js';
import type { ConversationTurn } from '../../domain/conversation/turn.js';
import { cloneHistory } from '../../domain/conversation/turn.js';
import { AssistantError } from '../../domain/generation/errors.js';

export type StateChangeCallback = (event: IStateTransitionEvent) => void;

export interface GenerationSessionOptions {
  logger?: Pick<Console, 'debug' | 'error'>;
  debug?: boolean;
}

let sessionCounter = 0;

export class GenerationSession {
  readonly id: string;
  readonly conversationId: string;
  readonly query: string;
  /** Prior turns, owned by this session */
  readonly history: readonly ConversationTurn[];
  /** The current query followed by this turn's assistant and tool turns */
  readonly turn: ConversationTurn[];

  toolRounds = 0;
  visibleText = '';
  readonly toolsUsed: string[] = [];

  private currentState: GenerationState = 'idle';
  private transitionHistory: IStateTransitionEvent[] = [];
  private stateChangeCallbacks: StateChangeCallback[] = [];
  private readonly logger: Pick<Console, 'debug' | 'error'>;

  constructor(
    conversationId: string,
    query: string,
    history: readonly ConversationTurn[],
    private readonly options: GenerationSessionOptions = {}
  ) {
    sessionCounter += 1;
    this.id = `${conversationId}#${sessionCounter}`;
    this.conversationId = conversationId;
    this.query = query;
    this.history = cloneHistory(history);
    this.turn = [{ role: 'user', content: query }];
    this.logger = options.logger ?? console;
  }

  getCurrentState(): GenerationState {
    return this.currentState;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.currentState);
  }

  /**
   * Moves to `to`, or throws an internal error if the rules forbid it.
   */
  transition(to: GenerationState, trigger: string): void {
    if (!canTransitionGeneration(this.currentState, to)) {
      throw AssistantError.internal(`Invalid transition: ${this.currentState} -> ${to} (${trigger})`);
    }

    const event: IStateTransitionEvent = {
      from: this.currentState,
      to,
      trigger,
      timestamp: Date.now(),
    };

    this.transitionHistory.push(event);
    this.currentState = to;

    if (this.options.debug) {
      this.logger.debug(`[GenerationSession] ${this.id}: ${event.from} -> ${to} (${trigger})`);
    }

    for (const callback of this.stateChangeCallbacks) {
      try {
        callback(event);
      } catch (error) {
        this.logger.error('[GenerationSession] Callback error:', error);
      }
    }
  }

  onStateChange(callback: StateChangeCallback): () => void {
    this.stateChangeCallbacks.push(callback);
    return () => {
      const index = this.stateChangeCallbacks.indexOf(callback);
      if (index >= 0) {
        this.stateChangeCallbacks.splice(index, 1);
      }
    };
  }

  getTransitionHistory(): IStateTransitionEvent[] {
    return [...this.transitionHistory];
  }

  /** States visited in order, starting with idle */
  getStatePath(): GenerationState[] {
    return ['idle', ...this.transitionHistory.map((event) => event.to)];
  }
}
