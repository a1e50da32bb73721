/**
 * Generation State Machine Rules
 * Defines valid state transitions for one generation session
 */

export type GenerationState =
  | 'idle'
  | 'retrieving'
  | 'assembling'
  | 'generating'
  | 'tool_pending'
  | 'completing'
  | 'completed'
  | 'failed';

export const GENERATION_TRANSITIONS: Record<GenerationState, GenerationState[]> = {
  idle: ['retrieving', 'failed'],
  retrieving: ['assembling', 'failed'],
  assembling: ['generating', 'failed'],
  generating: ['tool_pending', 'completing', 'failed'],
  tool_pending: ['generating', 'failed'],
  completing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export const TERMINAL_STATES: ReadonlySet<GenerationState> = new Set(['completed', 'failed']);

export function canTransitionGeneration(from: GenerationState, to: GenerationState): boolean {
  return GENERATION_TRANSITIONS[from].includes(to);
}

export interface IStateTransitionEvent {
  from: GenerationState;
  to: GenerationState;
  trigger: string;
  timestamp: number;
}
