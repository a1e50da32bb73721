export type {
  GenerationOrchestratorDeps,
  GenerationSettings,
  SubmitTurnOptions,
} from './generation-orchestrator.js';
export { DEFAULT_GENERATION_SETTINGS, GenerationOrchestrator } from './generation-orchestrator.js';
export type { GenerationSessionOptions, StateChangeCallback } from './generation-session.js';
export { GenerationSession } from './generation-session.js';
export { classifyError, raceAbort } from './classify-error.js';
