export type { AssembleInput, CitationBlock, PromptAssemblerOptions, PromptPlan } from './prompt-assembler.js';
export { PromptAssembler, measurePlan, renderCitation, renderMessages } from './prompt-assembler.js';
export { FALLBACK_DISCLAIMER, NO_PASSAGES_NOTE, SYSTEM_PROMPT, splitSentences } from './system-prompt.js';
