/**
 * Prompt Assembler
 *
 * Fits system instructions, grounding passages, conversation history and
 * tool schemas into a character budget, in that priority order.
 */

import type { ConversationTurn } from '../../domain/conversation/turn.js';
import { cloneHistory, groupTurnUnits, userTurn } from '../../domain/conversation/turn.js';
import type { PassageChunk, RetrievalResult } from '../../domain/rag/passage.js';
import { describeSource } from '../../domain/rag/passage.js';
import type { ToolSchema } from '../../domain/tools/types.js';
import { PromptBudgetError } from '../../domain/generation/errors.js';
import type { LLMMessage } from '../../infra/llm/llm-provider.js';
import { compareByScore } from '../retrieval/retriever.js';
import { NO_PASSAGES_NOTE, SYSTEM_PROMPT } from './system-prompt.js';

export interface CitationBlock {
  /** Inline marker the model is told to cite, e.g. "[2]" */
  marker: string;
  passage: PassageChunk;
  rendered: string;
}

export interface PromptPlan {
  system: string;
  grounding: CitationBlock[];
  /** Prior turns kept in the window, chronological */
  history: ConversationTurn[];
  /** The current query followed by this turn's tool exchanges */
  turn: ConversationTurn[];
  tools: ToolSchema[];
  size: number;
  budget: number;
  dropped: {
    history: number;
    passages: number;
    tools: number;
  };
}

export interface AssembleInput {
  query: string;
  history: readonly ConversationTurn[];
  /** Defaults to a single user turn carrying `query` */
  turn?: readonly ConversationTurn[];
  retrieval: RetrievalResult;
  tools: readonly ToolSchema[];
  budget: number;
}

export interface PromptAssemblerOptions {
  systemPrompt?: string;
  /** History units considered at most, most recent first */
  historyWindowTurns?: number;
}

type PlanSections = Pick<PromptPlan, 'system' | 'grounding' | 'history' | 'turn' | 'tools'>;

export function renderCitation(marker: string, passage: PassageChunk): string {
  return `${marker} (${describeSource(passage.source)})\n${passage.text}`;
}

function toMessage(turn: ConversationTurn): LLMMessage {
  if (turn.role === 'tool') {
    return { role: 'tool', content: turn.content, tool_call_id: turn.toolCallId };
  }
  if (turn.role === 'assistant' && turn.toolCalls && turn.toolCalls.length > 0) {
    return {
      role: 'assistant',
      content: turn.content || null,
      tool_calls: turn.toolCalls.map(call => ({
        id: call.id,
        type: 'function' as const,
        function: { name: call.name, arguments: call.rawArguments },
      })),
    };
  }
  return { role: turn.role, content: turn.content };
}

/**
 * Renders a plan into the chat messages sent to the provider.
 */
export function renderMessages(plan: PlanSections): LLMMessage[] {
  const grounding =
    plan.grounding.length > 0
      ? `## Knowledge base passages\n\n${plan.grounding.map(block => block.rendered).join('\n\n')}`
      : NO_PASSAGES_NOTE;

  return [
    { role: 'system', content: `${plan.system}\n\n${grounding}` },
    ...plan.history.map(toMessage),
    ...plan.turn.map(toMessage),
  ];
}

export function measurePlan(plan: PlanSections): number {
  const messages = JSON.stringify(renderMessages(plan)).length;
  return plan.tools.reduce((size, tool) => size + JSON.stringify(tool).length, messages);
}

export class PromptAssembler {
  private readonly systemPrompt: string;
  private readonly historyWindowTurns: number;

  constructor(options: PromptAssemblerOptions = {}) {
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.historyWindowTurns = Math.max(0, options.historyWindowTurns ?? 10);
  }

  assemble(input: AssembleInput): PromptPlan {
    const { budget } = input;
    const sections: PlanSections = {
      system: this.systemPrompt,
      grounding: [],
      history: [],
      turn: input.turn ? cloneHistory(input.turn) : [userTurn(input.query)],
      tools: [],
    };

    // System instructions and the current turn are never dropped
    let size = measurePlan(sections);
    if (size > budget) {
      throw new PromptBudgetError(size, budget);
    }

    const passages = [...input.retrieval.passages].sort(compareByScore);
    for (const passage of passages) {
      const marker = `[${sections.grounding.length + 1}]`;
      const block: CitationBlock = { marker, passage, rendered: renderCitation(marker, passage) };
      const candidate = measurePlan({ ...sections, grounding: [...sections.grounding, block] });
      if (candidate > budget) break;
      sections.grounding.push(block);
      size = candidate;
    }

    // A unit that starts with a tool turn lost its assistant request; sending it would be rejected
    const units = groupTurnUnits(input.history).filter(unit => unit[0]?.role !== 'tool');
    const recentUnits = this.historyWindowTurns > 0 ? units.slice(-this.historyWindowTurns) : [];
    let keptUnits = 0;
    for (const unit of recentUnits.reverse()) {
      const history = [...cloneHistory(unit), ...sections.history];
      const candidate = measurePlan({ ...sections, history });
      if (candidate > budget) break;
      sections.history = history;
      size = candidate;
      keptUnits++;
    }

    for (const tool of input.tools) {
      const candidate = size + JSON.stringify(tool).length;
      if (candidate > budget) break;
      sections.tools.push(tool);
      size = candidate;
    }

    return {
      ...sections,
      size,
      budget,
      dropped: {
        history: groupTurnUnits(input.history).length - keptUnits,
        passages: passages.length - sections.grounding.length,
        tools: input.tools.length - sections.tools.length,
      },
    };
  }
}
