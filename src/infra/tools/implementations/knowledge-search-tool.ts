import type { ToolDefinition, ToolExecutionContext } from '../tool-registry.js';
import type { ToolParametersSchema } from '../../../domain/tools/types.js';
import type { IRetriever } from '../../../app/retrieval/retriever.js';
import { describeSource } from '../../../domain/rag/passage.js';

interface KnowledgeSearchArgs {
  query: string;
}

export const NO_RESULTS_MESSAGE = 'No relevant passages were found in the knowledge base.';

export interface KnowledgeSearchOptions {
  k: number;
  minScore: number;
}

const PARAMETERS: ToolParametersSchema = {
  type: 'object',
  properties: {
    query: { type: 'string', minLength: 1, description: 'Medical topic or question to look up' },
  },
  required: ['query'],
  additionalProperties: false,
};

export class KnowledgeSearchTool implements ToolDefinition<KnowledgeSearchArgs, string> {
  name = 'search_knowledge_base';
  description = 'Search the medical knowledge base for passages about a topic not covered by the passages already provided.';
  parameters = PARAMETERS;

  constructor(
    private readonly retriever: IRetriever,
    private readonly options: KnowledgeSearchOptions
  ) {}

  async execute(args: KnowledgeSearchArgs, context: ToolExecutionContext): Promise<string> {
    const result = await this.retriever.retrieve(args.query, [], {
      k: this.options.k,
      minScore: this.options.minScore,
      signal: context.signal,
    });

    if (result.passages.length === 0) {
      return NO_RESULTS_MESSAGE;
    }

    return result.passages
      .map((passage, index) => `(${index + 1}) ${describeSource(passage.source)}\n${passage.text}`)
      .join('\n\n');
  }
}
