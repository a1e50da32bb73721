import { KnowledgeSearchTool, NO_RESULTS_MESSAGE } from '../../../../src/infra/tools/implementations/knowledge-search-tool.js';
import type { IRetriever } from '../../../../src/app/retrieval/retriever.js';
import type { RetrievalResult, RetrieveOptions } from '../../../../src/domain/rag/passage.js';

class StubRetriever implements IRetriever {
  readonly calls: Array<{ query: string; options: RetrieveOptions }> = [];

  constructor(private readonly result: RetrievalResult) {}

  async retrieve(query: string, _history: unknown, options: RetrieveOptions): Promise<RetrievalResult> {
    this.calls.push({ query, options });
    return this.result;
  }
}

describe('KnowledgeSearchTool', () => {
  const context = { callId: 'call_1', signal: new AbortController().signal };

  it('should list passages with their sources', async () => {
    const retriever = new StubRetriever({
      query: 'dengue',
      passages: [
        { id: 'a', text: 'Dengue spreads via mosquitoes.', score: 0.9, source: { title: 'WHO Dengue Factsheet', page: 2 } },
        { id: 'b', text: 'Hydration matters.', score: 0.7, source: {} },
      ],
    });
    const tool = new KnowledgeSearchTool(retriever, { k: 3, minScore: 0.5 });

    const output = await tool.execute({ query: 'dengue' }, context);

    expect(output).toBe(
      '(1) WHO Dengue Factsheet, p. 2\nDengue spreads via mosquitoes.\n\n(2) knowledge base\nHydration matters.'
    );
    expect(retriever.calls).toEqual([{ query: 'dengue', options: { k: 3, minScore: 0.5, signal: context.signal } }]);
  });

  it('should say when nothing was found', async () => {
    const tool = new KnowledgeSearchTool(new StubRetriever({ query: 'x', passages: [] }), { k: 3, minScore: 0.5 });

    await expect(tool.execute({ query: 'x' }, context)).resolves.toBe(NO_RESULTS_MESSAGE);
  });
});
