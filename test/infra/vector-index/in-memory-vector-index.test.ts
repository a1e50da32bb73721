import { InMemoryVectorIndex, cosineSimilarity } from '../../../src/infra/vector-index/in-memory-vector-index.js';
import { CancelledError } from '../../../src/domain/generation/errors.js';

describe('cosineSimilarity', () => {
  it('should score identical directions as 1 and orthogonal as 0', () => {
    expect(cosineSimilarity([1, 0], [3, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
  });

  it('should return 0 for a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should reject mismatched dimensions', () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow('Dimension mismatch: 2 vs 3');
  });
});

describe('InMemoryVectorIndex', () => {
  let index: InMemoryVectorIndex;

  beforeEach(() => {
    index = new InMemoryVectorIndex();
    index.upsert([
      { id: 'fever', values: [1, 0], metadata: { text: 'Fever guidance' } },
      { id: 'cough', values: [0, 1], metadata: { text: 'Cough guidance' } },
      { id: 'both', values: [1, 1], metadata: { text: 'Fever and cough' } },
    ]);
  });

  it('should return the nearest records first', async () => {
    const matches = await index.search([1, 0], 2);

    expect(matches.map((match) => match.id)).toEqual(['fever', 'both']);
    expect(matches[0].score).toBeCloseTo(1);
    expect(matches[1].score).toBeCloseTo(Math.SQRT1_2);
  });

  it('should break score ties by id', async () => {
    index.upsert([{ id: 'another-fever', values: [2, 0], metadata: {} }]);

    const matches = await index.search([1, 0], 2);

    expect(matches.map((match) => match.id)).toEqual(['another-fever', 'fever']);
  });

  it('should replace records on upsert and remove them', async () => {
    index.upsert([{ id: 'cough', values: [1, 0], metadata: { text: 'moved' } }]);
    expect(index.size).toBe(3);
    expect(index.remove('fever')).toBe(true);
    expect(index.remove('fever')).toBe(false);

    const [top] = await index.search([1, 0], 1);

    expect(top).toEqual({ id: 'cough', score: 1, metadata: { text: 'moved' } });
  });

  it('should not share metadata with callers', async () => {
    const [first] = await index.search([0, 1], 1);
    first.metadata.text = 'changed';

    const [again] = await index.search([0, 1], 1);

    expect(again.metadata.text).toBe('Cough guidance');
  });

  it('should reject when aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(index.search([1, 0], 1, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
