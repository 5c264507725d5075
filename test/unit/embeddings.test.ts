import { embedItems, embedTexts, itemToLabelText, itemToText, labelToText } from '../../src/core/embeddings';
import { ConcurrencyController } from '../../src/core/concurrency';
import { MockLLMProvider, SingleEmbeddingProvider } from '../fixtures/mock-provider';
import { makeFile, makeIssue, makePR } from '../fixtures/item-factory';

describe('item text', () => {
  it('joins title, body, file names and the head of the diff for PRs', () => {
    const pr = makePR({
      title: 'Fix parser',
      body: 'Handles nesting.',
      files: [makeFile('src/parser.ts'), makeFile('src/tree.ts')],
      diffText: '+a\n-b',
      labels: ['bug'],
    });
    expect(itemToText(pr)).toBe('Fix parser\nHandles nesting.\nsrc/parser.ts src/tree.ts\n+a\n-b');
  });

  it('keeps only the first 100 diff lines', () => {
    const diff = Array.from({ length: 150 }, (_, i) => `line ${i}`).join('\n');
    const text = itemToText(makePR({ title: 'T', body: '', files: [], diffText: diff }));
    expect(text.split('\n')).toHaveLength(101);
    expect(text.endsWith('line 99')).toBe(true);
  });

  it('adds labels for issues and skips an empty body', () => {
    expect(itemToText(makeIssue({ title: 'Crash', body: '', labels: ['bug', 'parser'] }))).toBe('Crash\nbug parser');
  });

  it('includes labels for keyword matching on PRs', () => {
    const pr = makePR({ title: 'Fix', body: '', files: [makeFile('a.ts')], labels: ['docs'] });
    expect(itemToLabelText(pr)).toBe('Fix\na.ts\ndocs');
  });

  it('renders a label with its description and keywords', () => {
    expect(labelToText({ name: 'parser', description: 'Parsing bugs', keywords: ['tree', 'nested'], color: '', source: 'vision' }))
      .toBe('parser Parsing bugs tree nested');
    expect(labelToText({ name: 'bug', description: '', keywords: [], color: '', source: 'repository' })).toBe('bug');
  });
});

describe('embedTexts', () => {
  let provider: MockLLMProvider;

  beforeEach(() => {
    provider = new MockLLMProvider();
  });

  it('uses the batch endpoint when available', async () => {
    provider.generateEmbeddingBatchResponse = [[1, 0], [0, 1]];
    const result = await embedTexts([{ key: 'a', text: 'first' }, { key: 'b', text: 'second' }], provider);

    expect([...result.entries()]).toEqual([['a', [1, 0]], ['b', [0, 1]]]);
    expect(provider.generateEmbeddingBatchCalls).toEqual([{ texts: ['first', 'second'] }]);
    expect(provider.generateEmbeddingCalls).toEqual([]);
  });

  it('embeds empty batch slots one by one', async () => {
    provider.generateEmbeddingBatchResponse = [[1, 0], []];
    provider.generateEmbeddingResponse = [0.5, 0.5];
    const result = await embedTexts([{ key: 1, text: 'one' }, { key: 2, text: 'two' }], provider);

    expect(result.get(1)).toEqual([1, 0]);
    expect(result.get(2)).toEqual([0.5, 0.5]);
    expect(provider.generateEmbeddingCalls).toEqual([{ text: 'two' }]);
  });

  it('falls back to individual calls when the batch call throws', async () => {
    provider.generateEmbeddingBatchResponse = () => { throw new Error('batch unavailable'); };
    provider.generateEmbeddingResponse = (text: string) => [text.length];
    const result = await embedTexts([{ key: 1, text: 'ab' }, { key: 2, text: 'abc' }], provider);

    expect(result.get(1)).toEqual([2]);
    expect(result.get(2)).toEqual([3]);
  });

  it('leaves failed embeddings out of the result', async () => {
    const single = new SingleEmbeddingProvider(text => {
      if (text === 'bad') throw new Error('upstream 500');
      return [1];
    });
    const result = await embedTexts(
      [{ key: 1, text: 'good' }, { key: 2, text: 'bad' }, { key: 3, text: 'fine' }],
      single,
      new ConcurrencyController({ maxConcurrent: 2 }),
    );

    expect([...result.keys()]).toEqual([1, 3]);
    expect(single.calls).toEqual(['good', 'bad', 'fine']);
  });

  it('returns an empty map without calling the provider', async () => {
    const result = await embedTexts([], provider);
    expect(result.size).toBe(0);
    expect(provider.generateEmbeddingBatchCalls).toEqual([]);
  });
});

describe('embedItems', () => {
  it('keys embeddings by item number', async () => {
    const provider = new MockLLMProvider();
    provider.generateEmbeddingBatchResponse = (texts: string[]) => texts.map((_, i) => [i + 1]);
    const result = await embedItems([makePR({ number: 7 }), makeIssue({ number: 8 })], provider);

    expect(result.get(7)).toEqual([1]);
    expect(result.get(8)).toEqual([2]);
  });
});
