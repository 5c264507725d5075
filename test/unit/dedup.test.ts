import { DedupEngine } from '../../src/core/dedup';
import { createGateConfig } from '../../src/core/config';
import { makeIssue, makePR } from '../fixtures/item-factory';

const near = (cos: number) => [cos, Math.sqrt(1 - cos * cos)];

describe('DedupEngine', () => {
  const engine = new DedupEngine(createGateConfig());

  describe('check', () => {
    it('gates a PR whose best match reaches the PR threshold', () => {
      const subject = makePR({ number: 5 });
      const peers = [makePR({ number: 2 }), makePR({ number: 3 })];
      const embeddings = new Map([[2, near(0.5)], [3, near(0.95)]]);

      const result = engine.check(subject, [1, 0], peers, embeddings);

      expect(result.outcome).toBe('gated');
      expect(result.isDuplicate).toBe(true);
      expect(result.duplicateOf).toBe(3);
      expect(result.maxSimilarity).toBeCloseTo(0.95);
    });

    it('passes below the threshold and still reports the best similarity', () => {
      const subject = makePR({ number: 5 });
      const result = engine.check(subject, [1, 0], [makePR({ number: 2 })], new Map([[2, near(0.88)]]));

      expect(result.outcome).toBe('pass');
      expect(result.isDuplicate).toBe(false);
      expect(result.duplicateOf).toBeNull();
      expect(result.maxSimilarity).toBeCloseTo(0.88);
    });

    it('applies the lower issue threshold to issues', () => {
      const subject = makeIssue({ number: 50 });
      const result = engine.check(subject, [1, 0], [makeIssue({ number: 40 })], new Map([[40, near(0.88)]]));

      expect(engine.thresholdFor(subject)).toBe(0.85);
      expect(result.outcome).toBe('gated');
      expect(result.duplicateOf).toBe(40);
    });

    it('never reports an item as its own duplicate', () => {
      const subject = makePR({ number: 5 });
      const result = engine.check(subject, [1, 0], [subject], new Map([[5, [1, 0]]]));
      expect(result).toEqual({ outcome: 'pass', isDuplicate: false, duplicateOf: null, maxSimilarity: 0 });
    });

    it('passes when no peer has an embedding', () => {
      const result = engine.check(makePR({ number: 5 }), [1, 0], [makePR({ number: 2 })], new Map());
      expect(result.outcome).toBe('pass');
      expect(result.maxSimilarity).toBe(0);
    });
  });

  describe('clusters', () => {
    const items = [1, 2, 3].map(number => makePR({ number }));
    const embeddings = new Map([[1, [1, 0]], [2, near(0.92)], [3, [0, 1]]]);

    it('uses the configured cluster threshold by default', () => {
      const clusters = engine.clusters(items, embeddings);
      expect(clusters).toHaveLength(1);
      expect(clusters[0].threshold).toBe(0.9);
      expect(clusters[0].members.map(m => m.number)).toEqual([1, 2]);
    });

    it('accepts an explicit threshold', () => {
      expect(engine.clusters(items, embeddings, 0.95)).toEqual([]);
    });
  });
});
