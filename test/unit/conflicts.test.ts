import { detectConflicts, fileOverlapScore, overlappingFiles } from '../../src/core/conflicts';
import { createGateConfig } from '../../src/core/config';
import { makeFile, makePR } from '../fixtures/item-factory';

const config = createGateConfig();

const pr = (number: number, files: string[]) =>
  makePR({ number, title: `PR ${number}`, files: files.map(f => makeFile(f)) });

describe('file overlap', () => {
  it('lists shared files in sorted order', () => {
    expect(overlappingFiles(pr(1, ['z.ts', 'b.ts', 'a.ts']), pr(2, ['a.ts', 'z.ts']))).toEqual(['a.ts', 'z.ts']);
  });

  it('scores the Jaccard index of the two file sets', () => {
    expect(fileOverlapScore(pr(1, ['a.ts', 'b.ts']), pr(2, ['b.ts', 'c.ts']))).toBeCloseTo(1 / 3);
    expect(fileOverlapScore(pr(1, []), pr(2, []))).toBe(0);
  });
});

describe('detectConflicts', () => {
  const prs = [
    pr(1, ['a.ts', 'b.ts']),
    pr(2, ['b.ts', 'c.ts']),
    pr(3, ['z.ts']),
    pr(4, ['a.ts', 'b.ts']),
  ];
  const embeddings = new Map([[1, [1, 0]], [2, [1, 0]], [3, [0, 1]]]);

  it('blends file overlap with semantic similarity and keeps pairs above the threshold', () => {
    const report = detectConflicts(prs, embeddings, config);

    expect(report.totalOpenPRs).toBe(4);
    expect(report.threshold).toBe(0.3);
    expect(report.fileOverlapWeight).toBe(0.5);
    expect(report.pairs).toEqual([
      {
        prA: 1,
        prB: 2,
        prATitle: 'PR 1',
        prBTitle: 'PR 2',
        overlappingFiles: ['b.ts'],
        fileOverlap: 0.3333,
        semanticSimilarity: 1,
        confidence: 0.6667,
      },
      {
        prA: 1,
        prB: 4,
        prATitle: 'PR 1',
        prBTitle: 'PR 4',
        overlappingFiles: ['a.ts', 'b.ts'],
        fileOverlap: 1,
        semanticSimilarity: 0,
        confidence: 0.5,
      },
    ]);
  });

  it('respects the configured weight', () => {
    const filesOnly = createGateConfig({ conflictFileOverlapWeight: 1 });
    const report = detectConflicts(prs, embeddings, filesOnly);
    expect(report.pairs.map(p => [p.prA, p.prB])).toEqual([[1, 4], [1, 2], [2, 4]]);
  });

  it('needs at least two PRs', () => {
    const report = detectConflicts([prs[0]], embeddings, config);
    expect(report.pairs).toEqual([]);
    expect(report.owner).toBe('acme');
  });
});
