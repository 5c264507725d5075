import { findIssuePrLinks } from '../../src/core/linking';
import { createGateConfig } from '../../src/core/config';
import { makeIssue, makePR } from '../fixtures/item-factory';

const config = createGateConfig();

describe('findIssuePrLinks', () => {
  const prs = [
    makePR({ number: 10, title: 'Fix nested parsing', linkedIssues: [100, 999] }),
    makePR({ number: 11, title: 'Speed up rendering' }),
  ];
  const issues = [
    makeIssue({ number: 103, title: 'Unrelated' }),
    makeIssue({ number: 100, title: 'Nested parse fails' }),
    makeIssue({ number: 101, title: 'Rendering is slow' }),
    makeIssue({ number: 102, title: 'No embedding yet' }),
  ];
  const embeddings = new Map([
    [10, [1, 0]],
    [11, [0, 1]],
    [100, [1, 0]],
    [101, [0.6, 0.8]],
    [103, [-1, 0]],
  ]);

  it('reports explicit links only for issues in the set', () => {
    const report = findIssuePrLinks(prs, issues, embeddings, config);
    expect(report.explicitLinks).toEqual([
      {
        prNumber: 10,
        issueNumber: 100,
        similarity: 1,
        prTitle: 'Fix nested parsing',
        issueTitle: 'Nested parse fails',
        isExplicit: true,
      },
    ]);
  });

  it('suggests links above the threshold, best first, never repeating an explicit one', () => {
    const report = findIssuePrLinks(prs, issues, embeddings, config);

    expect(report.suggestions.map(s => [s.prNumber, s.issueNumber])).toEqual([[11, 101], [10, 101]]);
    expect(report.suggestions[0].similarity).toBeCloseTo(0.8);
    expect(report.suggestions[1].similarity).toBeCloseTo(0.6);
    expect(report.suggestions.every(s => !s.isExplicit)).toBe(true);
  });

  it('lists issues nothing links to in ascending order', () => {
    const report = findIssuePrLinks(prs, issues, embeddings, config);
    expect(report.orphanIssues).toEqual([102, 103]);
    expect(report.totalPRs).toBe(2);
    expect(report.totalIssues).toBe(4);
    expect(report.threshold).toBe(0.45);
  });

  it('treats every issue as an orphan when there are no PRs', () => {
    const report = findIssuePrLinks([], issues, embeddings, config);
    expect(report.orphanIssues).toEqual([100, 101, 102, 103]);
    expect(report.suggestions).toEqual([]);
    expect(report.owner).toBe('acme');
  });

  it('raises the bar with a higher threshold', () => {
    const strict = createGateConfig({ linkingThreshold: 0.7 });
    const report = findIssuePrLinks(prs, issues, embeddings, strict);
    expect(report.suggestions.map(s => [s.prNumber, s.issueNumber])).toEqual([[11, 101]]);
  });
});
