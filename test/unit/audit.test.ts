import { runAudit } from '../../src/core/audit';
import { createGateConfig } from '../../src/core/config';
import { NOW, daysAgo, makeAuthor, makeFile, makePR } from '../fixtures/item-factory';

const config = createGateConfig();

const prs = [
  makePR({ number: 1, title: 'Support nested widgets' }),
  makePR({ number: 2, title: 'Nested widget support' }),
  makePR({
    number: 3,
    title: 'Session refactor',
    author: makeAuthor({ login: 'fresh-dev', accountCreatedAt: daysAgo(10), contributionsToRepo: 0 }),
    body: 'Refactors the session handling.',
    files: [makeFile('src/auth/session.ts', 50, 2), makeFile('package.json', 2, 1)],
  }),
  makePR({ number: 4, title: 'Typo fix', author: makeAuthor({ login: 'new-face', contributionsToRepo: 0 }) }),
];

const embeddings = new Map([
  [1, [1, 0]],
  [2, [1, 0]],
  [3, [0, 1]],
  [4, [-1, 0]],
]);

describe('runAudit', () => {
  const report = runAudit(prs, embeddings, config, { now: () => NOW });

  it('counts verdicts with non-anchor cluster members as close candidates', () => {
    expect(report.prsAnalyzed).toBe(4);
    expect(report.recommendCloseCount).toBe(1);
    expect(report.reviewRequiredCount).toBe(1);
    expect(report.fastTrackCount).toBe(2);
  });

  it('clusters at each audit threshold', () => {
    expect(report.clusters.map(c => c.threshold)).toEqual([0.9, 0.85, 0.8]);
    for (const level of report.clusters) {
      expect(level.clusters.map(c => c.members.map(m => m.number))).toEqual([[1, 2]]);
    }
  });

  it('ranks the riskiest PRs and stops at the first clean one', () => {
    expect(report.highestRisk).toEqual([
      {
        prNumber: 3,
        title: 'Session refactor',
        author: 'fresh-dev',
        score: 0.95,
        flagCount: 5,
        highSeverityCount: 2,
        flags: ['new_account', 'first_contribution', 'sensitive_paths', 'low_test_ratio', 'unjustified_deps'],
      },
      {
        prNumber: 4,
        title: 'Typo fix',
        author: 'new-face',
        score: 0.05,
        flagCount: 1,
        highSeverityCount: 0,
        flags: ['first_contribution'],
      },
    ]);
  });

  it('orders flag frequency from most to least common', () => {
    expect(Object.entries(report.flagFrequency)).toEqual([
      ['first_contribution', 2],
      ['new_account', 1],
      ['sensitive_paths', 1],
      ['low_test_ratio', 1],
      ['unjustified_deps', 1],
    ]);
  });

  it('summarises contributors', () => {
    expect(report).toMatchObject({
      owner: 'acme',
      repo: 'widgets',
      uniqueAuthors: 3,
      firstTimeContributors: 2,
      newAccounts: 1,
      sensitivePathPRs: 1,
      lowTestPRs: 1,
    });
    expect('visionDocument' in report).toBe(false);
  });

  it('names the vision document when one was used', () => {
    const withVision = runAudit(prs, embeddings, config, { now: () => NOW, visionName: 'VISION.yaml' });
    expect(withVision.visionDocument).toBe('VISION.yaml');
  });

  it('handles an empty backlog', () => {
    const empty = runAudit([], new Map(), config, { now: () => NOW });
    expect(empty).toMatchObject({ owner: '', prsAnalyzed: 0, fastTrackCount: 0, highestRisk: [], flagFrequency: {} });
  });
});
