import { matchCodeowners, parseCodeowners, pastReviewers, suggestReviewers } from '../../src/core/routing';
import { DEFAULT_CONFIG } from '../../src/core/config';
import { makeAuthor, makeFile, makePR } from '../fixtures/item-factory';

describe('parseCodeowners', () => {
  it('keeps patterns with at least one @owner', () => {
    const rules = parseCodeowners([
      '# comment',
      '',
      '*.ts @alice @bob',
      'docs/ team-without-at',
      '  src/auth/*   @security  ',
    ].join('\n'));

    expect(rules).toEqual([
      { pattern: '*.ts', owners: ['alice', 'bob'] },
      { pattern: 'src/auth/*', owners: ['security'] },
    ]);
  });

  it('returns nothing for an empty file', () => {
    expect(parseCodeowners('')).toEqual([]);
  });
});

describe('matchCodeowners', () => {
  it('lets the last matching rule own a file', () => {
    const owners = matchCodeowners(['README.md', 'src/auth/login.ts'], [
      { pattern: '*', owners: ['everyone'] },
      { pattern: 'src/auth/*', owners: ['security'] },
    ]);

    expect([...owners.entries()]).toEqual([
      ['everyone', ['CODEOWNERS: *']],
      ['security', ['CODEOWNERS: src/auth/*']],
    ]);
  });

  it('matches a bare file name in any directory', () => {
    const rules = [{ pattern: 'config.yml', owners: ['ops'] }];

    expect(matchCodeowners(['deploy/config.yml'], rules).get('ops')).toEqual(['CODEOWNERS: config.yml']);
    expect(matchCodeowners(['deploy/myconfig.yml'], rules).size).toBe(0);
    expect(matchCodeowners(['deploy/configXyml'], rules).size).toBe(0);
  });

  it('lists a pattern once per owner however many files it matches', () => {
    const owners = matchCodeowners(['a.ts', 'b.ts'], [{ pattern: '*.ts', owners: ['alice'] }]);
    expect(owners.get('alice')).toEqual(['CODEOWNERS: *.ts']);
  });
});

describe('pastReviewers', () => {
  it('counts only PRs that share a file', () => {
    const recent = [
      makePR({ number: 3, files: [makeFile('src/util.ts')] }),
      makePR({ number: 4, files: [makeFile('src/util.ts'), makeFile('src/auth/login.ts')] }),
      makePR({ number: 5, files: [makeFile('docs/a.md')] }),
    ];
    const reviews = new Map([[3, ['dave', 'alice']], [4, ['dave']], [5, ['erin']]]);

    const counts = pastReviewers(['src/util.ts'], recent, reviews);

    expect([...counts.entries()]).toEqual([['dave', 2], ['alice', 1]]);
  });
});

describe('suggestReviewers', () => {
  const pr = makePR({
    number: 7,
    title: 'Harden login',
    author: makeAuthor({ login: 'carol' }),
    files: [makeFile('src/auth/login.ts'), makeFile('src/util.ts')],
  });
  const codeowners = parseCodeowners('*.ts @alice\nsrc/auth/* @security @carol\n');
  const recentPRs = [
    makePR({ number: 3, files: [makeFile('src/util.ts')] }),
    makePR({ number: 4, files: [makeFile('src/util.ts'), makeFile('src/auth/login.ts')] }),
    makePR({ number: 5, files: [makeFile('docs/a.md')] }),
  ];
  const reviewsByPr = new Map([[3, ['dave', 'alice']], [4, ['dave']], [5, ['erin']]]);

  it('ranks owners above past reviewers and never suggests the author', () => {
    const report = suggestReviewers(pr, { codeowners, recentPRs, reviewsByPr }, DEFAULT_CONFIG);

    expect(report).toEqual({
      owner: 'acme',
      repo: 'widgets',
      prNumber: 7,
      prTitle: 'Harden login',
      changedFiles: ['src/auth/login.ts', 'src/util.ts'],
      codeownersFound: true,
      recentReviewersChecked: 3,
      suggestions: [
        {
          username: 'alice',
          score: 1,
          reasons: ['CODEOWNERS: *.ts', 'Reviewed 1 recent PR(s) touching similar files'],
        },
        { username: 'security', score: 0.6667, reasons: ['CODEOWNERS: src/auth/*'] },
        { username: 'dave', score: 0.3333, reasons: ['Reviewed 2 recent PR(s) touching similar files'] },
      ],
    });
  });

  it('stops at reviewMaxSuggestions', () => {
    const report = suggestReviewers(pr, { codeowners, recentPRs, reviewsByPr }, { ...DEFAULT_CONFIG, reviewMaxSuggestions: 1 });
    expect(report.suggestions.map(s => s.username)).toEqual(['alice']);
  });

  it('weighs every owned pattern', () => {
    const report = suggestReviewers(
      makePR({ author: makeAuthor({ login: 'carol' }), files: [makeFile('src/a.ts'), makeFile('docs/b.md')] }),
      { codeowners: parseCodeowners('*.ts @alice\n*.md @alice @bob\n') },
      DEFAULT_CONFIG,
    );
    expect(report.suggestions).toEqual([
      { username: 'alice', score: 1, reasons: ['CODEOWNERS: *.ts', 'CODEOWNERS: *.md'] },
      { username: 'bob', score: 0.5, reasons: ['CODEOWNERS: *.md'] },
    ]);
  });

  it('reports no candidates without CODEOWNERS or history', () => {
    const report = suggestReviewers(pr, {}, DEFAULT_CONFIG);
    expect(report.suggestions).toEqual([]);
    expect(report.codeownersFound).toBe(false);
    expect(report.recentReviewersChecked).toBe(0);
  });

  it('leaves nothing when the author is the only owner', () => {
    const report = suggestReviewers(pr, { codeowners: parseCodeowners('* @carol') }, DEFAULT_CONFIG);
    expect(report.suggestions).toEqual([]);
    expect(report.codeownersFound).toBe(true);
  });
});
