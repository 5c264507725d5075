import { join } from 'path';
import { loadSnapshot, parseSnapshot } from '../../src/core/snapshot';
import { SnapshotError } from '../../src/core/errors';

const FIXTURES = join(__dirname, '..', 'fixtures');

describe('parseSnapshot', () => {
  it('fills defaults an ingestion step would give', () => {
    const snapshot = parseSnapshot({
      owner: 'acme',
      repo: 'widgets',
      pullRequests: [{
        number: 4,
        title: 'Add tree view',
        author: { login: 'dev' },
        files: [{ filename: 'src/tree.ts', additions: 12, deletions: 3 }, { filename: 'README.md', additions: 2 }],
      }],
    });

    expect(snapshot.pullRequests).toEqual([{
      kind: 'pull_request',
      owner: 'acme',
      repo: 'widgets',
      number: 4,
      title: 'Add tree view',
      body: '',
      author: { login: 'dev', accountCreatedAt: undefined, contributionsToRepo: 0 },
      createdAt: undefined,
      updatedAt: undefined,
      labels: [],
      state: 'open',
      files: [
        { filename: 'src/tree.ts', status: 'modified', additions: 12, deletions: 3 },
        { filename: 'README.md', status: 'modified', additions: 2, deletions: 0 },
      ],
      diffText: '',
      linkedIssues: [],
      mergedAt: undefined,
      totalAdditions: 14,
      totalDeletions: 3,
    }]);
    expect(snapshot.issues).toEqual([]);
    expect(snapshot.embeddings.size).toBe(0);
  });

  it('marks merged PRs as merged unless told otherwise', () => {
    const snapshot = parseSnapshot({
      mergedPullRequests: [{ number: 9, title: 'Old fix', author: { login: 'dev' }, mergedAt: '2024-05-01T00:00:00Z' }],
    });
    expect(snapshot.mergedPullRequests[0].state).toBe('merged');
    expect(snapshot.mergedPullRequests[0].owner).toBe('');
  });

  it('keys item embeddings by number and label embeddings by name', () => {
    const snapshot = parseSnapshot({
      embeddings: { '12': [0.1, 0.2] },
      labelEmbeddings: { bug: [1, 0] },
    });
    expect([...snapshot.embeddings.entries()]).toEqual([[12, [0.1, 0.2]]]);
    expect([...snapshot.labelEmbeddings.entries()]).toEqual([['bug', [1, 0]]]);
  });

  it('reads reviewers per PR and the CODEOWNERS text', () => {
    const snapshot = parseSnapshot({
      reviews: { '12': ['alice', 'bob'] },
      codeowners: '*.ts @alice',
    });
    expect([...snapshot.reviews.entries()]).toEqual([[12, ['alice', 'bob']]]);
    expect(snapshot.codeowners).toBe('*.ts @alice');
  });

  it('defaults to no reviews and no CODEOWNERS', () => {
    const snapshot = parseSnapshot({});
    expect(snapshot.reviews.size).toBe(0);
    expect(snapshot.codeowners).toBe('');
  });

  it('rejects a reviewer list that is not strings', () => {
    expect(() => parseSnapshot({ reviews: { '3': [7] } }))
      .toThrow('snapshot.reviews.3[0]: expected a string');
  });

  it('names the path of a malformed field', () => {
    expect(() => parseSnapshot({ pullRequests: [{ number: 1, title: 7, author: { login: 'dev' } }] }))
      .toThrow('snapshot.pullRequests[0].title: expected a string');
  });

  it('rejects embedding keys that are not item numbers', () => {
    expect(() => parseSnapshot({ embeddings: { abc: [1] } }))
      .toThrow('snapshot.embeddings.abc: keys must be item numbers');
  });

  it('rejects an unknown file status', () => {
    expect(() => parseSnapshot({
      pullRequests: [{ number: 1, title: 'x', author: { login: 'dev' }, files: [{ filename: 'a', status: 'moved' }] }],
    })).toThrow('snapshot.pullRequests[0].files[0].status: expected one of added, removed, modified, renamed');
  });

  it('rejects a non-object root', () => {
    expect(() => parseSnapshot([])).toThrow(SnapshotError);
  });
});

describe('loadSnapshot', () => {
  it('reads a snapshot file', () => {
    const snapshot = loadSnapshot(join(FIXTURES, 'snapshot.json'));

    expect(snapshot.owner).toBe('acme');
    expect(snapshot.pullRequests.map(pr => pr.number)).toEqual([1, 2]);
    expect(snapshot.issues.map(i => i.number)).toEqual([100]);
    expect(snapshot.issues[0].reactions).toEqual({ '+1': 3 });
    expect(snapshot.labels).toEqual([{ name: 'bug', description: null, color: 'd73a4a' }]);
    expect(snapshot.embeddings.get(2)).toEqual([0, 1]);
    expect(snapshot.mergedPullRequests.map(pr => pr.number)).toEqual([50]);
    expect(snapshot.reviews.get(50)).toEqual(['parser-guru']);
    expect(snapshot.codeowners).toBe('# owners\nsrc/* @core-team\n');
  });

  it('wraps a missing file in SnapshotError', () => {
    expect(() => loadSnapshot(join(FIXTURES, 'missing.json'))).toThrow(SnapshotError);
  });
});
