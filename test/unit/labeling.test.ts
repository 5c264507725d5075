import {
  classifyItem,
  keywordScore,
  mergeTaxonomies,
  repositoryLabelsToTaxonomy,
} from '../../src/core/labeling';
import { createGateConfig } from '../../src/core/config';
import type { LabelDefinition } from '../../src/core/types';
import { makeIssue } from '../fixtures/item-factory';

const config = createGateConfig();

const visionLabel = (name: string, keywords: string[]): LabelDefinition =>
  ({ name, description: '', keywords, color: '', source: 'vision' });

describe('keywordScore', () => {
  it('counts whole-word matches only', () => {
    expect(keywordScore('Fix the Parser for nested trees', ['parser', 'nest', 'tree'])).toEqual({
      score: 1 / 3,
      matches: ['parser'],
    });
  });

  it('scores 0 without keywords', () => {
    expect(keywordScore('anything', [])).toEqual({ score: 0, matches: [] });
  });
});

describe('taxonomy', () => {
  it('converts repository labels and drops unnamed ones', () => {
    expect(repositoryLabelsToTaxonomy([
      { name: ' bug ', description: null, color: 'd73a4a' },
      { name: '' },
      {},
    ])).toEqual([{ name: 'bug', description: '', keywords: [], color: 'd73a4a', source: 'repository' }]);
  });

  it('lets vision labels win by case-insensitive name', () => {
    const merged = mergeTaxonomies(
      [visionLabel('Parser', ['parser'])],
      repositoryLabelsToTaxonomy([{ name: 'parser' }, { name: 'bug' }]),
    );
    expect(merged.map(l => [l.name, l.source])).toEqual([['Parser', 'vision'], ['bug', 'repository']]);
  });
});

describe('classifyItem', () => {
  const taxonomy: LabelDefinition[] = [
    visionLabel('parser', ['parser', 'nested', 'tree']),
    visionLabel('docs', ['readme', 'docs']),
    ...repositoryLabelsToTaxonomy([{ name: 'bug' }]),
    visionLabel('performance', ['slow']),
  ];
  const labelEmbeddings = new Map([
    ['parser', [1, 0]],
    ['docs', [0, 1]],
    ['bug', [0.6, 0.8]],
  ]);
  const issue = makeIssue({ labels: ['triage'] });

  it('blends keyword and semantic signals and sorts by confidence', () => {
    const report = classifyItem(issue, [1, 0], taxonomy, labelEmbeddings, config);

    expect(report.suggestions).toEqual([
      {
        label: 'parser',
        confidence: 1,
        embeddingSimilarity: 1,
        keywordScore: 1,
        keywordMatches: ['parser', 'nested', 'tree'],
        source: 'vision',
      },
      {
        label: 'bug',
        confidence: 0.42,
        embeddingSimilarity: 0.6,
        keywordScore: 0,
        keywordMatches: [],
        source: 'repository',
      },
    ]);
    expect(report).toMatchObject({
      itemKind: 'issue',
      itemNumber: 100,
      existingLabels: ['triage'],
      taxonomySize: 4,
      threshold: 0.3,
    });
  });

  it('relies on keywords alone without an item embedding', () => {
    const report = classifyItem(issue, undefined, taxonomy, labelEmbeddings, config);
    expect(report.suggestions.map(s => [s.label, s.confidence])).toEqual([['parser', 0.3]]);
  });

  it('caps the number of suggestions', () => {
    const report = classifyItem(issue, [1, 0], taxonomy, labelEmbeddings, createGateConfig({ labelMaxSuggestions: 1 }));
    expect(report.suggestions.map(s => s.label)).toEqual(['parser']);
  });

  it('suggests nothing from an empty taxonomy', () => {
    const report = classifyItem(issue, [1, 0], [], labelEmbeddings, config);
    expect(report.suggestions).toEqual([]);
    expect(report.taxonomySize).toBe(0);
  });
});
