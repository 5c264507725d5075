/**
 * Vision document loading: the project's principles, anti-patterns, focus
 * areas and label taxonomy, written as YAML by the maintainers.
 */

import { existsSync, readFileSync } from 'fs';
import { load } from 'js-yaml';
import type { LabelDefinition, VisionDocument, VisionPrinciple } from './types';
import { VisionDocumentError } from './errors';
import { createLogger } from './logger';

const log = createLogger('vision');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, field: string, source: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every(v => typeof v === 'string')) {
    throw new VisionDocumentError(`${field} must be a list of strings`, source);
  }
  return value;
}

function optionalString(value: unknown, field: string, source: string): string {
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') throw new VisionDocumentError(`${field} must be a string`, source);
  return value;
}

function entries(value: unknown, field: string, source: string): Record<string, unknown>[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new VisionDocumentError(`${field} must be a list of mappings`, source);
  }
  return value;
}

function parsePrinciples(value: unknown, source: string): VisionPrinciple[] {
  return entries(value, 'principles', source).map((p, i) => {
    if (typeof p.name !== 'string' || typeof p.description !== 'string') {
      throw new VisionDocumentError(`principles[${i}] needs a name and a description`, source);
    }
    return { name: p.name, description: p.description };
  });
}

/** Entries without a name are skipped */
function parseTaxonomy(value: unknown, source: string): LabelDefinition[] {
  const labels: LabelDefinition[] = [];
  entries(value, 'label_taxonomy', source).forEach((lb, i) => {
    if (typeof lb.name !== 'string' || lb.name === '') return;
    labels.push({
      name: lb.name,
      description: optionalString(lb.description, `label_taxonomy[${i}].description`, source),
      keywords: stringList(lb.keywords, `label_taxonomy[${i}].keywords`, source),
      color: optionalString(lb.color, `label_taxonomy[${i}].color`, source),
      source: 'vision',
    });
  });
  return labels;
}

export function parseVisionDocument(yamlText: string, source = '<vision>'): VisionDocument {
  let data: unknown;
  try {
    data = load(yamlText);
  } catch (err: unknown) {
    throw new VisionDocumentError(err instanceof Error ? err.message : String(err), source);
  }
  if (data === undefined || data === null) data = {};
  if (!isRecord(data)) throw new VisionDocumentError('document must be a mapping', source);

  return {
    project: optionalString(data.project, 'project', source),
    principles: parsePrinciples(data.principles, source),
    antiPatterns: stringList(data.anti_patterns, 'anti_patterns', source),
    // A blank entry would match every path once it joins the sensitive paths
    focusAreas: stringList(data.focus_areas, 'focus_areas', source).map(a => a.trim()).filter(a => a !== ''),
    labelTaxonomy: parseTaxonomy(data.label_taxonomy, source),
  };
}

/**
 * Load a vision document. A missing file means "no vision" and returns
 * undefined; a file that exists but cannot be parsed throws.
 */
export function loadVisionDocument(path: string): VisionDocument | undefined {
  if (!existsSync(path)) {
    log.warn({ path }, 'Vision document not found, Tier 3 will be skipped');
    return undefined;
  }
  const doc = parseVisionDocument(readFileSync(path, 'utf-8'), path);
  log.debug({ path, principles: doc.principles.length, labels: doc.labelTaxonomy.length }, 'Loaded vision document');
  return doc;
}
