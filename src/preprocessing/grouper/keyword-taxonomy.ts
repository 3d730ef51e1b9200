/**
 * Keyword Taxonomy
 *
 * Ordered mapping of functional group name → lowercase keywords.
 * Every helper returns a fresh taxonomy; none mutates its input.
 */

import type { KeywordTaxonomy } from '../types';
import defaultTaxonomyData from './data/default-taxonomy.json';

export interface TaxonomyEntry {
  name: string;
  keywords: string[];
}

function normalizeKeywords(keywords: readonly string[]): string[] {
  const normalized = keywords
    .map((keyword) => keyword.trim().toLowerCase())
    .filter((keyword) => keyword.length > 0);
  return Array.from(new Set(normalized));
}

export function createTaxonomy(entries: readonly TaxonomyEntry[]): KeywordTaxonomy {
  const taxonomy = new Map<string, readonly string[]>();
  for (const entry of entries) {
    const existing = taxonomy.get(entry.name) ?? [];
    taxonomy.set(
      entry.name,
      Object.freeze(normalizeKeywords([...existing, ...entry.keywords])),
    );
  }
  return taxonomy;
}

/**
 * Built-in taxonomy, loaded once
 */
export const DEFAULT_KEYWORD_TAXONOMY: KeywordTaxonomy =
  createTaxonomy(defaultTaxonomyData);

/**
 * Merge caller keywords into a copy of the base taxonomy.
 * Keywords for an existing group are appended; new groups go last.
 */
export function mergeTaxonomy(
  base: KeywordTaxonomy,
  custom?: Record<string, readonly string[]>,
): KeywordTaxonomy {
  const merged = new Map<string, readonly string[]>(base);
  if (!custom) {
    return merged;
  }

  for (const [name, keywords] of Object.entries(custom)) {
    const existing = merged.get(name) ?? [];
    merged.set(name, Object.freeze(normalizeKeywords([...existing, ...keywords])));
  }

  return merged;
}

export function withoutGroups(
  taxonomy: KeywordTaxonomy,
  names: readonly string[],
): KeywordTaxonomy {
  const removed = new Set(names);
  return new Map(
    Array.from(taxonomy).filter(([name]) => !removed.has(name)),
  );
}

export function listGroups(taxonomy: KeywordTaxonomy): string[] {
  return Array.from(taxonomy.keys());
}

export function getGroupKeywords(
  taxonomy: KeywordTaxonomy,
  name: string,
): readonly string[] {
  return taxonomy.get(name) ?? [];
}

export function toTaxonomyEntries(taxonomy: KeywordTaxonomy): TaxonomyEntry[] {
  return Array.from(taxonomy, ([name, keywords]) => ({
    name,
    keywords: [...keywords],
  }));
}
