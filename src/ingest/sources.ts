/**
 * Known Open Library dump files
 */

import { DEFAULT_BASE_URL } from '../lib/constants.js';
import type { Category, DumpSource } from './types.js';

const RECORD_TYPES: Record<Category, string> = {
  authors: '/type/author',
  editions: '/type/edition',
  works: '/type/work',
};

/**
 * File name of the latest dump for a category
 */
export function dumpFileName(category: Category): string {
  return `ol_dump_${category}_latest.txt.gz`;
}

/**
 * Build the list of dump sources, in processing order
 */
export function createDumpSources(baseUrl: string = DEFAULT_BASE_URL): DumpSource[] {
  const base = baseUrl.replace(/\/+$/, '');
  const categories: Category[] = ['authors', 'editions', 'works'];

  return categories.map((category) => {
    const name = dumpFileName(category);
    return {
      name,
      category,
      url: `${base}/${name}`,
      recordType: RECORD_TYPES[category],
    };
  });
}

/**
 * Find a source by file name
 */
export function findSource(sources: DumpSource[], name: string): DumpSource | undefined {
  const trimmed = name.trim();
  return sources.find((source) => source.name === trimmed);
}

/**
 * Type tag expected for records of a category
 */
export function recordTypeFor(category: Category): string {
  return RECORD_TYPES[category];
}
