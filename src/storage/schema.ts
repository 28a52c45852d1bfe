/**
 * Column sets for the published Parquet segments
 *
 * One fixed column list per category. Each column names its Parquet
 * encoding kind and where its value comes from in a dump record; the
 * mapper applies the coercion for the kind.
 */

import type { Category } from '../ingest/types.js';

/** Logical column kinds */
export type ColumnKind = 'string' | 'int' | 'timestamp' | 'string_list';

/** Where a column takes its value from */
export type ColumnSource =
  /** Record key column of the dump line */
  | { from: 'key' }
  /** Revision column of the dump line */
  | { from: 'revision' }
  /** Last-modified column of the dump line, falling back to the payload */
  | { from: 'lastModified' }
  /** A payload field */
  | { from: 'field'; field: string }
  /** A payload list of references, flattened to their keys */
  | { from: 'refs'; field: string }
  /** First element of a payload list */
  | { from: 'first'; field: string };

export interface ColumnDef {
  name: string;
  kind: ColumnKind;
  source: ColumnSource;
  /** Records without a value are skipped */
  required?: boolean;
}

/** Value of one column in a mapped row */
export type ColumnValue = string | number | Date | string[] | null;

/** A row ready for the columnar writer; every column of the category is present */
export interface MappedRecord {
  key: string;
  [column: string]: ColumnValue;
}

const key: ColumnDef = { name: 'key', kind: 'string', source: { from: 'key' }, required: true };
const revision: ColumnDef = { name: 'revision', kind: 'int', source: { from: 'revision' } };
const created: ColumnDef = { name: 'created', kind: 'timestamp', source: { from: 'field', field: 'created' } };
const lastModified: ColumnDef = { name: 'last_modified', kind: 'timestamp', source: { from: 'lastModified' } };

function text(name: string, field: string = name): ColumnDef {
  return { name, kind: 'string', source: { from: 'field', field } };
}

function list(name: string, field: string = name): ColumnDef {
  return { name, kind: 'string_list', source: { from: 'field', field } };
}

function refs(name: string, field: string): ColumnDef {
  return { name, kind: 'string_list', source: { from: 'refs', field } };
}

export const AUTHOR_COLUMNS: readonly ColumnDef[] = [
  key,
  text('name'),
  text('personal_name'),
  list('alternate_names'),
  text('birth_date'),
  text('death_date'),
  text('bio'),
  revision,
  created,
  lastModified,
];

export const EDITION_COLUMNS: readonly ColumnDef[] = [
  key,
  text('title'),
  text('subtitle'),
  refs('work_keys', 'works'),
  refs('author_keys', 'authors'),
  list('publishers'),
  text('publish_date'),
  { name: 'number_of_pages', kind: 'int', source: { from: 'field', field: 'number_of_pages' } },
  list('isbn_10'),
  list('isbn_13'),
  refs('languages', 'languages'),
  revision,
  created,
  lastModified,
];

export const WORK_COLUMNS: readonly ColumnDef[] = [
  key,
  text('title'),
  text('subtitle'),
  refs('author_keys', 'authors'),
  list('subjects'),
  text('first_publish_date'),
  text('description'),
  { name: 'cover_id', kind: 'int', source: { from: 'first', field: 'covers' } },
  revision,
  created,
  lastModified,
];

const COLUMNS: Record<Category, readonly ColumnDef[]> = {
  authors: AUTHOR_COLUMNS,
  editions: EDITION_COLUMNS,
  works: WORK_COLUMNS,
};

/**
 * Column list of a category, in file order
 */
export function columnsFor(category: Category): readonly ColumnDef[] {
  return COLUMNS[category];
}

/**
 * Column names of a category, in file order
 */
export function columnNames(category: Category): string[] {
  return COLUMNS[category].map((column) => column.name);
}
