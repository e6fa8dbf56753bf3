// Project persistence: snapshot <-> JSON-safe document.
//
// The document has an exact key set. Extra keys, missing keys, empty values
// and wrong shapes are all hard failures; a project file is loaded whole or
// not at all. MISSING is written as JSON null and read back as the sentinel.
// Counts and category lists are arrays of records, so a null value and a
// numeric-looking category name both survive the trip unchanged.

import { z } from 'zod';
import type {
  FailureCode, MembershipColumn, NormalizedValue, ProjectSnapshot,
} from './types.js';
import { MISSING, UNCATEGORIZED, isMissing } from './types.js';

const rawCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const membershipCellSchema = z.union([z.literal(0), z.literal(1), z.null()]);

/** Schema of a saved project. Update EXPECTED_KEYS-dependent checks when this changes. */
export const projectDocumentSchema = z.object({
  rawData: z.object({
    columns: z.array(z.string()).min(2),
    rows: z.array(z.array(rawCellSchema)).min(1),
  }).strict(),
  normalizedData: z.array(z.array(z.string().min(1).nullable())),
  responseColumns: z.array(z.string()).min(1),
  membership: z.array(z.object({
    category: z.string().min(1),
    column: z.string(),
    cells: z.array(membershipCellSchema),
  }).strict()),
  responseCounts: z.array(z.object({
    value: z.string().min(1).nullable(),
    count: z.number().int().nonnegative(),
  }).strict()),
  categoryValues: z.array(z.object({
    category: z.string().min(1),
    values: z.array(z.string().min(1)),
  }).strict()),
  categorizationMode: z.enum(['Single', 'Multi']),
  includeMissingData: z.boolean(),
}).strict();

export type ProjectDocument = z.infer<typeof projectDocumentSchema>;

const EXPECTED_KEYS = Object.keys(projectDocumentSchema.shape);

export type LoadResult =
  | { readonly ok: true; readonly snapshot: ProjectSnapshot }
  | { readonly ok: false; readonly code: FailureCode; readonly message: string };

function invalid(message: string): LoadResult {
  return { ok: false, code: 'InvalidDocument', message };
}

function toJson(value: NormalizedValue): string | null {
  return isMissing(value) ? null : value;
}

function fromJson(value: string | null): NormalizedValue {
  return value === null ? MISSING : value;
}

/** Convert a snapshot to a JSON-safe document */
export function serializeProject(snapshot: ProjectSnapshot): ProjectDocument {
  return {
    rawData: {
      columns: [...snapshot.raw.columns],
      rows: snapshot.raw.rows.map(row => [...row]),
    },
    normalizedData: snapshot.normalized.map(row => row.map(toJson)),
    responseColumns: [...snapshot.responseColumns],
    membership: snapshot.membership.map(m => ({ category: m.category, column: m.column, cells: [...m.cells] })),
    responseCounts: [...snapshot.responseCounts].map(([value, count]) => ({ value: toJson(value), count })),
    categoryValues: [...snapshot.categoryValues].map(([category, values]) => ({ category, values: [...values] })),
    categorizationMode: snapshot.mode,
    includeMissingData: snapshot.includeMissingData,
  };
}

export function stringifyProject(snapshot: ProjectSnapshot): string {
  return JSON.stringify(serializeProject(snapshot), null, 2);
}

/** Parse JSON text into a validated snapshot. Empty text reads as an empty document. */
export function parseProjectJson(text: string): LoadResult {
  if (text.trim().length === 0) return parseProjectDocument({});
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return invalid(`Project file is not valid JSON: ${message}`);
  }
  return parseProjectDocument(parsed);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Empty means invalid. Booleans are exempt: false is a real value. */
function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

/** Validate a loaded document and build a snapshot from it. Never mutates anything. */
export function parseProjectDocument(input: unknown): LoadResult {
  if (input === null || input === undefined || (isPlainObject(input) && Object.keys(input).length === 0)) {
    return invalid('Loaded project data is empty');
  }
  if (!isPlainObject(input)) {
    return invalid('Loaded project data must be a JSON object');
  }

  const unexpected = Object.keys(input).filter(k => !EXPECTED_KEYS.includes(k));
  if (unexpected.length > 0) {
    return invalid(`Unexpected variables loaded: ${unexpected.join(', ')}`);
  }

  for (const [key, schema] of Object.entries(projectDocumentSchema.shape)) {
    if (!(key in input)) {
      return invalid(`Variable '${key}' is missing from loaded project data`);
    }
    const value = input[key];
    if (typeof value !== 'boolean' && isEmptyValue(value)) {
      return invalid(`Variable '${key}' is empty in loaded project data`);
    }
    const result = schema.safeParse(value);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return invalid(`Variable '${key}' in loaded project data is not of the expected type${where}: ${issue?.message ?? 'invalid'}`);
    }
  }

  const parsed = projectDocumentSchema.safeParse(input);
  if (!parsed.success) {
    return invalid(`Loaded project data is malformed: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const consistencyError = checkConsistency(parsed.data);
  if (consistencyError) return invalid(consistencyError);

  return { ok: true, snapshot: toSnapshot(parsed.data) };
}

/** Cross-key checks the per-key schemas cannot express. Returns an error message or null. */
function checkConsistency(doc: ProjectDocument): string | null {
  const { rawData, normalizedData, responseColumns, membership, responseCounts, categoryValues } = doc;
  const rowCount = rawData.rows.length;

  const expectedColumns = rawData.columns.slice(1);
  if (expectedColumns.length !== responseColumns.length || expectedColumns.some((c, i) => c !== responseColumns[i])) {
    return `'responseColumns' does not match the response columns of 'rawData'`;
  }
  if (new Set(responseColumns).size !== responseColumns.length) {
    return `'responseColumns' contains duplicate column names`;
  }
  if (rawData.rows.some(row => row.length !== rawData.columns.length)) {
    return `'rawData' rows do not all have ${rawData.columns.length} cells`;
  }
  if (normalizedData.length !== rowCount || normalizedData.some(row => row.length !== responseColumns.length)) {
    return `'normalizedData' does not have the same shape as the response columns of 'rawData'`;
  }

  const categories = categoryValues.map(c => c.category);
  if (new Set(categories).size !== categories.length) {
    return `'categoryValues' contains duplicate category names`;
  }
  if (!categories.includes(UNCATEGORIZED)) {
    return `'categoryValues' has no "${UNCATEGORIZED}" category`;
  }

  const seenValues = new Set<string | null>();
  for (const { value } of responseCounts) {
    if (seenValues.has(value)) return `'responseCounts' lists "${value ?? 'missing'}" more than once`;
    seenValues.add(value);
  }

  // Exactly one membership column per (category, response column)
  const expectedPairs = new Set<string>();
  for (const category of categories) {
    for (const column of responseColumns) expectedPairs.add(JSON.stringify([category, column]));
  }
  const seenPairs = new Set<string>();
  for (const m of membership) {
    const pair = JSON.stringify([m.category, m.column]);
    if (!expectedPairs.has(pair)) return `'membership' has an unexpected column for "${m.category}" / "${m.column}"`;
    if (seenPairs.has(pair)) return `'membership' lists "${m.category}" / "${m.column}" more than once`;
    if (m.cells.length !== rowCount) return `'membership' column "${m.category}" / "${m.column}" does not have ${rowCount} cells`;
    seenPairs.add(pair);
  }
  if (seenPairs.size !== expectedPairs.size) {
    return `'membership' is missing columns for some categories`;
  }

  // Cells must agree with the value sets and with each other
  const derived = new Map<string, Set<string>>(categories.map(c => [c, new Set<string>()]));
  const inapplicableByColumn = new Map<string, string>();
  const holdersByColumn = new Map<string, number[]>();
  for (const m of membership) {
    const columnIndex = responseColumns.indexOf(m.column);
    const nullRows: number[] = [];
    const cellByValue = new Map<string, 0 | 1>();
    const holders = holdersByColumn.get(m.column) ?? new Array<number>(rowCount).fill(0);
    holdersByColumn.set(m.column, holders);
    for (let row = 0; row < rowCount; row++) {
      const cell = m.cells[row];
      const value = normalizedData[row][columnIndex];
      if (cell === null) nullRows.push(row);
      if (cell === 1) {
        if (value === null) return `'membership' marks a missing response as categorized in "${m.category}" / "${m.column}"`;
        derived.get(m.category)?.add(value);
        holders[row]++;
      }
      if (cell !== null && value !== null) {
        const earlier = cellByValue.get(value);
        if (earlier !== undefined && earlier !== cell) {
          return `'membership' column "${m.category}" / "${m.column}" gives "${value}" different cells in different rows`;
        }
        cellByValue.set(value, cell);
      }
    }
    const signature = nullRows.join(',');
    const previous = inapplicableByColumn.get(m.column);
    if (previous !== undefined && previous !== signature) {
      return `'membership' disagrees about inapplicable rows in column "${m.column}"`;
    }
    inapplicableByColumn.set(m.column, signature);
  }

  if (doc.categorizationMode === 'Single') {
    for (const [column, holders] of holdersByColumn) {
      const row = holders.findIndex(count => count > 1);
      if (row !== -1) {
        return `'membership' puts row ${row + 1} of column "${column}" in more than one category in Single mode`;
      }
    }
  }

  for (const { category, values } of categoryValues) {
    const fromCells = derived.get(category) ?? new Set<string>();
    const listed = new Set(values);
    if (listed.size !== fromCells.size || [...listed].some(v => !fromCells.has(v))) {
      return `'categoryValues' for "${category}" does not match its membership cells`;
    }
  }

  return null;
}

function toSnapshot(doc: ProjectDocument): ProjectSnapshot {
  const membership: MembershipColumn[] = doc.membership.map(m => ({
    category: m.category,
    column: m.column,
    cells: [...m.cells],
  }));

  return {
    raw: { columns: [...doc.rawData.columns], rows: doc.rawData.rows.map(row => [...row]) },
    normalized: doc.normalizedData.map(row => row.map(fromJson)),
    responseColumns: [...doc.responseColumns],
    membership,
    responseCounts: new Map(doc.responseCounts.map(({ value, count }) => [fromJson(value), count])),
    categoryValues: new Map(doc.categoryValues.map(({ category, values }) => [category, new Set(values)])),
    mode: doc.categorizationMode,
    includeMissingData: doc.includeMissingData,
  };
}
