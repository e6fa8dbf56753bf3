// Response table: raw import, its normalized counterpart, and per-value counts.
//
// The first import column is the respondent id; every other column is a
// response column. Rows are stored row-major, normalized cells in the same
// shape minus the id column. Counts cover the whole table, MISSING included.

import type {
  RawTable, RawCell, NormalizedValue, OpResult, ResponseSource, CodeframeTarget, CategorizationMode,
} from './types.js';
import { succeeded, failed, isMissing } from './types.js';
import { normalizeResponse } from './text-analyzer.js';

/** Persisted slice of the store */
export interface ResponseStoreSnapshot {
  readonly raw: RawTable;
  readonly normalized: readonly (readonly NormalizedValue[])[];
  readonly responseCounts: ReadonlyMap<NormalizedValue, number>;
}

export class ResponseStore implements ResponseSource {
  private columns: string[] = [];
  private rawRows: RawCell[][] = [];
  private normalizedRows: NormalizedValue[][] = [];
  private valueCounts: Map<NormalizedValue, number> = new Map();
  private codeframe: CodeframeTarget | undefined;

  /** Attach the ledger that owns the codeframe. Append reapplies it to new rows. */
  bindCodeframe(target: CodeframeTarget): void {
    this.codeframe = target;
  }

  /** Replace the table with a fresh import */
  load(table: RawTable): OpResult {
    if (table.rows.length === 0) {
      return failed('EmptyDataset', 'Imported dataset is empty');
    }
    if (table.columns.length < 2) {
      return failed(
        'TooFewColumns',
        'Imported dataset does not contain enough columns. The first column should contain respondent ids and the following columns should contain responses.',
      );
    }
    const repeated = duplicateNames(table.columns);
    if (repeated.length > 0) {
      return failed('DuplicateColumns', `Imported dataset repeats the column name(s) ${repeated.join(', ')}. Every column needs its own name.`);
    }

    this.columns = [...table.columns];
    this.rawRows = table.rows.map(row => fitRow(row, table.columns.length));
    this.normalizedRows = this.rawRows.map(normalizeRow);
    this.recount();
    return succeeded(`Loaded ${this.rawRows.length} rows with ${this.columns.length - 1} response column(s)`);
  }

  /** Append rows with the same shape; the bound codeframe is reapplied to them */
  append(table: RawTable, mode: CategorizationMode): OpResult {
    if (this.rawRows.length === 0) {
      return failed('NoDataset', 'There is no dataset in the current project to append to. Start a new project or load one first.');
    }
    if (table.rows.length === 0) {
      return failed('EmptyDataset', 'Imported dataset is empty');
    }
    if (table.columns.length !== this.columns.length) {
      return failed(
        'ShapeMismatch',
        `Imported dataset has ${table.columns.length} columns but the current project has ${this.columns.length}. ` +
        'It should contain respondent ids in the first column followed by the same number of response columns.',
      );
    }

    const firstNewRow = this.rawRows.length;
    const newRows = table.rows.map(row => fitRow(row, this.columns.length));
    this.rawRows.push(...newRows);
    this.normalizedRows.push(...newRows.map(normalizeRow));
    this.recount();
    this.codeframe?.reapplyCodeframe(firstNewRow, mode);

    return succeeded(`Appended ${newRows.length} rows (${this.rawRows.length} total)`);
  }

  isEmpty(): boolean {
    return this.rawRows.length === 0;
  }

  rowCount(): number {
    return this.rawRows.length;
  }

  idColumn(): string {
    return this.columns[0] ?? 'id';
  }

  ids(): RawCell[] {
    return this.rawRows.map(row => row[0]);
  }

  responseColumns(): readonly string[] {
    return this.columns.slice(1);
  }

  /** Normalized values of one response column, in row order */
  columnValues(column: string): readonly NormalizedValue[] {
    const index = this.responseColumns().indexOf(column);
    if (index === -1) return [];
    return this.normalizedRows.map(row => row[index]);
  }

  /** Distinct non-missing values occurring in one response column */
  distinctValues(column: string): Set<string> {
    const distinct = new Set<string>();
    for (const value of this.columnValues(column)) {
      if (!isMissing(value)) distinct.add(value);
    }
    return distinct;
  }

  counts(): ReadonlyMap<NormalizedValue, number> {
    return this.valueCounts;
  }

  countOf(value: NormalizedValue): number {
    return this.valueCounts.get(value) ?? 0;
  }

  /** Values the analyst has not coded yet. The ledger owns them. */
  uniqueUncategorizedValues(): ReadonlySet<string> {
    return this.codeframe?.uncategorizedValues() ?? new Set<string>();
  }

  snapshot(): ResponseStoreSnapshot {
    return {
      raw: { columns: [...this.columns], rows: this.rawRows.map(row => [...row]) },
      normalized: this.normalizedRows.map(row => [...row]),
      responseCounts: new Map(this.valueCounts),
    };
  }

  /** Restore a validated snapshot; counts are taken as saved, not recomputed */
  restore(snapshot: ResponseStoreSnapshot): void {
    this.columns = [...snapshot.raw.columns];
    this.rawRows = snapshot.raw.rows.map(row => [...row]);
    this.normalizedRows = snapshot.normalized.map(row => [...row]);
    this.valueCounts = new Map(snapshot.responseCounts);
  }

  private recount(): void {
    const counts = new Map<NormalizedValue, number>();
    for (const row of this.normalizedRows) {
      for (const value of row) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
      }
    }
    this.valueCounts = counts;
  }
}

/** Names that occur more than once, each listed once */
export function duplicateNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) repeated.add(name);
    seen.add(name);
  }
  return [...repeated];
}

/** Keep first occurrences; later repeats become name_2, name_3, ...
 *  skipping any suffix that is already taken by another name. */
export function uniqueNames(names: readonly string[]): string[] {
  const taken = new Set(names);
  const used = new Set<string>();
  return names.map(name => {
    let candidate = name;
    for (let n = 2; used.has(candidate) || (candidate !== name && taken.has(candidate)); n++) {
      candidate = `${name}_${n}`;
    }
    used.add(candidate);
    return candidate;
  });
}

/** Pad short rows with null and drop cells past the header width */
function fitRow(row: readonly RawCell[], width: number): RawCell[] {
  const fitted: RawCell[] = [];
  for (let i = 0; i < width; i++) {
    fitted.push(row[i] ?? null);
  }
  return fitted;
}

function normalizeRow(row: readonly RawCell[]): NormalizedValue[] {
  return row.slice(1).map(cell => normalizeResponse(cell));
}
