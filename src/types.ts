// Core types for the survey coding server
//
// Design principles:
//   - Make illegal states unrepresentable: discriminated unions over boolean+optional
//   - Validate at boundaries, trust inside: parse functions at system edges
//   - Missing data is a real value (a symbol), never a magic string

/** Sentinel for an absent response. Distinct from every string, including "nan" and "null". */
export const MISSING: unique symbol = Symbol('missing');
export type Missing = typeof MISSING;

/** A cleaned response: a non-empty string, or MISSING */
export type NormalizedValue = string | Missing;

export function isMissing(value: NormalizedValue): value is Missing {
  return value === MISSING;
}

/** Whether a value may sit in one real category per column, or in many */
export type CategorizationMode = 'Single' | 'Multi';

const CATEGORIZATION_MODES: readonly CategorizationMode[] = ['Single', 'Multi'];

/** Parse a raw string into a CategorizationMode, returning null for invalid input */
export function parseCategorizationMode(raw: string): CategorizationMode | null {
  const match = CATEGORIZATION_MODES.find(m => m.toLowerCase() === raw.trim().toLowerCase());
  return match ?? null;
}

/** The default, protected category. Everything starts here. */
export const UNCATEGORIZED = 'Uncategorized';

/** 1 = categorized here, 0 = not, null = inapplicable (the row's value is missing) */
export type MembershipCell = 0 | 1 | null;

/** A cell as it arrives from an import (CSV, XLSX, a saved project) */
export type RawCell = string | number | boolean | null;

/** A rectangular import: first column is the respondent id, the rest are responses */
export interface RawTable {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly RawCell[])[];
}

/** Recoverable failure kinds, reported back to the caller and never thrown */
export type FailureCode =
  | 'EmptyDataset'
  | 'TooFewColumns'
  | 'ShapeMismatch'
  | 'DuplicateColumns'
  | 'NoDataset'
  | 'EmptyName'
  | 'AlreadyExists'
  | 'Protected'
  | 'UnknownCategory'
  | 'AmbiguousSelection'
  | 'EmptySelection'
  | 'EmptyQuery'
  | 'ModeConflict'
  | 'UnsupportedFile'
  | 'InvalidDocument';

/** Outcome of a validated operation */
export type OpResult =
  | { readonly ok: true; readonly message: string }
  | { readonly ok: false; readonly code: FailureCode; readonly message: string };

export function succeeded(message: string): OpResult {
  return { ok: true, message };
}

export function failed(code: FailureCode, message: string): OpResult {
  return { ok: false, code, message };
}

/** A value, or the reason there is none */
export type Lookup<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly code: FailureCode; readonly message: string };

/** One occurrence scored against a query */
export interface MatchRecord {
  readonly value: string;
  readonly score: number;
  readonly column: string;
  readonly row: number;
}

/** Match records grouped by value for display */
export interface AggregatedMatch {
  readonly value: string;
  readonly score: number;   // max over occurrences
  readonly count: number;   // number of occurrences
}

export type MatchOutcome =
  | { readonly ok: true; readonly records: readonly MatchRecord[] }
  | { readonly ok: false; readonly code: FailureCode; readonly message: string };

/** Membership cells of one (category, response column) pair, in row order */
export interface MembershipColumn {
  readonly category: string;
  readonly column: string;
  readonly cells: readonly MembershipCell[];
}

/** A categorized value and how often it occurs across the whole table */
export interface CategoryResponse {
  readonly value: string;
  readonly count: number;
}

/** Display metrics for a category */
export interface CategoryMetric {
  readonly category: string;
  readonly count: number;
  readonly percentage: string;   // e.g. "42.00%"
}

/** Flat export: id column + one 0/1/blank column per (category, response column) */
export interface ExportTable {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly (string | number | null)[])[];
}

/** Complete in-memory state of a project: what save writes and load restores */
export interface ProjectSnapshot {
  readonly raw: RawTable;
  readonly normalized: readonly (readonly NormalizedValue[])[];   // rows x response columns
  readonly responseColumns: readonly string[];
  readonly membership: readonly MembershipColumn[];
  readonly responseCounts: ReadonlyMap<NormalizedValue, number>;
  readonly categoryValues: ReadonlyMap<string, ReadonlySet<string>>;   // display order
  readonly mode: CategorizationMode;
  readonly includeMissingData: boolean;
}

/** Read-only view of the response table, as the ledger and match engine need it */
export interface ResponseSource {
  responseColumns(): readonly string[];
  rowCount(): number;
  columnValues(column: string): readonly NormalizedValue[];
}

/** The part of the ledger the response store drives during append */
export interface CodeframeTarget {
  uncategorizedValues(): ReadonlySet<string>;
  reapplyCodeframe(firstNewRow: number, mode: CategorizationMode): void;
}

/** User-configurable behavior, exposed via survey-coder-config.json "behavior" block.
 *  All fields are optional; defaults live in thresholds.ts. */
export interface BehaviorConfig {
  /** Minimum score (0–100) for a match to be shown. Default: 60. */
  readonly matchThreshold?: number;
  /** Maximum aggregated match rows in a tool response. Default: 50. Range: 1–1000. */
  readonly maxMatchResults?: number;
  /** Multi mode: remove categorized values from Uncategorized too. Default: false. */
  readonly multiModeClearsUncategorized?: boolean;
  /** Percentages count missing responses in the denominator on new projects. Default: false. */
  readonly includeMissingDataByDefault?: boolean;
}

/** Server configuration */
export interface CoderConfig {
  readonly workspaceRoot: string;     // base directory for relative file paths
  readonly behavior?: BehaviorConfig;
}
