// CodingProject: the explicit state one analyst works against.
//
// Owns a ResponseStore, the CategoryLedger bound to it, a MatchEngine over
// both, and the project-wide flags. Every operation validates here first and
// returns an OpResult; the components below only see valid requests, so a
// failed call leaves the project exactly as it was.

import type {
  AggregatedMatch, CategorizationMode, CategoryMetric, CategoryResponse, ExportTable,
  Lookup, MatchOutcome, MatchRecord, OpResult, ProjectSnapshot, RawTable,
} from './types.js';
import { MISSING, UNCATEGORIZED, failed, isMissing, succeeded } from './types.js';
import { ResponseStore, uniqueNames } from './response-store.js';
import { CategoryLedger } from './category-ledger.js';
import { MatchEngine, aggregateMatches } from './match-engine.js';
import { normalizeResponse, weightedRatio, type SimilarityScorer } from './text-analyzer.js';

export interface ProjectPolicy {
  readonly multiModeClearsUncategorized: boolean;
  readonly includeMissingDataByDefault: boolean;
}

export interface ProjectSummary {
  readonly rows: number;
  readonly responseColumns: readonly string[];
  readonly mode: CategorizationMode;
  readonly includeMissingData: boolean;
  readonly categories: number;
  readonly uncategorizedValues: number;
  readonly lastQuery: string | null;
}

const NO_DATASET = 'There is no dataset in the current project. Start a new project or load one first.';

export class CodingProject {
  private policy: ProjectPolicy;
  private readonly scorer: SimilarityScorer;
  private store: ResponseStore;
  private ledger: CategoryLedger;
  private engine: MatchEngine;
  private mode: CategorizationMode = 'Single';
  private includeMissing: boolean;
  private lastMatches: MatchRecord[] = [];
  private lastQuery: string | null = null;

  constructor(policy: ProjectPolicy, scorer: SimilarityScorer = weightedRatio) {
    this.policy = policy;
    this.scorer = scorer;
    this.includeMissing = policy.includeMissingDataByDefault;
    const [store, ledger, engine] = this.assemble();
    this.store = store;
    this.ledger = ledger;
    this.engine = engine;
  }

  /** Apply a reloaded policy. The missing-data default only affects later projects. */
  applyPolicy(policy: ProjectPolicy): void {
    this.policy = policy;
    this.ledger.setPolicy(policy);
  }

  // --- Lifecycle ---

  /** Replace everything with a fresh dataset; all values start Uncategorized */
  startNew(table: RawTable, mode: CategorizationMode): OpResult {
    const [store, ledger, engine] = this.assemble();
    const loaded = store.load(table);
    if (!loaded.ok) return loaded;
    ledger.initialize();

    this.store = store;
    this.ledger = ledger;
    this.engine = engine;
    this.mode = mode;
    this.includeMissing = this.policy.includeMissingDataByDefault;
    this.clearMatches();
    return succeeded(`${loaded.message}. Categorization mode: ${mode}`);
  }

  /** Append rows and reapply the codeframe. A mode given here becomes the project's mode. */
  appendData(table: RawTable, mode?: CategorizationMode): OpResult {
    const next = mode ?? this.mode;
    const toSingle = next === 'Single' && this.mode === 'Multi';
    if (toSingle) {
      const conflicts = this.ledger.singleModeConflicts();
      if (conflicts.length > 0) {
        return failed(
          'ModeConflict',
          `Cannot switch to Single mode while responses sit in more than one category: ${conflicts.join(', ')}`,
        );
      }
    }

    const result = this.store.append(table, next);
    if (!result.ok) return result;
    if (toSingle) this.ledger.enforceSingleMode();
    const changed = next !== this.mode;
    this.mode = next;
    this.clearMatches();
    return changed ? succeeded(`${result.message}. Categorization mode: ${next}`) : result;
  }

  toSnapshot(): ProjectSnapshot {
    const stored = this.store.snapshot();
    const ledger = this.ledger.snapshot();
    return {
      raw: stored.raw,
      normalized: stored.normalized,
      responseColumns: [...this.store.responseColumns()],
      membership: ledger.membership,
      responseCounts: stored.responseCounts,
      categoryValues: ledger.categoryValues,
      mode: this.mode,
      includeMissingData: this.includeMissing,
    };
  }

  /** Replace state with a validated snapshot */
  restore(snapshot: ProjectSnapshot): void {
    const [store, ledger, engine] = this.assemble();
    store.restore(snapshot);
    ledger.restore(snapshot);

    this.store = store;
    this.ledger = ledger;
    this.engine = engine;
    this.mode = snapshot.mode;
    this.includeMissing = snapshot.includeMissingData;
    this.clearMatches();
  }

  // --- Matching ---

  match(query: string): MatchOutcome {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return { ok: false, code: 'EmptyQuery', message: 'Enter a string to match against' };
    }
    const outcome = this.engine.match(trimmed);
    if (outcome.ok) {
      this.lastMatches = [...outcome.records];
      this.lastQuery = trimmed;
    }
    return outcome;
  }

  /** Last match, re-filtered at the given threshold */
  matchResults(threshold: number): AggregatedMatch[] {
    return aggregateMatches(this.lastMatches, threshold);
  }

  // --- Categorization ---

  categorize(values: readonly string[], categories: readonly string[]): OpResult {
    const invalid = this.checkTargets(categories);
    if (invalid) return invalid;

    const normalized = normalizeAll(values);
    if (normalized.size === 0) {
      return failed('EmptySelection', 'Select at least one response to categorize');
    }

    for (const column of this.store.responseColumns()) {
      const result = this.ledger.categorize(normalized, categories, column, this.mode);
      if (!result.ok) return result;
    }
    this.dropCategorizedMatches();
    return succeeded(`Categorized ${normalized.size} response(s) into ${categories.join(', ')}`);
  }

  recategorize(values: readonly string[], categories: readonly string[], fromCategory: string): OpResult {
    const invalid = this.checkTargets(categories);
    if (invalid) return invalid;
    if (!this.ledger.hasCategory(fromCategory)) {
      return failed('UnknownCategory', `Category "${fromCategory}" does not exist`);
    }

    const normalized = normalizeAll(values);
    if (normalized.size === 0) {
      return failed('EmptySelection', 'Select at least one response to recategorize');
    }

    for (const column of this.store.responseColumns()) {
      const result = this.ledger.recategorize(normalized, categories, fromCategory, column, this.mode);
      if (!result.ok) return result;
    }
    this.dropCategorizedMatches();
    return succeeded(`Moved ${normalized.size} response(s) from "${fromCategory}" to ${categories.join(', ')}`);
  }

  // --- Categories ---

  createCategory(name: string): OpResult {
    if (this.store.isEmpty()) return failed('NoDataset', NO_DATASET);
    return this.ledger.create(name);
  }

  renameCategory(oldName: string, newName: string): OpResult {
    if (this.store.isEmpty()) return failed('NoDataset', NO_DATASET);
    if (!this.ledger.hasCategory(oldName)) {
      return failed('UnknownCategory', `Category "${oldName}" does not exist`);
    }
    return this.ledger.rename(oldName, newName);
  }

  deleteCategories(names: readonly string[]): OpResult {
    if (this.store.isEmpty()) return failed('NoDataset', NO_DATASET);
    if (names.length === 0) {
      return failed('EmptySelection', 'Select at least one category to delete');
    }
    if (names.includes(UNCATEGORIZED)) {
      return failed('Protected', `You may not delete the category "${UNCATEGORIZED}"`);
    }
    const unknown = names.filter(n => !this.ledger.hasCategory(n));
    if (unknown.length > 0) {
      return failed('UnknownCategory', `Unknown categor${unknown.length === 1 ? 'y' : 'ies'}: ${unknown.join(', ')}`);
    }

    const doomed = new Set(names);
    this.ledger.delete(doomed, this.mode);
    return succeeded(`Deleted ${doomed.size} categor${doomed.size === 1 ? 'y' : 'ies'}`);
  }

  categoryNames(): readonly string[] {
    return this.ledger.categoryNames();
  }

  /** Values of a category with their counts: count desc, then alphabetical */
  categoryResponses(category: string): Lookup<CategoryResponse[]> {
    if (!this.ledger.hasCategory(category)) {
      return { ok: false, code: 'UnknownCategory', message: `Category "${category}" does not exist` };
    }
    const responses = [...this.ledger.values(category)]
      .map(value => ({ value, count: this.store.countOf(value) }))
      .sort((a, b) => b.count - a.count || a.value.localeCompare(b.value));
    return { ok: true, value: responses };
  }

  /** Occurrence count and share of every category, in display order */
  categoryMetrics(): CategoryMetric[] {
    let total = 0;
    for (const count of this.store.counts().values()) total += count;
    const denominator = this.includeMissing ? total : total - this.store.countOf(MISSING);

    return this.ledger.categoryNames().map(category => {
      let count = 0;
      for (const value of this.ledger.values(category)) count += this.store.countOf(value);
      const share = denominator === 0 ? 0 : (count / denominator) * 100;
      return { category, count, percentage: `${share.toFixed(2)}%` };
    });
  }

  setIncludeMissingData(include: boolean): OpResult {
    this.includeMissing = include;
    return succeeded(include
      ? 'Missing responses now count towards category percentages'
      : 'Missing responses are now excluded from category percentages');
  }

  // --- Export ---

  /** Id column plus one 1/0/blank column per (category, response column),
   *  headed category_column. Multi mode leaves out the Uncategorized columns. */
  exportTable(): Lookup<ExportTable> {
    if (this.store.isEmpty()) {
      return { ok: false, code: 'NoDataset', message: NO_DATASET };
    }

    const membership = this.ledger.membershipTable()
      .filter(m => this.mode === 'Single' || m.category !== UNCATEGORIZED);
    // "a_b" + "c" and "a" + "b_c" both read "a_b_c"; later repeats get a suffix
    const columns = uniqueNames([this.store.idColumn(), ...membership.map(m => `${m.category}_${m.column}`)]);
    const rows = this.store.ids().map((id, row) => [
      typeof id === 'boolean' ? String(id) : id,
      ...membership.map(m => m.cells[row] ?? null),
    ]);
    return { ok: true, value: { columns, rows } };
  }

  // --- Read side ---

  hasDataset(): boolean {
    return !this.store.isEmpty();
  }

  categorizationMode(): CategorizationMode {
    return this.mode;
  }

  includesMissingData(): boolean {
    return this.includeMissing;
  }

  summary(): ProjectSummary {
    return {
      rows: this.store.rowCount(),
      responseColumns: this.store.responseColumns(),
      mode: this.mode,
      includeMissingData: this.includeMissing,
      categories: this.ledger.categoryNames().length,
      uncategorizedValues: this.store.uniqueUncategorizedValues().size,
      lastQuery: this.lastQuery,
    };
  }

  // --- Internals ---

  private assemble(): [ResponseStore, CategoryLedger, MatchEngine] {
    const store = new ResponseStore();
    const ledger = new CategoryLedger(store, this.policy);
    store.bindCodeframe(ledger);
    return [store, ledger, new MatchEngine(store, ledger, this.scorer)];
  }

  private checkTargets(categories: readonly string[]): OpResult | null {
    if (this.store.isEmpty()) return failed('NoDataset', NO_DATASET);
    if (categories.length === 0) {
      return failed('EmptySelection', 'Select at least one category');
    }
    if (this.mode === 'Single' && categories.length > 1) {
      return failed('AmbiguousSelection', 'Only one category can be selected in Single categorization mode');
    }
    const unknown = categories.filter(c => !this.ledger.hasCategory(c));
    if (unknown.length > 0) {
      return failed('UnknownCategory', `Unknown categor${unknown.length === 1 ? 'y' : 'ies'}: ${unknown.join(', ')}`);
    }
    return null;
  }

  /** Cached matches only ever show values still uncategorized in their column */
  private dropCategorizedMatches(): void {
    this.lastMatches = this.lastMatches.filter(r => this.ledger.isUncategorized(r.value, r.column));
  }

  private clearMatches(): void {
    this.lastMatches = [];
    this.lastQuery = null;
  }
}

/** Responses arrive as typed by the caller; match them in normalized form */
function normalizeAll(values: readonly string[]): Set<string> {
  const normalized = new Set<string>();
  for (const value of values) {
    const cleaned = normalizeResponse(value);
    if (!isMissing(cleaned)) normalized.add(cleaned);
  }
  return normalized;
}
