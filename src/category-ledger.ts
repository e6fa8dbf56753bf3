// Category ledger: which values belong to which category, per response column.
//
// Source of truth is one Set of normalized values per (category, column).
// Everything else is derived on read:
//   - a category's deduplicated value set = union over its columns
//   - membership cell (category, column, row) = 1 if the row's value is in the
//     (category, column) set, 0 if not, null if the row is inapplicable
// Mutations therefore touch one structure and the two views cannot drift.
//
// Unknown category or column names are caller contract violations and throw.
// Everything the analyst can get wrong comes back as an OpResult.

import type {
  CategorizationMode, CodeframeTarget, MembershipCell, MembershipColumn, OpResult, ResponseSource,
} from './types.js';
import { UNCATEGORIZED, failed, succeeded, isMissing } from './types.js';

/** Thrown when a caller references a category or column the ledger does not hold */
export class LedgerInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerInvariantError';
  }
}

export interface LedgerPolicy {
  /** Multi mode: drop categorized values from Uncategorized as Single mode does */
  readonly multiModeClearsUncategorized: boolean;
}

export interface LedgerSnapshot {
  readonly membership: readonly MembershipColumn[];
  readonly categoryValues: ReadonlyMap<string, ReadonlySet<string>>;
}

type ColumnSets = Map<string, Set<string>>;

export class CategoryLedger implements CodeframeTarget {
  private readonly source: ResponseSource;
  private policy: LedgerPolicy;
  /** Display order; Uncategorized is always last */
  private order: string[] = [UNCATEGORIZED];
  private records: Map<string, ColumnSets> = new Map([[UNCATEGORIZED, new Map()]]);
  /** Rows whose cell is inapplicable, per response column */
  private inapplicable: Map<string, Set<number>> = new Map();

  constructor(source: ResponseSource, policy: LedgerPolicy) {
    this.source = source;
    this.policy = policy;
  }

  setPolicy(policy: LedgerPolicy): void {
    this.policy = policy;
  }

  /** Reset to a fresh codeframe: every value Uncategorized, missing rows inapplicable */
  initialize(): void {
    const uncategorized: ColumnSets = new Map();
    this.order = [UNCATEGORIZED];
    this.records = new Map([[UNCATEGORIZED, uncategorized]]);
    this.inapplicable = new Map();

    for (const column of this.source.responseColumns()) {
      const values = this.source.columnValues(column);
      const distinct = new Set<string>();
      for (const value of values) {
        if (!isMissing(value)) distinct.add(value);
      }
      uncategorized.set(column, distinct);
      this.reconcileMissing(column, values.map(isMissing));
    }
  }

  // --- Category management ---

  create(name: string): OpResult {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      return failed('EmptyName', 'Category name cannot be empty');
    }
    if (this.records.has(trimmed)) {
      return failed('AlreadyExists', `Category "${trimmed}" already exists`);
    }

    const sets: ColumnSets = new Map();
    for (const column of this.source.responseColumns()) {
      sets.set(column, new Set());
    }
    this.records.set(trimmed, sets);
    // After earlier user categories, before Uncategorized
    this.order.splice(this.order.length - 1, 0, trimmed);
    return succeeded(`Category "${trimmed}" created`);
  }

  rename(oldName: string, newName: string): OpResult {
    const trimmed = newName.trim();
    if (trimmed.length === 0) {
      return failed('EmptyName', 'Category name cannot be empty');
    }
    if (this.records.has(trimmed)) {
      return failed('AlreadyExists', `A category named "${trimmed}" already exists`);
    }
    if (oldName === UNCATEGORIZED) {
      return failed('Protected', `You may not rename the category "${UNCATEGORIZED}"`);
    }

    const sets = this.columnSets(oldName);
    this.records.delete(oldName);
    this.records.set(trimmed, sets);
    this.order[this.order.indexOf(oldName)] = trimmed;
    return succeeded(`Category "${oldName}" renamed to "${trimmed}"`);
  }

  /** Remove categories. Their values go back to Uncategorized in Single mode,
   *  and in Multi mode whenever no other real category still holds them.
   *  Uncategorized itself is skipped; callers filter it out beforehand. */
  delete(names: Iterable<string>, mode: CategorizationMode): void {
    for (const name of names) {
      if (name === UNCATEGORIZED) continue;
      const sets = this.columnSets(name);
      this.records.delete(name);
      this.order = this.order.filter(c => c !== name);

      for (const [column, values] of sets) {
        const uncategorized = this.columnSet(UNCATEGORIZED, column);
        for (const value of values) {
          if (mode === 'Single' || !this.inAnyRealCategory(value, column)) {
            uncategorized.add(value);
          }
        }
      }
    }
  }

  // --- Membership mutation ---

  /** Assign values found in one response column to the target categories */
  categorize(
    values: Iterable<string>,
    categories: readonly string[],
    column: string,
    mode: CategorizationMode,
  ): OpResult {
    const selectionError = checkSelection(categories, mode);
    if (selectionError) return selectionError;

    const present = this.presentValues(values, column);
    this.assign(present, categories, column, mode);
    return succeeded(`Categorized ${present.size} value(s) in "${column}"`);
  }

  /** Move values out of fromCategory (always) into the new categories, for one column */
  recategorize(
    values: Iterable<string>,
    newCategories: readonly string[],
    fromCategory: string,
    column: string,
    mode: CategorizationMode,
  ): OpResult {
    const selectionError = checkSelection(newCategories, mode);
    if (selectionError) return selectionError;

    const from = this.columnSet(fromCategory, column);
    const targets = newCategories.map(c => this.columnSet(c, column));
    const moved = new Set<string>();
    for (const value of values) {
      if (from.has(value)) moved.add(value);
    }

    for (const value of moved) from.delete(value);
    for (const target of targets) {
      for (const value of moved) target.add(value);
    }
    return succeeded(`Recategorized ${moved.size} value(s) in "${column}"`);
  }

  /** Mark the flagged rows of a column inapplicable for every category */
  reconcileMissing(column: string, isMissingRow: readonly boolean[]): void {
    this.assertColumn(column);
    const rows = new Set<number>();
    isMissingRow.forEach((missing, row) => {
      if (missing) rows.add(row);
    });
    this.inapplicable.set(column, rows);
  }

  /** Extend the codeframe over rows appended from firstNewRow onward.
   *  Values already seen in a column keep their categories automatically.
   *  Values new to a column inherit the real categories that hold them anywhere,
   *  and otherwise land in Uncategorized. */
  reapplyCodeframe(firstNewRow: number, mode: CategorizationMode): void {
    const codeframe = new Map<string, Set<string>>();
    for (const name of this.order) {
      if (name !== UNCATEGORIZED) codeframe.set(name, this.values(name));
    }

    for (const column of this.source.responseColumns()) {
      const values = this.source.columnValues(column);
      const known = new Set<string>();
      for (const sets of this.records.values()) {
        for (const value of sets.get(column) ?? []) known.add(value);
      }

      const fresh = new Set<string>();
      for (let row = firstNewRow; row < values.length; row++) {
        const value = values[row];
        if (!isMissing(value) && !known.has(value)) fresh.add(value);
      }

      const uncategorized = this.columnSet(UNCATEGORIZED, column);
      for (const value of fresh) {
        uncategorized.add(value);
        const holders = [...codeframe].filter(([, held]) => held.has(value)).map(([name]) => name);
        if (holders.length === 0) continue;
        this.assign(new Set([value]), mode === 'Single' ? holders.slice(0, 1) : holders, column, mode);
      }

      this.reconcileMissing(column, values.map(isMissing));
    }
  }

  /** Values a real category shares with another holder in the same column,
   *  formatted as `"value" in column`. Single mode allows none. */
  singleModeConflicts(): string[] {
    const conflicts: string[] = [];
    for (const column of this.source.responseColumns()) {
      const holders = new Map<string, number>();
      for (const name of this.order) {
        if (name === UNCATEGORIZED) continue;
        for (const value of this.columnSet(name, column)) {
          holders.set(value, (holders.get(value) ?? 0) + 1);
        }
      }
      for (const [value, count] of holders) {
        if (count > 1) conflicts.push(`"${value}" in ${column}`);
      }
    }
    return conflicts;
  }

  /** Drop every categorized value from Uncategorized, as Single mode requires */
  enforceSingleMode(): void {
    for (const column of this.source.responseColumns()) {
      const uncategorized = this.columnSet(UNCATEGORIZED, column);
      for (const value of [...uncategorized]) {
        if (this.inAnyRealCategory(value, column)) uncategorized.delete(value);
      }
    }
  }

  // --- Read side ---

  categoryNames(): readonly string[] {
    return [...this.order];
  }

  hasCategory(name: string): boolean {
    return this.records.has(name);
  }

  /** Deduplicated values of a category across all response columns */
  values(category: string): Set<string> {
    const union = new Set<string>();
    for (const set of this.columnSets(category).values()) {
      for (const value of set) union.add(value);
    }
    return union;
  }

  columnValues(category: string, column: string): ReadonlySet<string> {
    return this.columnSet(category, column);
  }

  uncategorizedValues(): ReadonlySet<string> {
    return this.values(UNCATEGORIZED);
  }

  /** Whether a value is uncategorized in a given column */
  isUncategorized(value: string, column: string): boolean {
    return this.columnSet(UNCATEGORIZED, column).has(value);
  }

  membership(category: string, column: string): MembershipCell[] {
    const set = this.columnSet(category, column);
    const inapplicable = this.inapplicable.get(column) ?? new Set<number>();
    return this.source.columnValues(column).map((value, row): MembershipCell => {
      if (inapplicable.has(row)) return null;
      return !isMissing(value) && set.has(value) ? 1 : 0;
    });
  }

  /** Wide membership view: grouped by response column, categories in display order */
  membershipTable(): MembershipColumn[] {
    const table: MembershipColumn[] = [];
    for (const column of this.source.responseColumns()) {
      for (const category of this.order) {
        table.push({ category, column, cells: this.membership(category, column) });
      }
    }
    return table;
  }

  snapshot(): LedgerSnapshot {
    const categoryValues = new Map<string, ReadonlySet<string>>();
    for (const name of this.order) {
      categoryValues.set(name, this.values(name));
    }
    return { membership: this.membershipTable(), categoryValues };
  }

  /** Rebuild from a validated snapshot. The response source must already hold the matching rows. */
  restore(snapshot: LedgerSnapshot): void {
    const order = [...snapshot.categoryValues.keys()].filter(c => c !== UNCATEGORIZED);
    order.push(UNCATEGORIZED);

    const records = new Map<string, ColumnSets>();
    for (const name of order) {
      const sets: ColumnSets = new Map();
      for (const column of this.source.responseColumns()) sets.set(column, new Set());
      records.set(name, sets);
    }

    const inapplicable = new Map<string, Set<number>>();
    for (const { category, column, cells } of snapshot.membership) {
      const set = records.get(category)?.get(column);
      if (!set) throw new LedgerInvariantError(`Snapshot references unknown membership column "${category}" / "${column}"`);
      const values = this.source.columnValues(column);
      const rows = inapplicable.get(column) ?? new Set<number>();
      cells.forEach((cell, row) => {
        const value = values[row];
        if (cell === 1 && value !== undefined && !isMissing(value)) set.add(value);
        if (cell === null) rows.add(row);
      });
      inapplicable.set(column, rows);
    }

    this.order = order;
    this.records = records;
    this.inapplicable = inapplicable;
  }

  // --- Internals ---

  private assign(values: ReadonlySet<string>, categories: readonly string[], column: string, mode: CategorizationMode): void {
    const targets = categories.map(c => this.columnSet(c, column));

    if (mode === 'Single') {
      // At most one real category per value per column
      for (const sets of this.records.values()) {
        const set = sets.get(column);
        if (!set) continue;
        for (const value of values) set.delete(value);
      }
    } else if (this.policy.multiModeClearsUncategorized && !categories.includes(UNCATEGORIZED)) {
      const uncategorized = this.columnSet(UNCATEGORIZED, column);
      for (const value of values) uncategorized.delete(value);
    }

    for (const target of targets) {
      for (const value of values) target.add(value);
    }
  }

  private presentValues(values: Iterable<string>, column: string): Set<string> {
    const occurring = new Set<string>();
    for (const value of this.source.columnValues(column)) {
      if (!isMissing(value)) occurring.add(value);
    }
    const present = new Set<string>();
    for (const value of values) {
      if (occurring.has(value)) present.add(value);
    }
    return present;
  }

  private inAnyRealCategory(value: string, column: string): boolean {
    for (const name of this.order) {
      if (name !== UNCATEGORIZED && this.columnSet(name, column).has(value)) return true;
    }
    return false;
  }

  private columnSets(category: string): ColumnSets {
    const sets = this.records.get(category);
    if (!sets) throw new LedgerInvariantError(`Unknown category "${category}"`);
    return sets;
  }

  private columnSet(category: string, column: string): Set<string> {
    this.assertColumn(column);
    const sets = this.columnSets(category);
    let set = sets.get(column);
    if (!set) {
      set = new Set();
      sets.set(column, set);
    }
    return set;
  }

  private assertColumn(column: string): void {
    if (!this.source.responseColumns().includes(column)) {
      throw new LedgerInvariantError(`Unknown response column "${column}"`);
    }
  }
}

function checkSelection(categories: readonly string[], mode: CategorizationMode): OpResult | null {
  if (categories.length === 0) {
    return failed('EmptySelection', 'Select at least one category');
  }
  if (mode === 'Single' && categories.length > 1) {
    return failed('AmbiguousSelection', 'Only one category can be selected in Single categorization mode');
  }
  return null;
}
