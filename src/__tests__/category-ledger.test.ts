import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ResponseStore } from '../response-store.js';
import { CategoryLedger, LedgerInvariantError, type LedgerPolicy } from '../category-ledger.js';
import { UNCATEGORIZED, type RawTable } from '../types.js';

const FIVE_RESPONDENTS: RawTable = {
  columns: ['id', 'q1'],
  rows: [[1, 'hello'], [2, null], [3, 'Hello'], [4, 'goodbye'], [5, '']],
};

const TWO_COLUMNS: RawTable = {
  columns: ['id', 'q1', 'q2'],
  rows: [[1, 'price', 'ok'], [2, 'ok', '']],
};

function setup(table: RawTable, policy: LedgerPolicy = { multiModeClearsUncategorized: false }) {
  const store = new ResponseStore();
  const ledger = new CategoryLedger(store, policy);
  store.bindCodeframe(ledger);
  store.load(table);
  ledger.initialize();
  return { store, ledger };
}

function sorted(values: Iterable<string>): string[] {
  return [...values].sort();
}

describe('CategoryLedger.initialize', () => {
  it('puts every distinct value in Uncategorized and marks missing rows inapplicable', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);

    assert.deepEqual(ledger.categoryNames(), [UNCATEGORIZED]);
    assert.deepEqual(sorted(ledger.uncategorizedValues()), ['goodbye', 'hello']);
    assert.deepEqual(ledger.membership(UNCATEGORIZED, 'q1'), [1, null, 1, 1, null]);
  });
});

describe('CategoryLedger.create', () => {
  it('adds categories before Uncategorized, trimmed', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    assert.deepEqual(ledger.create('Greeting'), { ok: true, message: 'Category "Greeting" created' });
    ledger.create('  Farewell ');
    assert.deepEqual(ledger.categoryNames(), ['Greeting', 'Farewell', UNCATEGORIZED]);
    assert.deepEqual(ledger.membership('Farewell', 'q1'), [0, null, 0, 0, null]);
  });

  it('rejects a duplicate name and leaves the ledger unchanged', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('Greeting');
    const result = ledger.create('Greeting');
    assert.equal(result.ok === false && result.code, 'AlreadyExists');
    assert.deepEqual(ledger.categoryNames(), ['Greeting', UNCATEGORIZED]);
  });

  it('rejects an empty name', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    assert.equal(ledger.create('   ').ok, false);
    assert.equal(ledger.create(UNCATEGORIZED).ok, false);
  });
});

describe('CategoryLedger.categorize (Single)', () => {
  it('moves the value out of Uncategorized and sets membership', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('Greeting');

    const result = ledger.categorize(['hello'], ['Greeting'], 'q1', 'Single');

    assert.deepEqual(result, { ok: true, message: 'Categorized 1 value(s) in "q1"' });
    assert.deepEqual(sorted(ledger.values('Greeting')), ['hello']);
    assert.deepEqual(sorted(ledger.uncategorizedValues()), ['goodbye']);
    assert.deepEqual(ledger.membership('Greeting', 'q1'), [1, null, 1, 0, null]);
    assert.deepEqual(ledger.membership(UNCATEGORIZED, 'q1'), [0, null, 0, 1, null]);
  });

  it('moves a value between real categories, keeping one category per value', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('A');
    ledger.create('B');
    ledger.categorize(['hello'], ['A'], 'q1', 'Single');
    ledger.categorize(['hello'], ['B'], 'q1', 'Single');

    assert.equal(ledger.values('A').size, 0);
    assert.deepEqual(sorted(ledger.values('B')), ['hello']);
  });

  it('rejects several categories in Single mode', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('A');
    ledger.create('B');
    const result = ledger.categorize(['hello'], ['A', 'B'], 'q1', 'Single');
    assert.deepEqual(result, {
      ok: false,
      code: 'AmbiguousSelection',
      message: 'Only one category can be selected in Single categorization mode',
    });
    assert.equal(ledger.values('A').size, 0);
  });

  it('rejects an empty category selection', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    const result = ledger.categorize(['hello'], [], 'q1', 'Single');
    assert.equal(result.ok === false && result.code, 'EmptySelection');
  });

  it('ignores values that do not occur in the column', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('A');
    const result = ledger.categorize(['absent'], ['A'], 'q1', 'Single');
    assert.deepEqual(result, { ok: true, message: 'Categorized 0 value(s) in "q1"' });
    assert.equal(ledger.values('A').size, 0);
  });

  it('throws on an unknown column or category', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    assert.throws(() => ledger.categorize(['hello'], ['Nope'], 'q1', 'Single'), LedgerInvariantError);
    assert.throws(() => ledger.membership(UNCATEGORIZED, 'q9'), LedgerInvariantError);
  });
});

describe('CategoryLedger.categorize (Multi)', () => {
  it('keeps the value in Uncategorized by default', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('A');
    ledger.create('B');
    ledger.categorize(['hello'], ['A', 'B'], 'q1', 'Multi');

    assert.deepEqual(sorted(ledger.values('A')), ['hello']);
    assert.deepEqual(sorted(ledger.values('B')), ['hello']);
    assert.deepEqual(sorted(ledger.uncategorizedValues()), ['goodbye', 'hello']);
  });

  it('clears Uncategorized when the policy asks for it', () => {
    const { ledger } = setup(FIVE_RESPONDENTS, { multiModeClearsUncategorized: true });
    ledger.create('A');
    ledger.create('B');
    ledger.categorize(['hello'], ['A', 'B'], 'q1', 'Multi');

    assert.deepEqual(sorted(ledger.uncategorizedValues()), ['goodbye']);
    assert.deepEqual(ledger.membership(UNCATEGORIZED, 'q1'), [0, null, 0, 1, null]);
  });

  it('does not clear Uncategorized when it is one of the targets', () => {
    const { ledger } = setup(FIVE_RESPONDENTS, { multiModeClearsUncategorized: true });
    ledger.create('A');
    ledger.categorize(['hello'], ['A', UNCATEGORIZED], 'q1', 'Multi');
    assert.ok(ledger.isUncategorized('hello', 'q1'));
  });

  it('adds to existing categories instead of replacing them', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('A');
    ledger.create('B');
    ledger.categorize(['hello'], ['A'], 'q1', 'Multi');
    ledger.categorize(['hello'], ['B'], 'q1', 'Multi');
    assert.ok(ledger.values('A').has('hello'));
    assert.ok(ledger.values('B').has('hello'));
  });
});

describe('CategoryLedger.recategorize', () => {
  it('moves only values held by the source category', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('Greeting');
    ledger.create('Farewell');
    ledger.categorize(['hello'], ['Greeting'], 'q1', 'Single');

    const result = ledger.recategorize(['hello', 'goodbye'], ['Farewell'], 'Greeting', 'q1', 'Single');

    assert.deepEqual(result, { ok: true, message: 'Recategorized 1 value(s) in "q1"' });
    assert.equal(ledger.values('Greeting').size, 0);
    assert.deepEqual(sorted(ledger.values('Farewell')), ['hello']);
    assert.ok(ledger.isUncategorized('goodbye', 'q1'));
  });
});

describe('CategoryLedger.rename', () => {
  it('preserves values, membership and position', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('Greeting');
    ledger.create('Farewell');
    ledger.categorize(['hello'], ['Greeting'], 'q1', 'Single');
    const before = ledger.membership('Greeting', 'q1');

    const result = ledger.rename('Greeting', 'Hi');

    assert.deepEqual(result, { ok: true, message: 'Category "Greeting" renamed to "Hi"' });
    assert.deepEqual(ledger.categoryNames(), ['Hi', 'Farewell', UNCATEGORIZED]);
    assert.deepEqual(sorted(ledger.values('Hi')), ['hello']);
    assert.deepEqual(ledger.membership('Hi', 'q1'), before);
    assert.equal(ledger.hasCategory('Greeting'), false);
  });

  it('refuses existing names, empty names and Uncategorized', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('A');
    ledger.create('B');
    const taken = ledger.rename('A', 'B');
    const empty = ledger.rename('A', ' ');
    const protectedName = ledger.rename(UNCATEGORIZED, 'Other');
    assert.equal(taken.ok === false && taken.code, 'AlreadyExists');
    assert.equal(empty.ok === false && empty.code, 'EmptyName');
    assert.equal(protectedName.ok === false && protectedName.code, 'Protected');
  });

  it('throws for an unknown source category', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    assert.throws(() => ledger.rename('Ghost', 'Other'), LedgerInvariantError);
  });
});

describe('CategoryLedger.delete', () => {
  it('returns values to Uncategorized in Single mode', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('Greeting');
    ledger.categorize(['hello'], ['Greeting'], 'q1', 'Single');

    ledger.delete(['Greeting'], 'Single');

    assert.deepEqual(ledger.categoryNames(), [UNCATEGORIZED]);
    assert.deepEqual(sorted(ledger.uncategorizedValues()), ['goodbye', 'hello']);
    assert.deepEqual(ledger.membership(UNCATEGORIZED, 'q1'), [1, null, 1, 1, null]);
  });

  it('in Multi mode returns a value only once no real category holds it', () => {
    const { ledger } = setup(FIVE_RESPONDENTS, { multiModeClearsUncategorized: true });
    ledger.create('A');
    ledger.create('B');
    ledger.categorize(['hello'], ['A', 'B'], 'q1', 'Multi');

    ledger.delete(['A'], 'Multi');
    assert.equal(ledger.isUncategorized('hello', 'q1'), false);

    ledger.delete(['B'], 'Multi');
    assert.equal(ledger.isUncategorized('hello', 'q1'), true);
  });

  it('skips Uncategorized', () => {
    const { ledger } = setup(FIVE_RESPONDENTS);
    ledger.delete([UNCATEGORIZED], 'Single');
    assert.deepEqual(ledger.categoryNames(), [UNCATEGORIZED]);
  });
});

describe('CategoryLedger.reapplyCodeframe', () => {
  it('categorizes appended rows by the existing codeframe', () => {
    const { store, ledger } = setup(FIVE_RESPONDENTS);
    ledger.create('Greeting');
    ledger.categorize(['hello'], ['Greeting'], 'q1', 'Single');

    store.append({ columns: ['id', 'q1'], rows: [[6, 'HELLO'], [7, 'fresh'], [8, null]] }, 'Single');

    assert.deepEqual(ledger.membership('Greeting', 'q1'), [1, null, 1, 0, null, 1, 0, null]);
    assert.deepEqual(sorted(ledger.uncategorizedValues()), ['fresh', 'goodbye']);
  });

  it('carries a category over to a column where the value is new', () => {
    const { store, ledger } = setup(TWO_COLUMNS);
    ledger.create('Cost');
    ledger.categorize(['price'], ['Cost'], 'q1', 'Single');

    store.append({ columns: ['id', 'q1', 'q2'], rows: [[3, 'x', 'price']] }, 'Single');

    assert.deepEqual(ledger.membership('Cost', 'q2'), [0, null, 1]);
    assert.deepEqual(sorted(ledger.columnValues(UNCATEGORIZED, 'q2')), ['ok']);
    assert.ok(ledger.isUncategorized('x', 'q1'));
  });
});

describe('CategoryLedger snapshots', () => {
  it('lays out membership by column, then category order', () => {
    const { ledger } = setup(TWO_COLUMNS);
    ledger.create('Cost');
    const layout = ledger.membershipTable().map(m => `${m.category}/${m.column}`);
    assert.deepEqual(layout, ['Cost/q1', `${UNCATEGORIZED}/q1`, 'Cost/q2', `${UNCATEGORIZED}/q2`]);
  });

  it('restores to an identical snapshot', () => {
    const { store, ledger } = setup(TWO_COLUMNS);
    ledger.create('Cost');
    ledger.create('Fine');
    ledger.categorize(['price'], ['Cost'], 'q1', 'Single');
    ledger.categorize(['ok'], ['Fine'], 'q2', 'Single');
    const snapshot = ledger.snapshot();

    const restored = new CategoryLedger(store, { multiModeClearsUncategorized: false });
    restored.restore(snapshot);

    assert.deepEqual(restored.snapshot(), snapshot);
    assert.deepEqual(restored.categoryNames(), ['Cost', 'Fine', UNCATEGORIZED]);
  });
});
