import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type PledgeDb } from '../src/db.js';
import {
  createLedgerCounter, createClockCounter, createManualCounter, createConfiguredCounter, switchCounterSource,
} from '../src/counter.js';
import { CounterSource, setConfig, getCounterSource } from '../src/queries/config-queries.js';

describe('createLedgerCounter', () => {
  let db: PledgeDb;

  beforeEach(() => {
    db = createTestDb();
  });

  it('starts at block 0', () => {
    expect(createLedgerCounter(db).current()).toBe(0);
  });

  it('advances by one by default', () => {
    const counter = createLedgerCounter(db);
    expect(counter.advance()).toBe(1);
    expect(counter.current()).toBe(1);
  });

  it('persists across counter instances', () => {
    createLedgerCounter(db).advance(25);
    expect(createLedgerCounter(db).current()).toBe(25);
  });

  it('refuses non-positive or fractional steps', () => {
    const counter = createLedgerCounter(db);
    expect(() => counter.advance(0)).toThrow('Counter can only advance by a positive whole number (got 0)');
    expect(() => counter.advance(-3)).toThrow('positive whole number');
    expect(() => counter.advance(1.5)).toThrow('positive whole number');
    expect(counter.current()).toBe(0);
  });

  it('reports a corrupt stored height', () => {
    setConfig(db, 'block_height', 'banana');
    expect(() => createLedgerCounter(db).current()).toThrow('Corrupt block height in config: banana');
  });
});

describe('createClockCounter', () => {
  it('truncates milliseconds to whole seconds', () => {
    const counter = createClockCounter(() => 1_700_000_000_999);
    expect(counter.current()).toBe(1_700_000_000);
  });

  it('reads the clock on every call', () => {
    let now = 5_000;
    const counter = createClockCounter(() => now);
    expect(counter.current()).toBe(5);
    now = 9_000;
    expect(counter.current()).toBe(9);
  });

  it('holds its highest reading when the wall clock steps back', () => {
    let now = 20_000;
    const counter = createClockCounter(() => now);
    expect(counter.current()).toBe(20);
    now = 12_000;
    expect(counter.current()).toBe(20);
    now = 21_000;
    expect(counter.current()).toBe(21);
  });
});

describe('switchCounterSource', () => {
  let db: PledgeDb;

  beforeEach(() => {
    db = createTestDb();
  });

  it('moves from ledger to a clock that is ahead', () => {
    createLedgerCounter(db).advance(10);
    expect(switchCounterSource(db, CounterSource.Clock, createManualCounter(500))).toBe(500);
    expect(getCounterSource(db)).toBe(CounterSource.Clock);
  });

  it('refuses a clock that is behind the ledger and keeps the source', () => {
    createLedgerCounter(db).advance(600);
    expect(() => switchCounterSource(db, CounterSource.Clock, createManualCounter(500)))
      .toThrow('Clock is at block 500, behind the ledger at block 600; the counter cannot move backwards');
    expect(getCounterSource(db)).toBe(CounterSource.Ledger);
  });

  it('raises the ledger to the clock when switching back', () => {
    const clock = createManualCounter(500);
    switchCounterSource(db, CounterSource.Clock, clock);
    clock.set(800);
    expect(switchCounterSource(db, CounterSource.Ledger, clock)).toBe(800);
    expect(createLedgerCounter(db).current()).toBe(800);
  });

  it('is a no-op when the source is unchanged', () => {
    createLedgerCounter(db).advance(3);
    expect(switchCounterSource(db, CounterSource.Ledger, createManualCounter(500))).toBe(3);
    expect(createLedgerCounter(db).current()).toBe(3);
  });
});

describe('createConfiguredCounter', () => {
  it('follows the configured source', () => {
    const db = createTestDb();
    const clock = createManualCounter(70);
    const counter = createConfiguredCounter(db, clock);
    createLedgerCounter(db).advance(4);
    expect(counter.current()).toBe(4);

    switchCounterSource(db, CounterSource.Clock, clock);
    expect(counter.current()).toBe(70);
  });
});

describe('createManualCounter', () => {
  it('starts where told', () => {
    expect(createManualCounter(100).current()).toBe(100);
  });

  it('advances and sets forward', () => {
    const counter = createManualCounter();
    counter.advance(4);
    counter.set(10);
    expect(counter.current()).toBe(10);
  });

  it('never moves backwards', () => {
    const counter = createManualCounter(10);
    expect(() => counter.set(9)).toThrow('Counter cannot move backwards (10 -> 9)');
    expect(counter.current()).toBe(10);
  });
});
