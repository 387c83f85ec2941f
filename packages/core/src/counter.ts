/**
 * Block counters: the ambient, monotonically increasing time reference used
 * to turn a deadline offset into an absolute target point.
 */

import type { PledgeDb } from './db.js';
import { getRawDb } from './db.js';
import {
  CounterSource, getConfig, setConfig, getCounterSource, setCounterSource,
} from './queries/config-queries.js';

const BLOCK_HEIGHT_KEY = 'block_height';

export interface BlockCounter {
  current(): number;
}

export interface AdvancingCounter extends BlockCounter {
  /** Move forward by a positive whole number of blocks; returns the new height */
  advance(by?: number): number;
}

export interface ManualCounter extends AdvancingCounter {
  set(value: number): void;
}

function assertStep(by: number): void {
  if (!Number.isSafeInteger(by) || by <= 0) {
    throw new Error(`Counter can only advance by a positive whole number (got ${by})`);
  }
}

/** Counter persisted in the config table; starts at 0 */
export function createLedgerCounter(db: PledgeDb): AdvancingCounter {
  const read = (): number => {
    const stored = getConfig(db, BLOCK_HEIGHT_KEY);
    const height = stored == null ? 0 : Number(stored);
    if (!Number.isSafeInteger(height) || height < 0) {
      throw new Error(`Corrupt block height in config: ${stored}`);
    }
    return height;
  };

  return {
    current: read,

    advance(by = 1) {
      assertStep(by);
      const step = getRawDb(db).transaction(() => {
        const next = read() + by;
        setConfig(db, BLOCK_HEIGHT_KEY, String(next));
        return next;
      });
      return step();
    },
  };
}

/**
 * Whole seconds since the Unix epoch. Held at the highest value read so far,
 * so a wall clock stepped backwards stalls the counter instead of rewinding it.
 */
export function createClockCounter(now: () => number = Date.now): BlockCounter {
  let highest = 0;
  return {
    current() {
      highest = Math.max(highest, Math.floor(now() / 1000));
      return highest;
    },
  };
}

/** Reads whichever counter the config currently selects */
export function createConfiguredCounter(
  db: PledgeDb,
  clock: BlockCounter = createClockCounter(),
): BlockCounter {
  const ledger = createLedgerCounter(db);
  return {
    current: () => (getCounterSource(db) === CounterSource.Clock ? clock : ledger).current(),
  };
}

/**
 * Change the configured counter source without letting the counter go back.
 * Moving to the clock is refused while the ledger is ahead of it; moving to
 * the ledger first raises the stored height to the clock's value.
 * Returns the block the counter reads after the switch.
 */
export function switchCounterSource(
  db: PledgeDb,
  target: CounterSource,
  clock: BlockCounter = createClockCounter(),
): number {
  const ledger = createLedgerCounter(db);
  const step = getRawDb(db).transaction(() => {
    const source = getCounterSource(db);
    if (source === target) {
      return (target === CounterSource.Clock ? clock : ledger).current();
    }

    if (target === CounterSource.Clock) {
      const height = ledger.current();
      const seconds = clock.current();
      if (seconds < height) {
        throw new Error(`Clock is at block ${seconds}, behind the ledger at block ${height}; the counter cannot move backwards`);
      }
      setCounterSource(db, target);
      return seconds;
    }

    const height = Math.max(ledger.current(), clock.current());
    setConfig(db, BLOCK_HEIGHT_KEY, String(height));
    setCounterSource(db, target);
    return height;
  });
  return step();
}

/** In-process counter for embedders and tests */
export function createManualCounter(start = 0): ManualCounter {
  let height = start;

  return {
    current: () => height,

    advance(by = 1) {
      assertStep(by);
      height += by;
      return height;
    },

    set(value) {
      if (value < height) {
        throw new Error(`Counter cannot move backwards (${height} -> ${value})`);
      }
      height = value;
    },
  };
}
