/**
 * Key-value config storage operations.
 */

import { eq } from 'drizzle-orm';
import type { PledgeDb } from '../db.js';
import { config } from '../schema/config.js';
import type { Address } from '../types/records.js';

const DEFAULT_ADDRESS_KEY = 'default_address';
const COUNTER_SOURCE_KEY = 'counter_source';

export const CounterSource = {
  Ledger: 'ledger',
  Clock: 'clock',
} as const;

export type CounterSource = (typeof CounterSource)[keyof typeof CounterSource];

export function isCounterSource(value: string): value is CounterSource {
  return value === CounterSource.Ledger || value === CounterSource.Clock;
}

/** Get a config value by key */
export function getConfig(db: PledgeDb, key: string): string | null {
  const row = db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
  return row?.value ?? null;
}

/** Set a config value */
export function setConfig(db: PledgeDb, key: string, value: string): void {
  db.insert(config)
    .values({ key, value })
    .onConflictDoUpdate({ target: config.key, set: { value } })
    .run();
}

/** Address used when no caller is given explicitly */
export function getDefaultAddress(db: PledgeDb): Address | null {
  return getConfig(db, DEFAULT_ADDRESS_KEY);
}

export function setDefaultAddress(db: PledgeDb, address: Address): void {
  setConfig(db, DEFAULT_ADDRESS_KEY, address);
}

/** Which counter backs `schedule`; unknown stored values fall back to the ledger */
export function getCounterSource(db: PledgeDb): CounterSource {
  const stored = getConfig(db, COUNTER_SOURCE_KEY);
  return stored != null && isCounterSource(stored) ? stored : CounterSource.Ledger;
}

export function setCounterSource(db: PledgeDb, source: CounterSource): void {
  setConfig(db, COUNTER_SOURCE_KEY, source);
}
