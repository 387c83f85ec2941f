import {
  Registry, createSqliteStore, createClockCounter, createConfiguredCounter,
} from '@pledge/core';
import type { PledgeDb, RegistryStore, BlockCounter } from '@pledge/core';

/** Everything a command needs, built once per process */
export interface CliContext {
  readonly db: PledgeDb;
  readonly store: RegistryStore;
  /** Follows the configured source, so a `block source` switch applies at once */
  readonly counter: BlockCounter;
  readonly clock: BlockCounter;
  readonly registry: Registry;
}

export function createContext(db: PledgeDb, clock: BlockCounter = createClockCounter()): CliContext {
  const store = createSqliteStore(db);
  const counter = createConfiguredCounter(db, clock);

  return { db, store, counter, clock, registry: new Registry(store, counter) };
}
