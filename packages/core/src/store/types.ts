import type {
  Address, ObjectiveRecord, PriorityRecord, DeadlineRecord,
} from '../types/records.js';

/** One flat address-keyed table. No table knows about the others. */
export interface KeyedTable<V> {
  get(address: Address): V | null;
  /** Create or overwrite */
  put(address: Address, value: V): void;
  /** Returns false when nothing was stored under the address */
  remove(address: Address): boolean;
  /** Stored addresses in ascending order */
  addresses(): Address[];
  /** Every stored row with its address, in ascending address order */
  entries(): Array<[Address, V]>;
}

/**
 * The three record tables of the registry. Consistency between them is the
 * registry's job; the store only guarantees that `transaction` commits all of
 * `fn`'s writes or none of them.
 */
export interface RegistryStore {
  readonly objectives: KeyedTable<ObjectiveRecord>;
  readonly priorities: KeyedTable<PriorityRecord>;
  readonly deadlines: KeyedTable<DeadlineRecord>;
  transaction<T>(fn: () => T): T;
}
