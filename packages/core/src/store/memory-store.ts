/**
 * Map-backed RegistryStore for embedding and tests.
 * Records are copied on the way in and out so callers never alias state.
 */

import type {
  Address, ObjectiveRecord, PriorityRecord, DeadlineRecord,
} from '../types/records.js';
import type { KeyedTable, RegistryStore } from './types.js';

function createMemoryTable<V extends object>(rows: Map<Address, V>): KeyedTable<V> {
  return {
    get(address) {
      const row = rows.get(address);
      return row ? { ...row } : null;
    },

    put(address, value) {
      rows.set(address, { ...value });
    },

    remove(address) {
      return rows.delete(address);
    },

    addresses() {
      return [...rows.keys()].sort();
    },

    entries() {
      return [...rows]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([address, row]): [Address, V] => [address, { ...row }]);
    },
  };
}

function replaceRows<V>(target: Map<Address, V>, source: Map<Address, V>): void {
  target.clear();
  for (const [address, row] of source) target.set(address, row);
}

export function createMemoryStore(): RegistryStore {
  const state = {
    objectives: new Map<Address, ObjectiveRecord>(),
    priorities: new Map<Address, PriorityRecord>(),
    deadlines: new Map<Address, DeadlineRecord>(),
  };

  let txDepth = 0;

  function snapshot() {
    return {
      objectives: new Map(state.objectives),
      priorities: new Map(state.priorities),
      deadlines: new Map(state.deadlines),
    };
  }

  function restore(snap: ReturnType<typeof snapshot>): void {
    replaceRows(state.objectives, snap.objectives);
    replaceRows(state.priorities, snap.priorities);
    replaceRows(state.deadlines, snap.deadlines);
  }

  return {
    objectives: createMemoryTable(state.objectives),
    priorities: createMemoryTable(state.priorities),
    deadlines: createMemoryTable(state.deadlines),

    transaction<T>(fn: () => T): T {
      // Nested calls join the outermost transaction
      if (txDepth > 0) return fn();

      const snap = snapshot();
      txDepth++;
      try {
        return fn();
      } catch (err) {
        restore(snap);
        throw err;
      } finally {
        txDepth--;
      }
    },
  };
}
