/**
 * Read-only views across the record tables. Nothing here mutates or gates on
 * objective existence, so orphaned priority and deadline rows stay visible.
 */

import type { RegistryStore } from '../store/types.js';
import type {
  Address, ObjectiveRecord, PriorityRecord, DeadlineRecord, RecordSet,
} from '../types/records.js';

export interface Orphans {
  readonly priorities: Address[];
  readonly deadlines: Address[];
}

export interface RegistryStats {
  readonly objectives: number;
  readonly completed: number;
  readonly priorities: number;
  readonly deadlines: number;
  readonly orphanedPriorities: number;
  readonly orphanedDeadlines: number;
}

export function getObjective(store: RegistryStore, address: Address): ObjectiveRecord | null {
  return store.objectives.get(address);
}

export function getPriority(store: RegistryStore, address: Address): PriorityRecord | null {
  return store.priorities.get(address);
}

export function getDeadline(store: RegistryStore, address: Address): DeadlineRecord | null {
  return store.deadlines.get(address);
}

/** Everything stored under one address, whether or not the objective exists */
export function getRecordSet(store: RegistryStore, address: Address): RecordSet {
  return {
    address,
    objective: store.objectives.get(address),
    priority: store.priorities.get(address),
    deadline: store.deadlines.get(address),
  };
}

/** Priority and deadline rows whose address currently has no objective */
export function getOrphans(store: RegistryStore): Orphans {
  const live = new Set(store.objectives.addresses());
  return {
    priorities: store.priorities.addresses().filter(a => !live.has(a)),
    deadlines: store.deadlines.addresses().filter(a => !live.has(a)),
  };
}

export function getStats(store: RegistryStore): RegistryStats {
  const rows = store.objectives.entries();
  const orphans = getOrphans(store);
  return {
    objectives: rows.length,
    completed: rows.filter(([, objective]) => objective.completed).length,
    priorities: store.priorities.addresses().length,
    deadlines: store.deadlines.addresses().length,
    orphanedPriorities: orphans.priorities.length,
    orphanedDeadlines: orphans.deadlines.length,
  };
}

/** Blocks left until the deadline; zero at the target, negative once passed */
export function blocksRemaining(deadline: DeadlineRecord, current: number): number {
  return deadline.targetPoint - current;
}
