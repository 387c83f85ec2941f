/**
 * Operation façade over the three record tables.
 *
 * The tables share the address key space but nothing links them; every
 * mutating operation checks objective existence for the key it touches,
 * validates its input, then writes exactly one table. Failures come back as
 * tagged results, never as exceptions.
 */

import type { RegistryStore } from './store/types.js';
import type { BlockCounter } from './counter.js';
import type { Address, ObjectiveStatus } from './types/records.js';
import type { OperationResult } from './types/results.js';
import {
  characterCount, isValidPriority, isValidOffset, validateDescription,
} from './validation.js';

export class Registry {
  private store: RegistryStore;
  private counter: BlockCounter;

  constructor(store: RegistryStore, counter: BlockCounter) {
    this.store = store;
    this.counter = counter;
  }

  /** Read-only projection of the caller's objective */
  inspect(caller: Address): ObjectiveStatus {
    const objective = this.store.objectives.get(caller);
    if (!objective) return { present: false, descriptionLength: 0, completed: false };
    return {
      present: true,
      descriptionLength: characterCount(objective.description),
      completed: objective.completed,
    };
  }

  /** Record the caller's objective; it starts incomplete */
  initiate(caller: Address, text: string): OperationResult {
    return this.store.transaction<OperationResult>(() => {
      if (this.store.objectives.get(caller)) return { type: 'already-exists', address: caller };

      const invalid = validateDescription(text);
      if (invalid) return { type: 'invalid-input', field: 'description', message: invalid };

      this.store.objectives.put(caller, { description: text, completed: false });
      return { type: 'success', message: `Objective recorded for ${caller}` };
    });
  }

  /** Overwrite both fields. Completion may be set or unset freely. */
  modify(caller: Address, text: string, completed: boolean): OperationResult {
    return this.store.transaction<OperationResult>(() => {
      if (!this.store.objectives.get(caller)) return { type: 'not-found', address: caller };

      const invalid = validateDescription(text);
      if (invalid) return { type: 'invalid-input', field: 'description', message: invalid };

      this.store.objectives.put(caller, { description: text, completed });
      return { type: 'success', message: `Objective updated for ${caller}` };
    });
  }

  /** Delete the objective. Priority and deadline rows are left in place. */
  terminate(caller: Address): OperationResult {
    return this.store.transaction<OperationResult>(() => {
      if (!this.store.objectives.remove(caller)) return { type: 'not-found', address: caller };
      return { type: 'success', message: `Objective removed for ${caller}` };
    });
  }

  /** Create or overwrite the caller's urgency rating */
  classify(caller: Address, value: number): OperationResult {
    return this.store.transaction<OperationResult>(() => {
      if (!this.store.objectives.get(caller)) return { type: 'not-found', address: caller };

      if (!isValidPriority(value)) {
        return { type: 'invalid-input', field: 'urgency', message: 'Priority must be 1, 2 or 3' };
      }

      this.store.priorities.put(caller, { urgency: value });
      return { type: 'success', message: `Priority set for ${caller}: ${value}` };
    });
  }

  /** Create or overwrite the caller's deadline at `offset` blocks from now */
  schedule(caller: Address, offset: number): OperationResult {
    return this.store.transaction<OperationResult>(() => {
      if (!this.store.objectives.get(caller)) return { type: 'not-found', address: caller };

      if (!isValidOffset(offset)) {
        return { type: 'invalid-input', field: 'offset', message: 'Offset must be a positive whole number of blocks' };
      }

      // Frozen here; later operations never recompute it
      const targetPoint = this.counter.current() + offset;
      if (!Number.isSafeInteger(targetPoint)) {
        return { type: 'invalid-input', field: 'offset', message: 'Offset puts the deadline past the last representable block' };
      }
      this.store.deadlines.put(caller, { targetPoint, alertActivated: false });
      return { type: 'success', message: `Deadline set for ${caller}: block ${targetPoint}` };
    });
  }

  /**
   * Seed an objective for another address. There is no check tying the
   * caller to the target: any caller may seed any address that has none.
   */
  delegate(caller: Address, target: Address, text: string): OperationResult {
    return this.store.transaction<OperationResult>(() => {
      if (this.store.objectives.get(target)) return { type: 'already-exists', address: target };

      const invalid = validateDescription(text);
      if (invalid) return { type: 'invalid-input', field: 'description', message: invalid };

      this.store.objectives.put(target, { description: text, completed: false });
      return { type: 'success', message: `Objective recorded for ${target} by ${caller}` };
    });
  }
}
