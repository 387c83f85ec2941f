import type { Priority } from './priority.js';

/** Opaque participant identifier; the core never interprets it */
export type Address = string;

export interface ObjectiveRecord {
  readonly description: string;
  readonly completed: boolean;
}

export interface PriorityRecord {
  readonly urgency: Priority;
}

export interface DeadlineRecord {
  /** Absolute block height, frozen when the deadline was scheduled */
  readonly targetPoint: number;
  /** Passive flag; nothing in the registry ever raises it */
  readonly alertActivated: boolean;
}

/** Read-only projection returned by `inspect`. Absence is not an error. */
export interface ObjectiveStatus {
  readonly present: boolean;
  readonly descriptionLength: number;
  readonly completed: boolean;
}

export interface RecordSet {
  readonly address: Address;
  readonly objective: ObjectiveRecord | null;
  readonly priority: PriorityRecord | null;
  readonly deadline: DeadlineRecord | null;
}
