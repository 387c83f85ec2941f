export { Priority, PriorityName, priorityFromName } from './priority.js';
export type {
  Address, ObjectiveRecord, PriorityRecord, DeadlineRecord, ObjectiveStatus, RecordSet,
} from './records.js';
export type { InputField, OperationResult, OperationFailure } from './results.js';
export { FailureKind, isSuccess, isFailure, failureKind } from './results.js';
