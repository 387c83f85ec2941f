// Types
export { Priority, PriorityName, priorityFromName, FailureKind, isSuccess, isFailure, failureKind } from './types/index.js';
export type {
  Address, ObjectiveRecord, PriorityRecord, DeadlineRecord, ObjectiveStatus, RecordSet,
  InputField, OperationResult, OperationFailure,
} from './types/index.js';

// Validation
export {
  MAX_DESCRIPTION_LENGTH,
  characterCount,
  isNonEmpty,
  isWithinLength,
  isValidPriority,
  isValidOffset,
  validateDescription,
} from './validation.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getRawDb, getDbPath, CREATE_SCHEMA_SQL } from './db.js';
export type { PledgeDb } from './db.js';

// Stores
export { createMemoryStore, createSqliteStore } from './store/index.js';
export type { KeyedTable, RegistryStore } from './store/index.js';

// Counters
export {
  createLedgerCounter, createClockCounter, createManualCounter, createConfiguredCounter, switchCounterSource,
} from './counter.js';
export type { BlockCounter, AdvancingCounter, ManualCounter } from './counter.js';

// Registry
export { Registry } from './registry.js';

// Queries
export * from './queries/index.js';
