export type { KeyedTable, RegistryStore } from './types.js';
export { createMemoryStore } from './memory-store.js';
export { createSqliteStore } from './sqlite-store.js';
