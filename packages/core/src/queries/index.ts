// Registry queries
export {
  getObjective,
  getPriority,
  getDeadline,
  getRecordSet,
  getOrphans,
  getStats,
  blocksRemaining,
} from './registry-queries.js';
export type { Orphans, RegistryStats } from './registry-queries.js';

// Config queries
export {
  CounterSource,
  isCounterSource,
  getConfig,
  setConfig,
  getDefaultAddress,
  setDefaultAddress,
  getCounterSource,
  setCounterSource,
} from './config-queries.js';
