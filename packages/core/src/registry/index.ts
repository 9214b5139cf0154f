export type {
  SessionStatus,
  SessionRecord,
  AggregatedMetrics,
  ChangeReason,
  ApplyResult,
  SweepResult,
  RegistryEvents,
  Clock,
  SessionRegistryOptions,
} from './types.js';
export { SessionRegistry, DEFAULT_FRESHNESS_THRESHOLD_MS, DEFAULT_GRACE_PERIOD_MS } from './registry.js';
export { ExpirySweeper, DEFAULT_SWEEP_INTERVAL_MS } from './sweeper.js';
export type { ExpirySweeperOptions } from './sweeper.js';
