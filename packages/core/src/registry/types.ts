import type {
  SessionId,
  CostInfo,
  ContextWindowInfo,
  LineStats,
  DecodedMessage,
} from '../decoder/types.js';
import type { NotificationEntry } from '../history/types.js';

export type SessionStatus = 'active' | 'expired';

export interface SessionRecord {
  id: SessionId;
  displayName: string;
  /** Set when the pool was exhausted and the name came from the id. */
  synthesizedName: boolean;
  cwd: string;
  model: string | null;
  permissionMode: string | null;
  cost: CostInfo;
  contextWindow: ContextWindowInfo;
  lines: LineStats;
  /** Whether any status update has been applied. */
  hasStatus: boolean;
  status: SessionStatus;
  firstSeenAt: number;
  lastSeenAt: number;
  expiredAt: number | null;
}

export interface AggregatedMetrics {
  activeSessions: number;
  totalCostUsd: number;
  /** Mean context usage over active sessions that have reported status. */
  averageContextPct: number;
  totalLinesAdded: number;
  totalLinesRemoved: number;
}

export type ChangeReason =
  | 'session-created'
  | 'session-updated'
  | 'session-expired'
  | 'session-evicted'
  | 'notification-added'
  | 'history-read'
  | 'history-cleared';

export interface ApplyResult {
  record: SessionRecord;
  created: boolean;
  /** Entry appended for a lifecycle event; null for status updates and duplicates. */
  notification: NotificationEntry | null;
  duplicate: boolean;
}

export interface SweepResult {
  expired: SessionId[];
  evicted: SessionId[];
}

export interface RegistryEvents {
  'session:created': (record: SessionRecord) => void;
  'session:updated': (record: SessionRecord) => void;
  'session:expired': (record: SessionRecord) => void;
  'session:evicted': (record: SessionRecord) => void;
  'notification': (entry: NotificationEntry) => void;
  'notification:duplicate': (message: DecodedMessage) => void;
  'pool:exhausted': (sessionId: SessionId, name: string) => void;
  'change': (reason: ChangeReason) => void;
}

export type Clock = () => number;

export interface SessionRegistryOptions {
  /** Silence after which an active session expires. */
  freshnessThresholdMs?: number;
  /** Further silence after expiry before the record is evicted. */
  gracePeriodMs?: number;
  dedupWindowMs?: number;
  historyCapacity?: number;
  /** Name catalog; defaults to the bundled one. */
  catalog?: readonly string[];
  clock?: Clock;
  /** Receives errors thrown by event listeners; the mutation itself always completes. */
  onListenerError?: (error: unknown) => void;
}
