import { EventEmitter } from 'eventemitter3';
import type { DecodedMessage, LifecycleEvent, SessionId, StatusUpdate } from '../decoder/types.js';
import { NamePool } from '../names/pool.js';
import { NotificationHistory } from '../history/store.js';
import type { HistoryFilter, NotificationEntry } from '../history/types.js';
import type {
  AggregatedMetrics,
  ApplyResult,
  ChangeReason,
  Clock,
  RegistryEvents,
  SessionRecord,
  SessionRegistryOptions,
  SweepResult,
} from './types.js';

export const DEFAULT_FRESHNESS_THRESHOLD_MS = 5 * 60_000;
export const DEFAULT_GRACE_PERIOD_MS = 60_000;

type PendingEmit = () => void;

function copyRecord(record: SessionRecord): SessionRecord {
  return {
    ...record,
    cost: { ...record.cost },
    contextWindow: { ...record.contextWindow },
    lines: { ...record.lines },
  };
}

function byDisplayName(a: SessionRecord, b: SessionRecord): number {
  if (a.displayName < b.displayName) return -1;
  if (a.displayName > b.displayName) return 1;
  return 0;
}

/**
 * Owner of all session and notification state.
 *
 * Every mutating method is synchronous and finishes its state change
 * before any listener runs, so an operation is never observed half-applied
 * and operations are totally ordered by call order on the event loop.
 */
export class SessionRegistry extends EventEmitter<RegistryEvents> {
  readonly freshnessThresholdMs: number;
  readonly gracePeriodMs: number;
  private readonly sessions = new Map<SessionId, SessionRecord>();
  private readonly pool: NamePool;
  private readonly history: NotificationHistory;
  private readonly clock: Clock;
  private readonly onListenerError: ((error: unknown) => void) | undefined;

  constructor(options: SessionRegistryOptions = {}) {
    super();
    this.onListenerError = options.onListenerError;
    this.freshnessThresholdMs = options.freshnessThresholdMs ?? DEFAULT_FRESHNESS_THRESHOLD_MS;
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.clock = options.clock ?? Date.now;
    this.pool = new NamePool(options.catalog);
    this.history = new NotificationHistory({
      capacity: options.historyCapacity,
      dedupWindowMs: options.dedupWindowMs,
    });
  }

  get size(): number {
    return this.sessions.size;
  }

  now(): number {
    return this.clock();
  }

  // ---------------------------------------------------------------------------
  // Ingestion
  // ---------------------------------------------------------------------------

  apply(message: DecodedMessage, receivedAt: number = this.clock()): ApplyResult {
    return message.kind === 'status'
      ? this.applyStatus(message, receivedAt)
      : this.applyEvent(message, receivedAt);
  }

  applyStatus(update: StatusUpdate, receivedAt: number = this.clock()): ApplyResult {
    const pending: PendingEmit[] = [];
    const { record, created } = this.track(update.sessionId, receivedAt, pending);

    // Last arrival wins: every field is replaced, whatever the producer's clock says.
    record.cwd = update.cwd;
    record.model = update.model;
    record.permissionMode = update.permissionMode;
    record.cost = { ...update.cost };
    record.contextWindow = { ...update.contextWindow };
    record.lines = { ...update.lines };
    record.hasStatus = true;
    record.lastSeenAt = Math.max(record.lastSeenAt, receivedAt);

    this.queueSessionEmit(record, created, pending);
    this.flush(pending);
    return { record: copyRecord(record), created, notification: null, duplicate: false };
  }

  applyEvent(event: LifecycleEvent, receivedAt: number = this.clock()): ApplyResult {
    const pending: PendingEmit[] = [];
    const { record, created } = this.track(event.sessionId, receivedAt, pending);

    record.cwd = event.cwd;
    record.lastSeenAt = Math.max(record.lastSeenAt, receivedAt);

    const entry = this.history.append({
      eventType: event.eventType,
      sessionId: record.id,
      sessionName: record.displayName,
      cwd: event.cwd,
      toolName: event.toolName,
      message: event.message,
    }, receivedAt);

    this.queueSessionEmit(record, created, pending);
    if (entry) {
      const emitted = { ...entry };
      pending.push(() => this.emit('notification', emitted));
      pending.push(() => this.emit('change', 'notification-added'));
    } else {
      pending.push(() => this.emit('notification:duplicate', event));
    }

    this.flush(pending);
    return { record: copyRecord(record), created, notification: entry, duplicate: entry === null };
  }

  // ---------------------------------------------------------------------------
  // Expiry
  // ---------------------------------------------------------------------------

  /**
   * Expire sessions silent past the freshness threshold and evict expired
   * ones silent past threshold + grace period. Safe to call at any time and
   * any number of times.
   */
  sweep(now: number = this.clock()): SweepResult {
    const pending: PendingEmit[] = [];
    const result: SweepResult = { expired: [], evicted: [] };

    for (const record of this.sessions.values()) {
      if (record.status === 'active' && now - record.lastSeenAt > this.freshnessThresholdMs) {
        record.status = 'expired';
        record.expiredAt = now;
        result.expired.push(record.id);
        const snapshot = copyRecord(record);
        pending.push(() => this.emit('session:expired', snapshot));
        pending.push(() => this.emit('change', 'session-expired'));
      }
    }

    const evictAfter = this.freshnessThresholdMs + this.gracePeriodMs;
    for (const record of [...this.sessions.values()]) {
      if (record.status === 'expired' && now - record.lastSeenAt > evictAfter) {
        this.evict(record, pending);
        result.evicted.push(record.id);
      }
    }

    this.flush(pending);
    return result;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /** Active sessions ordered by display name. */
  snapshot(): SessionRecord[] {
    return [...this.sessions.values()]
      .filter(r => r.status === 'active')
      .sort(byDisplayName)
      .map(copyRecord);
  }

  /** A tracked (active or expired) session, or undefined once evicted or never seen. */
  get(sessionId: SessionId): SessionRecord | undefined {
    const record = this.sessions.get(sessionId);
    return record ? copyRecord(record) : undefined;
  }

  metrics(): AggregatedMetrics {
    let activeSessions = 0;
    let totalCostUsd = 0;
    let contextSum = 0;
    let contextCount = 0;
    let totalLinesAdded = 0;
    let totalLinesRemoved = 0;

    for (const record of this.sessions.values()) {
      if (record.status !== 'active') continue;
      activeSessions++;
      if (!record.hasStatus) continue;
      totalCostUsd += record.cost.totalUsd;
      contextSum += record.contextWindow.usedPct;
      contextCount++;
      totalLinesAdded += record.lines.added;
      totalLinesRemoved += record.lines.removed;
    }

    return {
      activeSessions,
      totalCostUsd,
      averageContextPct: contextCount > 0 ? contextSum / contextCount : 0,
      totalLinesAdded,
      totalLinesRemoved,
    };
  }

  listHistory(filter?: HistoryFilter): NotificationEntry[] {
    return this.history.list(filter);
  }

  getNotification(id: number): NotificationEntry | undefined {
    return this.history.get(id);
  }

  unreadCount(): number {
    return this.history.unreadCount();
  }

  // ---------------------------------------------------------------------------
  // History mutations
  // ---------------------------------------------------------------------------

  markRead(id: number): boolean {
    const changed = this.history.markRead(id);
    if (changed) this.flush([() => this.emit('change', 'history-read')]);
    return changed;
  }

  markAllRead(): number {
    const changed = this.history.markAllRead();
    if (changed > 0) this.flush([() => this.emit('change', 'history-read')]);
    return changed;
  }

  clearHistory(): number {
    const removed = this.history.clear();
    if (removed > 0) this.flush([() => this.emit('change', 'history-cleared')]);
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Find the active record for an id, or create one. An expired record is
   * evicted and replaced: identity belongs to the record, not the id string.
   */
  private track(
    sessionId: SessionId,
    receivedAt: number,
    pending: PendingEmit[],
  ): { record: SessionRecord; created: boolean } {
    const existing = this.sessions.get(sessionId);
    if (existing && existing.status === 'active') {
      return { record: existing, created: false };
    }
    if (existing) {
      this.evict(existing, pending);
    }

    const allocation = this.pool.allocate(sessionId);
    if (allocation.synthesized) {
      pending.push(() => this.emit('pool:exhausted', sessionId, allocation.name));
    }

    const record: SessionRecord = {
      id: sessionId,
      displayName: allocation.name,
      synthesizedName: allocation.synthesized,
      cwd: '',
      model: null,
      permissionMode: null,
      cost: { totalUsd: 0, totalTokens: 0 },
      contextWindow: { usedPct: 0 },
      lines: { added: 0, removed: 0 },
      hasStatus: false,
      status: 'active',
      firstSeenAt: receivedAt,
      lastSeenAt: receivedAt,
      expiredAt: null,
    };
    this.sessions.set(sessionId, record);
    return { record, created: true };
  }

  private evict(record: SessionRecord, pending: PendingEmit[]): void {
    this.sessions.delete(record.id);
    this.pool.release(record.displayName);
    const snapshot = copyRecord(record);
    pending.push(() => this.emit('session:evicted', snapshot));
    pending.push(() => this.emit('change', 'session-evicted'));
  }

  private queueSessionEmit(record: SessionRecord, created: boolean, pending: PendingEmit[]): void {
    const snapshot = copyRecord(record);
    const reason: ChangeReason = created ? 'session-created' : 'session-updated';
    if (created) {
      pending.push(() => this.emit('session:created', snapshot));
    } else {
      pending.push(() => this.emit('session:updated', snapshot));
    }
    pending.push(() => this.emit('change', reason));
  }

  /**
   * Run every queued emit even when a listener throws. Failures go to
   * `onListenerError`; without one, the first is rethrown once the batch is done.
   */
  private flush(pending: PendingEmit[]): void {
    const errors: unknown[] = [];
    for (const emit of pending) {
      try {
        emit();
      } catch (error) {
        errors.push(error);
      }
    }
    if (errors.length === 0) return;

    if (this.onListenerError) {
      for (const error of errors) this.onListenerError(error);
      return;
    }
    throw errors[0];
  }
}
