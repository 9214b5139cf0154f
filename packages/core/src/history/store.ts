import type {
  NotificationEntry,
  NotificationDraft,
  HistoryFilter,
  NotificationHistoryOptions,
} from './types.js';

export const DEFAULT_HISTORY_CAPACITY = 100;
export const DEFAULT_DEDUP_WINDOW_MS = 5_000;

function dedupKey(draft: NotificationDraft): string {
  return `${draft.sessionId}\u0000${draft.eventType}`;
}

/**
 * Bounded notification log.
 *
 * Entries are kept in insertion order and only `read` ever changes after
 * insertion. Readers always get copies.
 */
export class NotificationHistory {
  private entries: NotificationEntry[] = [];
  private nextId = 1;
  private readonly capacity: number;
  private readonly dedupWindowMs: number;
  // (session, event type) → time of the last appended entry
  private readonly lastAppended = new Map<string, number>();

  constructor(options: NotificationHistoryOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_HISTORY_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('History capacity must be a positive integer');
    }
    this.capacity = capacity;
    this.dedupWindowMs = Math.max(0, options.dedupWindowMs ?? DEFAULT_DEDUP_WINDOW_MS);
  }

  get size(): number {
    return this.entries.length;
  }

  /** True when an entry for the same session and event type was appended within the window. */
  isDuplicate(draft: NotificationDraft, now: number): boolean {
    const last = this.lastAppended.get(dedupKey(draft));
    return last !== undefined && now - last < this.dedupWindowMs;
  }

  /**
   * Append an entry stamped with `now`. Returns null when the draft repeats
   * a recent entry.
   */
  append(draft: NotificationDraft, now: number): NotificationEntry | null {
    if (this.isDuplicate(draft, now)) {
      return null;
    }

    this.pruneDedup(now);
    this.lastAppended.set(dedupKey(draft), now);

    const entry: NotificationEntry = { ...draft, id: this.nextId++, timestamp: now, read: false };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    return { ...entry };
  }

  list(filter: HistoryFilter = {}): NotificationEntry[] {
    const { sessionName } = filter;
    const matching = sessionName === undefined
      ? this.entries
      : this.entries.filter(e => e.sessionName === sessionName);
    return matching.map(e => ({ ...e }));
  }

  get(id: number): NotificationEntry | undefined {
    const entry = this.entries.find(e => e.id === id);
    return entry ? { ...entry } : undefined;
  }

  unreadCount(): number {
    return this.entries.reduce((count, e) => (e.read ? count : count + 1), 0);
  }

  /** Mark one entry read. Unknown ids are ignored; returns whether anything changed. */
  markRead(id: number): boolean {
    const entry = this.entries.find(e => e.id === id);
    if (!entry || entry.read) return false;
    entry.read = true;
    return true;
  }

  /** Returns the number of entries that flipped to read. */
  markAllRead(): number {
    let changed = 0;
    for (const entry of this.entries) {
      if (!entry.read) {
        entry.read = true;
        changed++;
      }
    }
    return changed;
  }

  /** Remove every entry. Ids keep increasing afterwards. */
  clear(): number {
    const removed = this.entries.length;
    this.entries = [];
    return removed;
  }

  private pruneDedup(now: number): void {
    for (const [key, at] of this.lastAppended) {
      if (now - at >= this.dedupWindowMs) {
        this.lastAppended.delete(key);
      }
    }
  }
}
