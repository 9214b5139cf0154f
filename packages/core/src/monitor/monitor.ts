import type { SessionId } from '../decoder/types.js';
import type { HistoryFilter, NotificationEntry } from '../history/types.js';
import type { SessionRegistry } from '../registry/registry.js';
import type { AggregatedMetrics, ChangeReason, SessionRecord } from '../registry/types.js';
import type { ChangeListener, ChangeSignal, SessionMonitorOptions } from './types.js';

export const DEFAULT_COALESCE_MS = 100;

function mergeSignals(older: ChangeSignal, newer: ChangeSignal): ChangeSignal {
  const reasons = new Set<ChangeReason>([...older.reasons, ...newer.reasons]);
  return { seq: newer.seq, reasons: [...reasons], at: newer.at };
}

/**
 * Read and subscribe surface over a SessionRegistry.
 *
 * Registry changes are batched for `coalesceMs` and delivered on a timer,
 * never inline with the mutation that caused them.
 */
export class SessionMonitor {
  private readonly coalesceMs: number;
  private readonly listeners = new Set<ChangeListener>();
  private readonly closeHandlers = new Set<() => void>();
  private readonly pendingReasons = new Set<ChangeReason>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private seq = 0;
  private closed = false;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly options: SessionMonitorOptions = {},
  ) {
    this.coalesceMs = Math.max(0, options.coalesceMs ?? DEFAULT_COALESCE_MS);
    registry.on('change', this.handleChange);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Active `subscribe` listeners, including those behind `onChange` iterators. */
  get listenerCount(): number {
    return this.listeners.size;
  }

  snapshot(): SessionRecord[] {
    return this.registry.snapshot();
  }

  get(sessionId: SessionId): SessionRecord | undefined {
    return this.registry.get(sessionId);
  }

  history(filter?: HistoryFilter): NotificationEntry[] {
    return this.registry.listHistory(filter);
  }

  getNotification(id: number): NotificationEntry | undefined {
    return this.registry.getNotification(id);
  }

  unreadCount(): number {
    return this.registry.unreadCount();
  }

  metrics(): AggregatedMetrics {
    return this.registry.metrics();
  }

  markRead(id: number): boolean {
    return this.registry.markRead(id);
  }

  markAllRead(): number {
    return this.registry.markAllRead();
  }

  clearHistory(): number {
    return this.registry.clearHistory();
  }

  /** Register a listener for coalesced change signals. Returns the unsubscribe function. */
  subscribe(listener: ChangeListener): () => void {
    if (this.closed) return () => {};
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Iterate coalesced change signals until the monitor closes or `signal`
   * aborts. Signals the consumer has not pulled yet merge into one, so a
   * slow consumer holds at most one pending signal.
   */
  onChange(signal?: AbortSignal): AsyncGenerator<ChangeSignal, void, unknown> {
    let pending: ChangeSignal | null = null;
    let wake: (() => void) | null = null;
    let done = this.closed || signal?.aborted === true;

    const notify = () => {
      const resolve = wake;
      wake = null;
      resolve?.();
    };
    const unsubscribe = this.subscribe(next => {
      pending = pending ? mergeSignals(pending, next) : next;
      notify();
    });

    const onAbort = () => finish();
    const cleanup = () => {
      unsubscribe();
      this.closeHandlers.delete(finish);
      signal?.removeEventListener('abort', onAbort);
    };
    // Ending detaches at once: a generator that never started runs no `finally`.
    const finish = () => {
      done = true;
      cleanup();
      notify();
    };

    if (done) {
      cleanup();
    } else {
      this.closeHandlers.add(finish);
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    async function* iterate(): AsyncGenerator<ChangeSignal, void, unknown> {
      try {
        while (true) {
          if (pending) {
            const next: ChangeSignal = pending;
            pending = null;
            yield next;
            continue;
          }
          if (done) return;
          await new Promise<void>(resolve => {
            wake = resolve;
          });
        }
      } finally {
        cleanup();
      }
    }

    const generator = iterate();
    const returnGenerator = generator.return.bind(generator);
    generator.return = value => {
      cleanup();
      return returnGenerator(value);
    };
    return generator;
  }

  /** Stop listening to the registry and end every iterator. Pending signals are dropped. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.registry.off('change', this.handleChange);
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pendingReasons.clear();
    this.listeners.clear();
    for (const finish of [...this.closeHandlers]) {
      finish();
    }
    this.closeHandlers.clear();
  }

  private readonly handleChange = (reason: ChangeReason): void => {
    if (this.closed) return;
    this.pendingReasons.add(reason);
    if (!this.timer) {
      this.timer = setTimeout(() => this.flush(), this.coalesceMs);
    }
  };

  private flush(): void {
    this.timer = null;
    if (this.pendingReasons.size === 0) return;

    const signal: ChangeSignal = {
      seq: ++this.seq,
      reasons: [...this.pendingReasons],
      at: this.registry.now(),
    };
    this.pendingReasons.clear();

    const errors: unknown[] = [];
    for (const listener of [...this.listeners]) {
      try {
        listener(signal);
      } catch (error) {
        errors.push(error);
      }
    }
    for (const error of errors) {
      if (this.options.onListenerError) {
        this.options.onListenerError(error);
      } else {
        throw error;
      }
    }
  }
}
