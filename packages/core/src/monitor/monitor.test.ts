import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SessionRegistry } from '../registry/registry.js';
import { SessionMonitor } from './monitor.js';
import type { ChangeSignal } from './types.js';
import type { LifecycleEvent, StatusUpdate } from '../decoder/types.js';

function status(sessionId: string): StatusUpdate {
  return {
    kind: 'status',
    sessionId,
    cwd: '/proj',
    model: null,
    permissionMode: null,
    cost: { totalUsd: 0, totalTokens: 0 },
    contextWindow: { usedPct: 0 },
    lines: { added: 0, removed: 0 },
  };
}

function stop(sessionId: string): LifecycleEvent {
  return {
    kind: 'event',
    eventType: 'Stop',
    sessionId,
    cwd: '/proj',
    toolName: null,
    message: null,
    producerTimestamp: null,
  };
}

describe('SessionMonitor', () => {
  let registry: SessionRegistry;
  let monitor: SessionMonitor;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000);
    registry = new SessionRegistry({ catalog: ['Ada', 'Bea', 'Cy'] });
    monitor = new SessionMonitor(registry, { coalesceMs: 100 });
  });

  afterEach(() => {
    monitor.close();
    vi.useRealTimers();
  });

  it('answers queries from the registry', () => {
    registry.apply(status('a'));
    registry.apply(stop('a'));

    expect(monitor.snapshot()).toHaveLength(1);
    expect(monitor.get('a')?.id).toBe('a');
    expect(monitor.get('missing')).toBeUndefined();
    expect(monitor.history()).toHaveLength(1);
    expect(monitor.unreadCount()).toBe(1);
    expect(monitor.metrics().activeSessions).toBe(1);
  });

  it('applies history mutations', () => {
    registry.apply(stop('a'));
    registry.apply(stop('b'));
    const [first] = monitor.history();

    expect(monitor.markRead(first.id)).toBe(true);
    expect(monitor.unreadCount()).toBe(1);
    expect(monitor.markAllRead()).toBe(1);
    expect(monitor.clearHistory()).toBe(2);
    expect(monitor.history()).toEqual([]);
  });

  it('batches a burst of changes into one signal', () => {
    const listener = vi.fn();
    monitor.subscribe(listener);

    registry.apply(status('a'));
    registry.apply(status('a'));
    registry.apply(stop('a'));
    expect(listener).not.toHaveBeenCalled();

    vi.advanceTimersByTime(100);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({
      seq: 1,
      reasons: ['session-created', 'session-updated', 'notification-added'],
      at: 1_100,
    });
  });

  it('stops delivering after unsubscribe', () => {
    const listener = vi.fn();
    const unsubscribe = monitor.subscribe(listener);
    unsubscribe();

    registry.apply(status('a'));
    vi.advanceTimersByTime(100);

    expect(listener).not.toHaveBeenCalled();
  });

  it('isolates a throwing listener', () => {
    const onListenerError = vi.fn();
    monitor.close();
    monitor = new SessionMonitor(registry, { coalesceMs: 100, onListenerError });
    const healthy = vi.fn();
    monitor.subscribe(() => {
      throw new Error('render failed');
    });
    monitor.subscribe(healthy);

    registry.apply(status('a'));
    vi.advanceTimersByTime(100);

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(onListenerError).toHaveBeenCalledTimes(1);
  });

  it('yields signals through onChange', async () => {
    const iterator = monitor.onChange();
    const next = iterator.next();

    registry.apply(status('a'));
    await vi.advanceTimersByTimeAsync(100);

    const result = await next;
    expect(result.done).toBe(false);
    expect(result.value).toMatchObject({ seq: 1, reasons: ['session-created'] });
    await iterator.return();
  });

  it('merges signals a slow consumer has not pulled', async () => {
    const iterator = monitor.onChange();

    registry.apply(status('a'));
    await vi.advanceTimersByTimeAsync(100);
    registry.apply(stop('a'));
    await vi.advanceTimersByTimeAsync(100);

    const first = await iterator.next();
    expect(first.value).toEqual({
      seq: 2,
      reasons: ['session-created', 'session-updated', 'notification-added'],
      at: 1_200,
    });
    await iterator.return();
  });

  it('ends iterators on close', async () => {
    const iterator = monitor.onChange();
    const next = iterator.next();

    monitor.close();

    expect(await next).toEqual({ done: true, value: undefined });
    expect(monitor.isClosed).toBe(true);
  });

  it('ends an iterator when its signal aborts', async () => {
    const controller = new AbortController();
    const seen: ChangeSignal[] = [];
    const consumer = (async () => {
      for await (const signal of monitor.onChange(controller.signal)) {
        seen.push(signal);
      }
    })();

    registry.apply(status('a'));
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    await consumer;

    expect(seen.map(s => s.seq)).toEqual([1]);
  });

  it('detaches an iterator aborted before its first pull', () => {
    const controller = new AbortController();
    monitor.onChange(controller.signal);
    expect(monitor.listenerCount).toBe(1);

    controller.abort();

    expect(monitor.listenerCount).toBe(0);
  });

  it('detaches an iterator returned before its first pull', async () => {
    const iterator = monitor.onChange();
    expect(monitor.listenerCount).toBe(1);

    expect(await iterator.return()).toEqual({ done: true, value: undefined });

    expect(monitor.listenerCount).toBe(0);
  });

  it('does not subscribe an iterator whose signal already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const iterator = monitor.onChange(controller.signal);

    expect(monitor.listenerCount).toBe(0);
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
  });

  it('looks up a notification by id', () => {
    registry.apply(stop('a'));
    const [entry] = monitor.history();

    expect(monitor.getNotification(entry.id)).toEqual(entry);
    expect(monitor.getNotification(entry.id + 1)).toBeUndefined();
  });

  it('drops pending changes on close', () => {
    const listener = vi.fn();
    monitor.subscribe(listener);
    registry.apply(status('a'));

    monitor.close();
    vi.advanceTimersByTime(100);

    expect(listener).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });
});
