import { describe, it, expect } from 'vitest';
import { NotificationHistory } from './store.js';
import type { NotificationDraft } from './types.js';

function draft(overrides: Partial<NotificationDraft> = {}): NotificationDraft {
  return {
    eventType: 'Stop',
    sessionId: 'host1-100',
    sessionName: 'Ada',
    cwd: '/proj',
    toolName: null,
    message: null,
    ...overrides,
  };
}

describe('NotificationHistory', () => {
  it('assigns increasing ids in insertion order', () => {
    const history = new NotificationHistory();
    history.append(draft(), 1_000);
    history.append(draft({ eventType: 'PermissionRequest' }), 1_001);
    history.append(draft({ sessionId: 'host2-5', sessionName: 'Bea' }), 1_002);

    expect(history.list().map(e => e.id)).toEqual([1, 2, 3]);
    expect(history.list().map(e => e.timestamp)).toEqual([1_000, 1_001, 1_002]);
  });

  it('stamps new entries unread with the receipt time', () => {
    const history = new NotificationHistory();
    const entry = history.append(draft(), 5_000);

    expect(entry).toEqual({
      id: 1,
      eventType: 'Stop',
      sessionId: 'host1-100',
      sessionName: 'Ada',
      cwd: '/proj',
      toolName: null,
      message: null,
      timestamp: 5_000,
      read: false,
    });
  });

  it('drops a repeat of the same session and event type inside the window', () => {
    const history = new NotificationHistory({ dedupWindowMs: 3_000 });

    expect(history.append(draft(), 10_000)).not.toBeNull();
    expect(history.append(draft(), 12_999)).toBeNull();
    expect(history.size).toBe(1);
  });

  it('accepts the repeat once the window has passed', () => {
    const history = new NotificationHistory({ dedupWindowMs: 3_000 });
    history.append(draft(), 10_000);

    expect(history.append(draft(), 13_000)).not.toBeNull();
    expect(history.size).toBe(2);
  });

  it('measures the window from the last appended entry, not the last duplicate', () => {
    const history = new NotificationHistory({ dedupWindowMs: 3_000 });
    history.append(draft(), 10_000);
    history.append(draft(), 12_000);

    expect(history.append(draft(), 13_500)).not.toBeNull();
  });

  it('does not dedup different event types or sessions', () => {
    const history = new NotificationHistory({ dedupWindowMs: 3_000 });
    history.append(draft(), 10_000);
    history.append(draft({ eventType: 'UserInputRequired' }), 10_000);
    history.append(draft({ sessionId: 'host2-5' }), 10_000);

    expect(history.size).toBe(3);
  });

  it('evicts the oldest entries beyond capacity', () => {
    const history = new NotificationHistory({ capacity: 2, dedupWindowMs: 0 });
    history.append(draft(), 1);
    history.append(draft(), 2);
    history.append(draft(), 3);

    expect(history.list().map(e => e.id)).toEqual([2, 3]);
  });

  it('filters by session name', () => {
    const history = new NotificationHistory();
    history.append(draft(), 1);
    history.append(draft({ sessionId: 'host2-5', sessionName: 'Bea' }), 2);

    expect(history.list({ sessionName: 'Bea' }).map(e => e.sessionId)).toEqual(['host2-5']);
    expect(history.list({ sessionName: 'Nobody' })).toEqual([]);
  });

  it('tracks unread counts through mark-read operations', () => {
    const history = new NotificationHistory();
    history.append(draft(), 1);
    history.append(draft({ eventType: 'PermissionRequest' }), 2);

    expect(history.unreadCount()).toBe(2);
    expect(history.markRead(1)).toBe(true);
    expect(history.markRead(1)).toBe(false);
    expect(history.unreadCount()).toBe(1);
    expect(history.markAllRead()).toBe(1);
    expect(history.unreadCount()).toBe(0);
  });

  it('treats mark-read on an unknown id as a no-op', () => {
    const history = new NotificationHistory();
    history.append(draft(), 1);

    expect(history.markRead(99)).toBe(false);
    expect(history.unreadCount()).toBe(1);
  });

  it('clears all entries and keeps ids increasing', () => {
    const history = new NotificationHistory({ dedupWindowMs: 0 });
    history.append(draft(), 1);
    history.append(draft(), 2);

    expect(history.clear()).toBe(2);
    expect(history.list()).toEqual([]);
    expect(history.append(draft(), 3)?.id).toBe(3);
  });

  it('keeps dedup memory across clear', () => {
    const history = new NotificationHistory({ dedupWindowMs: 3_000 });
    history.append(draft(), 10_000);
    history.clear();

    expect(history.append(draft(), 11_000)).toBeNull();
  });

  it('returns copies that cannot mutate stored entries', () => {
    const history = new NotificationHistory();
    history.append(draft(), 1);
    const [copy] = history.list();
    copy.read = true;

    expect(history.get(1)?.read).toBe(false);
    expect(history.get(2)).toBeUndefined();
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new NotificationHistory({ capacity: 0 })).toThrow('History capacity must be a positive integer');
  });
});
