import type { EventType, SessionId } from '../decoder/types.js';

export interface NotificationEntry {
  id: number;
  eventType: EventType;
  sessionId: SessionId;
  /** Display name the session held when the entry was created. */
  sessionName: string;
  cwd: string;
  toolName: string | null;
  message: string | null;
  /** Local receipt time (epoch ms). */
  timestamp: number;
  read: boolean;
}

export type NotificationDraft = Omit<NotificationEntry, 'id' | 'timestamp' | 'read'>;

export interface HistoryFilter {
  sessionName?: string;
}

export interface NotificationHistoryOptions {
  /** Maximum retained entries; the oldest are evicted first. */
  capacity?: number;
  /** Repeats of the same (session, event type) closer than this are dropped. */
  dedupWindowMs?: number;
}
