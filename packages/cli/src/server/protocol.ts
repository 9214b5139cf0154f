import { z } from 'zod';
import type {
  AggregatedMetrics,
  ChangeReason,
  InboundMessage,
  NotificationEntry,
  SessionRecord,
} from '@relaywatch/core';

// ── Publisher → Server (/publish) ─────────────────────────────

export const PublishFrameSchema = z.object({
  topic: z.string().min(1),
  // Objects are re-serialized so the decoder sees the same bytes a broker would carry.
  payload: z.union([z.string(), z.record(z.string(), z.unknown())]),
});

export type PublishFrame = z.infer<typeof PublishFrameSchema>;

// ── Feed client → Server (/feed) ──────────────────────────────

export const MarkReadSchema = z.object({
  type: z.literal('mark_read'),
  id: z.number().int().positive(),
});

export const MarkAllReadSchema = z.object({
  type: z.literal('mark_all_read'),
});

export const ClearHistorySchema = z.object({
  type: z.literal('clear_history'),
});

export const GetHistorySchema = z.object({
  type: z.literal('get_history'),
  session: z.string().min(1).optional(),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  MarkReadSchema,
  MarkAllReadSchema,
  ClearHistorySchema,
  GetHistorySchema,
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// ── Server → Feed client ──────────────────────────────────────

export interface InitMessage {
  type: 'init';
  version: string;
  sessions: SessionRecord[];
  history: NotificationEntry[];
  unreadCount: number;
  metrics: AggregatedMetrics;
}

export interface StateMessage {
  type: 'state';
  seq: number;
  reasons: ChangeReason[];
  sessions: SessionRecord[];
  unreadCount: number;
  metrics: AggregatedMetrics;
}

export interface HistoryMessage {
  type: 'history';
  session?: string;
  entries: NotificationEntry[];
}

export interface AckMessage {
  type: 'ack';
  action: 'mark_read' | 'mark_all_read' | 'clear_history';
  changed: number;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  code?: 'PARSE_ERROR' | 'NOT_FOUND' | 'QUEUE_FULL';
}

export type ServerMessage =
  | InitMessage
  | StateMessage
  | HistoryMessage
  | AckMessage
  | ErrorMessage;

// ── Helpers ──────────────────────────────────────────────────

function parseJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

export function parseClientMessage(data: string): ClientMessage | null {
  const result = ClientMessageSchema.safeParse(parseJson(data));
  return result.success ? result.data : null;
}

export function parsePublishFrame(data: string): InboundMessage | null {
  const result = PublishFrameSchema.safeParse(parseJson(data));
  if (!result.success) return null;

  const { topic, payload } = result.data;
  return {
    topic,
    payload: typeof payload === 'string' ? payload : JSON.stringify(payload),
  };
}
