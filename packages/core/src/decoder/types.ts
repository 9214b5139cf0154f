export const EVENT_TYPES = ['Stop', 'PermissionRequest', 'UserInputRequired'] as const;

export type EventType = typeof EVENT_TYPES[number];

export type SessionId = string;

export interface CostInfo {
  totalUsd: number;
  totalTokens: number;
}

export interface ContextWindowInfo {
  usedPct: number;
}

export interface LineStats {
  added: number;
  removed: number;
}

export interface StatusUpdate {
  kind: 'status';
  sessionId: SessionId;
  cwd: string;
  model: string | null;
  permissionMode: string | null;
  cost: CostInfo;
  contextWindow: ContextWindowInfo;
  lines: LineStats;
}

export interface LifecycleEvent {
  kind: 'event';
  eventType: EventType;
  sessionId: SessionId;
  cwd: string;
  /** Tool awaiting approval (permission requests only). */
  toolName: string | null;
  /** Human-readable detail pulled from the payload content. */
  message: string | null;
  /** Producer clock value. Carried for display, never used for ordering. */
  producerTimestamp: number | string | null;
}

export type DecodedMessage = StatusUpdate | LifecycleEvent;

export type DecodeErrorReason =
  | 'unknown-topic'
  | 'invalid-encoding'
  | 'invalid-json'
  | 'invalid-payload';

export interface TopicConfig {
  /** First topic segment shared by every family, e.g. `claude-code`. */
  root: string;
}

export const DEFAULT_TOPIC_ROOT = 'claude-code';
