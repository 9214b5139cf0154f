export { EVENT_TYPES, DEFAULT_TOPIC_ROOT } from './types.js';
export type {
  EventType,
  SessionId,
  CostInfo,
  ContextWindowInfo,
  LineStats,
  StatusUpdate,
  LifecycleEvent,
  DecodedMessage,
  DecodeErrorReason,
  TopicConfig,
} from './types.js';
export { topicNames, matchTopic } from './topics.js';
export type { TopicNames, TopicMatch } from './topics.js';
export { StatusPayloadSchema, LifecyclePayloadSchema } from './schema.js';
export type { StatusPayload, LifecyclePayload } from './schema.js';
export { extractPermissionDetail, extractInputMessage, ASK_USER_QUESTION_TOOL } from './detail.js';
export type { EventDetail } from './detail.js';
export { DecodeError } from './errors.js';
export { decodeMessage } from './decoder.js';
export type { DecodeResult } from './decoder.js';
