import type { ZodError } from 'zod';
import { DecodeError } from './errors.js';
import { StatusPayloadSchema, LifecyclePayloadSchema, type StatusPayload } from './schema.js';
import { topicNames, matchTopic, type TopicNames } from './topics.js';
import { extractPermissionDetail, extractInputMessage } from './detail.js';
import type { DecodedMessage, EventType, LifecycleEvent, StatusUpdate } from './types.js';

export type DecodeResult =
  | { ok: true; message: DecodedMessage }
  | { ok: false; error: DecodeError };

const UTF8_BOM = '\uFEFF';

const DEFAULT_TOPICS = topicNames();

function fail(topic: string, reason: DecodeError['reason'], message: string): DecodeResult {
  return { ok: false, error: new DecodeError(message, topic, reason) };
}

function describeIssues(error: ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function decodeText(payload: Uint8Array | string): string | null {
  let text: string;
  if (typeof payload === 'string') {
    text = payload;
  } else {
    try {
      text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(payload);
    } catch {
      return null;
    }
  }
  // PowerShell-based producers prepend a BOM
  return text.startsWith(UTF8_BOM) ? text.slice(1) : text;
}

function modelName(model: StatusPayload['model']): string | null {
  if (model === null || model === undefined) return null;
  if (typeof model === 'string') return model;
  return model.display_name ?? model.id ?? null;
}

function toStatusUpdate(payload: StatusPayload, sessionId: string): StatusUpdate {
  return {
    kind: 'status',
    sessionId,
    cwd: payload.cwd,
    model: modelName(payload.model),
    permissionMode: payload.permission_mode ?? null,
    cost: {
      totalUsd: payload.cost?.total_cost_usd ?? 0,
      totalTokens: payload.cost?.total_tokens ?? 0,
    },
    contextWindow: {
      usedPct: payload.context_window?.used_percentage ?? 0,
    },
    lines: {
      added: payload.lines?.added ?? 0,
      removed: payload.lines?.removed ?? 0,
    },
  };
}

function toLifecycleEvent(eventType: EventType, body: unknown, topic: string): DecodeResult {
  const parsed = LifecyclePayloadSchema.safeParse(body);
  if (!parsed.success) {
    return fail(topic, 'invalid-payload', `Invalid ${eventType} payload: ${describeIssues(parsed.error)}`);
  }

  const { session_id, cwd, timestamp, content } = parsed.data;
  let detail: Pick<LifecycleEvent, 'toolName' | 'message'> = { toolName: null, message: null };
  if (eventType === 'PermissionRequest') {
    detail = extractPermissionDetail(content);
  } else if (eventType === 'UserInputRequired') {
    detail = { toolName: null, message: extractInputMessage(content) };
  }

  return {
    ok: true,
    message: {
      kind: 'event',
      eventType,
      sessionId: session_id,
      cwd,
      toolName: detail.toolName,
      message: detail.message,
      producerTimestamp: timestamp ?? null,
    },
  };
}

/**
 * Decode one inbound message into a typed record.
 *
 * Never throws: malformed bytes, JSON or fields come back as a
 * `DecodeError` result so the caller can drop the message.
 */
export function decodeMessage(
  topic: string,
  payload: Uint8Array | string,
  names: TopicNames = DEFAULT_TOPICS,
): DecodeResult {
  const match = matchTopic(topic, names);
  if (!match) {
    return fail(topic, 'unknown-topic', `Unrecognized topic: ${topic}`);
  }

  const text = decodeText(payload);
  if (text === null) {
    return fail(topic, 'invalid-encoding', 'Payload is not valid UTF-8');
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    return fail(topic, 'invalid-json', `Payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (match.family === 'event') {
    return toLifecycleEvent(match.eventType, body, topic);
  }

  const parsed = StatusPayloadSchema.safeParse(body);
  if (!parsed.success) {
    return fail(topic, 'invalid-payload', `Invalid status payload: ${describeIssues(parsed.error)}`);
  }

  const sessionId = parsed.data.session_id ?? match.sessionSuffix;
  if (sessionId.length === 0) {
    return fail(topic, 'invalid-payload', 'Invalid status payload: session_id: Required');
  }

  return { ok: true, message: toStatusUpdate(parsed.data, sessionId) };
}
