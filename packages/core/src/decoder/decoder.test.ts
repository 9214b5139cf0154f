import { describe, it, expect } from 'vitest';
import { decodeMessage } from './decoder.js';
import { topicNames } from './topics.js';
import { DecodeError } from './errors.js';

const STATUS_TOPIC = 'claude-code/status/host1-100';
const STOP_TOPIC = 'claude-code/events/stop';
const PERMISSION_TOPIC = 'claude-code/events/permission-request';
const INPUT_TOPIC = 'claude-code/events/notification';

function statusBody(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    session_id: 'host1-100',
    cwd: '/proj',
    model: 'opus',
    permission_mode: 'default',
    cost: { total_cost_usd: 0.42, total_tokens: 1200 },
    context_window: { used_percentage: 10 },
    lines: { added: 5, removed: 2 },
    ...overrides,
  });
}

describe('decodeMessage: status', () => {
  it('decodes a full status payload', () => {
    const result = decodeMessage(STATUS_TOPIC, statusBody());

    expect(result).toEqual({
      ok: true,
      message: {
        kind: 'status',
        sessionId: 'host1-100',
        cwd: '/proj',
        model: 'opus',
        permissionMode: 'default',
        cost: { totalUsd: 0.42, totalTokens: 1200 },
        contextWindow: { usedPct: 10 },
        lines: { added: 5, removed: 2 },
      },
    });
  });

  it('decodes bytes and strips a UTF-8 BOM', () => {
    const bytes = new TextEncoder().encode('\uFEFF' + statusBody());
    const result = decodeMessage(STATUS_TOPIC, bytes);

    expect(result.ok).toBe(true);
  });

  it('normalizes a model object to its display name', () => {
    const result = decodeMessage(STATUS_TOPIC, statusBody({ model: { id: 'm-1', display_name: 'Opus' } }));

    expect(result.ok && result.message.kind === 'status' && result.message.model).toBe('Opus');
  });

  it('falls back to the model id when no display name is given', () => {
    const result = decodeMessage(STATUS_TOPIC, statusBody({ model: { id: 'm-1' } }));

    expect(result.ok && result.message.kind === 'status' && result.message.model).toBe('m-1');
  });

  it('fills omitted sections with zeros and nulls', () => {
    const result = decodeMessage(STATUS_TOPIC, JSON.stringify({ session_id: 'host1-100', cwd: '/proj' }));

    expect(result).toEqual({
      ok: true,
      message: {
        kind: 'status',
        sessionId: 'host1-100',
        cwd: '/proj',
        model: null,
        permissionMode: null,
        cost: { totalUsd: 0, totalTokens: 0 },
        contextWindow: { usedPct: 0 },
        lines: { added: 0, removed: 0 },
      },
    });
  });

  it('takes the session id from the topic when the payload omits it', () => {
    const result = decodeMessage('claude-code/status/host2-7', JSON.stringify({ cwd: '/x' }));

    expect(result.ok && result.message.sessionId).toBe('host2-7');
  });

  it('rejects a status payload with no session id anywhere', () => {
    const result = decodeMessage('claude-code/status/', JSON.stringify({ cwd: '/x' }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('invalid-payload');
    }
  });

  it('rejects wrong field types', () => {
    const result = decodeMessage(STATUS_TOPIC, statusBody({ cost: { total_cost_usd: 'free' } }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DecodeError);
      expect(result.error.reason).toBe('invalid-payload');
      expect(result.error.topic).toBe(STATUS_TOPIC);
      expect(result.error.message).toContain('cost.total_cost_usd');
    }
  });

  it('rejects out-of-range context usage', () => {
    const result = decodeMessage(STATUS_TOPIC, statusBody({ context_window: { used_percentage: 140 } }));

    expect(result.ok).toBe(false);
  });

  it('rejects negative or fractional line counts', () => {
    expect(decodeMessage(STATUS_TOPIC, statusBody({ lines: { added: -1 } })).ok).toBe(false);
    expect(decodeMessage(STATUS_TOPIC, statusBody({ lines: { added: 1.5 } })).ok).toBe(false);
  });
});

describe('decodeMessage: failures', () => {
  it('rejects unknown topics', () => {
    const result = decodeMessage('claude-code/task/complete', '{}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('unknown-topic');
      expect(result.error.message).toBe('Unrecognized topic: claude-code/task/complete');
    }
  });

  it('rejects nested status topics', () => {
    const result = decodeMessage('claude-code/status/host1-100/extra', statusBody());

    expect(result.ok).toBe(false);
  });

  it('rejects invalid UTF-8 bytes', () => {
    const result = decodeMessage(STATUS_TOPIC, new Uint8Array([0x7b, 0xff, 0xfe, 0x7d]));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('invalid-encoding');
    }
  });

  it('rejects truncated JSON', () => {
    const result = decodeMessage(STOP_TOPIC, '{"session_id": "host1-100", "cw');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('invalid-json');
    }
  });

  it('rejects JSON that is not an object', () => {
    const result = decodeMessage(STOP_TOPIC, '[1, 2, 3]');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('invalid-payload');
    }
  });
});

describe('decodeMessage: lifecycle events', () => {
  it('decodes a stop event', () => {
    const result = decodeMessage(STOP_TOPIC, JSON.stringify({
      event: 'stop',
      session_id: 'host1-100',
      cwd: '/proj',
      timestamp: 1700000000,
    }));

    expect(result).toEqual({
      ok: true,
      message: {
        kind: 'event',
        eventType: 'Stop',
        sessionId: 'host1-100',
        cwd: '/proj',
        toolName: null,
        message: null,
        producerTimestamp: 1700000000,
      },
    });
  });

  it('requires a session id on events', () => {
    const result = decodeMessage(STOP_TOPIC, JSON.stringify({ cwd: '/proj' }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain('session_id');
    }
  });

  it('extracts tool and command from a permission request', () => {
    const result = decodeMessage(PERMISSION_TOPIC, JSON.stringify({
      session_id: 'host1-100',
      cwd: '/proj',
      content: { tool_name: 'Bash', tool_input: { command: 'rm -rf build' } },
    }));

    expect(result.ok).toBe(true);
    if (result.ok && result.message.kind === 'event') {
      expect(result.message.eventType).toBe('PermissionRequest');
      expect(result.message.toolName).toBe('Bash');
      expect(result.message.message).toBe('rm -rf build');
    }
  });

  it('extracts the question from an AskUserQuestion request', () => {
    const result = decodeMessage(PERMISSION_TOPIC, JSON.stringify({
      session_id: 'host1-100',
      cwd: '/proj',
      content: {
        tool_name: 'AskUserQuestion',
        tool_input: { questions: [{ question: 'Which branch?' }] },
      },
    }));

    expect(result.ok && result.message.kind === 'event' && result.message.message).toBe('Which branch?');
  });

  it('parses tool details out of raw content', () => {
    const raw = JSON.stringify({ tool_name: 'Write', tool_input: { command: 'touch a' } });
    const result = decodeMessage(PERMISSION_TOPIC, JSON.stringify({
      session_id: 'host1-100',
      cwd: '/proj',
      content: { raw },
    }));

    expect(result.ok).toBe(true);
    if (result.ok && result.message.kind === 'event') {
      expect(result.message.toolName).toBe('Write');
      expect(result.message.message).toBe('touch a');
    }
  });

  it('previews raw content that is not JSON', () => {
    const raw = 'x'.repeat(120);
    const result = decodeMessage(PERMISSION_TOPIC, JSON.stringify({
      session_id: 'host1-100',
      cwd: '/proj',
      content: { raw },
    }));

    expect(result.ok && result.message.kind === 'event' && result.message.message).toBe('x'.repeat(100) + '...');
  });

  it('decodes an input-required event with its message', () => {
    const result = decodeMessage(INPUT_TOPIC, JSON.stringify({
      session_id: 'host1-100',
      cwd: '/proj',
      content: { type: 'elicitation', title: 'Login', message: 'Enter the code' },
    }));

    expect(result.ok).toBe(true);
    if (result.ok && result.message.kind === 'event') {
      expect(result.message.eventType).toBe('UserInputRequired');
      expect(result.message.message).toBe('Enter the code');
    }
  });

  it('falls back to the title, then raw question', () => {
    const withTitle = decodeMessage(INPUT_TOPIC, JSON.stringify({
      session_id: 'a-1', cwd: '/', content: { title: 'Login' },
    }));
    const withRaw = decodeMessage(INPUT_TOPIC, JSON.stringify({
      session_id: 'a-1', cwd: '/', content: { raw: JSON.stringify({ question: 'Proceed?' }) },
    }));

    expect(withTitle.ok && withTitle.message.kind === 'event' && withTitle.message.message).toBe('Login');
    expect(withRaw.ok && withRaw.message.kind === 'event' && withRaw.message.message).toBe('Proceed?');
  });

  it('accepts events without content', () => {
    const result = decodeMessage(INPUT_TOPIC, JSON.stringify({ session_id: 'a-1', cwd: '/' }));

    expect(result.ok && result.message.kind === 'event' && result.message.message).toBeNull();
  });

  it('honors a custom topic root', () => {
    const names = topicNames({ root: 'agents/' });
    const result = decodeMessage('agents/events/stop', JSON.stringify({ session_id: 'a-1', cwd: '/' }), names);

    expect(result.ok).toBe(true);
    expect(decodeMessage(STOP_TOPIC, JSON.stringify({ session_id: 'a-1', cwd: '/' }), names).ok).toBe(false);
  });
});
