import { describe, it, expect, vi } from 'vitest';
import { SessionRegistry } from '../registry/registry.js';
import { Ingestor } from './ingestor.js';
import { InboundQueue } from './queue.js';
import type { InboundMessage } from './types.js';

const STATUS_TOPIC = 'claude-code/status/host1-100';
const STOP_TOPIC = 'claude-code/events/stop';

function statusPayload(usedPct: number): string {
  return JSON.stringify({
    session_id: 'host1-100',
    cwd: '/proj',
    model: 'opus',
    context_window: { used_percentage: usedPct },
  });
}

function stopPayload(): string {
  return JSON.stringify({ event: 'Stop', session_id: 'host1-100', cwd: '/proj', timestamp: 1_700_000_000 });
}

function setup() {
  const registry = new SessionRegistry({ catalog: ['Ada', 'Bea'], clock: () => 500 });
  const onDecodeError = vi.fn();
  const ingestor = new Ingestor(registry, { onDecodeError });
  return { registry, ingestor, onDecodeError };
}

describe('Ingestor', () => {
  it('applies a status update then a completion event', () => {
    const { registry, ingestor } = setup();

    ingestor.ingest({ topic: STATUS_TOPIC, payload: statusPayload(10), receivedAt: 100 });
    ingestor.ingest({ topic: STOP_TOPIC, payload: stopPayload(), receivedAt: 200 });

    const [record] = registry.snapshot();
    expect(registry.snapshot()).toHaveLength(1);
    expect(record.contextWindow.usedPct).toBe(10);

    const history = registry.listHistory();
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({
      eventType: 'Stop',
      sessionName: record.displayName,
      cwd: '/proj',
      timestamp: 200,
    });
  });

  it('drops malformed bytes without touching state', () => {
    const { registry, ingestor, onDecodeError } = setup();
    ingestor.ingest({ topic: STATUS_TOPIC, payload: statusPayload(10), receivedAt: 100 });
    const before = registry.snapshot();

    const result = ingestor.ingest({ topic: STATUS_TOPIC, payload: new Uint8Array([0xff, 0xfe, 0x00]) });

    expect(result).toBeNull();
    expect(registry.snapshot()).toEqual(before);
    expect(registry.listHistory()).toEqual([]);
    expect(onDecodeError).toHaveBeenCalledTimes(1);
    expect(onDecodeError.mock.calls[0][0]).toMatchObject({ name: 'DecodeError', reason: 'invalid-encoding' });
  });

  it('counts received, applied and dropped messages by reason', () => {
    const { ingestor } = setup();

    ingestor.ingest({ topic: STATUS_TOPIC, payload: statusPayload(5) });
    ingestor.ingest({ topic: 'claude-code/unknown', payload: '{}' });
    ingestor.ingest({ topic: STOP_TOPIC, payload: 'not json' });
    ingestor.ingest({ topic: STOP_TOPIC, payload: '{"cwd":"/proj"}' });

    expect(ingestor.stats()).toEqual({
      received: 4,
      applied: 1,
      dropped: 3,
      droppedByReason: {
        'unknown-topic': 1,
        'invalid-encoding': 0,
        'invalid-json': 1,
        'invalid-payload': 1,
      },
    });

    ingestor.resetStats();
    expect(ingestor.stats().received).toBe(0);
  });

  it('stamps messages without a receipt time from its clock', () => {
    const { registry, ingestor } = setup();
    ingestor.ingest({ topic: STATUS_TOPIC, payload: statusPayload(1) });

    expect(registry.get('host1-100')?.lastSeenAt).toBe(500);
  });

  it('honours a custom topic root', () => {
    const registry = new SessionRegistry({ catalog: ['Ada'] });
    const ingestor = new Ingestor(registry, { topics: { root: 'agents' } });

    expect(ingestor.ingest({ topic: STATUS_TOPIC, payload: statusPayload(1) })).toBeNull();
    expect(ingestor.ingest({ topic: 'agents/status/host1-100', payload: statusPayload(1) })).not.toBeNull();
  });

  it('consumes a source until it ends', async () => {
    const { registry, ingestor } = setup();
    async function* source(): AsyncGenerator<InboundMessage> {
      yield { topic: STATUS_TOPIC, payload: statusPayload(10) };
      yield { topic: STOP_TOPIC, payload: stopPayload() };
    }

    const stats = await ingestor.run(source());

    expect(stats.applied).toBe(2);
    expect(registry.listHistory()).toHaveLength(1);
  });

  it('stops consuming when aborted', async () => {
    const { ingestor } = setup();
    const queue = new InboundQueue<InboundMessage>();
    const controller = new AbortController();

    const running = ingestor.run(queue, controller.signal);
    queue.push({ topic: STATUS_TOPIC, payload: statusPayload(10) });
    await new Promise(resolve => setTimeout(resolve, 0));
    controller.abort();
    const stats = await running;
    queue.push({ topic: STATUS_TOPIC, payload: statusPayload(20) });

    expect(stats.received).toBe(1);
    expect(ingestor.stats().received).toBe(1);
  });

  it('returns at once for an already aborted signal', async () => {
    const { ingestor } = setup();
    const queue = new InboundQueue<InboundMessage>();

    const stats = await ingestor.run(queue, AbortSignal.abort());

    expect(stats.received).toBe(0);
  });
});

describe('InboundQueue', () => {
  it('delivers buffered items before ending after close', async () => {
    const queue = new InboundQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.close();

    const items: number[] = [];
    for await (const item of queue) items.push(item);

    expect(items).toEqual([1, 2]);
    expect(queue.push(3)).toBe(false);
  });

  it('refuses items beyond its limit', () => {
    const queue = new InboundQueue<number>(2);

    expect(queue.push(1)).toBe(true);
    expect(queue.push(2)).toBe(true);
    expect(queue.push(3)).toBe(false);
    expect(queue.pending).toBe(2);
    expect(queue.overflowed).toBe(1);
  });

  it('wakes a waiting reader', async () => {
    const queue = new InboundQueue<string>();
    const iterator = queue[Symbol.asyncIterator]();
    const next = iterator.next();

    queue.push('hello');

    expect(await next).toEqual({ value: 'hello', done: false });
  });
});
