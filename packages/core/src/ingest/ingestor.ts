import { decodeMessage } from '../decoder/decoder.js';
import { topicNames, type TopicNames } from '../decoder/topics.js';
import type { DecodeErrorReason } from '../decoder/types.js';
import type { SessionRegistry } from '../registry/registry.js';
import type { ApplyResult, Clock } from '../registry/types.js';
import type { InboundMessage, IngestStats, IngestorOptions } from './types.js';

function emptyReasons(): Record<DecodeErrorReason, number> {
  return {
    'unknown-topic': 0,
    'invalid-encoding': 0,
    'invalid-json': 0,
    'invalid-payload': 0,
  };
}

/**
 * Decodes inbound messages and applies them to the registry. Malformed
 * input is counted and dropped; nothing a producer sends can make it throw.
 */
export class Ingestor {
  private readonly names: TopicNames;
  private readonly clock: Clock;
  private received = 0;
  private applied = 0;
  private droppedByReason = emptyReasons();

  constructor(
    private readonly registry: SessionRegistry,
    private readonly options: IngestorOptions = {},
  ) {
    this.names = topicNames(options.topics);
    this.clock = options.clock ?? (() => registry.now());
  }

  /** Apply one message. Returns null when it was dropped. */
  ingest(message: InboundMessage): ApplyResult | null {
    this.received++;
    const result = decodeMessage(message.topic, message.payload, this.names);
    if (!result.ok) {
      this.droppedByReason[result.error.reason]++;
      this.options.onDecodeError?.(result.error, message);
      return null;
    }

    this.applied++;
    return this.registry.apply(result.message, message.receivedAt ?? this.clock());
  }

  /**
   * Consume a source until it ends or `signal` aborts. On abort the source
   * is left to its owner to close; consumption stops immediately.
   */
  async run(source: AsyncIterable<InboundMessage>, signal?: AbortSignal): Promise<IngestStats> {
    if (signal?.aborted) return this.stats();

    const iterator = source[Symbol.asyncIterator]();
    let onAbort = (): void => {};
    const aborted = new Promise<'aborted'>(resolve => {
      onAbort = () => resolve('aborted');
    });
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      while (true) {
        const next = await Promise.race([iterator.next(), aborted]);
        if (next === 'aborted' || next.done) break;
        this.ingest(next.value);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    return this.stats();
  }

  stats(): IngestStats {
    const dropped = Object.values(this.droppedByReason).reduce((sum, n) => sum + n, 0);
    return {
      received: this.received,
      applied: this.applied,
      dropped,
      droppedByReason: { ...this.droppedByReason },
    };
  }

  resetStats(): void {
    this.received = 0;
    this.applied = 0;
    this.droppedByReason = emptyReasons();
  }
}
