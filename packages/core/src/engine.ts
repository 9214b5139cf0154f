import type { TopicConfig } from './decoder/types.js';
import type { DecodeError } from './decoder/errors.js';
import { SessionRegistry } from './registry/registry.js';
import { ExpirySweeper } from './registry/sweeper.js';
import type { SessionRegistryOptions, SweepResult } from './registry/types.js';
import { SessionMonitor } from './monitor/monitor.js';
import { Ingestor } from './ingest/ingestor.js';
import { InboundQueue } from './ingest/queue.js';
import type { InboundMessage, IngestStats } from './ingest/types.js';

export interface RelayEngineOptions extends SessionRegistryOptions {
  topics?: TopicConfig;
  sweepIntervalMs?: number;
  coalesceMs?: number;
  /** Messages buffered while ingestion catches up; extra ones are refused. */
  queueLimit?: number;
  onDecodeError?: (error: DecodeError, message: InboundMessage) => void;
  onSweep?: (result: SweepResult) => void;
  onSweepError?: (error: unknown) => void;
}

/**
 * Wires the registry, sweeper, monitor and ingestor together.
 *
 * Transports call `publish()`; UIs read through `monitor`. `stop()` halts
 * the sweeper, abandons queued messages and ends every change iterator.
 */
export class RelayEngine {
  readonly registry: SessionRegistry;
  readonly monitor: SessionMonitor;
  readonly ingestor: Ingestor;
  readonly sweeper: ExpirySweeper;
  private queue: InboundQueue<InboundMessage> | null = null;
  private abort: AbortController | null = null;
  private running: Promise<IngestStats> | null = null;
  private stopped = false;
  private listenerFailures = 0;

  constructor(private readonly options: RelayEngineOptions = {}) {
    // Listener failures never reach the ingestion loop or the sweep timer.
    const onListenerError = (error: unknown): void => {
      this.listenerFailures++;
      options.onListenerError?.(error);
    };
    this.registry = new SessionRegistry({ ...options, onListenerError });
    this.ingestor = new Ingestor(this.registry, {
      topics: options.topics,
      clock: options.clock,
      onDecodeError: options.onDecodeError,
    });
    this.sweeper = new ExpirySweeper(this.registry, {
      intervalMs: options.sweepIntervalMs,
      clock: options.clock,
      onSweep: options.onSweep,
      onError: options.onSweepError,
    });
    this.monitor = new SessionMonitor(this.registry, {
      coalesceMs: options.coalesceMs,
      onListenerError,
    });
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /** Errors thrown by registry or monitor listeners since construction. */
  get listenerErrorCount(): number {
    return this.listenerFailures;
  }

  start(): void {
    if (this.running) return;
    if (this.stopped) {
      throw new Error('RelayEngine cannot be restarted after stop()');
    }

    const queue = new InboundQueue<InboundMessage>(this.options.queueLimit);
    const abort = new AbortController();
    this.queue = queue;
    this.abort = abort;
    this.sweeper.start();
    this.running = this.ingestor.run(queue, abort.signal);
  }

  /** Queue a message for ingestion. Returns false when the engine is not running or the queue is full. */
  publish(message: InboundMessage): boolean {
    if (!this.queue) return false;
    return this.queue.push({
      ...message,
      receivedAt: message.receivedAt ?? this.registry.now(),
    });
  }

  async stop(): Promise<IngestStats> {
    this.stopped = true;
    this.sweeper.stop();
    this.monitor.close();

    const running = this.running;
    this.abort?.abort();
    this.queue?.close();
    this.running = null;
    this.queue = null;
    this.abort = null;

    return running ? await running : this.ingestor.stats();
  }
}
