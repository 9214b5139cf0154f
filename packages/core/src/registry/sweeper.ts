import type { SessionRegistry } from './registry.js';
import type { Clock, SweepResult } from './types.js';

export const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

export interface ExpirySweeperOptions {
  intervalMs?: number;
  clock?: Clock;
  /** Called with the result of every sweep that changed something. */
  onSweep?: (result: SweepResult) => void;
  /** Called when a sweep throws; the timer keeps running. */
  onError?: (error: unknown) => void;
}

/**
 * Runs registry sweeps on a fixed interval. The timer is unref'd so an idle
 * sweeper never keeps the process alive.
 */
export class ExpirySweeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly intervalMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly options: ExpirySweeperOptions = {},
  ) {
    const intervalMs = options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error('Sweep interval must be a positive number of milliseconds');
    }
    this.intervalMs = intervalMs;
    this.clock = options.clock ?? (() => registry.now());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  sweepNow(): SweepResult {
    const result = this.registry.sweep(this.clock());
    if (result.expired.length > 0 || result.evicted.length > 0) {
      this.options.onSweep?.(result);
    }
    return result;
  }

  private tick(): void {
    try {
      this.sweepNow();
    } catch (error) {
      if (this.options.onError) {
        this.options.onError(error);
      } else {
        throw error;
      }
    }
  }
}
