import type { ChangeReason } from '../registry/types.js';

export interface ChangeSignal {
  /** Increases with every flushed batch; a gap means batches were merged. */
  seq: number;
  reasons: ChangeReason[];
  at: number;
}

export type ChangeListener = (signal: ChangeSignal) => void;

export interface SessionMonitorOptions {
  /** Window in which registry changes are batched into one signal. */
  coalesceMs?: number;
  /** Receives errors thrown by subscribe() listeners. */
  onListenerError?: (error: unknown) => void;
}
