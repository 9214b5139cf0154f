import type { DecodeErrorReason, TopicConfig } from '../decoder/types.js';
import type { DecodeError } from '../decoder/errors.js';
import type { Clock } from '../registry/types.js';

/** One message as handed over by a transport. */
export interface InboundMessage {
  topic: string;
  payload: Uint8Array | string;
  /** Local receipt time; the ingestor's clock is used when absent. */
  receivedAt?: number;
}

export interface IngestStats {
  received: number;
  applied: number;
  dropped: number;
  droppedByReason: Record<DecodeErrorReason, number>;
}

export interface IngestorOptions {
  topics?: TopicConfig;
  clock?: Clock;
  onDecodeError?: (error: DecodeError, message: InboundMessage) => void;
}
