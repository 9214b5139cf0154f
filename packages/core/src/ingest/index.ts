export type { InboundMessage, IngestStats, IngestorOptions } from './types.js';
export { Ingestor } from './ingestor.js';
export { InboundQueue } from './queue.js';
