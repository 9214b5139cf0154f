export * from './decoder/index.js';
export * from './names/index.js';
export * from './history/index.js';
export * from './registry/index.js';
export * from './monitor/index.js';
export * from './ingest/index.js';
export * from './format/index.js';
export { RelayEngine } from './engine.js';
export type { RelayEngineOptions } from './engine.js';
