export type { ChangeSignal, ChangeListener, SessionMonitorOptions } from './types.js';
export { SessionMonitor, DEFAULT_COALESCE_MS } from './monitor.js';
