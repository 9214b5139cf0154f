export type {
  NotificationEntry,
  NotificationDraft,
  HistoryFilter,
  NotificationHistoryOptions,
} from './types.js';
export { NotificationHistory, DEFAULT_HISTORY_CAPACITY, DEFAULT_DEDUP_WINDOW_MS } from './store.js';
