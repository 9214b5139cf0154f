export { projectName, formatNotification, formatTooltip, APP_TITLE } from './notification.js';
export type { FormattedNotification } from './notification.js';
