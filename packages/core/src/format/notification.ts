import { ASK_USER_QUESTION_TOOL } from '../decoder/detail.js';
import type { NotificationEntry } from '../history/types.js';
import type { AggregatedMetrics } from '../registry/types.js';

export const APP_TITLE = 'relaywatch';

export interface FormattedNotification {
  title: string;
  body: string;
}

/** Last segment of a POSIX or Windows path; the input itself when it has none. */
export function projectName(cwd: string): string {
  const trimmed = cwd.replace(/[\\/]+$/, '');
  const segments = trimmed.split(/[\\/]/);
  const last = segments[segments.length - 1];
  return last || cwd;
}

function permissionDetail(entry: NotificationEntry): string {
  const { toolName, message } = entry;
  if (toolName && message) return `${toolName}: ${message}`;
  if (toolName) return `${toolName} needs approval`;
  return message ?? 'A tool needs approval';
}

function headerAndDetail(entry: NotificationEntry): [string, string | null] {
  switch (entry.eventType) {
    case 'Stop':
      return ['✅ Task complete', null];
    case 'PermissionRequest':
      if (entry.toolName === ASK_USER_QUESTION_TOOL) {
        return ['❓ Question', entry.message ?? 'A question is waiting'];
      }
      return ['⚠️ Approval required', permissionDetail(entry)];
    case 'UserInputRequired':
      return ['💬 Input required', entry.message ?? 'Waiting for input'];
  }
}

/**
 * Desktop-notification style rendering of a history entry: the session
 * name as the sender, then what happened, the detail, and the project.
 */
export function formatNotification(entry: NotificationEntry): FormattedNotification {
  const [header, detail] = headerAndDetail(entry);
  const lines = [header];
  if (detail) lines.push(detail);

  const project = projectName(entry.cwd);
  if (project) lines.push(`📁 ${project}`);

  return { title: entry.sessionName, body: lines.join('\n') };
}

export function formatTooltip(metrics: AggregatedMetrics): string {
  if (metrics.activeSessions === 0) {
    return `${APP_TITLE}\nNo active sessions`;
  }
  return [
    APP_TITLE,
    `Sessions: ${metrics.activeSessions}`,
    `Cost: $${metrics.totalCostUsd.toFixed(2)}`,
    `Context: ${metrics.averageContextPct.toFixed(0)}%`,
  ].join('\n');
}
