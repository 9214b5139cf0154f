import { DEFAULT_TOPIC_ROOT, EVENT_TYPES, type EventType, type TopicConfig } from './types.js';

export interface TopicNames {
  /** Wildcard a transport subscribes to. */
  all: string;
  statusPrefix: string;
  events: Record<EventType, string>;
}

export type TopicMatch =
  | { family: 'status'; sessionSuffix: string }
  | { family: 'event'; eventType: EventType };

export function topicNames(config: TopicConfig = { root: DEFAULT_TOPIC_ROOT }): TopicNames {
  const root = config.root.replace(/\/+$/, '');
  return {
    all: `${root}/#`,
    statusPrefix: `${root}/status/`,
    events: {
      Stop: `${root}/events/stop`,
      PermissionRequest: `${root}/events/permission-request`,
      UserInputRequired: `${root}/events/notification`,
    },
  };
}

/**
 * Classify a topic into a payload family. Returns null for topics the
 * decoder does not handle.
 */
export function matchTopic(topic: string, names: TopicNames): TopicMatch | null {
  if (topic.startsWith(names.statusPrefix)) {
    const suffix = topic.slice(names.statusPrefix.length);
    // status/<id>/more is not a status topic
    if (suffix.includes('/')) return null;
    return { family: 'status', sessionSuffix: suffix };
  }

  for (const eventType of EVENT_TYPES) {
    if (topic === names.events[eventType]) {
      return { family: 'event', eventType };
    }
  }

  return null;
}
