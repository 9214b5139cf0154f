import { z } from 'zod';
import { DEFAULT_TOPIC_ROOT } from '@relaywatch/core';
import { DURATION_PATTERN } from './duration.js';

const durationSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(DURATION_PATTERN, { message: 'Must be milliseconds or a duration like 500ms, 30s, 5m' }),
]);

// Env references resolve to strings, so numeric fields take digit strings too.
const integerSchema = z.union([
  z.number(),
  z.string().regex(/^\d+$/, { message: 'Must be an integer' }).transform(Number),
]).pipe(z.number().int());

const topicsSchema = z.object({
  root: z.string().min(1).optional(),
}).strict();

const registrySchema = z.object({
  freshness_threshold: durationSchema.optional(),
  grace_period: durationSchema.optional(),
  dedup_window: durationSchema.optional(),
  history_capacity: integerSchema.pipe(z.number().positive()).optional(),
}).strict();

const sweeperSchema = z.object({
  interval: durationSchema.optional(),
}).strict();

const feedSchema = z.object({
  coalesce: durationSchema.optional(),
}).strict();

const serverSchema = z.object({
  host: z.string().min(1).optional(),
  port: integerSchema.pipe(z.number().min(0).max(65_535)).optional(),
}).strict();

export const LOG_LEVELS = ['quiet', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const logSchema = z.object({
  level: z.enum(LOG_LEVELS).optional(),
}).strict();

const ConfigSchema = z.object({
  topics: topicsSchema.optional(),
  registry: registrySchema.optional(),
  sweeper: sweeperSchema.optional(),
  feed: feedSchema.optional(),
  server: serverSchema.optional(),
  log: logSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

/** Resolved configuration. Durations are milliseconds. */
export interface Config {
  topics: {
    root: string;
  };
  registry: {
    freshness_threshold: number;
    grace_period: number;
    dedup_window: number;
    history_capacity: number;
  };
  sweeper: {
    interval: number;
  };
  feed: {
    coalesce: number;
  };
  server: {
    host: string;
    port: number;
  };
  log: {
    level: LogLevel;
  };
}

export const ConfigDefaults: Config = {
  topics: {
    root: DEFAULT_TOPIC_ROOT,
  },
  registry: {
    freshness_threshold: 300_000,
    grace_period: 60_000,
    dedup_window: 5_000,
    history_capacity: 100,
  },
  sweeper: {
    interval: 30_000,
  },
  feed: {
    coalesce: 100,
  },
  server: {
    host: '127.0.0.1',
    port: 1884,
  },
  log: {
    level: 'info',
  },
};

export { ConfigSchema };
