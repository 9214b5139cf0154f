import { readFile } from 'fs/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import {
  Ingestor,
  SessionRegistry,
  formatNotification,
  projectName,
  type InboundMessage,
  type IngestStats,
  type NotificationEntry,
  type SessionRecord,
} from '@relaywatch/core';
import type { Config } from '../config/index.js';
import { getConfig, type GlobalOptions } from '../context.js';
import { createLogger, type Logger } from '../logger.js';
import { createReporterCallbacks } from '../reporter/console.js';
import { engineOptionsFromConfig } from './serve.js';

const ReplayLineSchema = z.object({
  topic: z.string().min(1),
  payload: z.union([z.string(), z.record(z.string(), z.unknown())]),
  receivedAt: z.number().int().nonnegative().optional(),
});

export interface ReplayReport {
  sessions: SessionRecord[];
  history: NotificationEntry[];
  unreadCount: number;
  stats: IngestStats;
  /** 1-based line numbers that were not valid replay records. */
  invalidLines: number[];
}

export interface ReplayOptions {
  config: Config;
  logger: Logger;
}

function parseLine(line: string): InboundMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const result = ReplayLineSchema.safeParse(value);
  if (!result.success) return null;

  const { topic, payload, receivedAt } = result.data;
  return {
    topic,
    payload: typeof payload === 'string' ? payload : JSON.stringify(payload),
    receivedAt,
  };
}

/**
 * Feed an NDJSON capture through a fresh registry. No sweeper runs, so
 * every session seen stays active in the report.
 */
export async function replayFile(path: string, options: ReplayOptions): Promise<ReplayReport> {
  const { config, logger } = options;
  const engineOptions = engineOptionsFromConfig(config);
  const callbacks = createReporterCallbacks(logger);

  const registry = new SessionRegistry(engineOptions);
  const ingestor = new Ingestor(registry, {
    topics: engineOptions.topics,
    onDecodeError: callbacks.onDecodeError,
  });

  const content = await readFile(path, 'utf-8');
  const invalidLines: number[] = [];

  async function* messages(): AsyncGenerator<InboundMessage> {
    const lines = content.split(/\r?\n/);
    for (const [index, line] of lines.entries()) {
      const lineNumber = index + 1;
      if (line.trim() === '') continue;
      const message = parseLine(line);
      if (!message) {
        invalidLines.push(lineNumber);
        logger.warn(`Skipping line ${lineNumber}: expected {"topic", "payload", "receivedAt"?}`);
        continue;
      }
      yield message;
    }
  }

  const stats = await ingestor.run(messages());

  return {
    sessions: registry.snapshot(),
    history: registry.listHistory(),
    unreadCount: registry.unreadCount(),
    stats,
    invalidLines,
  };
}

function describeSession(record: SessionRecord): string {
  const parts = [
    chalk.bold(record.displayName),
    projectName(record.cwd) || chalk.dim('(no cwd)'),
  ];
  if (record.hasStatus) {
    parts.push(`$${record.cost.totalUsd.toFixed(2)}`, `ctx ${record.contextWindow.usedPct.toFixed(0)}%`);
    if (record.model) parts.push(chalk.dim(record.model));
  }
  return `  ${parts.join('  ')}`;
}

function describeEntry(entry: NotificationEntry): string {
  const { title, body } = formatNotification(entry);
  const marker = entry.read ? ' ' : chalk.cyan('•');
  const time = chalk.dim(new Date(entry.timestamp).toISOString());
  return `${marker} ${time}  ${chalk.bold(title)}  ${body.split('\n').join(chalk.dim(' | '))}`;
}

/** Human-readable report lines. */
export function renderReplayReport(report: ReplayReport): string[] {
  const out: string[] = [];
  const { sessions, history, unreadCount, stats } = report;

  out.push(chalk.bold(`Sessions (${sessions.length})`));
  if (sessions.length === 0) {
    out.push(chalk.dim('  none'));
  }
  out.push(...sessions.map(describeSession));
  out.push('');

  out.push(chalk.bold(`History (${history.length}, ${unreadCount} unread)`));
  if (history.length === 0) {
    out.push(chalk.dim('  none'));
  }
  out.push(...history.map(describeEntry));
  out.push('');

  out.push(`Messages: ${stats.received} received, ${stats.applied} applied, ${stats.dropped} dropped`);
  const reasons = Object.entries(stats.droppedByReason).filter(([, count]) => count > 0);
  for (const [reason, count] of reasons) {
    out.push(chalk.dim(`  ${reason}: ${count}`));
  }
  if (report.invalidLines.length > 0) {
    out.push(chalk.yellow(`Invalid lines: ${report.invalidLines.join(', ')}`));
  }
  return out;
}

export function registerReplayCommand(program: Command): void {
  program
    .command('replay')
    .description('Replay an NDJSON capture of {topic, payload} messages and print the resulting state')
    .argument('<file>', 'NDJSON file, one message per line')
    .action(async (file: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const logger = createLogger(globalOpts.verbose ? 'debug' : config.log.level);

      const report = await replayFile(file, { config, logger });

      if (globalOpts.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        for (const line of renderReplayReport(report)) {
          console.log(line);
        }
      }
    });
}
