import chalk from 'chalk';
import {
  formatNotification,
  formatTooltip,
  projectName,
  type DecodeError,
  type DecodedMessage,
  type InboundMessage,
  type NotificationEntry,
  type RelayEngine,
  type RelayEngineOptions,
  type SessionRecord,
  type SweepResult,
} from '@relaywatch/core';
import type { Logger } from '../logger.js';

export type ReporterCallbacks = Required<
  Pick<RelayEngineOptions, 'onDecodeError' | 'onSweep' | 'onSweepError' | 'onListenerError'>
>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function oneLine(text: string): string {
  return text.split('\n').join(chalk.dim(' | '));
}

/** Engine callbacks for what the registry does not announce as events. */
export function createReporterCallbacks(logger: Logger): ReporterCallbacks {
  return {
    onDecodeError: (error: DecodeError, message: InboundMessage) => {
      logger.debug(`Dropped message on ${message.topic}: ${error.reason} (${error.message})`);
    },
    onSweep: (result: SweepResult) => {
      if (result.expired.length === 0 && result.evicted.length === 0) return;
      logger.debug(`Sweep expired ${result.expired.length}, evicted ${result.evicted.length}`);
    },
    onSweepError: (error: unknown) => {
      logger.error(`Sweep failed: ${describeError(error)}`);
    },
    onListenerError: (error: unknown) => {
      logger.error(`Listener failed: ${describeError(error)}`);
    },
  };
}

/**
 * Log registry activity as it happens, plus the tooltip line after each
 * coalesced change. Returns a function that detaches every listener.
 */
export function attachConsoleReporter(engine: RelayEngine, logger: Logger): () => void {
  const { registry, monitor } = engine;

  const onCreated = (record: SessionRecord): void => {
    const project = projectName(record.cwd);
    logger.info(`${chalk.green('+')} ${chalk.bold(record.displayName)} ${chalk.dim(record.id)}${project ? ` ${project}` : ''}`);
  };
  const onExpired = (record: SessionRecord): void => {
    logger.info(`${chalk.yellow('-')} ${chalk.bold(record.displayName)} went quiet`);
  };
  const onEvicted = (record: SessionRecord): void => {
    logger.debug(`Forgot ${record.displayName} (${record.id})`);
  };
  const onNotification = (entry: NotificationEntry): void => {
    const { title, body } = formatNotification(entry);
    logger.info(`${chalk.bold(title)} ${oneLine(body)}`);
  };
  const onDuplicate = (message: DecodedMessage): void => {
    logger.debug(`Duplicate ${message.kind === 'event' ? message.eventType : 'status'} from ${message.sessionId} ignored`);
  };
  const onExhausted = (sessionId: string, name: string): void => {
    logger.warn(`Name pool exhausted; ${sessionId} shown as ${name}`);
  };

  registry.on('session:created', onCreated);
  registry.on('session:expired', onExpired);
  registry.on('session:evicted', onEvicted);
  registry.on('notification', onNotification);
  registry.on('notification:duplicate', onDuplicate);
  registry.on('pool:exhausted', onExhausted);

  const unsubscribe = monitor.subscribe(() => {
    logger.debug(oneLine(formatTooltip(monitor.metrics())));
  });

  return () => {
    unsubscribe();
    registry.off('session:created', onCreated);
    registry.off('session:expired', onExpired);
    registry.off('session:evicted', onEvicted);
    registry.off('notification', onNotification);
    registry.off('notification:duplicate', onDuplicate);
    registry.off('pool:exhausted', onExhausted);
  };
}
