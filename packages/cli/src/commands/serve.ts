import { Command } from 'commander';
import chalk from 'chalk';
import { RelayEngine, type RelayEngineOptions } from '@relaywatch/core';
import type { Config } from '../config/index.js';
import { getConfig, type GlobalOptions } from '../context.js';
import { createLogger, type Logger } from '../logger.js';
import { attachConsoleReporter, createReporterCallbacks } from '../reporter/console.js';
import { startRelayServer, type RelayServer } from '../server/index.js';
import { VERSION } from '../version.js';

export function engineOptionsFromConfig(config: Config): RelayEngineOptions {
  return {
    topics: { root: config.topics.root },
    freshnessThresholdMs: config.registry.freshness_threshold,
    gracePeriodMs: config.registry.grace_period,
    dedupWindowMs: config.registry.dedup_window,
    historyCapacity: config.registry.history_capacity,
    sweepIntervalMs: config.sweeper.interval,
    coalesceMs: config.feed.coalesce,
  };
}

export interface ServeOptions {
  config: Config;
  logger: Logger;
  version?: string;
  /** Overrides `config.server.port`; 0 picks a free port. */
  port?: number;
}

export interface RunningRelay {
  engine: RelayEngine;
  relay: RelayServer;
  stop: () => Promise<void>;
}

/** Start the engine, the console reporter and the relay server. */
export async function startServe(options: ServeOptions): Promise<RunningRelay> {
  const { config, logger } = options;

  const engine = new RelayEngine({
    ...engineOptionsFromConfig(config),
    ...createReporterCallbacks(logger),
  });
  const detach = attachConsoleReporter(engine, logger);
  engine.start();

  const relay = startRelayServer({
    engine,
    version: options.version ?? VERSION,
    host: config.server.host,
    port: options.port ?? config.server.port,
    logger,
  });

  try {
    await relay.ready;
  } catch (error) {
    detach();
    await engine.stop();
    throw error;
  }

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      await relay.close();
      detach();
      const stats = await engine.stop();
      logger.info(`Stopped after ${stats.received} messages (${stats.applied} applied, ${stats.dropped} dropped)`);
    })();
    return stopping;
  };

  return { engine, relay, stop };
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run the relay: accept publishers and serve session state')
    .option('-p, --port <port>', 'Port to listen on (overrides config)')
    .action(async (options: { port?: string }, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const logger = createLogger(globalOpts.verbose ? 'debug' : config.log.level);

      let port: number | undefined;
      if (options.port !== undefined) {
        port = Number(options.port);
        if (!Number.isInteger(port) || port < 0 || port > 65_535) {
          console.error(chalk.red(`Invalid port: ${options.port}`));
          process.exitCode = 1;
          return;
        }
      }

      const running = await startServe({ config, logger, port });

      await new Promise<void>(resolve => {
        const shutdown = (signal: NodeJS.Signals): void => {
          logger.info(`Received ${signal}, shutting down`);
          running.stop().then(resolve, (err: unknown) => {
            logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
            process.exitCode = 1;
            resolve();
          });
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      });
    });
}
