import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { getConfig, type GlobalOptions } from '../context.js';
import { setConfigValue, getConfigPath, initConfig, formatDuration, type Config } from '../config/index.js';

/** Config with durations written back in their readable form. */
export function displayConfig(config: Config): Record<string, unknown> {
  return {
    topics: config.topics,
    registry: {
      freshness_threshold: formatDuration(config.registry.freshness_threshold),
      grace_period: formatDuration(config.registry.grace_period),
      dedup_window: formatDuration(config.registry.dedup_window),
      history_capacity: config.registry.history_capacity,
    },
    sweeper: { interval: formatDuration(config.sweeper.interval) },
    feed: { coalesce: formatDuration(config.feed.coalesce) },
    server: config.server,
    log: config.log,
  };
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage relaywatch configuration');

  config
    .command('init')
    .description('Create a commented config file in ~/.relaywatch/')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const { configPath, created } = initConfig({ configPath: globalOpts.config });

      if (!created) {
        console.log(chalk.yellow('Config already exists at:'), configPath);
        console.log(chalk.yellow('Run with --config <path> to use a different location.'));
        return;
      }
      console.log(chalk.green('Created config file:'), configPath);
      console.log('');
      console.log(chalk.cyan('Next steps:'));
      console.log('  1. Edit', configPath);
      console.log('  2. Run', chalk.green('relaywatch serve'));
    });

  config
    .command('show')
    .description('Show current configuration')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const cfg = getConfig();

      if (globalOpts.json) {
        console.log(JSON.stringify(cfg, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:\n'));
        console.log(stringify(displayConfig(cfg)));
      }
    });

  config
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key (dot-notation, e.g. server.port)')
    .argument('<value>', 'Value to set')
    .action((key: string, value: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      setConfigValue(key, value, { configPath: globalOpts.config });

      const configPath = getConfigPath(globalOpts.config);
      console.log(chalk.green(`Set ${chalk.bold(key)} = ${chalk.bold(value)}`));
      console.log(chalk.dim(`Config: ${configPath}`));
    });
}
