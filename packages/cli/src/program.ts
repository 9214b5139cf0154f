import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { registerServeCommand } from './commands/serve.js';
import { registerReplayCommand } from './commands/replay.js';
import { registerConfigCommand } from './commands/config.js';
import { VERSION } from './version.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('relaywatch')
    .description('Track AI coding-agent sessions and notifications relayed over pub/sub topics')
    .version(VERSION)
    .option('-v, --verbose', 'Log debug detail')
    .option('--json', 'Machine-readable JSON output')
    .option('-c, --config <path>', 'Path to config file');

  registerServeCommand(program);
  registerReplayCommand(program);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);

    // config init must work before any config exists
    if (chain[0] === 'config' && chain[1] === 'init') {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: opts.config });

    if (!configFileExists && envKeysUsed.length > 0 && !opts.json) {
      const keys = envKeysUsed.join(', ');
      console.error(chalk.cyan(`  Using ${keys} from environment.`));
      console.error(chalk.dim(`  Run "relaywatch config init" to create a config file for more options.\n`));
    }

    setConfig(config);
  });

  return program;
}

export function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
