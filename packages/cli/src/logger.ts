import chalk from 'chalk';
import type { LogLevel } from './config/index.js';

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Severity = 'debug' | 'info' | 'warn' | 'error';

const PREFIXES: Record<Severity, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function enabled(level: LogLevel, severity: Severity): boolean {
  switch (level) {
    case 'quiet':
      return severity === 'error';
    case 'info':
      return severity !== 'debug';
    case 'debug':
      return true;
  }
}

/**
 * Console logger writing to stderr, leaving stdout for command output.
 * `quiet` keeps errors only; `debug` adds per-message diagnostics.
 */
export function createLogger(
  level: LogLevel,
  sink: (line: string) => void = line => console.error(line),
): Logger {
  const write = (severity: Severity, message: string): void => {
    if (!enabled(level, severity)) return;
    const prefix = PREFIXES[severity](severity.padEnd(5));
    sink(`${prefix} ${message}`);
  };

  return {
    level,
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: message => write('error', message),
  };
}
