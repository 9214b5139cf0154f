#!/usr/bin/env node

import chalk from 'chalk';
import { ConfigError } from './config/index.js';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`Config error: ${error.message}`));
      if (error.filePath) {
        console.error(chalk.dim(`  File: ${error.filePath}`));
      }
    } else {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    }
    process.exit(1);
  });
