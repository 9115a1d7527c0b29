#!/usr/bin/env node
import chalk from 'chalk';
import { createCli } from '../cli/index.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
