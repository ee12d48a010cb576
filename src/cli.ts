#!/usr/bin/env tsx
/**
 * cloudsweep CLI entry point
 */

import chalk from 'chalk';

import { createProgram } from './cli/program';
import { formatErrorMessage } from './providers/aws/errors';

try {
  await createProgram().parseAsync(process.argv);
} catch (error) {
  console.error(chalk.red(`Error: ${formatErrorMessage(error)}`));
  process.exit(1);
}
