#!/usr/bin/env node

/**
 * appctl CLI
 *
 * Main entry point for the appctl command-line interface.
 * Installs, starts, stops and inspects a web application run as a local
 * uvicorn process, a docker container or a docker-compose project.
 */

import chalk from 'chalk';
import { createProgram } from './cli.js';
import { CliError } from './utils/errors.js';
import { commandStderr, createShell } from './utils/shell.js';

try {
  await createProgram(createShell()).parseAsync(process.argv);
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red('\n❌ Error:'), message || 'Unknown error');

  if (error instanceof CliError && error.hint) {
    console.error(chalk.gray(`   ${error.hint}`));
  }

  const stderr = commandStderr(error);
  if (stderr) {
    console.error(chalk.gray('\nDetails:'));
    console.error(chalk.gray(stderr));
  }

  console.error(chalk.yellow('\n💡 Try running:'), chalk.cyan('appctl doctor'));

  process.exit(1);
}
