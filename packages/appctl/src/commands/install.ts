/**
 * install command - Install application dependencies (uvicorn mode)
 */

import chalk from 'chalk';
import type { Backend } from '../types.js';

export async function install(backend: Backend): Promise<void> {
  if (!backend.install) {
    console.log(chalk.yellow('⚠ Only uvicorn mode supports install'));
    return;
  }

  await backend.install();
  console.log(chalk.green('✓ Dependencies installed'));
}
