/**
 * build command - Build images (docker and docker-compose modes)
 */

import chalk from 'chalk';
import type { Backend } from '../types.js';

export async function build(backend: Backend): Promise<void> {
  if (!backend.build) {
    console.log(
      chalk.yellow(`⚠ Nothing to build in ${backend.mode} mode, run`),
      chalk.cyan('appctl install'),
      chalk.yellow('instead')
    );
    return;
  }

  await backend.build();
}
