/**
 * clean command - Stop the service and remove what it created
 */

import chalk from 'chalk';
import prompts from 'prompts';
import type { Backend, CleanOptions } from '../types.js';

const WHAT_GETS_REMOVED: Record<Backend['mode'], string[]> = {
  uvicorn: ['The running uvicorn process', 'The virtual environment (venv/)', 'The log file (uvicorn.log)'],
  docker: ['The container', 'The image'],
  'docker-compose': ['All compose containers and networks', 'All compose volumes (data will be lost)'],
};

export async function clean(backend: Backend, options: CleanOptions = {}): Promise<void> {
  if (!options.yes) {
    console.log(chalk.yellow('\n⚠️  WARNING: This will delete:'));
    for (const item of WHAT_GETS_REMOVED[backend.mode]) {
      console.log(chalk.yellow(`   • ${item}`));
    }

    const response = await prompts({
      type: 'confirm',
      name: 'confirmed',
      message: 'Are you sure?',
      initial: false,
    });

    if (!response.confirmed) {
      console.log(chalk.gray('\nCancelled'));
      return;
    }
  }

  console.log(chalk.green('✓ Cleaning up resources...'));
  await backend.clean();
  console.log(chalk.green('✓ Resources cleaned'));
}
