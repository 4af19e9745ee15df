/**
 * doctor command - Run diagnostics
 */

import path from 'path';
import fs from 'fs-extra';
import chalk from 'chalk';
import type { DeployContext } from '../types.js';
import { checkPrerequisites, getCliVersion } from '../utils.js';
import type { Shell } from '../utils/shell.js';
import { VENV_DIR } from '../backends/process.js';

export const COMPOSE_FILES = ['compose.yaml', 'compose.yml', 'docker-compose.yaml', 'docker-compose.yml'];

function mark(present: boolean, missing = '✗ Missing'): string {
  return present ? chalk.green('✓') : chalk.yellow(missing);
}

/**
 * Print diagnostics. Returns the list of recommendations (empty when healthy).
 */
export async function doctor(ctx: DeployContext, shell: Shell): Promise<string[]> {
  console.log(chalk.blue.bold('\n🩺 appctl Diagnostics\n'));

  // CLI Version
  console.log(chalk.cyan('CLI Version:'), getCliVersion());

  // Prerequisites
  console.log(chalk.cyan('\n📋 Prerequisites:'));
  const prereqs = await checkPrerequisites(shell);

  console.log(
    chalk.gray('  Node.js:'),
    prereqs.node.satisfies
      ? chalk.green(`✓ v${prereqs.node.version}`)
      : chalk.yellow(`⚠️  v${prereqs.node.version} (need v20+)`)
  );
  console.log(
    chalk.gray('  Python:'),
    prereqs.python.installed
      ? chalk.green(`✓ v${prereqs.python.version ?? 'unknown'}`)
      : chalk.red('✗ Not installed')
  );
  console.log(
    chalk.gray('  Container CLI:'),
    prereqs.container.command
      ? chalk.green(`✓ ${prereqs.container.command} v${prereqs.container.version ?? 'unknown'}`)
      : chalk.red('✗ Not installed')
  );
  console.log(
    chalk.gray('  Compose CLI:'),
    prereqs.compose.command
      ? chalk.green(`✓ ${prereqs.compose.command} v${prereqs.compose.version ?? 'unknown'}`)
      : chalk.red('✗ Not available')
  );

  console.log(chalk.gray('  Platform:'), prereqs.platform.name);
  if (prereqs.platform.isWSL) {
    console.log(chalk.gray('  WSL:'), chalk.blue('✓ Detected'));
  }

  // Project info
  console.log(chalk.cyan('\n📂 Project:'));
  console.log(chalk.gray('  Directory:'), ctx.dir);
  console.log(chalk.gray('  Mode:'), ctx.mode);

  const hasRequirements = await fs.pathExists(ctx.requirementsFile);
  const hasDockerfile = await fs.pathExists(path.join(ctx.dir, 'Dockerfile'));
  const hasVenv = await fs.pathExists(path.join(ctx.dir, VENV_DIR));
  let composeFile: string | undefined;
  for (const file of COMPOSE_FILES) {
    if (await fs.pathExists(path.join(ctx.dir, file))) {
      composeFile = file;
      break;
    }
  }

  console.log(chalk.gray('  Env file:'), mark(ctx.envFileLoaded));
  console.log(chalk.gray('  Requirements:'), mark(hasRequirements));
  console.log(chalk.gray('  Dockerfile:'), mark(hasDockerfile));
  console.log(chalk.gray('  Compose file:'), composeFile ? chalk.green(`✓ ${composeFile}`) : mark(false));
  console.log(chalk.gray('  Virtual environment:'), mark(hasVenv, '✗ Not created'));

  // Recommendations
  console.log(chalk.cyan('\n💡 Recommendations:'));
  const recommendations: string[] = [];

  if (!prereqs.node.satisfies) {
    recommendations.push('Upgrade Node.js to v20 or higher');
  }

  switch (ctx.mode) {
    case 'uvicorn':
      if (!prereqs.python.installed) {
        recommendations.push('Install Python 3: https://www.python.org/downloads/');
      }
      if (!hasRequirements) {
        recommendations.push(`Add ${path.relative(ctx.dir, ctx.requirementsFile)} listing the app's dependencies`);
      }
      if (!hasVenv) {
        recommendations.push('Run appctl install to create the virtual environment');
      }
      break;
    case 'docker':
      if (!prereqs.container.command) {
        recommendations.push('Install Docker: https://docs.docker.com/get-docker/');
      }
      if (!hasDockerfile) {
        recommendations.push('Add a Dockerfile to the app directory');
      }
      break;
    case 'docker-compose':
      if (!prereqs.compose.command) {
        recommendations.push('Install Docker Compose: https://docs.docker.com/compose/install/');
      }
      if (!composeFile) {
        recommendations.push('Add a compose.yaml to the app directory');
      }
      break;
  }

  if (recommendations.length === 0) {
    console.log(chalk.green('  ✓ Everything looks good!'));
  } else {
    recommendations.forEach((rec) => console.log(chalk.yellow('  •'), rec));
  }

  console.log();
  return recommendations;
}
