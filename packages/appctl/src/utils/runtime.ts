/**
 * Locating the external tools each mode depends on.
 *
 * docker falls back to podman, and docker-compose falls back to the Compose
 * v2 plugin and then podman-compose, with a warning when a substitute is used.
 */

import chalk from 'chalk';
import { CliError } from './errors.js';
import type { Shell } from './shell.js';

/** A command plus the arguments that always precede its subcommand */
export interface ToolCommand {
  file: string;
  baseArgs: string[];
  /** Human-readable form, e.g. "docker compose" */
  label: string;
}

export function notFound(command: string): CliError {
  return new CliError(`Command '${command}' not found, please install it first`);
}

export async function requireCommand(shell: Shell, command: string): Promise<void> {
  if (!(await shell.which(command))) {
    throw notFound(command);
  }
}

function warnSubstitute(missing: string, substitute: string): void {
  console.log(chalk.yellow(`⚠ Command '${missing}' not found, using ${substitute} instead`));
}

/**
 * Container CLI: docker, else podman.
 */
export async function findContainerCli(shell: Shell): Promise<ToolCommand | null> {
  if (await shell.which('docker')) {
    return { file: 'docker', baseArgs: [], label: 'docker' };
  }
  if (await shell.which('podman')) {
    return { file: 'podman', baseArgs: [], label: 'podman' };
  }
  return null;
}

/**
 * Compose CLI: docker-compose, else `docker compose`, else podman-compose.
 */
export async function findComposeCli(shell: Shell): Promise<ToolCommand | null> {
  if (await shell.which('docker-compose')) {
    return { file: 'docker-compose', baseArgs: [], label: 'docker-compose' };
  }

  if (await shell.which('docker')) {
    const probe = await shell.run('docker', ['compose', 'version'], { reject: false });
    if (probe.exitCode === 0) {
      return { file: 'docker', baseArgs: ['compose'], label: 'docker compose' };
    }
  }

  if (await shell.which('podman-compose')) {
    return { file: 'podman-compose', baseArgs: [], label: 'podman-compose' };
  }

  return null;
}

export async function resolveContainerCli(shell: Shell): Promise<ToolCommand> {
  const cli = await findContainerCli(shell);
  if (!cli) {
    throw notFound('docker');
  }
  if (cli.file !== 'docker') {
    warnSubstitute('docker', cli.label);
  }
  return cli;
}

export async function resolveComposeCli(shell: Shell): Promise<ToolCommand> {
  const cli = await findComposeCli(shell);
  if (!cli) {
    throw notFound('docker-compose');
  }
  if (cli.file !== 'docker-compose') {
    warnSubstitute('docker-compose', cli.label);
  }
  return cli;
}
