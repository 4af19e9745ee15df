/**
 * Turns parsed command-line options into a DeployContext.
 */

import chalk from 'chalk';
import { parse } from 'dotenv';
import fs from 'fs-extra';
import path from 'path';
import { DEPLOY_MODES, type DeployContext, type DeployMode, type GlobalOptions } from '../types.js';
import { CliError } from './errors.js';

export function isDeployMode(value: string): value is DeployMode {
  return DEPLOY_MODES.some((mode) => mode === value);
}

export function parseDeployMode(value: string): DeployMode {
  if (!isDeployMode(value)) {
    throw new CliError(
      `Invalid deploy mode: ${value} (expected one of: ${DEPLOY_MODES.join(', ')})`
    );
  }
  return value;
}

/**
 * Parse an env file. Returns null when the file does not exist.
 */
export async function loadEnvFile(file: string): Promise<Record<string, string> | null> {
  if (!(await fs.pathExists(file))) {
    return null;
  }
  return parse(await fs.readFile(file, 'utf-8'));
}

export async function resolveContext(
  options: GlobalOptions,
  cwd: string = process.cwd()
): Promise<DeployContext> {
  const mode = parseDeployMode(options.mode);
  console.log(chalk.green(`✓ Deploy mode: ${mode}`));

  const dir = path.resolve(cwd, options.appDir);
  if (!(await fs.pathExists(dir)) || !(await fs.stat(dir)).isDirectory()) {
    throw new CliError(`Cannot access app directory: ${options.appDir}`);
  }

  const envFile = path.resolve(dir, options.envFile);
  const env = await loadEnvFile(envFile);
  if (env) {
    console.log(chalk.green(`✓ Loaded env file: ${options.envFile}`));
  } else {
    console.log(chalk.yellow(`⚠ Env file not found: ${options.envFile}, using defaults`));
  }

  return {
    dir,
    mode,
    envFile,
    envFileLoaded: env !== null,
    env: env ?? {},
    requirementsFile: path.resolve(dir, options.requirements),
    host: options.host,
    port: options.port,
    workers: options.workers,
    app: options.app,
    name: options.name,
  };
}
