/**
 * appctl command tree: global options and one subcommand per lifecycle operation.
 */

import { Command, Option } from 'commander';

// Import commands
import { deploy } from './commands/deploy.js';
import { install } from './commands/install.js';
import { build } from './commands/build.js';
import { start } from './commands/start.js';
import { stop } from './commands/stop.js';
import { restart } from './commands/restart.js';
import { status } from './commands/status.js';
import { clean } from './commands/clean.js';
import { logs } from './commands/logs.js';
import { health } from './commands/health.js';
import { doctor } from './commands/doctor.js';

import { createBackend } from './backends/index.js';
import {
  DEPLOY_MODES,
  type Backend,
  type CleanOptions,
  type DeployContext,
  type GlobalOptions,
  type HealthOptions,
  type LogsOptions,
  type StartOptions,
} from './types.js';
import { getCliVersion, parsePort, parsePositiveInt, parseTail } from './utils.js';
import { resolveContext } from './utils/context.js';
import type { Shell } from './utils/shell.js';

export type BackendFactory = (ctx: DeployContext, shell: Shell) => Backend;

/**
 * Build the appctl program. Backends are created per invocation from the
 * resolved global options.
 */
export function createProgram(shell: Shell, backendFactory: BackendFactory = createBackend): Command {
  async function prepare(command: Command): Promise<{ ctx: DeployContext; backend: Backend }> {
    const ctx = await resolveContext(command.optsWithGlobals<GlobalOptions>());
    return { ctx, backend: backendFactory(ctx, shell) };
  }

  const program = new Command();

  program
    .name('appctl')
    .description('🚀 Deploy and manage a web app as a process, a container or a compose project')
    .version(getCliVersion(), '-v, --version', 'Output the current version')
    .addOption(
      new Option('-m, --mode <mode>', 'Deploy mode')
        .choices(DEPLOY_MODES)
        .default('uvicorn')
        .env('APPCTL_MODE')
    )
    .addOption(
      new Option('-e, --env-file <file>', 'Environment variable file').default('.env').env('APPCTL_ENV_FILE')
    )
    .option('-r, --requirements <file>', 'Dependency file', 'requirements.txt')
    .addOption(
      new Option('-d, --app-dir <dir>', 'Application directory').default('.').env('APPCTL_APP_DIR')
    )
    .addOption(
      new Option('-p, --port <port>', 'Port number').argParser(parsePort).default(8000).env('APPCTL_PORT')
    )
    .addOption(
      new Option('-H, --host <host>', 'Host address').default('0.0.0.0').env('APPCTL_HOST')
    )
    .addOption(
      new Option('-w, --workers <num>', 'Number of worker processes')
        .argParser(parsePositiveInt)
        .default(4)
        .env('APPCTL_WORKERS')
    )
    .option('--app <module>', 'ASGI application import path', 'main:app')
    .option('--name <name>', 'Image and container name', 'fastapi-app')
    .addHelpText(
      'after',
      `
Examples:
  $ appctl -m docker -p 8001 deploy      Deploy with Docker on port 8001
  $ appctl --mode docker-compose         Deploy with Docker Compose
  $ appctl restart                       Restart the service
  $ appctl stop                          Stop the service`
    );

  // deploy command (default)
  program
    .command('deploy', { isDefault: true })
    .description('Full deployment: install dependencies, start and health check')
    .option('--skip-health', 'Skip the health check')
    .action(async (options: StartOptions, command: Command) => {
      const { ctx, backend } = await prepare(command);
      await deploy(ctx, backend, options);
    });

  // install command
  program
    .command('install')
    .description('Install dependencies into the virtual environment (uvicorn mode)')
    .action(async (_options: object, command: Command) => {
      const { backend } = await prepare(command);
      await install(backend);
    });

  // build command
  program
    .command('build')
    .description('Build images (docker and docker-compose modes)')
    .action(async (_options: object, command: Command) => {
      const { backend } = await prepare(command);
      await build(backend);
    });

  // start command
  program
    .command('start')
    .description('Start the service')
    .option('--skip-health', 'Skip the health check')
    .action(async (options: StartOptions, command: Command) => {
      const { ctx, backend } = await prepare(command);
      await start(ctx, backend, options);
    });

  // stop command
  program
    .command('stop')
    .description('Stop the service')
    .action(async (_options: object, command: Command) => {
      const { backend } = await prepare(command);
      await stop(backend);
    });

  // restart command
  program
    .command('restart')
    .description('Restart the service')
    .option('--skip-health', 'Skip the health check')
    .action(async (options: StartOptions, command: Command) => {
      const { ctx, backend } = await prepare(command);
      await restart(ctx, backend, options);
    });

  // status command
  program
    .command('status')
    .description('Show service status (exits 1 when not running)')
    .action(async (_options: object, command: Command) => {
      const { backend } = await prepare(command);
      if (!(await status(backend))) {
        process.exitCode = 1;
      }
    });

  // clean command
  program
    .command('clean')
    .description('Stop the service and remove its resources')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (options: CleanOptions, command: Command) => {
      const { backend } = await prepare(command);
      await clean(backend, options);
    });

  // logs command
  program
    .command('logs')
    .description('View service logs')
    .option('-f, --follow', 'Follow log output')
    .option('--tail <lines>', 'Number of lines to show from end, or "all"', parseTail, '100')
    .action(async (options: LogsOptions, command: Command) => {
      const { backend } = await prepare(command);
      await logs(backend, options);
    });

  // health command
  program
    .command('health')
    .description('Check the service health endpoint')
    .option('--path <path>', 'Endpoint to probe (e.g. /ready)', '/health')
    .option('--timeout <seconds>', 'Give up after this many seconds', parsePositiveInt, 30)
    .action(async (options: HealthOptions, command: Command) => {
      const { ctx } = await prepare(command);
      await health(ctx, options);
    });

  // doctor command
  program
    .command('doctor')
    .description('Run diagnostics and show system info')
    .action(async (_options: object, command: Command) => {
      const { ctx } = await prepare(command);
      await doctor(ctx, shell);
    });

  return program;
}
