/**
 * docker-compose mode - the services described by the project's compose file
 */

import chalk from 'chalk';
import type { Backend, DeployContext, LogsOptions } from '../types.js';
import { resolveComposeCli, type ToolCommand } from '../utils/runtime.js';
import type { RunOptions, RunResult, Shell } from '../utils/shell.js';
import { withSpinner } from '../utils/spinner.js';

export function createComposeBackend(ctx: DeployContext, shell: Shell): Backend {
  let cli: ToolCommand | undefined;

  async function compose(args: string[], options: RunOptions = {}): Promise<RunResult> {
    cli ??= await resolveComposeCli(shell);
    return shell.run(cli.file, [...cli.baseArgs, ...args], {
      cwd: ctx.dir,
      env: ctx.env,
      ...options,
    });
  }

  async function build(): Promise<void> {
    console.log(chalk.green('✓ Building compose services...'));
    await compose(['build'], { stdio: 'inherit' });
    console.log(chalk.green('✓ Build complete'));
  }

  async function start(): Promise<void> {
    await withSpinner(
      'Starting compose services...',
      'Compose services started',
      'Failed to start compose services',
      () => compose(['up', '-d'])
    );
  }

  async function stop(): Promise<void> {
    await withSpinner(
      'Stopping compose services...',
      'Compose services stopped',
      'Failed to stop compose services',
      () => compose(['down'])
    );
  }

  async function status(): Promise<boolean> {
    console.log(chalk.blue.bold('\n📊 Service Status\n'));
    await compose(['ps'], { stdio: 'inherit' });

    const { stdout } = await compose(['ps', '-q']);
    return stdout.trim() !== '';
  }

  async function clean(): Promise<void> {
    console.log(
      chalk.yellow('⚠ Stopping and removing all compose resources, including volumes...')
    );
    await withSpinner(
      'Removing compose resources...',
      'Compose resources removed',
      'Failed to remove compose resources',
      () => compose(['down', '-v'])
    );
  }

  async function logs(options: LogsOptions): Promise<void> {
    const args = ['logs', '--tail', options.tail ?? '100'];
    if (options.follow) {
      args.push('--follow');
    }
    await compose(args, { stdio: 'inherit' });
  }

  return { mode: 'docker-compose', build, start, stop, status, clean, logs };
}
