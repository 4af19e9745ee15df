/**
 * docker mode - a single container built from the project's Dockerfile
 */

import chalk from 'chalk';
import type { Backend, DeployContext, LogsOptions } from '../types.js';
import { resolveContainerCli, type ToolCommand } from '../utils/runtime.js';
import type { RunOptions, RunResult, Shell } from '../utils/shell.js';
import { withSpinner } from '../utils/spinner.js';

export function createContainerBackend(ctx: DeployContext, shell: Shell): Backend {
  const image = `${ctx.name}:latest`;
  // Exact match; a bare name filter would also match "my-app-worker"
  const nameFilter = `name=^${ctx.name}$`;
  let cli: ToolCommand | undefined;

  async function docker(args: string[], options: RunOptions = {}): Promise<RunResult> {
    cli ??= await resolveContainerCli(shell);
    return shell.run(cli.file, [...cli.baseArgs, ...args], {
      cwd: ctx.dir,
      env: ctx.env,
      ...options,
    });
  }

  async function imageExists(): Promise<boolean> {
    const { stdout } = await docker(['images', '-q', image]);
    return stdout.trim() !== '';
  }

  /** Id of the container, or '' when there is none */
  async function containerId(includeStopped: boolean): Promise<string> {
    const args = ['ps', '-q', '-f', nameFilter];
    if (includeStopped) {
      args.splice(1, 0, '-a');
    }
    const { stdout } = await docker(args);
    return stdout.trim().split('\n')[0] ?? '';
  }

  async function build(): Promise<void> {
    console.log(chalk.green(`✓ Building image ${image}...`));
    await docker(['build', '-t', image, '.'], { stdio: 'inherit' });
    console.log(chalk.green('✓ Image built'));
  }

  async function stop(): Promise<void> {
    if (!(await containerId(true))) {
      console.log(chalk.yellow(`⚠ Container ${ctx.name} is not running`));
      return;
    }

    await withSpinner(
      `Stopping container ${ctx.name}...`,
      'Container stopped and removed',
      'Failed to stop container',
      async () => {
        if (await containerId(false)) {
          await docker(['stop', ctx.name]);
        }
        await docker(['rm', ctx.name]);
      }
    );
  }

  async function start(): Promise<void> {
    if (!(await imageExists())) {
      console.log(chalk.yellow(`⚠ Image ${image} not found, building it...`));
      await build();
    }

    await stop();

    const args = [
      'run',
      '-d',
      '--name',
      ctx.name,
      '-p',
      `${ctx.port}:${ctx.port}`,
      '--restart',
      'unless-stopped',
    ];
    // Already parsed with dotenv rules; docker's own --env-file keeps quotes
    for (const [key, value] of Object.entries(ctx.env)) {
      args.push('-e', `${key}=${value}`);
    }
    args.push(image);

    await withSpinner(
      `Starting container on port ${ctx.port}...`,
      'Container started',
      'Failed to start container',
      () => docker(args)
    );

    console.log(chalk.gray(`  Container ID: ${await containerId(false)}`));
  }

  async function status(): Promise<boolean> {
    if (!(await containerId(false))) {
      console.log(chalk.yellow(`⚠ Container ${ctx.name} is not running`));
      return false;
    }

    console.log(chalk.green(`✓ Container ${ctx.name} is running`));
    await docker(['ps', '-f', nameFilter], { stdio: 'inherit' });
    return true;
  }

  async function clean(): Promise<void> {
    await stop();

    if (await imageExists()) {
      console.log(chalk.yellow(`⚠ Removing image ${image}...`));
      await docker(['rmi', image]);
    }
  }

  async function logs(options: LogsOptions): Promise<void> {
    if (!(await containerId(true))) {
      console.log(chalk.yellow(`⚠ Container ${ctx.name} does not exist`));
      return;
    }

    const args = ['logs', '--tail', options.tail ?? '100'];
    if (options.follow) {
      args.push('--follow');
    }
    args.push(ctx.name);

    await docker(args, { stdio: 'inherit' });
  }

  return { mode: 'docker', build, start, stop, status, clean, logs };
}
