/**
 * uvicorn mode - run the app as a background process from a local virtualenv
 */

import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';
import type { Backend, DeployContext, LogsOptions } from '../types.js';
import { CliError } from '../utils/errors.js';
import { requireCommand } from '../utils/runtime.js';
import type { Shell } from '../utils/shell.js';
import { withSpinner } from '../utils/spinner.js';

export const VENV_DIR = 'venv';
export const PID_FILE = 'uvicorn.pid';
export const LOG_FILE = 'uvicorn.log';

export function createProcessBackend(ctx: DeployContext, shell: Shell): Backend {
  const venvDir = path.join(ctx.dir, VENV_DIR);
  const pidFile = path.join(ctx.dir, PID_FILE);
  const logFile = path.join(ctx.dir, LOG_FILE);
  const pattern = `uvicorn ${ctx.app}`;

  const venvBin = (name: string) => path.join(venvDir, 'bin', name);

  // What `source venv/bin/activate` would set up
  const venvEnv = (): Record<string, string> => ({
    ...ctx.env,
    VIRTUAL_ENV: venvDir,
    PATH: [path.join(venvDir, 'bin'), process.env.PATH ?? ''].filter(Boolean).join(path.delimiter),
  });

  async function readPid(): Promise<number | null> {
    const raw = (await fs.readFile(pidFile, 'utf-8')).trim();
    return /^\d+$/.test(raw) ? parseInt(raw, 10) : null;
  }

  /** PIDs of processes whose command line matches the app */
  async function findPids(): Promise<number[]> {
    const { stdout, exitCode } = await shell.run('pgrep', ['-f', pattern], { reject: false });
    if (exitCode !== 0) {
      return [];
    }
    return stdout
      .split('\n')
      .map((line) => parseInt(line.trim(), 10))
      .filter((pid) => Number.isInteger(pid) && pid !== process.pid);
  }

  async function isRunning(): Promise<boolean> {
    if (await fs.pathExists(pidFile)) {
      const pid = await readPid();
      if (pid !== null && shell.isAlive(pid)) {
        return true;
      }
    }
    return (await findPids()).length > 0;
  }

  async function install(): Promise<void> {
    console.log(chalk.green('✓ Installing dependencies...'));
    await requireCommand(shell, 'python3');

    if (!(await fs.pathExists(venvDir))) {
      await withSpinner(
        'Creating virtual environment...',
        'Virtual environment created',
        'Failed to create virtual environment',
        () => shell.run('python3', ['-m', 'venv', VENV_DIR], { cwd: ctx.dir, env: ctx.env })
      );
    }

    await withSpinner('Upgrading pip...', 'pip upgraded', 'Failed to upgrade pip', () =>
      shell.run(venvBin('pip'), ['install', '--upgrade', 'pip'], { cwd: ctx.dir, env: venvEnv() })
    );

    if (!(await fs.pathExists(ctx.requirementsFile))) {
      throw new CliError(
        `Requirements file not found: ${path.relative(ctx.dir, ctx.requirementsFile)}`
      );
    }

    await withSpinner(
      'Installing project dependencies...',
      'Dependencies installed',
      'Failed to install dependencies',
      () =>
        shell.run(venvBin('pip'), ['install', '-r', ctx.requirementsFile], {
          cwd: ctx.dir,
          env: venvEnv(),
        })
    );
  }

  async function start(): Promise<void> {
    if (!(await fs.pathExists(venvDir))) {
      throw new CliError(
        'Virtual environment not found',
        `Run ${chalk.cyan('appctl install')} first.`
      );
    }

    if (await isRunning()) {
      console.log(chalk.yellow('⚠ Service is already running, stopping it first...'));
      await stop();
    }

    const args = [
      ctx.app,
      '--host',
      ctx.host,
      '--port',
      String(ctx.port),
      '--workers',
      String(ctx.workers),
      '--access-log',
    ];

    const pid = await withSpinner(
      `Starting uvicorn on port ${ctx.port} with ${ctx.workers} workers...`,
      (started: number) => `Service started, PID: ${started}`,
      'Failed to start uvicorn',
      () => shell.spawnDetached(venvBin('uvicorn'), args, { cwd: ctx.dir, env: venvEnv(), logFile })
    );

    await fs.writeFile(pidFile, `${pid}\n`);
    console.log(chalk.gray(`  Log file: ${LOG_FILE}`));
  }

  async function stop(): Promise<void> {
    if (await fs.pathExists(pidFile)) {
      const pid = await readPid();
      if (pid !== null && shell.isAlive(pid)) {
        if (!shell.kill(pid)) {
          throw new CliError(`Permission denied stopping PID ${pid}`);
        }
        console.log(chalk.green(`✓ Service stopped, PID: ${pid}`));
      } else {
        console.log(chalk.yellow('⚠ Service is not running, removing PID file'));
      }
      await fs.remove(pidFile);
      return;
    }

    const pids = await findPids();
    if (pids.length === 0) {
      console.log(chalk.yellow('⚠ No running uvicorn service found'));
      return;
    }

    const stopped: number[] = [];
    for (const pid of pids) {
      if (shell.kill(pid)) {
        stopped.push(pid);
      } else {
        console.log(chalk.yellow(`⚠ Permission denied stopping PID ${pid}`));
      }
    }
    if (stopped.length > 0) {
      console.log(chalk.green(`✓ Stopped all uvicorn processes: ${stopped.join(', ')}`));
    }
  }

  async function status(): Promise<boolean> {
    if (await fs.pathExists(pidFile)) {
      const pid = await readPid();
      if (pid !== null && shell.isAlive(pid)) {
        console.log(chalk.green(`✓ Service is running, PID: ${pid}`));
        return true;
      }
      console.log(chalk.yellow('⚠ PID file exists but the process is not running'));
      await fs.remove(pidFile);
      return false;
    }

    const pids = await findPids();
    if (pids.length > 0) {
      console.log(chalk.green(`✓ Service is running, PID: ${pids.join(' ')}`));
      return true;
    }

    console.log(chalk.yellow('⚠ Service is not running'));
    return false;
  }

  async function clean(): Promise<void> {
    await stop();

    if (await fs.pathExists(venvDir)) {
      console.log(chalk.yellow('⚠ Removing virtual environment...'));
      await fs.remove(venvDir);
    }

    if (await fs.pathExists(logFile)) {
      console.log(chalk.yellow('⚠ Removing log file...'));
      await fs.remove(logFile);
    }
  }

  async function logs(options: LogsOptions): Promise<void> {
    if (!(await fs.pathExists(logFile))) {
      console.log(chalk.yellow(`⚠ No log file found: ${LOG_FILE}`));
      return;
    }

    const tail = options.tail ?? '100';
    const args = ['-n', tail === 'all' ? '+1' : tail];
    if (options.follow) {
      args.push('-f');
    }
    args.push(LOG_FILE);

    await shell.run('tail', args, { cwd: ctx.dir, stdio: 'inherit' });
  }

  return { mode: 'uvicorn', install, start, stop, status, clean, logs };
}
