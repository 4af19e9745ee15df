/**
 * Thin wrapper around the external commands appctl drives.
 *
 * Backends never call execa or process.kill directly; they go through a Shell
 * so the lifecycle logic can run against a fake in tests.
 */

import { ExecaError, execa } from 'execa';
import which from 'which';

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** 'inherit' streams output straight to the terminal */
  stdio?: 'pipe' | 'inherit';
  /** When false, a non-zero exit resolves instead of throwing */
  reject?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface DetachedOptions {
  cwd: string;
  env?: Record<string, string>;
  /** stdout and stderr are appended here */
  logFile: string;
}

export interface Shell {
  run(file: string, args: string[], options?: RunOptions): Promise<RunResult>;
  /** Absolute path of a command on PATH, or null */
  which(command: string): Promise<string | null>;
  /** Launch a process that outlives appctl; resolves with its PID */
  spawnDetached(file: string, args: string[], options: DetachedOptions): Promise<number>;
  isAlive(pid: number): boolean;
  /**
   * Signal a process. A process that already exited counts as stopped;
   * false means it belongs to another user and was left running.
   */
  kill(pid: number, signal?: NodeJS.Signals): boolean;
}

function toText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Whether a command failed because the user pressed Ctrl+C
 */
export function isInterrupted(error: unknown): boolean {
  return error instanceof ExecaError && (error.signal === 'SIGINT' || error.exitCode === 130);
}

/**
 * stderr captured from a failed command, if any
 */
export function commandStderr(error: unknown): string | undefined {
  if (!(error instanceof ExecaError)) {
    return undefined;
  }
  const { stderr }: { stderr: unknown } = error;
  return typeof stderr === 'string' && stderr.trim() ? stderr : undefined;
}

export function createShell(): Shell {
  return {
    async run(file, args, options = {}) {
      const result = await execa(file, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: options.stdio ?? 'pipe',
        reject: options.reject ?? true,
      });

      return {
        stdout: toText(result.stdout),
        stderr: toText(result.stderr),
        // Missing when the command could not be spawned or died from a signal
        exitCode: result.exitCode ?? 127,
      };
    },

    async which(command) {
      return which(command, { nothrow: true });
    },

    async spawnDetached(file, args, options) {
      const subprocess = execa(file, args, {
        cwd: options.cwd,
        env: options.env,
        detached: true,
        cleanup: false,
        reject: false,
        stdin: 'ignore',
        stdout: { file: options.logFile, append: true },
        stderr: { file: options.logFile, append: true },
      });

      if (subprocess.pid === undefined) {
        await subprocess;
        throw new Error(`Failed to launch ${file}`);
      }

      subprocess.unref();
      return subprocess.pid;
    },

    isAlive(pid) {
      try {
        process.kill(pid, 0);
        return true;
      } catch (error) {
        // EPERM: the process exists but belongs to another user
        return errorCode(error) === 'EPERM';
      }
    },

    kill(pid, signal = 'SIGTERM') {
      try {
        process.kill(pid, signal);
        return true;
      } catch (error) {
        const code = errorCode(error);
        if (code === 'ESRCH') {
          return true;
        }
        if (code === 'EPERM') {
          return false;
        }
        throw error;
      }
    },
  };
}
