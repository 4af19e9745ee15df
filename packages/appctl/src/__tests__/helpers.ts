/**
 * Test helpers: an in-process stand-in for the Shell and a DeployContext factory.
 */

import path from 'path';
import type { DeployContext } from '../types.js';
import type { DetachedOptions, RunOptions, RunResult, Shell } from '../utils/shell.js';

export interface RecordedCall {
  /** "file arg1 arg2" */
  line: string;
  options: RunOptions;
}

export class FakeShell implements Shell {
  readonly calls: RecordedCall[] = [];
  readonly spawned: Array<{ line: string; options: DetachedOptions }> = [];
  readonly killed: number[] = [];
  readonly alive = new Set<number>();
  /** PIDs owned by another user: kill leaves them running */
  readonly denied = new Set<number>();
  readonly installed: Set<string>;
  nextPid = 4242;

  private readonly results = new Map<string, Partial<RunResult>>();

  constructor(installed: string[] = []) {
    this.installed = new Set(installed);
  }

  /** Canned result for an exact command line */
  on(line: string, result: Partial<RunResult>): this {
    this.results.set(line, result);
    return this;
  }

  lines(): string[] {
    return this.calls.map((call) => call.line);
  }

  async run(file: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    const line = [file, ...args].join(' ');
    this.calls.push({ line, options });

    const result: RunResult = { stdout: '', stderr: '', exitCode: 0, ...this.results.get(line) };
    if (result.exitCode !== 0 && options.reject !== false) {
      throw new Error(`Command failed with exit code ${result.exitCode}: ${line}`);
    }
    return result;
  }

  async which(command: string): Promise<string | null> {
    return this.installed.has(command) ? `/usr/bin/${command}` : null;
  }

  async spawnDetached(file: string, args: string[], options: DetachedOptions): Promise<number> {
    this.spawned.push({ line: [file, ...args].join(' '), options });
    const pid = this.nextPid++;
    this.alive.add(pid);
    return pid;
  }

  isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  kill(pid: number): boolean {
    if (this.denied.has(pid)) {
      return false;
    }
    this.killed.push(pid);
    this.alive.delete(pid);
    return true;
  }
}

export function testContext(dir: string, overrides: Partial<DeployContext> = {}): DeployContext {
  return {
    dir,
    mode: 'uvicorn',
    envFile: path.join(dir, '.env'),
    envFileLoaded: false,
    env: {},
    requirementsFile: path.join(dir, 'requirements.txt'),
    host: '0.0.0.0',
    port: 8000,
    workers: 4,
    app: 'main:app',
    name: 'fastapi-app',
    ...overrides,
  };
}
