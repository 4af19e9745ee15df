/**
 * Utility functions for the appctl CLI
 */

import { InvalidArgumentError } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Prerequisites } from './types.js';
import { findComposeCli, findContainerCli } from './utils/runtime.js';
import type { Shell } from './utils/shell.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Read package.json version
 */
export function getCliVersion(): string {
  const packagePath = path.join(__dirname, '../package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

/**
 * Commander argument parser for positive integers (workers, timeouts)
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Commander argument parser for TCP ports
 */
export function parsePort(value: string): number {
  const port = parsePositiveInt(value);
  if (port > 65535) {
    throw new InvalidArgumentError('Must be a port between 1 and 65535.');
  }
  return port;
}

/**
 * Commander argument parser for `logs --tail`: a line count or "all"
 */
export function parseTail(value: string): string {
  const trimmed = value.trim();
  if (trimmed === 'all' || /^\d+$/.test(trimmed)) {
    return trimmed;
  }
  throw new InvalidArgumentError('Must be a non-negative integer or "all".');
}

/**
 * Wildcard bind addresses cannot be connected to; probe loopback instead.
 */
export function probeHost(host: string): string {
  if (host === '0.0.0.0' || host === '::' || host === '') {
    return '127.0.0.1';
  }
  return host.includes(':') ? `[${host}]` : host;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait for a condition with timeout
 */
export async function waitFor(
  condition: () => Promise<boolean>,
  options: {
    timeoutMs: number;
    intervalMs?: number;
    onProgress?: (elapsed: number) => void;
  }
): Promise<boolean> {
  const { timeoutMs, intervalMs = 1000, onProgress } = options;
  const startTime = Date.now();

  while (Date.now() - startTime < timeoutMs) {
    if (await condition()) {
      return true;
    }

    if (onProgress) {
      onProgress(Date.now() - startTime);
    }

    await sleep(intervalMs);
  }

  return false;
}

function firstVersion(text: string): string | undefined {
  const match = text.match(/v?(\d+\.\d+(?:\.\d+)?)/);
  return match ? match[1] : undefined;
}

/**
 * Check system prerequisites
 */
export async function checkPrerequisites(shell: Shell): Promise<Prerequisites> {
  const nodeVersion = process.version.replace('v', '');
  const prereqs: Prerequisites = {
    node: {
      version: nodeVersion,
      satisfies: parseInt(nodeVersion.split('.')[0], 10) >= 20,
    },
    python: { installed: false },
    container: {},
    compose: {},
    platform: { name: process.platform },
  };

  if (await shell.which('python3')) {
    prereqs.python.installed = true;
    const { stdout, stderr } = await shell.run('python3', ['--version'], { reject: false });
    prereqs.python.version = firstVersion(stdout || stderr);
  }

  const container = await findContainerCli(shell);
  if (container) {
    prereqs.container.command = container.label;
    const { stdout } = await shell.run(container.file, ['--version'], { reject: false });
    prereqs.container.version = firstVersion(stdout);
  }

  const compose = await findComposeCli(shell);
  if (compose) {
    prereqs.compose.command = compose.label;
    const { stdout } = await shell.run(compose.file, [...compose.baseArgs, 'version'], {
      reject: false,
    });
    prereqs.compose.version = firstVersion(stdout);
  }

  if (process.platform === 'linux') {
    const { stdout } = await shell.run('uname', ['-r'], { reject: false });
    const kernel = stdout.toLowerCase();
    if (kernel.includes('microsoft') || kernel.includes('wsl')) {
      prereqs.platform.isWSL = true;
    }
  }

  return prereqs;
}
