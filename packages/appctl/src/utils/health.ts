/**
 * HTTP health check against the deployed service
 */

import chalk from 'chalk';
import ora from 'ora';
import type { DeployContext } from '../types.js';
import { probeHost, sleep, waitFor } from '../utils.js';
import { CliError } from './errors.js';

export const DEFAULT_HEALTH_PATH = '/health';

export interface HealthCheckOptions {
  path?: string;
  /** Grace period before the first request */
  initialDelayMs?: number;
  timeoutMs?: number;
  intervalMs?: number;
  /** Resolves true when the URL answers with a 2xx */
  probe?: (url: string) => Promise<boolean>;
}

export function serviceUrl(ctx: Pick<DeployContext, 'host' | 'port'>, urlPath = ''): string {
  return `http://${probeHost(ctx.host)}:${ctx.port}${urlPath}`;
}

export async function httpProbe(url: string): Promise<boolean> {
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(2000) });
    return response.ok;
  } catch {
    // Connection refused or timed out: not up yet
    return false;
  }
}

/**
 * Wait for the service to answer on its health endpoint.
 * Throws when it does not within the timeout.
 */
export async function runHealthCheck(
  ctx: Pick<DeployContext, 'host' | 'port'>,
  options: HealthCheckOptions = {}
): Promise<void> {
  const {
    path = DEFAULT_HEALTH_PATH,
    initialDelayMs = 3000,
    timeoutMs = 30_000,
    intervalMs = 1000,
    probe = httpProbe,
  } = options;
  const url = serviceUrl(ctx, path.startsWith('/') ? path : `/${path}`);

  const spinner = ora(`Running health check: ${chalk.cyan(url)}`).start();
  await sleep(initialDelayMs);

  const healthy = await waitFor(() => probe(url), {
    timeoutMs,
    intervalMs,
    onProgress: (elapsed) => {
      spinner.text = `Running health check: ${chalk.cyan(url)} (${Math.round(elapsed / 1000)}s)`;
    },
  });

  if (!healthy) {
    spinner.fail('Health check failed');
    throw new CliError(
      `Health check failed, service is not reachable at ${url}`,
      `Check the service logs with ${chalk.cyan('appctl logs')}.`
    );
  }

  spinner.succeed('Health check passed, service is up');
}
