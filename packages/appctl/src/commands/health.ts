/**
 * health command - Check the service's health endpoint
 */

import type { DeployContext, HealthOptions } from '../types.js';
import { DEFAULT_HEALTH_PATH, runHealthCheck } from '../utils/health.js';

export async function health(ctx: DeployContext, options: HealthOptions = {}): Promise<void> {
  await runHealthCheck(ctx, {
    path: options.path ?? DEFAULT_HEALTH_PATH,
    // The service is expected to be up already
    initialDelayMs: 0,
    timeoutMs: (options.timeout ?? 30) * 1000,
  });
}
