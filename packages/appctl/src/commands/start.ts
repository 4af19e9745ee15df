/**
 * start command - Start the service and wait for it to become healthy
 */

import type { Backend, DeployContext, StartOptions } from '../types.js';
import { runHealthCheck } from '../utils/health.js';

export async function start(
  ctx: DeployContext,
  backend: Backend,
  options: StartOptions = {}
): Promise<void> {
  await backend.start();

  if (!options.skipHealth) {
    await runHealthCheck(ctx);
  }
}
