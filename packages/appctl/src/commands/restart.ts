/**
 * restart command - Stop, start again and health check
 */

import type { Backend, DeployContext, StartOptions } from '../types.js';
import { runHealthCheck } from '../utils/health.js';

export async function restart(
  ctx: DeployContext,
  backend: Backend,
  options: StartOptions = {}
): Promise<void> {
  await backend.stop();
  await backend.start();

  if (!options.skipHealth) {
    await runHealthCheck(ctx);
  }
}
