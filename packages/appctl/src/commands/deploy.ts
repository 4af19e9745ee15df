/**
 * deploy command - Full deployment: install (uvicorn), start, health check
 */

import chalk from 'chalk';
import type { Backend, DeployContext, StartOptions } from '../types.js';
import { runHealthCheck, serviceUrl } from '../utils/health.js';

export async function deploy(
  ctx: DeployContext,
  backend: Backend,
  options: StartOptions = {}
): Promise<void> {
  console.log(chalk.blue.bold('\n🚀 Starting full deployment\n'));

  if (backend.install) {
    await backend.install();
  }

  await backend.start();

  if (!options.skipHealth) {
    await runHealthCheck(ctx);
  }

  console.log(chalk.green.bold('\n✨ Deployment complete!\n'));
  console.log(chalk.cyan('   Service:  '), serviceUrl(ctx));
  console.log(chalk.cyan('   API docs: '), serviceUrl(ctx, '/docs'));
  console.log();
}
