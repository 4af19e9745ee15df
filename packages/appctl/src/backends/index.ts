import type { Backend, DeployContext } from '../types.js';
import type { Shell } from '../utils/shell.js';
import { createComposeBackend } from './compose.js';
import { createContainerBackend } from './container.js';
import { createProcessBackend } from './process.js';

export function createBackend(ctx: DeployContext, shell: Shell): Backend {
  switch (ctx.mode) {
    case 'uvicorn':
      return createProcessBackend(ctx, shell);
    case 'docker':
      return createContainerBackend(ctx, shell);
    case 'docker-compose':
      return createComposeBackend(ctx, shell);
  }
}
