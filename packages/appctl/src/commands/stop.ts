/**
 * stop command - Stop the service
 */

import type { Backend } from '../types.js';

export async function stop(backend: Backend): Promise<void> {
  await backend.stop();
}
