/**
 * status command - Show service status
 */

import type { Backend } from '../types.js';

/**
 * Resolves true when the service is running. The CLI exits 1 otherwise.
 */
export async function status(backend: Backend): Promise<boolean> {
  return backend.status();
}
