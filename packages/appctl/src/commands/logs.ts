/**
 * logs command - View service logs
 */

import type { Backend, LogsOptions } from '../types.js';
import { isInterrupted } from '../utils/shell.js';

export async function logs(backend: Backend, options: LogsOptions): Promise<void> {
  try {
    await backend.logs(options);
  } catch (error) {
    // Ctrl+C is expected, don't treat as error
    if (!isInterrupted(error)) {
      throw error;
    }
  }
}
