import { errorMessage } from '../errors.js';
import type { Logger } from './logger.js';

/**
 * Runs a non-fatal side operation (job deletion, alert publish, bucket check).
 * A failure is logged at warn level with `label` and resolves to `undefined`;
 * it never reaches the caller.
 */
export async function bestEffort<T>(
  label: string,
  operation: () => Promise<T>,
  log: Logger
): Promise<T | undefined> {
  try {
    return await operation();
  } catch (err) {
    log.warn({ err }, `${label} failed: ${errorMessage(err)}`);
    return undefined;
  }
}
