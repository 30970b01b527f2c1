/**
 * Executor Concurrency Defaults
 *
 * The default limit comes from EXECUTOR_MAX_CONCURRENCY. Executors and single
 * runs may override it, capped at MAX_CONCURRENCY.
 */

import { getConfig } from '../config/index.js';

/** Maximum allowed concurrency to prevent resource exhaustion */
export const MAX_CONCURRENCY = 50;

/**
 * Get concurrency value with an optional override.
 *
 * @returns The override if it is a positive number (floored, capped at
 *          MAX_CONCURRENCY), otherwise the configured default
 *
 * @example
 * getConcurrency();   // EXECUTOR_MAX_CONCURRENCY
 * getConcurrency(4);  // 4
 */
export function getConcurrency(override?: unknown): number {
  if (typeof override === 'number' && override >= 1) {
    return Math.min(Math.floor(override), MAX_CONCURRENCY);
  }
  return Math.min(getConfig().executor.maxConcurrency, MAX_CONCURRENCY);
}
