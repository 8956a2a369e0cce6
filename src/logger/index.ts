/**
 * Default observability sinks
 *
 * Every module takes an optional Logger and Metrics; these are what they
 * fall back to when the caller supplies none.
 */

import type { Logger, Metrics } from '../types/index.js';

export type { Logger, Metrics };

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => {},
  gauge: () => {},
  timing: () => {},
};

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
