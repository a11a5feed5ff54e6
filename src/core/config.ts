/**
 * Process-wide engine configuration.
 *
 * The update queue is shared by every component in the process, so its
 * settings live here rather than on an application instance.
 *
 * @example
 * configure({
 *   onError: (err) => telemetry.capture(err),
 *   maxDrainIterations: 10_000
 * });
 */

import { reportError } from './log.js';

export interface SpindleConfig {
  /** Receives errors the engine recovers from instead of throwing. */
  onError?: (err: unknown) => void;
  /** Upper bound on deferred updates executed by a single drain. */
  maxDrainIterations: number;
}

const DEFAULT_MAX_DRAIN_ITERATIONS = 100_000;

const config: SpindleConfig = {
  maxDrainIterations: DEFAULT_MAX_DRAIN_ITERATIONS,
};

export function configure(opts: Partial<SpindleConfig>): void {
  if (opts.onError !== undefined) config.onError = opts.onError;
  if (opts.maxDrainIterations !== undefined) {
    if (!Number.isInteger(opts.maxDrainIterations) || opts.maxDrainIterations < 1) {
      throw new RangeError('Spindle: maxDrainIterations must be a positive integer');
    }
    config.maxDrainIterations = opts.maxDrainIterations;
  }
}

/** Restore defaults. Mostly useful between tests. */
export function resetConfig(): void {
  config.onError = undefined;
  config.maxDrainIterations = DEFAULT_MAX_DRAIN_ITERATIONS;
}

export function getConfig(): Readonly<SpindleConfig> {
  return config;
}

/**
 * Route a recovered error to the configured handler, or log it.
 */
export function handleError(err: unknown, context: string): void {
  if (config.onError) {
    config.onError(err);
  } else {
    reportError(`Error in ${context}:`, err);
  }
}
