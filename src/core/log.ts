/**
 * Development diagnostics.
 *
 * Warnings are stripped in production builds (NODE_ENV === 'production').
 * Errors are always reported.
 */

export function isDev(): boolean {
  return typeof process === 'undefined' || process.env?.NODE_ENV !== 'production';
}

export function warn(message: string, ...details: unknown[]): void {
  if (isDev()) {
    console.warn(`Spindle: ${message}`, ...details);
  }
}

export function reportError(message: string, ...details: unknown[]): void {
  console.error(`Spindle: ${message}`, ...details);
}
