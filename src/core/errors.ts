/**
 * Spindle Core - Errors
 *
 * A render function that is not positionally stable, or a component protocol
 * that is used out of order, leaves the node tree in a state the engine cannot
 * reason about. Those cases throw ContractViolationError and abort the current
 * render. Transient conditions (a busy component, a destroyed update target)
 * never throw; see scheduler.ts.
 */

export class ContractViolationError extends Error {
  constructor(message: string) {
    super(`Spindle: ${message}`);
    this.name = 'ContractViolationError';
  }
}

/** Throw a ContractViolationError. Typed `never` so callers narrow after it. */
export function contractViolation(message: string): never {
  throw new ContractViolationError(message);
}
