/**
 * Fatal precondition failures.
 *
 * Navigation errors (dereferencing past-the-end, stepping off either end,
 * stepping backward in a forward-only collection) are programming errors,
 * not recoverable conditions. They are raised as `PreconditionError` and are
 * never caught inside this package.
 */

export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Throw a PreconditionError with `message` unless `condition` holds.
 */
export function precondition(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new PreconditionError(message);
  }
}

/**
 * Throw a PreconditionError unconditionally.
 */
export function preconditionFailure(message: string): never {
  throw new PreconditionError(message);
}
