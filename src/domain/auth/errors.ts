/**
 * Raised when a required argument is missing, empty or out of range.
 * Always thrown before any I/O takes place.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function requireNonEmpty(value: string | number, name: string): void {
  if (value === '' || (typeof value === 'number' && !Number.isFinite(value))) {
    throw new InvalidArgumentError(`must provide ${name}`);
  }
}
