/**
 * An error that is reported to the user by its message alone
 *
 * Anything that isn't a SimpleError is a bug, and gets its stack trace printed.
 */
export class SimpleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The message of anything thrown
 */
export function errorMessage(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}
