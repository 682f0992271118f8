/**
 * Raised when a request cannot be signed.
 * A malformed credential can never produce a usable URL, so unlike
 * configuration or install problems this aborts plan construction.
 */
export class SigningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SigningError';
  }
}
