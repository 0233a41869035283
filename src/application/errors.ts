/**
 * Errors a store may throw. Domain failures of the user service are returned
 * as outcomes instead; these reach the HTTP error handler.
 */
export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
