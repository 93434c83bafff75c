/**
 * Raised when a pass meets a tree that an earlier pass should have rejected.
 *
 * This is never a user error; the driver turns it into a single `internal` diagnostic.
 */
export class InternalCompilerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalCompilerError';
  }
}
