/**
 * Raised when a structural precondition of the tree is broken:
 * rotating without the pivot child, dereferencing a handle the arena never issued,
 * or finding a RED node without a parent during fix-up.
 * These are programming errors inside the library, never expected outcomes.
 */
export class TreeInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreeInvariantError';
  }
}

