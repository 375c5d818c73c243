/**
 * Error types for programmer mistakes. Conditions a user can trigger
 * (stale rows, declined prompts, protected buffers) are not errors and
 * never reach these classes.
 */

export class EditorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EditorError';
  }
}

export class DuplicateBufferError extends EditorError {
  readonly bufferName: string;

  constructor(bufferName: string) {
    super(`Buffer "${bufferName}" already exists`);
    this.name = 'DuplicateBufferError';
    this.bufferName = bufferName;
  }
}
