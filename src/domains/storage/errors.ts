/** The requested name resolves outside the storage directory. */
export class InvalidImageReferenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidImageReferenceError';
  }
}

export class ImageNotFoundError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageNotFoundError';
  }
}
