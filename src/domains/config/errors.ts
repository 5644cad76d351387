/**
 * Raised when the process configuration cannot produce a valid service:
 * invalid environment values, a missing primary source, or two sources
 * that name the same physical camera. Always fatal at startup.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
