/** The request asked for something the service cannot produce. Rejected before any device is touched. */
export class CaptureValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CaptureValidationError';
  }
}

/** The primary camera failed; the whole request fails with it. */
export class PrimaryCaptureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PrimaryCaptureError';
  }
}
