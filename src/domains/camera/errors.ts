/** Base class for camera related failures. */
export class CameraError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CameraError';
  }
}

/** The camera device could not be opened. */
export class CameraInitializationError extends CameraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CameraInitializationError';
  }
}

/** The camera failed to provide a fresh frame. */
export class CameraCaptureError extends CameraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CameraCaptureError';
  }
}
