export interface Resolution {
  width: number;
  height: number;
}

/** Largest width or height a capture may request. */
export const MAX_RESOLUTION_SIDE = 8192;

export class InvalidResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidResolutionError';
  }
}

/**
 * Parses `<width>x<height>`; both sides must be strictly positive integers no
 * larger than MAX_RESOLUTION_SIDE.
 */
export function parseResolution(value: string): Resolution {
  if (!value) {
    throw new InvalidResolutionError('Resolution value is required.');
  }

  const parts = value.toLowerCase().split('x');
  if (parts.length !== 2) {
    throw new InvalidResolutionError("Resolution must be formatted as '<width>x<height>'.");
  }

  const [rawWidth = '', rawHeight = ''] = parts.map((part) => part.trim());
  if (!/^[+-]?\d+$/.test(rawWidth) || !/^[+-]?\d+$/.test(rawHeight)) {
    throw new InvalidResolutionError('Resolution dimensions must be integers.');
  }

  const width = parseInt(rawWidth, 10);
  const height = parseInt(rawHeight, 10);
  if (width <= 0 || height <= 0) {
    throw new InvalidResolutionError('Resolution dimensions must be positive integers.');
  }
  if (width > MAX_RESOLUTION_SIDE || height > MAX_RESOLUTION_SIDE) {
    throw new InvalidResolutionError(`Resolution dimensions must not exceed ${MAX_RESOLUTION_SIDE} pixels.`);
  }

  return { width, height };
}

export function formatResolution({ width, height }: Resolution): string {
  return `${width}x${height}`;
}
