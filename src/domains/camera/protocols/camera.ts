import type { Frame } from '../drivers/types';
import type { NormalizedKey } from '../source-identity';
import type { Resolution } from '../resolution';
import type { ImageFormat } from '../../config/settings';

export type CameraMode = 'dummy' | 'hardware';

export interface CaptureParams {
  resolution: Resolution;
  format: ImageFormat;
  quality: number;
}

export interface DeviceDescription {
  source: string;
  key: NormalizedKey;
  mode: CameraMode;
  started: boolean;
}

/**
 * Camera protocol: a lockable capture source with a start/stop lifecycle.
 */
export interface Camera {
  readonly source: string;
  readonly started: boolean;
  /** Opens the device; idempotent. Throws CameraInitializationError. */
  start(): Promise<void>;
  /** Releases the device; safe to call repeatedly. */
  stop(): Promise<void>;
  /** Captures one fresh RGB frame. Throws CameraCaptureError. */
  captureFreshFrame(params: CaptureParams): Promise<Frame>;
  describe(): DeviceDescription;
}
