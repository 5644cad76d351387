import { AsyncMutex } from './mutex';
import { CameraCaptureError, CameraInitializationError } from './errors';
import { deviceIndexOf, isDummy, normalize } from './source-identity';
import { formatResolution } from './resolution';
import { renderPlaceholderFrame } from './drivers/placeholder';
import { toRgbFrame } from './drivers/frame-ops';
import { openFfmpegHandle } from './drivers/ffmpeg';
import type { Frame, RawFrame, VideoHandle, VideoHandleOpener } from './drivers/types';
import type { Camera, CameraMode, CaptureParams, DeviceDescription } from './protocols/camera';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';

type Backend =
  | { kind: 'dummy' }
  | { kind: 'hardware'; handle: VideoHandle };

export interface CaptureDeviceOptions {
  source: string;
  deviceIndex?: number;
  warmupFrames?: number;
  /** Requested buffer depth; values below 1 leave the device default. */
  bufferSize?: number | null;
  readTimeoutMs?: number;
  openHandle?: VideoHandleOpener;
  logger?: Logger;
}

export const DEFAULT_READ_TIMEOUT_MS = 5000;

/**
 * Owns one camera. State is either stopped (no backend) or started (dummy,
 * or an open hardware handle); every transition and every capture runs under
 * the device lock.
 */
export class CaptureDevice implements Camera {
  readonly source: string;
  readonly deviceIndex: number;
  readonly warmupFrames: number;
  readonly bufferSize: number | null;
  readonly readTimeoutMs: number;
  readonly mode: CameraMode;

  private backend: Backend | null = null;
  private readonly lock = new AsyncMutex();
  private readonly openHandle: VideoHandleOpener;
  private readonly logger: Logger;

  constructor(options: CaptureDeviceOptions) {
    this.source = options.source.trim();
    this.deviceIndex = options.deviceIndex ?? deviceIndexOf(this.source);
    this.warmupFrames = Math.max(0, options.warmupFrames ?? 3);
    this.bufferSize = options.bufferSize && options.bufferSize > 0 ? options.bufferSize : null;
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.mode = isDummy(this.source) ? 'dummy' : 'hardware';
    this.logger = (options.logger ?? rootLogger).child({ component: 'Camera', source: this.source });
    this.openHandle = options.openHandle ?? openFfmpegHandle({ logger: this.logger });
  }

  get started(): boolean {
    return this.backend !== null;
  }

  describe(): DeviceDescription {
    return {
      source: this.source,
      key: normalize(this.source),
      mode: this.mode,
      started: this.started,
    };
  }

  async start(): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.backend) return;

      if (this.mode === 'dummy') {
        this.logger.info('Camera operating in dummy mode; skipping hardware init.');
        this.backend = { kind: 'dummy' };
        return;
      }

      const captureSource = this.resolveCaptureSource();
      this.logger.info('Opening camera device', { captureSource });

      let handle: VideoHandle;
      try {
        handle = await this.openHandle(captureSource);
      } catch (error) {
        throw new CameraInitializationError(`Unable to open camera source '${this.source}'.`, { cause: error });
      }

      if (!handle.isOpened()) {
        await handle.release();
        throw new CameraInitializationError(`Unable to open camera source '${this.source}'.`);
      }

      if (this.bufferSize !== null && !handle.setBufferSize(this.bufferSize)) {
        this.logger.warn('Unable to set camera buffer size', { bufferSize: this.bufferSize });
      }

      this.backend = { kind: 'hardware', handle };
      this.logger.info('Camera device ready', { captureSource });
    });
  }

  async stop(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const backend = this.backend;
      this.backend = null;
      if (backend?.kind === 'hardware') {
        this.logger.info('Releasing camera source');
        await backend.handle.release();
      }
    });
  }

  async captureFreshFrame(params: CaptureParams): Promise<Frame> {
    const { width, height } = params.resolution;

    return this.lock.runExclusive(async () => {
      const backend = this.backend;
      if (!backend) {
        throw new CameraCaptureError('Camera has not been started.');
      }

      this.logger.debug('Capturing frame', {
        resolution: formatResolution(params.resolution),
        format: params.format,
        quality: params.quality,
      });

      if (backend.kind === 'dummy') {
        try {
          return await renderPlaceholderFrame(width, height);
        } catch (error) {
          throw new CameraCaptureError('Failed to render placeholder frame.', { cause: error });
        }
      }

      const { handle } = backend;
      for (let i = 0; i < this.warmupFrames; i++) {
        await this.readFrame(handle);
      }

      const raw = await this.readFrame(handle);
      if (!raw || raw.data.length === 0) {
        throw new CameraCaptureError('Failed to read frame from camera.');
      }

      try {
        return await toRgbFrame(raw, width, height);
      } catch (error) {
        throw new CameraCaptureError('Failed to convert camera frame.', { cause: error });
      }
    });
  }

  /** A read that times out is withdrawn from the handle through its signal. */
  private async readFrame(handle: VideoHandle): Promise<RawFrame | null> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new CameraCaptureError(`Camera read timed out after ${this.readTimeoutMs}ms.`));
        controller.abort();
      }, this.readTimeoutMs);
    });

    try {
      return await Promise.race([handle.read(controller.signal), timeout]);
    } catch (error) {
      if (error instanceof CameraCaptureError) throw error;
      throw new CameraCaptureError('Failed to read frame from camera.', { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  /** Numeric tokens open by index, everything else by its literal value. */
  private resolveCaptureSource(): number | string {
    return /^\d+$/.test(this.source) ? parseInt(this.source, 10) : this.source;
  }
}
