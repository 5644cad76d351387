import { CameraCaptureError } from '../camera/errors';
import { formatResolution, InvalidResolutionError, parseResolution, type Resolution } from '../camera/resolution';
import type { Camera, CaptureParams } from '../camera/protocols/camera';
import type { Frame } from '../camera/drivers/types';
import type { ImageFormat, Settings } from '../config/settings';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';
import { generateImageId } from '../storage/image-id';
import { imageReference } from '../storage/image-storage';
import { CaptureValidationError, PrimaryCaptureError } from './errors';
import type { CaptureImageItem, CaptureRequest, CaptureResponse } from './capture-schemas';

/** The cameras a capture runs against. */
export interface DeviceSet {
  readonly primary: Camera;
  readonly secondaries: readonly Camera[];
}

export interface ImageSink {
  save(frame: Frame, id: string, format: ImageFormat, quality: number): Promise<string>;
}

export type CaptureDefaults = Pick<Settings, 'defaultResolution' | 'defaultFormat' | 'defaultQuality'>;

export interface CaptureCoordinatorOptions {
  /** Looked up per request, so the coordinator can be built before the fleet starts. */
  fleet: () => DeviceSet;
  storage: ImageSink;
  defaults: CaptureDefaults;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Turns one capture request into stored images. The primary camera is
 * authoritative: its failure fails the request. Secondaries are best effort
 * and only consulted when `use_extra` is set.
 */
export class CaptureCoordinator {
  private readonly fleet: () => DeviceSet;
  private readonly storage: ImageSink;
  private readonly defaults: CaptureDefaults;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CaptureCoordinatorOptions) {
    this.fleet = options.fleet;
    this.storage = options.storage;
    this.defaults = options.defaults;
    this.logger = (options.logger ?? rootLogger).child({ component: 'Capture' });
    this.now = options.now ?? (() => new Date());
  }

  resolveParams(request: Partial<CaptureRequest>): CaptureParams {
    const resolutionText = request.resolution || this.defaults.defaultResolution;
    let resolution: Resolution;
    try {
      resolution = parseResolution(resolutionText);
    } catch (error) {
      if (error instanceof InvalidResolutionError) {
        throw new CaptureValidationError(error.message);
      }
      throw error;
    }

    return {
      resolution,
      format: request.format ?? this.defaults.defaultFormat,
      quality: request.quality ?? this.defaults.defaultQuality,
    };
  }

  async capture(request: Partial<CaptureRequest> = {}, logger: Logger = this.logger): Promise<CaptureResponse> {
    const params = this.resolveParams(request);
    const useExtra = request.use_extra ?? false;
    const { primary, secondaries } = this.fleet();
    const summary = {
      resolution: formatResolution(params.resolution),
      format: params.format,
      quality: params.quality,
    };

    logger.info('Processing capture request', { ...summary, useExtra });

    let main: CaptureImageItem;
    try {
      main = await this.captureAndStore(primary, 0, params, logger);
    } catch (error) {
      if (error instanceof CameraCaptureError) {
        logger.error('Main camera capture failed', error, { ...summary, source: primary.source });
        throw new PrimaryCaptureError('Camera capture failed.', { cause: error });
      }
      throw error;
    }

    const timestamp = this.now().toISOString();
    const response: CaptureResponse = {
      image_id: main.image_id,
      image_url_or_path: main.image_url_or_path,
      timestamp,
    };
    if (!useExtra) {
      return response;
    }

    const extras = await this.captureSecondaries(secondaries, params, logger);
    return { ...response, images: [main, ...extras] };
  }

  /**
   * Captures all secondaries at once. Survivors are numbered from 1 in
   * configured order; a failed camera takes no index.
   */
  private async captureSecondaries(
    devices: readonly Camera[],
    params: CaptureParams,
    logger: Logger
  ): Promise<CaptureImageItem[]> {
    const settled = await Promise.allSettled(
      devices.map((device) => this.captureAndStore(device, 0, params, logger))
    );

    const items: CaptureImageItem[] = [];
    settled.forEach((outcome, position) => {
      if (outcome.status === 'fulfilled') {
        items.push({ ...outcome.value, index: items.length + 1 });
        return;
      }
      if (!(outcome.reason instanceof CameraCaptureError)) {
        throw outcome.reason;
      }
      logger.warn('Extra camera capture failed; skipping source.', {
        source: devices[position]?.source,
        error: outcome.reason.message,
      });
    });
    return items;
  }

  private async captureAndStore(
    device: Camera,
    index: number,
    params: CaptureParams,
    logger: Logger
  ): Promise<CaptureImageItem> {
    const frame = await device.captureFreshFrame(params);
    const imageId = generateImageId();
    const filePath = await this.storage.save(frame, imageId, params.format, params.quality);
    logger.info('Stored captured image', { path: filePath, source: device.source });
    return {
      index,
      image_id: imageId,
      image_url_or_path: imageReference(filePath),
    };
  }
}
