import mitt, { type Emitter } from 'mitt';
import { CaptureDevice, type CaptureDeviceOptions } from './capture-device';
import type { Camera } from './protocols/camera';
import { CameraInitializationError } from './errors';
import { equivalenceKeys, parseExtraSources, type NormalizedKey } from './source-identity';
import { ConfigurationError } from '../config/errors';
import { resolvePrimarySource, type Settings } from '../config/settings';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';

export type CameraRole = 'primary' | 'secondary';

export type FleetEvents = {
  'camera:started': { source: string; role: CameraRole };
  'camera:dropped': { source: string; error: CameraInitializationError };
  'camera:stopped': { source: string; role: CameraRole };
};

export type DeviceFactory = (options: CaptureDeviceOptions) => Camera;

export const createCaptureDevice: DeviceFactory = (options) => new CaptureDevice(options);

export type FleetSettings = Pick<
  Settings,
  'mainCameraSource' | 'legacyCameraSource' | 'extraCameraSources' | 'warmupFrames' | 'bufferSize' | 'readTimeoutMs'
>;

export interface FleetOptions {
  createDevice?: DeviceFactory;
  logger?: Logger;
  events?: Emitter<FleetEvents>;
}

/**
 * The set of started cameras: one primary that must work and the secondaries
 * that survived startup, in configured order.
 */
export class CameraFleet {
  constructor(
    readonly primary: Camera,
    readonly secondaries: readonly Camera[],
    readonly events: Emitter<FleetEvents>,
    private readonly logger: Logger
  ) {}

  get devices(): Camera[] {
    return [this.primary, ...this.secondaries];
  }

  /** Stops every device; one failing stop does not keep the others open. */
  async shutdown(): Promise<void> {
    const roles: [Camera, CameraRole][] = [
      [this.primary, 'primary'],
      ...this.secondaries.map((device): [Camera, CameraRole] => [device, 'secondary']),
    ];

    await Promise.all(
      roles.map(async ([device, role]) => {
        try {
          await device.stop();
          this.events.emit('camera:stopped', { source: device.source, role });
        } catch (error) {
          this.logger.error('Failed to stop camera', error, { source: device.source, role });
        }
      })
    );
  }
}

/**
 * Throws ConfigurationError when any two configured tokens name the same
 * device. Runs before anything is opened.
 */
export function assertDistinctSources(primary: string, secondaries: readonly string[], logger: Logger = rootLogger): void {
  const seen: { token: string; keys: Set<NormalizedKey> }[] = [{ token: primary, keys: equivalenceKeys(primary) }];

  for (const token of secondaries) {
    const keys = equivalenceKeys(token);
    const clash = seen.find((other) => [...keys].some((key) => other.keys.has(key)));
    if (clash) {
      const isPrimary = clash === seen[0];
      logger.error(
        isPrimary
          ? 'Extra camera source duplicates the main camera source.'
          : 'Extra camera source duplicates another extra camera source.',
        undefined,
        { source: token, duplicateOf: clash.token }
      );
      throw new ConfigurationError(
        `Camera source '${token}' refers to the same device as ${isPrimary ? 'main' : 'extra'} source '${clash.token}'.`
      );
    }
    seen.push({ token, keys });
  }
}

/**
 * Builds and starts the primary and secondary cameras. Configuration problems
 * and a primary that will not open are fatal; a secondary that will not open
 * is logged and left out of the fleet.
 */
export async function initializeFleet(settings: FleetSettings, options: FleetOptions = {}): Promise<CameraFleet> {
  const logger = (options.logger ?? rootLogger).child({ component: 'Fleet' });
  const createDevice = options.createDevice ?? createCaptureDevice;
  const events = options.events ?? mitt<FleetEvents>();

  const primarySource = resolvePrimarySource(settings, logger);
  const extraSources = parseExtraSources(settings.extraCameraSources);
  assertDistinctSources(primarySource.token, extraSources, logger);

  const build = (source: string) =>
    createDevice({
      source,
      warmupFrames: settings.warmupFrames,
      bufferSize: settings.bufferSize,
      readTimeoutMs: settings.readTimeoutMs,
      logger: options.logger,
    });

  const primary = build(primarySource.token);
  try {
    await primary.start();
  } catch (error) {
    logger.error('Failed to initialize main camera', error, { source: primarySource.token });
    throw error;
  }
  events.emit('camera:started', { source: primary.source, role: 'primary' });
  logger.info('Main camera initialized', { source: primary.source, origin: primarySource.origin });

  const secondaries: Camera[] = [];
  try {
    for (const source of extraSources) {
      const device = build(source);
      try {
        await device.start();
      } catch (error) {
        if (!(error instanceof CameraInitializationError)) {
          throw error;
        }
        logger.warn('Failed to initialize extra camera source; ignoring source.', {
          source,
          error: error.message,
        });
        events.emit('camera:dropped', { source, error });
        continue;
      }
      secondaries.push(device);
      events.emit('camera:started', { source: device.source, role: 'secondary' });
    }
  } catch (error) {
    logger.error('Unexpected failure while starting extra cameras', error);
    await new CameraFleet(primary, secondaries, events, logger).shutdown();
    throw error;
  }

  logger.info('Camera fleet ready', {
    primary: primary.source,
    secondaries: secondaries.map((device) => device.source),
    dropped: extraSources.length - secondaries.length,
  });
  return new CameraFleet(primary, secondaries, events, logger);
}
