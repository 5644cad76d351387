import { describe, it, expect, afterEach } from 'vitest';
import mitt from 'mitt';
import { assertDistinctSources, initializeFleet, type FleetEvents, type FleetSettings } from './fleet';
import { CameraInitializationError } from './errors';
import type { Camera, CaptureParams, DeviceDescription } from './protocols/camera';
import type { Frame } from './drivers/types';
import type { CaptureDeviceOptions } from './capture-device';
import { normalize } from './source-identity';
import { ConfigurationError } from '../config/errors';
import { ApertureLogger } from '../observability/logger';
import type { LogEntry } from '../observability/types';

const logger = new ApertureLogger({ level: 'warn', format: 'json' });

class FakeCamera implements Camera {
  started = false;
  stops = 0;

  constructor(
    readonly source: string,
    private readonly startError?: Error
  ) {}

  async start(): Promise<void> {
    if (this.startError) throw this.startError;
    this.started = true;
  }

  async stop(): Promise<void> {
    this.stops++;
    this.started = false;
  }

  async captureFreshFrame({ resolution }: CaptureParams): Promise<Frame> {
    return {
      width: resolution.width,
      height: resolution.height,
      channels: 3,
      data: Buffer.alloc(resolution.width * resolution.height * 3),
    };
  }

  describe(): DeviceDescription {
    return { source: this.source, key: normalize(this.source), mode: 'hardware', started: this.started };
  }
}

function settings(overrides: Partial<FleetSettings> = {}): FleetSettings {
  return {
    mainCameraSource: '0',
    extraCameraSources: '',
    warmupFrames: 0,
    bufferSize: 1,
    readTimeoutMs: 1000,
    ...overrides,
  };
}

/** Device factory that records what it built and fails the listed sources. */
function fakeFactory(failing: Record<string, Error> = {}) {
  const built: FakeCamera[] = [];
  const options: CaptureDeviceOptions[] = [];
  const createDevice = (opts: CaptureDeviceOptions) => {
    options.push(opts);
    const camera = new FakeCamera(opts.source, failing[opts.source]);
    built.push(camera);
    return camera;
  };
  return { built, options, createDevice };
}

describe('Fleet orchestrator', () => {
  const cleanups: (() => void)[] = [];

  afterEach(() => {
    cleanups.splice(0).forEach((fn) => fn());
  });

  function captureLogs(): LogEntry[] {
    const entries: LogEntry[] = [];
    cleanups.push(ApertureLogger.addListener((entry) => entries.push(entry)));
    return entries;
  }

  it('should start the primary alone when no extras are configured', async () => {
    const factory = fakeFactory();
    const fleet = await initializeFleet(settings(), { createDevice: factory.createDevice, logger });

    expect(fleet.primary.source).toBe('0');
    expect(fleet.primary.started).toBe(true);
    expect(fleet.secondaries).toEqual([]);
  });

  it('should pass device tuning to every camera it builds', async () => {
    const factory = fakeFactory();
    await initializeFleet(settings({ extraCameraSources: '1', warmupFrames: 5, bufferSize: 2, readTimeoutMs: 750 }), {
      createDevice: factory.createDevice,
      logger,
    });

    expect(factory.options.map((o) => [o.source, o.warmupFrames, o.bufferSize, o.readTimeoutMs])).toEqual([
      ['0', 5, 2, 750],
      ['1', 5, 2, 750],
    ]);
  });

  it('should fail before starting anything when an extra duplicates the primary', async () => {
    const entries = captureLogs();
    const factory = fakeFactory();

    await expect(
      initializeFleet(settings({ mainCameraSource: '0', extraCameraSources: '1,/dev/video0' }), {
        createDevice: factory.createDevice,
        logger,
      })
    ).rejects.toThrow(ConfigurationError);

    expect(factory.built).toHaveLength(0);
    const error = entries.find((entry) => entry.level === 'error');
    expect(error?.msg).toBe('Extra camera source duplicates the main camera source.');
    expect(error?.source).toBe('/dev/video0');
  });

  it('should reject two extras naming the same device', () => {
    expect(() => assertDistinctSources('dummy', ['/dev/video1', '1'], logger)).toThrow(
      "Camera source '1' refers to the same device as extra source '/dev/video1'."
    );
  });

  it('should accept distinct sources', () => {
    expect(() => assertDistinctSources('0', ['1', '/dev/video2', 'rtsp://cam/a'], logger)).not.toThrow();
  });

  it('should propagate a primary start failure and build no secondaries', async () => {
    const factory = fakeFactory({ '0': new CameraInitializationError("Unable to open camera source '0'.") });

    await expect(
      initializeFleet(settings({ extraCameraSources: '1' }), { createDevice: factory.createDevice, logger })
    ).rejects.toThrow(CameraInitializationError);

    expect(factory.built.map((c) => c.source)).toEqual(['0']);
  });

  it('should drop a failing secondary and keep the others in order', async () => {
    const entries = captureLogs();
    const events = mitt<FleetEvents>();
    const dropped: string[] = [];
    events.on('camera:dropped', ({ source }) => dropped.push(source));

    const factory = fakeFactory({ '2': new CameraInitializationError("Unable to open camera source '2'.") });
    const fleet = await initializeFleet(settings({ extraCameraSources: '1,2,3' }), {
      createDevice: factory.createDevice,
      logger,
      events,
    });

    expect(fleet.secondaries.map((c) => c.source)).toEqual(['1', '3']);
    expect(dropped).toEqual(['2']);
    const warning = entries.find((entry) => entry.level === 'warn');
    expect(warning?.msg).toBe('Failed to initialize extra camera source; ignoring source.');
    expect(warning?.source).toBe('2');
  });

  it('should stop already started cameras when an extra fails unexpectedly', async () => {
    const factory = fakeFactory({ '2': new TypeError('driver bug') });

    await expect(
      initializeFleet(settings({ extraCameraSources: '1,2,3' }), { createDevice: factory.createDevice, logger })
    ).rejects.toThrow('driver bug');

    expect(factory.built.map((c) => [c.source, c.stops])).toEqual([
      ['0', 1],
      ['1', 1],
      ['2', 0],
    ]);
  });

  it('should fall back to the legacy key with a deprecation warning', async () => {
    const entries = captureLogs();
    const factory = fakeFactory();
    const fleet = await initializeFleet(
      settings({ mainCameraSource: undefined, legacyCameraSource: 'dummy' }),
      { createDevice: factory.createDevice, logger }
    );

    expect(fleet.primary.source).toBe('dummy');
    expect(entries.some((entry) => entry.msg === 'CAMERA_SOURCE is deprecated; set MAIN_CAMERA_SOURCE instead')).toBe(
      true
    );
  });

  it('should refuse an empty primary source', async () => {
    const factory = fakeFactory();
    await expect(
      initializeFleet(settings({ mainCameraSource: '   ' }), { createDevice: factory.createDevice, logger })
    ).rejects.toThrow(ConfigurationError);
    expect(factory.built).toHaveLength(0);
  });

  it('should stop every camera on shutdown even when one stop fails', async () => {
    const factory = fakeFactory();
    const events = mitt<FleetEvents>();
    const stopped: string[] = [];
    events.on('camera:stopped', ({ source, role }) => stopped.push(`${role}:${source}`));

    const fleet = await initializeFleet(settings({ extraCameraSources: '1,2' }), {
      createDevice: factory.createDevice,
      logger: new ApertureLogger({ level: 'error', format: 'json' }),
      events,
    });
    const [, failing] = factory.built;
    if (failing) {
      failing.stop = async () => {
        throw new Error('stuck');
      };
    }

    await fleet.shutdown();

    expect(stopped.sort()).toEqual(['primary:0', 'secondary:2']);
    expect(factory.built.map((c) => c.started)).toEqual([false, true, false]);
  });
});
