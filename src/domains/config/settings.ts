import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { Logger } from '../observability/types';

export const IMAGE_FORMATS = ['jpeg', 'png'] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

/** Built-in primary source used when neither primary key is present. */
export const DEFAULT_PRIMARY_SOURCE = '0';

const intFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'must be an integer')
    .transform(Number)
    .optional()
    .transform((value) => value ?? fallback);

const envSchema = z.object({
  CAMERA_STORAGE_DIR: z.string().trim().min(1).default('./data/images'),
  CAMERA_DEFAULT_RESOLUTION: z.string().trim().toLowerCase().default('320x320'),
  CAMERA_DEFAULT_FORMAT: z
    .string()
    .trim()
    .toLowerCase()
    .default('jpeg')
    .pipe(z.enum(IMAGE_FORMATS, { errorMap: () => ({ message: "must be either 'jpeg' or 'png'" }) })),
  CAMERA_DEFAULT_QUALITY: intFromEnv(95).pipe(z.number().min(1).max(100)),
  MAIN_CAMERA_SOURCE: z.string().optional(),
  CAMERA_SOURCE: z.string().optional(),
  EXTRA_CAMERA_SOURCES: z.string().default(''),
  CAMERA_RETENTION_SECONDS: intFromEnv(3600).pipe(z.number().min(0)),
  CAMERA_CLEANUP_INTERVAL_SECONDS: intFromEnv(600).pipe(z.number().positive()),
  CAMERA_WARMUP_FRAMES: intFromEnv(3).pipe(z.number().min(0)),
  CAMERA_BUFFER_SIZE: intFromEnv(1).pipe(z.number().min(1)),
  CAMERA_READ_TIMEOUT_MS: intFromEnv(5000).pipe(z.number().positive()),
  PORT: intFromEnv(8200).pipe(z.number().min(0).max(65535)),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
});

export interface Settings {
  storageDir: string;
  defaultResolution: string;
  defaultFormat: ImageFormat;
  defaultQuality: number;
  /** Raw value of the primary key; `undefined` when absent from the environment. */
  mainCameraSource?: string;
  /** Raw value of the deprecated primary key. */
  legacyCameraSource?: string;
  extraCameraSources: string;
  retentionSeconds: number;
  cleanupIntervalSeconds: number;
  warmupFrames: number;
  bufferSize: number;
  readTimeoutMs: number;
  port: number;
  host: string;
}

export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    storageDir: path.resolve(e.CAMERA_STORAGE_DIR),
    defaultResolution: e.CAMERA_DEFAULT_RESOLUTION,
    defaultFormat: e.CAMERA_DEFAULT_FORMAT,
    defaultQuality: e.CAMERA_DEFAULT_QUALITY,
    mainCameraSource: e.MAIN_CAMERA_SOURCE,
    legacyCameraSource: e.CAMERA_SOURCE,
    extraCameraSources: e.EXTRA_CAMERA_SOURCES,
    retentionSeconds: e.CAMERA_RETENTION_SECONDS,
    cleanupIntervalSeconds: e.CAMERA_CLEANUP_INTERVAL_SECONDS,
    warmupFrames: e.CAMERA_WARMUP_FRAMES,
    bufferSize: e.CAMERA_BUFFER_SIZE,
    readTimeoutMs: e.CAMERA_READ_TIMEOUT_MS,
    port: e.PORT,
    host: e.HOST,
  };
}

export type PrimarySourceOrigin = 'MAIN_CAMERA_SOURCE' | 'CAMERA_SOURCE' | 'default';

export interface ResolvedPrimarySource {
  token: string;
  origin: PrimarySourceOrigin;
}

/**
 * Primary source precedence: MAIN_CAMERA_SOURCE, then the deprecated
 * CAMERA_SOURCE, then the built-in default. The first key present wins even
 * when blank; a blank winner is a configuration error.
 */
export function resolvePrimarySource(
  settings: Pick<Settings, 'mainCameraSource' | 'legacyCameraSource'>,
  logger?: Logger
): ResolvedPrimarySource {
  let resolved: ResolvedPrimarySource;
  if (settings.mainCameraSource !== undefined) {
    resolved = { token: settings.mainCameraSource.trim(), origin: 'MAIN_CAMERA_SOURCE' };
  } else if (settings.legacyCameraSource !== undefined) {
    logger?.warn('CAMERA_SOURCE is deprecated; set MAIN_CAMERA_SOURCE instead', {
      source: settings.legacyCameraSource,
    });
    resolved = { token: settings.legacyCameraSource.trim(), origin: 'CAMERA_SOURCE' };
  } else {
    resolved = { token: DEFAULT_PRIMARY_SOURCE, origin: 'default' };
  }

  if (resolved.token === '') {
    throw new ConfigurationError(`Primary camera source is empty (from ${resolved.origin}).`);
  }
  return resolved;
}
