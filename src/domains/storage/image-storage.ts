import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import type { Frame } from '../camera/drivers/types';
import type { ImageFormat } from '../config/settings';
import { ImageNotFoundError, InvalidImageReferenceError } from './errors';

/** URL prefix under which stored images are served. */
export const IMAGE_ROUTE_PREFIX = '/api/images';

export interface StoredImage {
  path: string;
  bytes: Buffer;
  mediaType: string;
}

const EXTENSIONS: Record<ImageFormat, string> = {
  jpeg: 'jpg',
  png: 'png',
};

export function guessMediaType(filePath: string): string {
  switch (path.extname(filePath).toLowerCase()) {
    case '.jpg':
    case '.jpeg':
      return 'image/jpeg';
    case '.png':
      return 'image/png';
    default:
      return 'application/octet-stream';
  }
}

export function imageReference(filePath: string): string {
  return `${IMAGE_ROUTE_PREFIX}/${path.basename(filePath)}`;
}

/**
 * Flat directory of encoded captures named `<id>.<ext>`. Files are only ever
 * created here; deletion belongs to the retention sweeper.
 */
export class ImageStorage {
  readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
  }

  pathFor(id: string, format: ImageFormat): string {
    return path.join(this.baseDir, `${id}.${EXTENSIONS[format]}`);
  }

  /** Encodes the frame and writes it; an existing file is never overwritten. */
  async save(frame: Frame, id: string, format: ImageFormat, quality: number): Promise<string> {
    const image = sharp(frame.data, {
      raw: { width: frame.width, height: frame.height, channels: frame.channels },
    });
    const encoded =
      format === 'jpeg'
        ? await image.jpeg({ quality, optimiseCoding: true }).toBuffer()
        : await image.png().toBuffer();

    const filePath = this.pathFor(id, format);
    await fs.writeFile(filePath, encoded, { flag: 'wx' });
    return filePath;
  }

  async resolve(filename: string): Promise<StoredImage> {
    const candidate = path.resolve(this.baseDir, filename);
    const relative = path.relative(this.baseDir, candidate);
    const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
    if (relative === '' || escapes || path.isAbsolute(relative)) {
      throw new InvalidImageReferenceError('Invalid image path supplied.');
    }

    let bytes: Buffer;
    try {
      bytes = await fs.readFile(candidate);
    } catch (error) {
      throw new ImageNotFoundError('Image not found.', { cause: error });
    }
    return { path: candidate, bytes, mediaType: guessMediaType(candidate) };
  }
}
