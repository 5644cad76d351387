import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { guessMediaType, imageReference, ImageStorage } from './image-storage';
import { ImageNotFoundError, InvalidImageReferenceError } from './errors';
import { generateImageId } from './image-id';
import type { Frame } from '../camera/drivers/types';

const frame = (width: number, height: number): Frame => ({
  width,
  height,
  channels: 3,
  data: Buffer.alloc(width * height * 3, 90),
});

describe('ImageStorage', () => {
  let dir: string;
  let storage: ImageStorage;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'aperture-storage-'));
    storage = new ImageStorage(path.join(dir, 'images'));
    await storage.ensureDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write a decodable jpeg named after the id', async () => {
    const saved = await storage.save(frame(16, 8), 'abc123', 'jpeg', 80);

    expect(saved).toBe(path.join(dir, 'images', 'abc123.jpg'));
    const meta = await sharp(saved).metadata();
    expect(meta.format).toBe('jpeg');
    expect(meta.width).toBe(16);
    expect(meta.height).toBe(8);
  });

  it('should write png files with a png extension', async () => {
    const saved = await storage.save(frame(4, 4), 'pngimage', 'png', 95);

    expect(path.basename(saved)).toBe('pngimage.png');
    expect((await sharp(saved).metadata()).format).toBe('png');
  });

  it('should never overwrite an existing image', async () => {
    await storage.save(frame(4, 4), 'same', 'png', 95);
    await expect(storage.save(frame(4, 4), 'same', 'png', 95)).rejects.toThrow(/EEXIST/);
  });

  it('should resolve a stored image with its media type', async () => {
    const saved = await storage.save(frame(4, 4), 'fetchme', 'jpeg', 95);

    const image = await storage.resolve('fetchme.jpg');

    expect(image.path).toBe(saved);
    expect(image.mediaType).toBe('image/jpeg');
    expect(image.bytes.equals(await fs.readFile(saved))).toBe(true);
  });

  it('should reject names that escape the storage directory', async () => {
    await fs.writeFile(path.join(dir, 'secret.png'), 'x');

    await expect(storage.resolve('../secret.png')).rejects.toThrow(InvalidImageReferenceError);
    await expect(storage.resolve('/etc/passwd')).rejects.toThrow(InvalidImageReferenceError);
    await expect(storage.resolve('.')).rejects.toThrow(InvalidImageReferenceError);
  });

  it('should resolve names that merely start with two dots', async () => {
    const saved = await storage.save(frame(2, 2), '..dotted', 'jpeg', 80);

    const image = await storage.resolve('..dotted.jpg');

    expect(image.path).toBe(saved);
    expect(image.mediaType).toBe('image/jpeg');
    await expect(storage.resolve('..')).rejects.toThrow(InvalidImageReferenceError);
  });

  it('should report unknown images as not found', async () => {
    await expect(storage.resolve('missing.jpg')).rejects.toThrow(ImageNotFoundError);
  });
});

describe('storage helpers', () => {
  it('should infer media types from the extension', () => {
    expect(guessMediaType('/x/a.jpg')).toBe('image/jpeg');
    expect(guessMediaType('/x/a.JPEG')).toBe('image/jpeg');
    expect(guessMediaType('/x/a.png')).toBe('image/png');
    expect(guessMediaType('/x/a.bin')).toBe('application/octet-stream');
    expect(guessMediaType('/x/noext')).toBe('application/octet-stream');
  });

  it('should build references under the images route', () => {
    expect(imageReference('/data/images/abc.jpg')).toBe('/api/images/abc.jpg');
  });

  it('should generate 32 lowercase hex character ids', () => {
    const first = generateImageId();
    const second = generateImageId();
    expect(first).toMatch(/^[0-9a-f]{32}$/);
    expect(first).not.toBe(second);
  });
});
