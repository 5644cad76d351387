import sharp from 'sharp';
import type { Frame, RawFrame } from './types';

/**
 * Converts a raw BGR frame into an RGB frame of exactly width x height. The
 * stretch and the channel swap both run inside libvips.
 */
export async function toRgbFrame(frame: RawFrame, width: number, height: number): Promise<Frame> {
  let pipeline = sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: 3 },
  });
  if (frame.width !== width || frame.height !== height) {
    pipeline = pipeline.resize(width, height, { fit: 'fill' });
  }

  const { data, info } = await pipeline
    .recomb([
      [0, 0, 1],
      [0, 1, 0],
      [1, 0, 0],
    ])
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { width: info.width, height: info.height, channels: 3, data };
}
