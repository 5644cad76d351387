import sharp from 'sharp';
import type { Frame } from './types';

export type Rgb = [number, number, number];

const randomChannel = () => 64 + Math.floor(Math.random() * 129);

export function randomBaseColor(): Rgb {
  return [randomChannel(), randomChannel(), randomChannel()];
}

/**
 * SVG for the stand-in image produced by dummy cameras: flat base colour,
 * both diagonals in white and the resolution as a label.
 */
export function placeholderSvg(width: number, height: number, base: Rgb): string {
  const stroke = Math.max(1, Math.floor(width / 80));
  const fontSize = Math.max(8, Math.floor(Math.min(width, height) / 12));
  const labelX = Math.floor(width / 10);
  const labelY = Math.floor(height / 10) + fontSize;

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="rgb(${base.join(',')})"/>`,
    `<line x1="0" y1="0" x2="${width}" y2="${height}" stroke="white" stroke-width="${stroke}"/>`,
    `<line x1="0" y1="${height}" x2="${width}" y2="0" stroke="white" stroke-width="${stroke}"/>`,
    `<text x="${labelX}" y="${labelY}" font-family="sans-serif" font-size="${fontSize}" fill="black">${width}x${height}</text>`,
    `</svg>`,
  ].join('');
}

export async function renderPlaceholderFrame(
  width: number,
  height: number,
  base: Rgb = randomBaseColor()
): Promise<Frame> {
  const { data, info } = await sharp(Buffer.from(placeholderSvg(width, height, base)))
    .resize(width, height, { fit: 'fill' })
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.width !== width || info.height !== height || info.channels !== 3) {
    throw new Error(`Placeholder rendered as ${info.width}x${info.height}x${info.channels}`);
  }
  return { width, height, channels: 3, data };
}
