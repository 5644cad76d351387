/**
 * Camera source tokens arrive as a numeric index ("0"), a V4L2 device path
 * ("/dev/video0") or an opaque string (stream URL, file, keyword). These
 * helpers canonicalize tokens so the same physical device is recognised
 * whichever notation was configured.
 */

export const DEVICE_PATH_PREFIX = '/dev/video';

export type NormalizedKey = `index:${number}` | `dev:${string}` | `raw:${string}`;

const DUMMY_SOURCES = new Set(['', 'dummy', 'simulator', 'placeholder']);

const isDigits = (value: string) => /^\d+$/.test(value);

export function normalize(token: string): NormalizedKey {
  const trimmed = token.trim();
  if (isDigits(trimmed)) {
    return `index:${parseInt(trimmed, 10)}`;
  }
  const lower = trimmed.toLowerCase();
  if (lower.startsWith(DEVICE_PATH_PREFIX)) {
    return `dev:${lower}`;
  }
  return `raw:${trimmed}`;
}

/**
 * Keys used for duplicate detection. Index and device-path notations for the
 * same numbered device expand to the same pair, so "0" and "/dev/video0"
 * intersect.
 */
export function equivalenceKeys(token: string): Set<NormalizedKey> {
  const trimmed = token.trim();
  const keys = new Set<NormalizedKey>([normalize(trimmed)]);

  let deviceNumber: number | undefined;
  if (isDigits(trimmed)) {
    deviceNumber = parseInt(trimmed, 10);
  } else {
    const lower = trimmed.toLowerCase();
    const suffix = lower.slice(DEVICE_PATH_PREFIX.length);
    if (lower.startsWith(DEVICE_PATH_PREFIX) && isDigits(suffix)) {
      deviceNumber = parseInt(suffix, 10);
    }
  }

  if (deviceNumber !== undefined) {
    keys.add(`index:${deviceNumber}`);
    keys.add(`dev:${DEVICE_PATH_PREFIX}${deviceNumber}`);
  }
  return keys;
}

export function areEquivalent(a: string, b: string): boolean {
  const keysA = equivalenceKeys(a);
  for (const key of equivalenceKeys(b)) {
    if (keysA.has(key)) return true;
  }
  return false;
}

export function isDummy(token: string): boolean {
  return DUMMY_SOURCES.has(token.trim().toLowerCase());
}

/** Splits a comma-separated source list, dropping blanks and keeping order. */
export function parseExtraSources(raw: string | undefined | null): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0);
}

/** Integer index for numeric tokens, 0 for everything else. */
export function deviceIndexOf(token: string): number {
  const trimmed = token.trim();
  return isDigits(trimmed) ? parseInt(trimmed, 10) : 0;
}
