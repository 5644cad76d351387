import { describe, it, expect } from 'vitest';
import { formatResolution, InvalidResolutionError, MAX_RESOLUTION_SIDE, parseResolution } from './resolution';

describe('parseResolution', () => {
  it('should parse width and height', () => {
    expect(parseResolution('640x480')).toEqual({ width: 640, height: 480 });
  });

  it('should accept an upper-case separator and padded numbers', () => {
    expect(parseResolution('1920X1080')).toEqual({ width: 1920, height: 1080 });
    expect(parseResolution(' 320 x 240 ')).toEqual({ width: 320, height: 240 });
  });

  it.each(['', '640', 'x480', '640-480', '640x-1', 'abcx123', '640x480x2', '0x480', '1.5x2'])(
    'should reject %j',
    (value) => {
      expect(() => parseResolution(value)).toThrow(InvalidResolutionError);
    }
  );

  it('should accept sizes up to the maximum side and reject larger ones', () => {
    expect(parseResolution(`${MAX_RESOLUTION_SIDE}x1`)).toEqual({ width: 8192, height: 1 });
    expect(() => parseResolution('8193x1')).toThrow('Resolution dimensions must not exceed 8192 pixels.');
    expect(() => parseResolution('1x20000')).toThrow(InvalidResolutionError);
  });

  it('should format back to the wire form', () => {
    expect(formatResolution({ width: 320, height: 240 })).toBe('320x240');
  });
});
