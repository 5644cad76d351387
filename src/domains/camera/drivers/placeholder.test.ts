import { describe, it, expect } from 'vitest';
import { placeholderSvg, randomBaseColor, renderPlaceholderFrame } from './placeholder';

describe('placeholder frames', () => {
  it('should draw a label with the resolution and scale the guide lines', () => {
    const svg = placeholderSvg(320, 240, [100, 110, 120]);
    expect(svg).toContain('fill="rgb(100,110,120)"');
    expect(svg).toContain('stroke-width="4"');
    expect(svg).toContain('>320x240</text>');
  });

  it('should keep guide lines at least one pixel wide', () => {
    expect(placeholderSvg(40, 30, [64, 64, 64])).toContain('stroke-width="1"');
  });

  it('should pick base channels between 64 and 192', () => {
    for (let i = 0; i < 50; i++) {
      for (const channel of randomBaseColor()) {
        expect(channel).toBeGreaterThanOrEqual(64);
        expect(channel).toBeLessThanOrEqual(192);
      }
    }
  });

  it.each([
    [64, 48],
    [1, 1],
    [17, 5],
  ])('should render exactly %ix%i RGB pixels', async (width, height) => {
    const frame = await renderPlaceholderFrame(width, height);
    expect(frame.width).toBe(width);
    expect(frame.height).toBe(height);
    expect(frame.channels).toBe(3);
    expect(frame.data.length).toBe(width * height * 3);
  });
});
