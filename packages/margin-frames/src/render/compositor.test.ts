/**
 * Tests for raster concatenation and captions
 */

import { describe, it, expect } from 'vitest';
import { composeFrame, concatRasters, drawCaption } from './compositor.js';
import { Raster } from './raster.js';
import { RasterReleasedError } from '../core/errors.js';

function pixelAt(raster: Raster, x: number, y: number): [number, number, number, number] {
  const data = raster.pixels();
  const offset = (y * raster.width + x) * 4;
  return [data[offset] ?? -1, data[offset + 1] ?? -1, data[offset + 2] ?? -1, data[offset + 3] ?? -1];
}

describe('concatRasters', () => {
  it('should produce (w1 + w2) x max(h1, h2)', () => {
    const sizes: Array<[number, number, number, number]> = [
      [40, 30, 20, 50],
      [10, 10, 10, 10],
      [64, 80, 32, 16],
    ];

    for (const [w1, h1, w2, h2] of sizes) {
      const combined = concatRasters([
        Raster.create(w1, h1, 'left', '#FF0000'),
        Raster.create(w2, h2, 'right', '#0000FF'),
      ]);

      expect(combined.width).toBe(w1 + w2);
      expect(combined.height).toBe(Math.max(h1, h2));
    }
  });

  it('should paste left to right, top-aligned, over the background', () => {
    const combined = concatRasters(
      [Raster.create(4, 2, 'left', '#FF0000'), Raster.create(3, 5, 'right', '#0000FF')],
      { background: '#00FF00' }
    );

    expect(pixelAt(combined, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(combined, 4, 4)).toEqual([0, 0, 255, 255]);
    // below the shorter left image
    expect(pixelAt(combined, 1, 3)).toEqual([0, 255, 0, 255]);
  });

  it('should default the background to black', () => {
    const combined = concatRasters([Raster.create(2, 1, 'a', '#FFFFFF'), Raster.create(2, 3, 'b', '#FFFFFF')]);

    expect(pixelAt(combined, 0, 2)).toEqual([0, 0, 0, 255]);
  });

  it('should release its inputs unless asked not to', () => {
    const left = Raster.create(2, 2, 'left');
    const right = Raster.create(2, 2, 'right');
    concatRasters([left, right]);

    expect(left.released).toBe(true);
    expect(() => right.surface()).toThrow(RasterReleasedError);

    const kept = Raster.create(2, 2, 'kept');
    concatRasters([kept], { release: false });
    expect(kept.released).toBe(false);
  });
});

describe('drawCaption', () => {
  it('should draw in place below its top-left position', () => {
    const raster = Raster.create(200, 60, 'caption', '#FFFFFF');
    const result = drawCaption(raster, 'Northmark, 2000', {
      fontFamily: 'sans-serif',
      size: 40,
      fill: '#000000',
      position: { x: 10, y: 10 },
    });

    expect(result).toBe(raster);
    const data = raster.pixels();
    // Rows above the text box stay background
    for (let i = 0; i < 8 * raster.width * 4; i++) {
      expect(data[i]).toBe(255);
    }
  });
});

describe('composeFrame', () => {
  it('should release map and chart and keep the combined size', () => {
    const map = Raster.create(30, 30, 'map', '#FFFFFF');
    const chart = Raster.create(20, 30, 'chart', '#FFFFFF');
    const frame = composeFrame(map, chart, 'Southvale, 2004', {
      fontFamily: 'sans-serif',
      size: 10,
      fill: '#000000',
      position: { x: 0, y: 0 },
    });

    expect([frame.width, frame.height]).toEqual([50, 30]);
    expect(frame.label).toBe('Southvale, 2004');
    expect(map.released && chart.released).toBe(true);
  });
});
