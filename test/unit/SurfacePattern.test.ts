import { describe, it, expect } from 'vitest';
import { createSurfacePattern } from '../../src/rendering/SurfacePattern.js';
import { RgbaSurface } from '../../src/rendering/RgbaSurface.js';

describe('createSurfacePattern', () => {
  it('should scale the surface into the target frame', () => {
    const surface = new RgbaSurface(10, 10);

    const pattern = createSurfacePattern(surface, 20, 40);

    expect(pattern.matrix.toArray()).toEqual([0.5, 0, 0, 0.25, 0, 0]);
    expect(pattern.sourcePoint({ x: 20, y: 40 })).toEqual({ x: 10, y: 10 });
    expect(pattern.filter).toBe('best');
    expect(pattern.extend).toBe('none');
    expect(pattern.theta).toBe(0);
  });

  it('should be frozen', () => {
    const pattern = createSurfacePattern(new RgbaSurface(2, 2), 2, 2, 30);

    expect(Object.isFrozen(pattern)).toBe(true);
    expect(pattern.surface.width).toBe(2);
  });
});

describe('RgbaSurface', () => {
  it('should release its pixels when finished', () => {
    const surface = new RgbaSurface(2, 1, new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]));

    expect(surface.pixelAt(1, 0)).toEqual([5, 6, 7, 8]);
    expect(surface.pixelAt(2, 0)).toEqual([0, 0, 0, 0]);

    surface.finish();
    surface.finish();

    expect(surface.finished).toBe(true);
    expect(() => surface.data).toThrow('Surface 2x1 has been finished');
  });

  it('should reject a buffer of the wrong length', () => {
    expect(() => new RgbaSurface(2, 2, new Uint8Array(4))).toThrow(RangeError);
  });
});
