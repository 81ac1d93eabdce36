import { describe, it, expect } from 'vitest';
import { PNG } from 'pngjs';
import jpeg from 'jpeg-js';
import { RasterDecoder } from '../../src/utils/ImageDecoder.js';
import { RgbaSurface } from '../../src/rendering/RgbaSurface.js';
import { DecodeError, SizeRejectedError } from '../../src/core/errors.js';
import { createRecordingLogger } from '../helpers/fakes.js';

function solidPng(width: number, height: number, rgba: [number, number, number, number]): Uint8Array {
  const png = new PNG({ width, height });
  for (let i = 0; i < width * height; i++) {
    png.data.set(rgba, i * 4);
  }
  return PNG.sync.write(png);
}

const SVG = Buffer.from(
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
    '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="20" viewBox="0 0 10 20">' +
    '<rect width="10" height="20" fill="#ff0000"/></svg>'
);

function createDecoder(maxPixels?: number): RasterDecoder {
  return new RasterDecoder({ logger: createRecordingLogger(), maxPixels });
}

describe('RasterDecoder', () => {
  describe('detectFormat', () => {
    it('should detect formats from magic bytes', () => {
      const decoder = createDecoder();

      expect(decoder.detectFormat(solidPng(1, 1, [0, 0, 0, 255]))).toBe('png');
      expect(decoder.detectFormat(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg');
      expect(decoder.detectFormat(Buffer.from('GIF89a'))).toBe('gif');
      expect(decoder.detectFormat(SVG)).toBe('svg');
      expect(decoder.detectFormat(Buffer.from('plain text'))).toBe('unknown');
      expect(decoder.detectFormat(new Uint8Array([1, 2]))).toBe('unknown');
    });
  });

  describe('png', () => {
    it('should decode at natural size', () => {
      const { surface, format } = createDecoder().decode(solidPng(4, 2, [10, 20, 30, 255]));

      expect(format).toBe('png');
      expect([surface.width, surface.height]).toEqual([4, 2]);
      expect(surface instanceof RgbaSurface ? surface.pixelAt(3, 1) : undefined).toEqual([10, 20, 30, 255]);
    });

    it('should resample to a target size', () => {
      const { surface } = createDecoder().decode(solidPng(4, 2, [10, 20, 30, 255]), 8, 6);

      expect([surface.width, surface.height]).toEqual([8, 6]);
      expect(surface instanceof RgbaSurface ? surface.pixelAt(7, 5) : undefined).toEqual([10, 20, 30, 255]);
    });

    it('should follow the aspect ratio when one dimension is given', () => {
      const decoder = createDecoder();

      const byWidth = decoder.decode(solidPng(4, 2, [0, 0, 0, 255]), 8).surface;
      const byHeight = decoder.decode(solidPng(4, 2, [0, 0, 0, 255]), undefined, 1).surface;

      expect([byWidth.width, byWidth.height]).toEqual([8, 4]);
      expect([byHeight.width, byHeight.height]).toEqual([2, 1]);
    });

    it('should reject targets over the pixel budget', () => {
      const decoder = createDecoder(16);
      const bytes = solidPng(4, 2, [0, 0, 0, 255]);

      expect(() => decoder.decode(bytes, 8, 4)).toThrow(SizeRejectedError);
      expect(decoder.decode(bytes).surface.width).toBe(4);
    });

    it('should wrap corrupt data in a DecodeError', () => {
      const corrupt = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0]);

      expect(() => createDecoder().decode(corrupt)).toThrow(DecodeError);
    });
  });

  describe('jpeg', () => {
    function solidJpeg(width: number, height: number): Uint8Array {
      const data = new Uint8Array(width * height * 4).fill(128);
      return jpeg.encode({ data, width, height }, 90).data;
    }

    it('should decode at natural size with opaque alpha', () => {
      const { surface, format } = createDecoder().decode(solidJpeg(8, 4));

      expect(format).toBe('jpeg');
      expect([surface.width, surface.height]).toEqual([8, 4]);
      expect(surface instanceof RgbaSurface ? surface.pixelAt(7, 3)[3] : undefined).toBe(255);
    });

    it('should resample to a target size', () => {
      const { surface } = createDecoder().decode(solidJpeg(8, 4), 4);

      expect([surface.width, surface.height]).toEqual([4, 2]);
    });

    it('should wrap corrupt data in a DecodeError', () => {
      expect(() => createDecoder().decode(new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0, 0]))).toThrow(DecodeError);
    });
  });

  describe('svg', () => {
    it('should read the intrinsic size', () => {
      const { surface, format } = createDecoder().decode(SVG);

      expect(format).toBe('svg');
      expect([surface.width, surface.height]).toEqual([10, 20]);
    });

    it('should rasterize at the target size', () => {
      const { surface } = createDecoder().decode(SVG, 20, 40);

      expect([surface.width, surface.height]).toEqual([20, 40]);
      expect(surface instanceof RgbaSurface ? surface.pixelAt(10, 20) : undefined).toEqual([255, 0, 0, 255]);
    });
  });

  it('should refuse unsupported formats', () => {
    expect(() => createDecoder().decode(new Uint8Array([0x42, 0x4d, 0, 0, 0, 0]))).toThrow(
      'Unsupported image format: bmp'
    );
  });
});
