/**
 * Decodes encoded image bytes into RGBA surfaces, optionally at a target size.
 * PNG, JPEG and GIF are resampled from their natural size; SVG is rasterized
 * directly at the target size.
 */

import { PNG } from 'pngjs';
import { GifReader } from 'omggif';
import jpeg from 'jpeg-js';
import { Resvg } from '@resvg/resvg-js';
import type { Size } from '../types/geometry.js';
import { RgbaSurface, type Surface } from '../rendering/RgbaSurface.js';
import { DecodeError, SizeRejectedError } from '../core/errors.js';
import { resampleRgba } from './resample.js';
import type { ILogger } from './Logger.js';
import { createLogger } from './Logger.js';

/**
 * Formats recognised by signature.
 */
export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'bmp' | 'webp' | 'svg' | 'unknown';

/**
 * Result of decoding an image.
 */
export interface DecodeResult {
  surface: Surface;
  format: ImageFormat;
}

/**
 * Decoder boundary used by image handles.
 *
 * With no target size the surface has the image's natural size. With only
 * one of width/height, the other follows the natural aspect ratio.
 * Implementations throw SizeRejectedError when they will not honour the
 * requested size; any other error is a hard failure.
 */
export interface ImageDecoder {
  decode(bytes: Uint8Array, width?: number, height?: number): DecodeResult;
}

/**
 * Configuration for RasterDecoder.
 */
export interface RasterDecoderConfig {
  /** Logger instance */
  logger?: ILogger;
  /**
   * Largest target area, in pixels, the decoder agrees to produce.
   * @default 16777216 (4096 x 4096)
   */
  maxPixels?: number;
}

export const DEFAULT_MAX_PIXELS = 4096 * 4096;

/**
 * Image signature bytes for format detection.
 */
const IMAGE_SIGNATURES = {
  png: [0x89, 0x50, 0x4e, 0x47],  // .PNG
  jpeg: [0xff, 0xd8, 0xff],       // JPEG SOI marker
  gif: [0x47, 0x49, 0x46],        // GIF
  bmp: [0x42, 0x4d],              // BM
  webp: [0x52, 0x49, 0x46, 0x46], // RIFF (WebP container)
} as const;

/** Formats decoded to pixels at natural size and then resampled */
type RasterFormat = 'png' | 'jpeg' | 'gif';

/** How far into a text file to look for an <svg> root */
const SVG_SNIFF_BYTES = 1024;

/**
 * Default decoder backed by pngjs, jpeg-js, omggif and resvg.
 */
export class RasterDecoder implements ImageDecoder {
  private readonly logger: ILogger;
  private readonly maxPixels: number;

  constructor(config: RasterDecoderConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'RasterDecoder');
    this.maxPixels = config.maxPixels ?? DEFAULT_MAX_PIXELS;
  }

  /**
   * Detects the image format from the buffer's magic bytes.
   */
  detectFormat(bytes: Uint8Array): ImageFormat {
    if (bytes.length < 4) {
      return 'unknown';
    }
    if (this.matchesSignature(bytes, IMAGE_SIGNATURES.png)) {
      return 'png';
    }
    if (this.matchesSignature(bytes, IMAGE_SIGNATURES.jpeg)) {
      return 'jpeg';
    }
    if (this.matchesSignature(bytes, IMAGE_SIGNATURES.gif)) {
      return 'gif';
    }
    if (this.matchesSignature(bytes, IMAGE_SIGNATURES.bmp)) {
      return 'bmp';
    }
    if (
      this.matchesSignature(bytes, IMAGE_SIGNATURES.webp) &&
      bytes.length >= 12 &&
      bytes[8] === 0x57 && // W
      bytes[9] === 0x45 && // E
      bytes[10] === 0x42 && // B
      bytes[11] === 0x50   // P
    ) {
      return 'webp';
    }

    const head = new TextDecoder('utf-8', { fatal: false })
      .decode(bytes.subarray(0, SVG_SNIFF_BYTES))
      .replace(/^\uFEFF/, '')
      .trimStart();
    if (head.startsWith('<') && head.includes('<svg')) {
      return 'svg';
    }

    return 'unknown';
  }

  private matchesSignature(bytes: Uint8Array, signature: readonly number[]): boolean {
    if (bytes.length < signature.length) {
      return false;
    }
    for (let i = 0; i < signature.length; i++) {
      if (bytes[i] !== signature[i]) {
        return false;
      }
    }
    return true;
  }

  /**
   * Decodes bytes to a surface.
   *
   * @throws SizeRejectedError if the target area exceeds maxPixels
   * @throws DecodeError if the format is unsupported or the data is corrupt
   */
  decode(bytes: Uint8Array, width?: number, height?: number): DecodeResult {
    const format = this.detectFormat(bytes);

    this.logger.debug('Decoding image', {
      format,
      size: bytes.length,
      width,
      height,
    });

    switch (format) {
      case 'png':
      case 'jpeg':
      case 'gif':
        return { surface: this.decodeRaster(format, bytes, width, height), format };
      case 'svg':
        return { surface: this.decodeSvg(bytes, width, height), format };
      default:
        throw new DecodeError(`Unsupported image format: ${format}`);
    }
  }

  private decodeRaster(
    format: RasterFormat,
    bytes: Uint8Array,
    width: number | undefined,
    height: number | undefined
  ): Surface {
    const natural = this.readPixels(format, bytes);
    const target = this.resolveTarget(natural, width, height);
    const pixels = resampleRgba(natural.rgba, natural.width, natural.height, target.width, target.height);

    this.logger.debug('Image decoded successfully', {
      format,
      naturalWidth: natural.width,
      naturalHeight: natural.height,
      width: target.width,
      height: target.height,
    });

    return new RgbaSurface(target.width, target.height, pixels);
  }

  private readPixels(format: RasterFormat, bytes: Uint8Array): Size & { rgba: Uint8Array } {
    const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    try {
      if (format === 'png') {
        const png = PNG.sync.read(buffer);
        return { width: png.width, height: png.height, rgba: new Uint8Array(png.data) };
      }
      if (format === 'jpeg') {
        const image = jpeg.decode(buffer, { useTArray: true, formatAsRGBA: true });
        return { width: image.width, height: image.height, rgba: image.data };
      }
      const reader = new GifReader(buffer);
      const rgba = new Uint8Array(reader.width * reader.height * 4);
      reader.decodeAndBlitFrameRGBA(0, rgba);
      return { width: reader.width, height: reader.height, rgba };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to decode image', { format, size: bytes.length, error: message });
      throw new DecodeError(`Failed to decode ${format} image: ${message}`, { cause: error });
    }
  }

  private decodeSvg(bytes: Uint8Array, width: number | undefined, height: number | undefined): Surface {
    const svg = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    try {
      const intrinsic = new Resvg(svg, { font: { loadSystemFonts: false } });
      const natural = {
        width: Math.max(Math.round(intrinsic.width), 1),
        height: Math.max(Math.round(intrinsic.height), 1),
      };
      const target = this.resolveTarget(natural, width, height);

      const renderer = new Resvg(svg, {
        fitTo: { mode: 'width', value: target.width },
        font: { loadSystemFonts: false },
      });
      const rendered = renderer.render();
      const pixels = resampleRgba(
        new Uint8Array(rendered.pixels),
        rendered.width,
        rendered.height,
        target.width,
        target.height
      );

      this.logger.debug('SVG rasterized', { width: target.width, height: target.height });

      return new RgbaSurface(target.width, target.height, pixels);
    } catch (error) {
      if (error instanceof SizeRejectedError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to rasterize SVG', { size: bytes.length, error: message });
      throw new DecodeError(`Failed to decode svg image: ${message}`, { cause: error });
    }
  }

  /**
   * Works out the output size and enforces the pixel budget.
   */
  private resolveTarget(natural: Size, width: number | undefined, height: number | undefined): Size {
    if (width === undefined && height === undefined) {
      return natural;
    }

    let target: Size;
    if (width !== undefined && height !== undefined) {
      target = { width, height };
    } else if (width !== undefined) {
      target = { width, height: (natural.height * width) / natural.width };
    } else {
      const h = height ?? natural.height;
      target = { width: (natural.width * h) / natural.height, height: h };
    }

    const resolved = {
      width: Math.max(Math.round(target.width), 1),
      height: Math.max(Math.round(target.height), 1),
    };
    if (resolved.width * resolved.height > this.maxPixels) {
      throw new SizeRejectedError(
        `Target size ${resolved.width}x${resolved.height} exceeds the ${this.maxPixels} pixel budget`,
        resolved.width,
        resolved.height
      );
    }
    return resolved;
  }
}

/**
 * Creates a RasterDecoder instance.
 */
export function createImageDecoder(logger?: ILogger): RasterDecoder {
  return new RasterDecoder({ logger });
}
