/**
 * Decoded bitmap owned by an image handle.
 * Pixels are 8-bit RGBA, row-major.
 */
export interface Surface {
  readonly width: number;
  readonly height: number;
  /** Pixel data; throws once the surface is finished */
  readonly data: Uint8Array;
  readonly finished: boolean;
  /** Releases the pixel buffer. Safe to call more than once. */
  finish(): void;
}

/**
 * In-memory RGBA surface.
 */
export class RgbaSurface implements Surface {
  readonly width: number;
  readonly height: number;
  private pixels: Uint8Array | null;

  constructor(width: number, height: number, data?: Uint8Array) {
    const expected = width * height * 4;
    if (data && data.length !== expected) {
      throw new RangeError(
        `Pixel buffer holds ${data.length} bytes, expected ${expected} for ${width}x${height}`
      );
    }
    this.width = width;
    this.height = height;
    this.pixels = data ?? new Uint8Array(expected);
  }

  get data(): Uint8Array {
    if (this.pixels === null) {
      throw new Error(`Surface ${this.width}x${this.height} has been finished`);
    }
    return this.pixels;
  }

  get finished(): boolean {
    return this.pixels === null;
  }

  finish(): void {
    this.pixels = null;
  }

  /**
   * Reads one pixel as [r, g, b, a]; coordinates outside the surface read as transparent.
   */
  pixelAt(x: number, y: number): [number, number, number, number] {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return [0, 0, 0, 0];
    }
    const data = this.data;
    const offset = (y * this.width + x) * 4;
    return [data[offset], data[offset + 1], data[offset + 2], data[offset + 3]];
  }
}
