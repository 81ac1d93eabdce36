import { readFileSync } from 'node:fs';
import { parse } from 'node:path';
import type { Size } from '../types/geometry.js';
import type { ImageHandleOptions } from '../types/options.js';
import type { ImageDecoder } from '../utils/ImageDecoder.js';
import { createImageDecoder } from '../utils/ImageDecoder.js';
import type { Surface } from '../rendering/RgbaSurface.js';
import type { PatternBuilder, SurfacePattern } from '../rendering/SurfacePattern.js';
import { defaultPatternBuilder } from '../rendering/SurfacePattern.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { ArgumentError, SizeRejectedError } from './errors.js';
import { DerivedCache, type CacheState } from './DerivedCache.js';

/**
 * Values an ImageHandle derives lazily from its bytes.
 */
export type DerivedField = 'surface' | 'pattern';

/**
 * Attributes whose writes invalidate derived values.
 */
export type TransformAttribute = 'width' | 'height' | 'theta';

/**
 * Which derived values each attribute write discards.
 */
export const INVALIDATION_EDGES: Readonly<Record<TransformAttribute, readonly DerivedField[]>> = {
  width: ['surface', 'pattern'],
  height: ['surface', 'pattern'],
  theta: ['pattern'],
};

/**
 * Derived values built from another derived value; they go when their source goes.
 */
const DEPENDENTS: Readonly<Record<DerivedField, readonly DerivedField[]>> = {
  surface: ['pattern'],
  pattern: [],
};

/** Dependents first, so a pattern never outlives the surface it paints */
const TEARDOWN_ORDER: readonly DerivedField[] = ['pattern', 'surface'];

/** Nearest integer, ties to even */
function roundHalfEven(value: number): number {
  const rounded = Math.round(value);
  return Math.abs(value % 1) === 0.5 && rounded % 2 !== 0 ? rounded - 1 : rounded;
}

/**
 * One decimal place, ties to even. `toFixed` already rounds from the exact
 * binary value, so only exact ties (x.25, x.75) need handling.
 */
function formatTenths(value: number): string {
  const exactTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  return exactTie ? (roundHalfEven(value * 10) / 10).toFixed(1) : value.toFixed(1);
}

function toPixelSize(attribute: 'width' | 'height', value: number): number {
  if (!Number.isFinite(value)) {
    throw new ArgumentError(`${attribute} must be a finite number, got ${value}`);
  }
  return Math.max(roundHalfEven(value), 1);
}

function assertFactor(label: string, factor: number | undefined): void {
  if (factor !== undefined && !(Number.isFinite(factor) && factor > 0)) {
    throw new ArgumentError(`${label} must be a positive number, got ${factor}`);
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a.buffer, a.byteOffset, a.byteLength).equals(b);
}

/**
 * Scaled and rotated view of one encoded image.
 *
 * `width`, `height` and `theta` are plain attributes; the decoded surface
 * and the pattern painted from it are built on first read and discarded
 * when an attribute they depend on changes. The image is stretched to
 * width x height first, then rotated `theta` degrees counter-clockwise
 * about its centre.
 *
 * @example
 * const icon = ImageHandle.fromPath('/usr/share/icons/hicolor/scalable/apps/terminal.svg');
 * icon.resize(undefined, 24);
 * icon.theta = 90;
 * paint(icon.pattern);
 */
export class ImageHandle {
  readonly bytes: Uint8Array;
  readonly name: string;
  readonly path: string;

  private readonly decoder: ImageDecoder;
  private readonly patternBuilder: PatternBuilder;
  private readonly logger: ILogger;

  private natural: Readonly<Size> | undefined;
  private explicitWidth: number | undefined;
  private explicitHeight: number | undefined;
  private rotation = 0.0;

  private readonly caches: Record<DerivedField, DerivedCache<Surface> | DerivedCache<SurfacePattern>>;
  private readonly surfaceCache: DerivedCache<Surface>;
  private readonly patternCache: DerivedCache<SurfacePattern>;

  constructor(bytes: Uint8Array, options: ImageHandleOptions = {}) {
    this.bytes = bytes;
    this.name = options.name ?? '';
    this.path = options.path ?? '';
    this.logger = options.logger ?? createLogger('warn', 'ImageHandle');
    this.decoder = options.decoder ?? createImageDecoder(this.logger.child('Decoder'));
    this.patternBuilder = options.patternBuilder ?? defaultPatternBuilder;

    this.surfaceCache = new DerivedCache(
      () => this.decodeSurface(),
      (surface) => surface.finish()
    );
    this.patternCache = new DerivedCache(() =>
      this.patternBuilder.buildPattern(this.surface, this.width, this.height, this.theta)
    );
    this.caches = { surface: this.surfaceCache, pattern: this.patternCache };
  }

  /**
   * Creates a handle from a file, read synchronously in full.
   * The name is the file name without its final extension.
   */
  static fromPath(imagePath: string, options: Omit<ImageHandleOptions, 'name' | 'path'> = {}): ImageHandle {
    const bytes = readFileSync(imagePath);
    return new ImageHandle(bytes, { ...options, name: parse(imagePath).name, path: imagePath });
  }

  /**
   * Intrinsic size, from one decode without a target size.
   */
  get naturalSize(): Readonly<Size> {
    if (this.natural === undefined) {
      const { surface } = this.decoder.decode(this.bytes);
      this.natural = Object.freeze({ width: surface.width, height: surface.height });
      surface.finish();
    }
    return this.natural;
  }

  get width(): number {
    return this.explicitWidth ?? this.naturalSize.width;
  }

  set width(value: number) {
    this.explicitWidth = toPixelSize('width', value);
    this.invalidate(INVALIDATION_EDGES.width);
  }

  get height(): number {
    return this.explicitHeight ?? this.naturalSize.height;
  }

  set height(value: number) {
    this.explicitHeight = toPixelSize('height', value);
    this.invalidate(INVALIDATION_EDGES.height);
  }

  /**
   * Rotation in degrees, counter-clockwise.
   */
  get theta(): number {
    return this.rotation;
  }

  set theta(value: number) {
    const theta = Number(value);
    if (!Number.isFinite(theta)) {
      throw new ArgumentError(`theta must be a finite number, got ${value}`);
    }
    this.rotation = theta;
    this.invalidate(INVALIDATION_EDGES.theta);
  }

  /**
   * Resizes to absolute pixel dimensions. Giving one dimension keeps the
   * natural aspect ratio; giving both sets each independently.
   */
  resize(width?: number, height?: number): void {
    if (width === undefined && height === undefined) {
      throw new ArgumentError('You must supply either width or height');
    }
    const natural = this.naturalSize;
    const widthFactor = width === undefined ? undefined : width / natural.width;
    const heightFactor = height === undefined ? undefined : height / natural.height;

    this.scale(widthFactor, heightFactor, width === undefined || height === undefined);
  }

  /**
   * Scales relative to the natural size.
   *
   * With `lockAspectRatio`, exactly one factor may be given and the other
   * dimension follows the natural aspect ratio. Without it, a missing
   * factor means 1.
   */
  scale(widthFactor?: number, heightFactor?: number, lockAspectRatio = false): void {
    if (widthFactor === undefined && heightFactor === undefined) {
      throw new ArgumentError('You must supply widthFactor or heightFactor');
    }
    assertFactor('widthFactor', widthFactor);
    assertFactor('heightFactor', heightFactor);

    const size = lockAspectRatio
      ? this.scaleLocked(widthFactor, heightFactor)
      : this.scaleFree(widthFactor, heightFactor);

    this.width = size.width;
    this.height = size.height;
  }

  private scaleLocked(widthFactor: number | undefined, heightFactor: number | undefined): Size {
    if (widthFactor !== undefined && heightFactor !== undefined) {
      throw new ArgumentError(
        "Can't rescale with locked aspect ratio and give widthFactor and heightFactor: " +
          `${widthFactor}, ${heightFactor}`
      );
    }
    const { width: width0, height: height0 } = this.naturalSize;
    if (widthFactor !== undefined) {
      const width = width0 * widthFactor;
      return { width, height: (height0 / width0) * width };
    }
    const height = height0 * (heightFactor ?? 1);
    return { width: (width0 / height0) * height, height };
  }

  private scaleFree(widthFactor: number | undefined, heightFactor: number | undefined): Size {
    const { width: width0, height: height0 } = this.naturalSize;
    return {
      width: width0 * (widthFactor ?? 1),
      height: height0 * (heightFactor ?? 1),
    };
  }

  /**
   * Surface decoded at the current width and height.
   */
  get surface(): Surface {
    return this.surfaceCache.get();
  }

  /**
   * Pattern for the current width, height and theta.
   */
  get pattern(): SurfacePattern {
    return this.patternCache.get();
  }

  private decodeSurface(): Surface {
    const width = this.width;
    const height = this.height;
    try {
      return this.decoder.decode(this.bytes, width, height).surface;
    } catch (error) {
      if (!(error instanceof SizeRejectedError)) {
        throw error;
      }
      this.logger.warn(
        "Couldn't load image at specified width and height. Falling back to image scaling in the pattern.",
        { name: this.name, width, height, reason: error.message }
      );
      return this.decoder.decode(this.bytes).surface;
    }
  }

  /**
   * Discards derived values. Discarding the surface also discards the
   * pattern built from it; surfaces are finished as they are dropped.
   */
  invalidate(fields: readonly DerivedField[]): void {
    const doomed = new Set<DerivedField>();
    const visit = (field: DerivedField): void => {
      if (doomed.has(field)) return;
      doomed.add(field);
      DEPENDENTS[field].forEach(visit);
    };
    fields.forEach(visit);

    for (const field of TEARDOWN_ORDER) {
      if (doomed.has(field) && this.caches[field].invalidate()) {
        this.logger.debug('Invalidated derived value', { name: this.name, field });
      }
    }
  }

  cacheState(field: DerivedField): CacheState {
    return this.caches[field].state;
  }

  /**
   * Releases the surface and drops the pattern.
   */
  dispose(): void {
    this.invalidate(['surface', 'pattern']);
  }

  /**
   * Equal when bytes, theta, width and height match; name and path are ignored.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof ImageHandle)) {
      return false;
    }
    return (
      bytesEqual(this.bytes, other.bytes) &&
      this.theta === other.theta &&
      this.width === other.width &&
      this.height === other.height
    );
  }

  toString(): string {
    return `<ImageHandle: '${this.name}', ${this.width}x${this.height}@${formatTenths(this.theta)}deg, '${this.path}'>`;
  }
}
