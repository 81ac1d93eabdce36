/**
 * Paintable pattern pairing a decoded surface with its placement matrix.
 */

import type { Point } from '../types/geometry.js';
import { composePatternMatrix, TransformMatrix } from '../geometry/TransformMatrix.js';
import type { Surface } from './RgbaSurface.js';

/**
 * Sampling filter requested from the paint backend.
 */
export type PatternFilter = 'fast' | 'good' | 'best' | 'nearest' | 'bilinear';

/**
 * How the backend treats area outside the surface.
 */
export type PatternExtend = 'none' | 'repeat' | 'reflect' | 'pad';

/**
 * A surface plus the device-to-source matrix for painting it at
 * width x height, rotated theta degrees about its centre.
 * Consumers treat it as read-only.
 */
export interface SurfacePattern {
  readonly surface: Surface;
  readonly matrix: TransformMatrix;
  readonly filter: PatternFilter;
  readonly extend: PatternExtend;
  readonly width: number;
  readonly height: number;
  readonly theta: number;
  /** Maps a device-space point into surface coordinates */
  sourcePoint(point: Point): Point;
}

/**
 * Pattern/paint boundary used by image handles.
 */
export interface PatternBuilder {
  buildPattern(surface: Surface, width: number, height: number, theta: number): SurfacePattern;
}

/**
 * Builds the default pattern for a surface.
 */
export function createSurfacePattern(
  surface: Surface,
  width: number,
  height: number,
  theta = 0
): SurfacePattern {
  const matrix = composePatternMatrix(
    { width: surface.width, height: surface.height },
    { width, height },
    theta
  );

  const pattern: SurfacePattern = {
    surface,
    matrix,
    filter: 'best',
    extend: 'none',
    width,
    height,
    theta,
    sourcePoint: (point: Point) => matrix.transformPoint(point),
  };
  return Object.freeze(pattern);
}

/**
 * PatternBuilder backed by createSurfacePattern.
 */
export const defaultPatternBuilder: PatternBuilder = {
  buildPattern: createSurfacePattern,
};
