/**
 * Affine matrices for surface patterns.
 *
 * Matrices follow the cairo convention used by pattern backends:
 *   x' = a*x + c*y + e
 *   y' = b*x + d*y + f
 * A pattern matrix maps device (user) coordinates into the pattern's source
 * space, so scaling a pattern up means scaling its matrix down.
 */

import type { Point, Size, Transform2D } from '../types/geometry.js';
import { IDENTITY_TRANSFORM } from '../types/geometry.js';

/** Rotations smaller than this many degrees are treated as none */
export const ROTATION_EPSILON = 1e-6;

/**
 * Immutable 2D affine transform.
 */
export class TransformMatrix implements Transform2D {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
  readonly e: number;
  readonly f: number;

  constructor(a = 1, b = 0, c = 0, d = 1, e = 0, f = 0) {
    this.a = a;
    this.b = b;
    this.c = c;
    this.d = d;
    this.e = e;
    this.f = f;
  }

  static identity(): TransformMatrix {
    return TransformMatrix.from(IDENTITY_TRANSFORM);
  }

  static from(transform: Transform2D): TransformMatrix {
    return new TransformMatrix(transform.a, transform.b, transform.c, transform.d, transform.e, transform.f);
  }

  static scaling(sx: number, sy: number = sx): TransformMatrix {
    return new TransformMatrix(sx, 0, 0, sy, 0, 0);
  }

  static translation(tx: number, ty: number): TransformMatrix {
    return new TransformMatrix(1, 0, 0, 1, tx, ty);
  }

  /**
   * Rotation by `radians`, positive from the x axis towards the y axis.
   */
  static rotation(radians: number): TransformMatrix {
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    return new TransformMatrix(cos, sin, -sin, cos, 0, 0);
  }

  /**
   * Composes two transforms: the result applies `this` first, then `other`.
   */
  multiply(other: Transform2D): TransformMatrix {
    return new TransformMatrix(
      this.a * other.a + this.b * other.c,
      this.a * other.b + this.b * other.d,
      this.c * other.a + this.d * other.c,
      this.c * other.b + this.d * other.d,
      this.e * other.a + this.f * other.c + other.e,
      this.e * other.b + this.f * other.d + other.f
    );
  }

  transformPoint(point: Point): Point {
    return {
      x: this.a * point.x + this.c * point.y + this.e,
      y: this.b * point.x + this.d * point.y + this.f,
    };
  }

  determinant(): number {
    return this.a * this.d - this.b * this.c;
  }

  /**
   * @throws RangeError if the matrix is singular
   */
  invert(): TransformMatrix {
    const det = this.determinant();
    if (det === 0 || !Number.isFinite(det)) {
      throw new RangeError('Matrix is not invertible');
    }
    return new TransformMatrix(
      this.d / det,
      -this.b / det,
      -this.c / det,
      this.a / det,
      (this.c * this.f - this.d * this.e) / det,
      (this.b * this.e - this.a * this.f) / det
    );
  }

  isIdentity(): boolean {
    return this.equals(IDENTITY_TRANSFORM);
  }

  equals(other: Transform2D, tolerance = 0): boolean {
    return (
      Math.abs(this.a - other.a) <= tolerance &&
      Math.abs(this.b - other.b) <= tolerance &&
      Math.abs(this.c - other.c) <= tolerance &&
      Math.abs(this.d - other.d) <= tolerance &&
      Math.abs(this.e - other.e) <= tolerance &&
      Math.abs(this.f - other.f) <= tolerance
    );
  }

  toArray(): [number, number, number, number, number, number] {
    return [this.a, this.b, this.c, this.d, this.e, this.f];
  }

  toString(): string {
    return `TransformMatrix(${this.toArray().join(', ')})`;
  }
}

/**
 * Builds the matrix that paints a `source` sized surface into a `target`
 * sized frame, rotated `thetaDegrees` about the frame's centre.
 *
 * The image is stretched first and then rotated; in matrix terms the
 * rotation acts on device coordinates before the scale maps them into
 * source space. The pivot is the centre of the resized image, so the
 * rotation does not depend on the scale factor.
 */
export function composePatternMatrix(source: Size, target: Size, thetaDegrees: number): TransformMatrix {
  const scale = TransformMatrix.scaling(source.width / target.width, source.height / target.height);

  if (Math.abs(thetaDegrees) < ROTATION_EPSILON) {
    return scale;
  }

  const radians = (thetaDegrees * Math.PI) / 180;
  const cx = target.width / 2;
  const cy = target.height / 2;

  // https://cairographics.org/cookbook/transform_about_point/
  const rotation = TransformMatrix.translation(-cx, -cy)
    .multiply(TransformMatrix.rotation(radians))
    .multiply(TransformMatrix.translation(cx, cy));

  return rotation.multiply(scale);
}
