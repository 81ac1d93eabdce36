/**
 * 2D point in coordinate space.
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Size with width and height.
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * 2D affine transform matrix.
 * Stored as [a, b, c, d, e, f] representing:
 * | a c e |
 * | b d f |
 * | 0 0 1 |
 */
export interface Transform2D {
  /** Scale X and rotation component */
  a: number;
  /** Rotation component */
  b: number;
  /** Rotation component */
  c: number;
  /** Scale Y and rotation component */
  d: number;
  /** Translate X */
  e: number;
  /** Translate Y */
  f: number;
}

/**
 * Identity transform (no transformation).
 */
export const IDENTITY_TRANSFORM: Readonly<Transform2D> = {
  a: 1,
  b: 0,
  c: 0,
  d: 1,
  e: 0,
  f: 0,
};
