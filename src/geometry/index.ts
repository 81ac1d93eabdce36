/**
 * Geometry module for pattern matrices.
 */

export { TransformMatrix, composePatternMatrix, ROTATION_EPSILON } from './TransformMatrix.js';
