/**
 * Surfaces and the patterns painted from them.
 */

export { RgbaSurface, type Surface } from './RgbaSurface.js';
export {
  createSurfacePattern,
  defaultPatternBuilder,
  type SurfacePattern,
  type PatternBuilder,
  type PatternFilter,
  type PatternExtend,
} from './SurfacePattern.js';
