/**
 * iconimg - lazy icon image transforms
 *
 * Scaled and rotated surface patterns that are re-derived only when their
 * inputs change, plus icon lookup across prioritised directories.
 */

// Main entry points
export { ImageHandle, ResourceLoader, toQuery, INVALIDATION_EDGES } from './core/index.js';
export type { DerivedField, TransformAttribute, CacheState } from './core/index.js';
export { DerivedCache } from './core/index.js';

// Errors
export {
  IconImageError,
  ArgumentError,
  LoadingError,
  DecodeError,
  SizeRejectedError,
  ConfigurationError,
} from './core/index.js';
export type { IconImageErrorCode } from './core/index.js';

// Types - Options and geometry
export type {
  LogLevel,
  ImageHandleOptions,
  ResourceLoaderOptions,
  Point,
  Size,
  Transform2D,
} from './types/index.js';
export {
  DEFAULT_LOADER_OPTIONS,
  parseResourceLoaderOptions,
  IDENTITY_TRANSFORM,
} from './types/index.js';

// Geometry
export { TransformMatrix, composePatternMatrix, ROTATION_EPSILON } from './geometry/index.js';

// Rendering boundary
export { RgbaSurface, createSurfacePattern, defaultPatternBuilder } from './rendering/index.js';
export type {
  Surface,
  SurfacePattern,
  PatternBuilder,
  PatternFilter,
  PatternExtend,
} from './rendering/index.js';

// Decoding and scanning boundaries
export {
  RasterDecoder,
  createImageDecoder,
  DEFAULT_MAX_PIXELS,
  scanFiles,
  fileScanner,
  expandHome,
  WILDCARD_EXTENSION,
} from './utils/index.js';
export type {
  ImageDecoder,
  ImageFormat,
  DecodeResult,
  RasterDecoderConfig,
  DirectoryScanner,
} from './utils/index.js';

// Logger
export { createLogger, Logger } from './utils/Logger.js';
export type { ILogger, LogEntry, LogSink } from './utils/Logger.js';
