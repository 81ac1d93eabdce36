/**
 * Type definitions for iconimg.
 */

// Options and configuration
export type { LogLevel, ImageHandleOptions, ResourceLoaderOptions } from './options.js';
export {
  DEFAULT_LOADER_OPTIONS,
  resourceLoaderOptionsSchema,
  parseResourceLoaderOptions,
} from './options.js';

// Geometry
export type { Point, Size, Transform2D } from './geometry.js';
export { IDENTITY_TRANSFORM } from './geometry.js';
