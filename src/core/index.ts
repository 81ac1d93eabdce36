/**
 * Core module: image handles, name resolution and errors.
 */

export {
  ImageHandle,
  INVALIDATION_EDGES,
  type DerivedField,
  type TransformAttribute,
} from './ImageHandle.js';
export { ResourceLoader, toQuery } from './ResourceLoader.js';
export { DerivedCache, type CacheState } from './DerivedCache.js';
export {
  IconImageError,
  ArgumentError,
  LoadingError,
  DecodeError,
  SizeRejectedError,
  ConfigurationError,
  type IconImageErrorCode,
} from './errors.js';
