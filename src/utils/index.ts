export { Logger, createLogger, consoleSink, formatLogEntry } from './Logger.js';
export type { ILogger, LogEntry, LogSink } from './Logger.js';

export {
  RasterDecoder,
  createImageDecoder,
  DEFAULT_MAX_PIXELS,
  type ImageDecoder,
  type ImageFormat,
  type DecodeResult,
  type RasterDecoderConfig,
} from './ImageDecoder.js';

export {
  scanFiles,
  fileScanner,
  expandHome,
  isWildcardQuery,
  WILDCARD_EXTENSION,
  type DirectoryScanner,
} from './scanFiles.js';

export { resampleRgba } from './resample.js';
