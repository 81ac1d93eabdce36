import { z } from 'zod';
import type { ILogger } from '../utils/Logger.js';
import type { ImageDecoder } from '../utils/ImageDecoder.js';
import type { PatternBuilder } from '../rendering/SurfacePattern.js';
import type { DirectoryScanner } from '../utils/scanFiles.js';
import { ConfigurationError } from '../core/errors.js';

/**
 * Logging level for diagnostic output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Options for a single image handle.
 */
export interface ImageHandleOptions {
  /** Display name, usually the file name without its extension */
  name?: string;
  /** File the bytes were read from */
  path?: string;
  /**
   * Decoder used for natural size and surfaces.
   * @default new RasterDecoder()
   */
  decoder?: ImageDecoder;
  /**
   * Builds patterns from surfaces.
   * @default defaultPatternBuilder
   */
  patternBuilder?: PatternBuilder;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Options for ResourceLoader. Unknown keys are rejected.
 */
export interface ResourceLoaderOptions {
  /**
   * Logging level, used when no logger is given.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /** Logger instance; takes precedence over logLevel */
  logger?: ILogger;

  /**
   * Decoder shared by every handle the loader creates.
   * @default new RasterDecoder()
   */
  decoder?: ImageDecoder;

  /**
   * Pattern builder shared by every handle the loader creates.
   * @default defaultPatternBuilder
   */
  patternBuilder?: PatternBuilder;

  /**
   * Directory scanning primitive.
   * @default fileScanner
   */
  scanner?: DirectoryScanner;
}

/**
 * Default loader options.
 */
export const DEFAULT_LOADER_OPTIONS = {
  logLevel: 'warn',
} as const satisfies ResourceLoaderOptions;

function implementsMethods(...methods: string[]) {
  return (value: unknown): boolean =>
    typeof value === 'object' &&
    value !== null &&
    methods.every((method) => typeof Reflect.get(value, method) === 'function');
}

/**
 * Schema for ResourceLoaderOptions.
 */
export const resourceLoaderOptionsSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    logger: z
      .custom<ILogger>(implementsMethods('debug', 'info', 'warn', 'error', 'child'), {
        message: 'logger must implement debug, info, warn, error and child',
      })
      .optional(),
    decoder: z
      .custom<ImageDecoder>(implementsMethods('decode'), {
        message: 'decoder must implement decode',
      })
      .optional(),
    patternBuilder: z
      .custom<PatternBuilder>(implementsMethods('buildPattern'), {
        message: 'patternBuilder must implement buildPattern',
      })
      .optional(),
    scanner: z
      .custom<DirectoryScanner>(implementsMethods('scan'), {
        message: 'scanner must implement scan',
      })
      .optional(),
  })
  .strict();

/**
 * Validates loader options.
 * @throws ConfigurationError listing every problem found
 */
export function parseResourceLoaderOptions(options: unknown): ResourceLoaderOptions {
  const result = resourceLoaderOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
