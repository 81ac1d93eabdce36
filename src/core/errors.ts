/**
 * Error taxonomy for the image pipeline.
 * File system errors are not wrapped; they reach the caller as Node raised them.
 */

export type IconImageErrorCode =
  | 'INVALID_ARGUMENT'
  | 'LOADING_FAILED'
  | 'DECODE_FAILED'
  | 'SIZE_REJECTED'
  | 'INVALID_CONFIG';

/**
 * Base class for every error raised by this library.
 */
export class IconImageError extends Error {
  readonly code: IconImageErrorCode;

  constructor(code: IconImageErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised by resize/scale and the size setters for missing or contradictory arguments.
 */
export class ArgumentError extends IconImageError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/**
 * Raised when one or more requested names match no file in any search directory.
 */
export class LoadingError extends IconImageError {
  /** Queries that stayed unmatched, sorted */
  readonly missing: string[];

  constructor(missing: Iterable<string>) {
    const sorted = [...missing].sort();
    super(
      'LOADING_FAILED',
      `Wasn't able to find images corresponding to the names: ${sorted.join(', ')}`
    );
    this.missing = sorted;
  }
}

/**
 * Raised when encoded bytes cannot be turned into a surface.
 */
export class DecodeError extends IconImageError {
  constructor(message: string, options?: ErrorOptions) {
    super('DECODE_FAILED', message, options);
  }
}

/**
 * Raised by a decoder that will not rasterize at the requested size.
 * Image handles catch this one and retry at natural size.
 */
export class SizeRejectedError extends IconImageError {
  readonly width: number | undefined;
  readonly height: number | undefined;

  constructor(message: string, width?: number, height?: number) {
    super('SIZE_REJECTED', message);
    this.width = width;
    this.height = height;
  }
}

/**
 * Raised at construction time for unknown or ill-typed options.
 */
export class ConfigurationError extends IconImageError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
