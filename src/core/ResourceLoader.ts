/**
 * Resolves icon names to files across an ordered list of directories.
 */

import { extname } from 'node:path';
import type { ResourceLoaderOptions } from '../types/options.js';
import { DEFAULT_LOADER_OPTIONS, parseResourceLoaderOptions } from '../types/options.js';
import type { ImageDecoder } from '../utils/ImageDecoder.js';
import { createImageDecoder } from '../utils/ImageDecoder.js';
import type { PatternBuilder } from '../rendering/SurfacePattern.js';
import { defaultPatternBuilder } from '../rendering/SurfacePattern.js';
import type { DirectoryScanner } from '../utils/scanFiles.js';
import { fileScanner, WILDCARD_EXTENSION } from '../utils/scanFiles.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { ImageHandle } from './ImageHandle.js';
import { LoadingError } from './errors.js';

/**
 * Turns a requested name into a scan query: the name itself when it has an
 * extension, otherwise `name.*`.
 */
export function toQuery(name: string): string {
  return extname(name) ? name : `${name}${WILDCARD_EXTENSION}`;
}

/**
 * Loads ImageHandles by name. Directories earlier in the list win: the first
 * directory holding any candidate for a name supplies it, and later
 * directories are never consulted for that name.
 *
 * @example
 * const loader = new ResourceLoader(['/usr/share/icons/Adwaita/24x24', '/usr/share/icons/Adwaita']);
 * const icons = loader.load('audio-volume-muted', 'audio-volume-low');
 * icons.get('audio-volume-muted')?.pattern;
 */
export class ResourceLoader {
  private readonly searchPath: readonly string[];
  private readonly logger: ILogger;
  private readonly decoder: ImageDecoder;
  private readonly patternBuilder: PatternBuilder;
  private readonly scanner: DirectoryScanner;

  /**
   * @throws ConfigurationError for unknown or ill-typed options
   */
  constructor(directories: readonly string[], options: ResourceLoaderOptions = {}) {
    const resolved = { ...DEFAULT_LOADER_OPTIONS, ...parseResourceLoaderOptions(options) };

    this.searchPath = Object.freeze([...directories]);
    this.logger = resolved.logger ?? createLogger(resolved.logLevel, 'ResourceLoader');
    this.decoder = resolved.decoder ?? createImageDecoder(this.logger.child('Decoder'));
    this.patternBuilder = resolved.patternBuilder ?? defaultPatternBuilder;
    this.scanner = resolved.scanner ?? fileScanner;
  }

  get directories(): readonly string[] {
    return this.searchPath;
  }

  /**
   * Resolves every name or fails; there are no partial results.
   *
   * Names with an extension must match a file name exactly and are keyed
   * as given. Names without one match any extension and are keyed by the
   * bare name.
   *
   * @throws LoadingError naming every query no directory could satisfy
   */
  load(...names: string[]): Map<string, ImageHandle> {
    const requested = new Set(names);
    const queries = new Set([...requested].map(toQuery));
    const seen = new Set<string>();
    const resolved = new Map<string, ImageHandle>();
    const handleLogger = this.logger.child('ImageHandle');

    for (const directory of this.searchPath) {
      const pending = [...queries].filter((query) => !seen.has(query));
      if (pending.length === 0) {
        break;
      }

      const matches = this.scanner.scan(directory, pending);
      for (const [query, paths] of matches) {
        const [first] = paths;
        if (first === undefined || seen.has(query) || !queries.has(query)) {
          continue;
        }

        const key = requested.has(query) ? query : query.slice(0, -WILDCARD_EXTENSION.length);
        resolved.set(
          key,
          ImageHandle.fromPath(first, {
            decoder: this.decoder,
            patternBuilder: this.patternBuilder,
            logger: handleLogger,
          })
        );
        seen.add(query);

        this.logger.debug('Resolved image', { query, key, path: first, directory });
      }
    }

    const missing = [...queries].filter((query) => !seen.has(query));
    if (missing.length > 0) {
      throw new LoadingError(missing);
    }

    return resolved;
  }
}
