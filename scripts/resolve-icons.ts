#!/usr/bin/env node
/**
 * Resolves icon names against search directories and prints what was found.
 *
 * Usage: tsx scripts/resolve-icons.ts <dir>[:<dir>...] <name> [name...]
 */

import { ResourceLoader, LoadingError } from '../src/index.js';

function main(): void {
  const [searchPath, ...names] = process.argv.slice(2);

  if (!searchPath || names.length === 0) {
    console.error('Usage: tsx scripts/resolve-icons.ts <dir>[:<dir>...] <name> [name...]');
    process.exit(1);
  }

  const loader = new ResourceLoader(searchPath.split(':'), { logLevel: 'debug' });

  try {
    const images = loader.load(...names);

    for (const [key, image] of images) {
      console.log(`  ✓ ${key}: ${image.toString()}`);
      image.dispose();
    }
  } catch (error) {
    if (error instanceof LoadingError) {
      for (const query of error.missing) {
        console.log(`  ✗ ${query}: not found`);
      }
      process.exit(2);
    }
    console.error('Error:', error instanceof Error ? error.message : error);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

main();
