import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ResourceLoader, toQuery } from '../../src/core/ResourceLoader.js';
import { ConfigurationError, LoadingError } from '../../src/core/errors.js';
import { fileScanner, type DirectoryScanner } from '../../src/utils/scanFiles.js';
import { FakeDecoder, createRecordingLogger } from '../helpers/fakes.js';

describe('ResourceLoader', () => {
  let root: string;
  let dirA: string;
  let dirB: string;
  let decoder: FakeDecoder;

  function touch(directory: string, fileName: string, bytes: number[] = [1]): string {
    const filePath = join(directory, fileName);
    writeFileSync(filePath, Buffer.from(bytes));
    return filePath;
  }

  function createLoader(directories: string[], scanner?: DirectoryScanner): ResourceLoader {
    return new ResourceLoader(directories, { decoder, scanner, logger: createRecordingLogger() });
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'iconimg-loader-'));
    dirA = join(root, 'a');
    dirB = join(root, 'b');
    mkdirSync(dirA);
    mkdirSync(dirB);
    decoder = new FakeDecoder({ width: 24, height: 24 });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('toQuery', () => {
    it('should keep names with an extension and wildcard the rest', () => {
      expect(toQuery('icon.png')).toBe('icon.png');
      expect(toQuery('icon')).toBe('icon.*');
      expect(toQuery('.hidden')).toBe('.hidden.*');
    });
  });

  describe('load', () => {
    it('should prefer the first directory holding any candidate', () => {
      const inA = touch(dirA, 'icon.png');
      touch(dirB, 'icon.svg');

      const images = createLoader([dirA, dirB]).load('icon');

      expect([...images.keys()]).toEqual(['icon']);
      expect(images.get('icon')?.path).toBe(inA);
      expect(images.get('icon')?.name).toBe('icon');
    });

    it('should fall through to later directories', () => {
      touch(dirA, 'other.png');
      const inB = touch(dirB, 'icon.svg');

      const images = createLoader([dirA, dirB]).load('icon');

      expect(images.get('icon')?.path).toBe(inB);
    });

    it('should match names with an extension exactly and key them as given', () => {
      touch(dirA, 'icon.png');
      const inB = touch(dirB, 'icon.svg');

      const images = createLoader([dirA, dirB]).load('icon.svg');

      expect([...images.keys()]).toEqual(['icon.svg']);
      expect(images.get('icon.svg')?.path).toBe(inB);
    });

    it('should take the lexically first candidate within a directory', () => {
      touch(dirA, 'icon.svg');
      const png = touch(dirA, 'icon.png');

      const images = createLoader([dirA]).load('icon');

      expect(images.get('icon')?.path).toBe(png);
    });

    it('should read the file bytes into the handle', () => {
      touch(dirA, 'icon.png', [4, 5, 6]);

      const handle = createLoader([dirA]).load('icon').get('icon');

      expect(handle ? [...handle.bytes] : []).toEqual([4, 5, 6]);
    });

    it('should fail naming the unmatched wildcard query', () => {
      const loader = createLoader([dirA]);

      expect(() => loader.load('missing')).toThrow(LoadingError);
      expect(() => loader.load('missing')).toThrow(/missing\.\*/);
    });

    it('should list every unmatched query and return nothing', () => {
      touch(dirA, 'icon.png');
      const loader = createLoader([dirA, dirB]);

      let caught: unknown;
      try {
        loader.load('icon', 'zeta', 'alpha.svg');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(LoadingError);
      expect(caught instanceof LoadingError ? caught.missing : []).toEqual(['alpha.svg', 'zeta.*']);
    });

    it('should only scan later directories for names still unresolved', () => {
      touch(dirA, 'icon.png');
      touch(dirB, 'icon.svg');
      touch(dirB, 'other.png');
      const scan = vi.fn(fileScanner.scan);

      const images = createLoader([dirA, dirB], { scan }).load('icon', 'other');

      expect(scan).toHaveBeenCalledTimes(2);
      expect(scan).toHaveBeenNthCalledWith(1, dirA, ['icon.*', 'other.*']);
      expect(scan).toHaveBeenNthCalledWith(2, dirB, ['other.*']);
      expect(images.get('icon')?.path).toBe(join(dirA, 'icon.png'));
      expect(images.get('other')?.path).toBe(join(dirB, 'other.png'));
    });

    it('should stop scanning once every name is resolved', () => {
      touch(dirA, 'icon.png');
      const scan = vi.fn(fileScanner.scan);

      createLoader([dirA, dirB], { scan }).load('icon');

      expect(scan).toHaveBeenCalledTimes(1);
    });

    it('should give handles the loader decoder', () => {
      touch(dirA, 'icon.png');

      const handle = createLoader([dirA]).load('icon').get('icon');

      expect(handle?.naturalSize).toEqual({ width: 24, height: 24 });
      expect(decoder.calls).toHaveLength(1);
    });
  });

  describe('options', () => {
    it('should reject unknown options', () => {
      const options = { logLevel: 'warn', colour: 'red' } as const;

      let caught: unknown;
      try {
        new ResourceLoader([dirA], options);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught instanceof ConfigurationError ? caught.issues : []).toEqual([
        "(root): Unrecognized key(s) in object: 'colour'",
      ]);
    });

    it('should expose a read-only copy of the directories', () => {
      const directories = [dirA, dirB];
      const loader = new ResourceLoader(directories, { logLevel: 'silent' });
      directories.push(root);

      expect(loader.directories).toEqual([dirA, dirB]);
      expect(Object.isFrozen(loader.directories)).toBe(true);
    });
  });
});
