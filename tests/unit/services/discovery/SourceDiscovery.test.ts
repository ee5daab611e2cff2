/**
 * Unit Tests for source discovery over a temporary directory
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { symlinkSync, writeFileSync } from 'fs';
import path from 'path';
import {
  DEFAULT_DISCOVERY_OPTIONS,
  discoverSources,
  type DiscoveryOptions,
  type SkippedEntry,
} from '../../../../src/services/discovery/SourceDiscovery.js';
import { IoError } from '../../../../src/lib/errors/ParserErrors.js';
import { createTempTree, removeTempTree, silentLogger } from '../../../helpers/parser-test-helper.js';

const OPTIONS: DiscoveryOptions = { ...DEFAULT_DISCOVERY_OPTIONS, maxFileSize: 100 };

function byPath(entries: SkippedEntry[]): SkippedEntry[] {
  return [...entries].sort((a, b) => (a.path < b.path ? -1 : 1));
}

describe('discoverSources', () => {
  let root: string;

  beforeEach(() => {
    root = createTempTree({
      'README.md': '# Readme\n',
      'package.json': '{}',
      'src/app.ts': 'export const a = 1;\n',
      'src/util.py': 'x = 1\n',
      'build/out.js': 'x',
      'debug.log': 'log',
      '.hidden/secret.ts': 'x',
      '.gitignore': 'build/\n*.log\n',
      'big.txt': 'x'.repeat(200),
    });
  });

  afterEach(() => {
    removeTempTree(root);
  });

  it('should list files sorted by relative path', () => {
    const result = discoverSources(root, OPTIONS, silentLogger())._unsafeUnwrap();

    expect(result.descriptors.map((d) => d.path)).toEqual(['README.md', 'package.json', 'src/app.ts', 'src/util.py']);
  });

  it('should describe each file from its metadata', () => {
    const result = discoverSources(root, OPTIONS, silentLogger())._unsafeUnwrap();
    const [readme, manifest] = result.descriptors;

    expect(readme).toMatchObject({ path: 'README.md', kind: 'source_file', sizeBytes: 9 });
    expect(readme.lastModified).toBeInstanceOf(Date);
    expect(manifest).toMatchObject({ path: 'package.json', kind: 'manifest', sizeBytes: 2 });
  });

  it('should record why entries were skipped', () => {
    const result = discoverSources(root, OPTIONS, silentLogger())._unsafeUnwrap();

    expect(byPath(result.skipped)).toEqual([
      { path: '.gitignore', reason: 'hidden' },
      { path: '.hidden', reason: 'hidden' },
      { path: 'big.txt', reason: 'too_large' },
      { path: 'build', reason: 'ignored' },
      { path: 'debug.log', reason: 'ignored' },
    ]);
  });

  it('should log each skip', () => {
    const log = silentLogger();
    const logSpy = vi.spyOn(log, 'logDiscoverySkip');

    discoverSources(root, OPTIONS, log);

    expect(logSpy).toHaveBeenCalledWith('big.txt', 'too_large', undefined);
    expect(logSpy).toHaveBeenCalledTimes(5);
  });

  it('should include dotfiles when asked', () => {
    const result = discoverSources(root, { ...OPTIONS, includeHidden: true }, silentLogger())._unsafeUnwrap();

    expect(result.descriptors.map((d) => d.path)).toEqual([
      '.gitignore',
      '.hidden/secret.ts',
      'README.md',
      'package.json',
      'src/app.ts',
      'src/util.py',
    ]);
  });

  it('should walk ignored paths when ignore files are not respected', () => {
    const result = discoverSources(root, { ...OPTIONS, respectIgnoreFiles: false }, silentLogger())._unsafeUnwrap();

    expect(result.descriptors.map((d) => d.path)).toEqual([
      'README.md',
      'build/out.js',
      'debug.log',
      'package.json',
      'src/app.ts',
      'src/util.py',
    ]);
  });

  it('should honour the project ignore file', () => {
    writeFileSync(path.join(root, '.polyglotignore'), '# local\nsrc/util.py\n');

    const result = discoverSources(root, OPTIONS, silentLogger())._unsafeUnwrap();

    expect(result.descriptors.map((d) => d.path)).toEqual(['README.md', 'package.json', 'src/app.ts']);
    expect(result.skipped).toContainEqual({ path: 'src/util.py', reason: 'ignored' });
  });

  it('should keep only files matching the include globs', () => {
    const result = discoverSources(root, { ...OPTIONS, include: ['src/**'] }, silentLogger())._unsafeUnwrap();

    expect(result.descriptors.map((d) => d.path)).toEqual(['src/app.ts', 'src/util.py']);
    expect(result.skipped).toContainEqual({ path: 'README.md', reason: 'not_included' });
  });

  it('should skip symlinks unless following them', () => {
    symlinkSync(path.join(root, 'src/app.ts'), path.join(root, 'link.ts'));

    const result = discoverSources(root, OPTIONS, silentLogger())._unsafeUnwrap();

    expect(result.descriptors.map((d) => d.path)).not.toContain('link.ts');
    expect(result.skipped).toContainEqual({ path: 'link.ts', reason: 'symlink' });
  });

  it('should follow symlinks without looping on directory cycles', () => {
    symlinkSync(path.join(root, 'src/app.ts'), path.join(root, 'link.ts'));
    symlinkSync(root, path.join(root, 'src/loop'));

    const result = discoverSources(root, { ...OPTIONS, followSymlinks: true }, silentLogger())._unsafeUnwrap();

    expect(result.descriptors.map((d) => d.path)).toEqual([
      'README.md',
      'link.ts',
      'package.json',
      'src/app.ts',
      'src/util.py',
    ]);
  });

  it('should fail when the root does not exist', () => {
    const error = discoverSources(path.join(root, 'absent'), OPTIONS, silentLogger())._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(IoError);
    expect(error.operation).toBe('stat');
  });

  it('should fail when the root is a file', () => {
    const error = discoverSources(path.join(root, 'README.md'), OPTIONS, silentLogger())._unsafeUnwrapErr();

    expect(error.operation).toBe('walk');
    expect(error.message).toBe(`Failed to walk ${path.join(root, 'README.md')} - not a directory`);
  });
});
