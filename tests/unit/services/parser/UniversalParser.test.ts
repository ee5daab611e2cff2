/**
 * Unit Tests for UniversalParser
 *
 * Runs against an in-memory filesystem so reads and stats can be counted.
 */

import { describe, it, expect, vi } from 'vitest';
import { UniversalParser, policyFromConfig, DEFAULT_POLICY } from '../../../../src/services/parser/UniversalParser.js';
import { ParserRegistryBuilder, type ParserRegistry } from '../../../../src/services/parser/ParserRegistry.js';
import { MarkdownCapsule } from '../../../../src/services/parser/capsules/MarkdownCapsule.js';
import type { LanguageCapsule } from '../../../../src/services/parser/LanguageCapsule.js';
import {
  CapsuleFailureError,
  FileTooLargeError,
  IoError,
  NoMatchingCapsuleError,
} from '../../../../src/lib/errors/ParserErrors.js';
import { DEFAULT_CONFIG } from '../../../../src/lib/env-config.js';
import {
  MemoryFileSystem,
  TEST_CONTEXT,
  descriptor,
  fakeCapsule,
  silentLogger,
} from '../../../helpers/parser-test-helper.js';

function buildRegistry(...capsules: LanguageCapsule[]): ParserRegistry {
  return new ParserRegistryBuilder().registerAll(capsules)._unsafeUnwrap().build()._unsafeUnwrap();
}

const registry = buildRegistry(fakeCapsule('py', { extensions: ['py'] }), new MarkdownCapsule());

describe('UniversalParser', () => {
  describe('parseDescriptor', () => {
    it('should reject an oversized descriptor without reading it', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/big.py': 'x = 1' });
      const parser = new UniversalParser(registry, { maxFileSize: 10 }, fileSystem, silentLogger());

      const result = await parser.parseDescriptor(TEST_CONTEXT, descriptor('big.py', { sizeBytes: 11 }));

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(FileTooLargeError);
      expect(error).toMatchObject({ path: 'big.py', size: 11, max: 10 });
      expect(fileSystem.readCalls).toEqual([]);
    });

    it('should reject a file that grew past the limit after it was described', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/grown.py': 'x = 1234567890123' });
      const parser = new UniversalParser(registry, { maxFileSize: 10 }, fileSystem, silentLogger());

      const result = await parser.parseDescriptor(TEST_CONTEXT, descriptor('grown.py', { sizeBytes: 1 }));

      expect(result._unsafeUnwrapErr()).toMatchObject({ code: 'FILE_TOO_LARGE', size: 17 });
    });

    it('should parse a zero-byte file', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/empty.py': '' });
      const parser = new UniversalParser(registry, {}, fileSystem, silentLogger());

      const document = (await parser.parseDescriptor(TEST_CONTEXT, descriptor('empty.py')))._unsafeUnwrap();

      expect(document.stats.byteLength).toBe(0);
      expect(document.metadata.additional.language).toBe('py');
      expect(fileSystem.readCalls).toEqual(['/project/empty.py']);
    });

    it('should read absolute paths as given', async () => {
      const fileSystem = new MemoryFileSystem({ '/elsewhere/a.py': 'pass' });
      const parser = new UniversalParser(registry, {}, fileSystem, silentLogger());

      const result = await parser.parseDescriptor(TEST_CONTEXT, descriptor('/elsewhere/a.py'));

      expect(result.isOk()).toBe(true);
      expect(fileSystem.readCalls).toEqual(['/elsewhere/a.py']);
    });

    it('should report invalid UTF-8 as a capsule failure for the detected language', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/bad.py': new Uint8Array([0x70, 0xff, 0xfe]) });
      const parser = new UniversalParser(registry, {}, fileSystem, silentLogger());

      const error = (await parser.parseDescriptor(TEST_CONTEXT, descriptor('bad.py')))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(CapsuleFailureError);
      expect(error).toMatchObject({ language: 'py', kind: 'utf8' });
    });

    it('should name the language unknown when invalid UTF-8 has no capsule', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/blob.bin': new Uint8Array([0xc3]) });
      const parser = new UniversalParser(registry, {}, fileSystem, silentLogger());

      const error = (await parser.parseDescriptor(TEST_CONTEXT, descriptor('blob.bin')))._unsafeUnwrapErr();

      expect(error).toMatchObject({ language: 'unknown', kind: 'utf8' });
    });

    it('should fail with NoMatchingCapsuleError when nothing accepts the file', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/main.go': 'package main' });
      const log = silentLogger();
      const logSpy = vi.spyOn(log, 'logParseFailure');
      const parser = new UniversalParser(registry, {}, fileSystem, log);

      const error = (await parser.parseDescriptor(TEST_CONTEXT, descriptor('main.go')))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(NoMatchingCapsuleError);
      expect(logSpy).toHaveBeenCalledWith('main.go', {
        code: 'NO_MATCHING_CAPSULE',
        message: 'No capsule matches main.go',
      });
    });

    it('should apply parseOptions.maxBytes before reading', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/a.py': 'value = 12345' });
      const parser = new UniversalParser(
        registry,
        { parseOptions: { collectSymbols: true, collectComments: true, maxBytes: 4 } },
        fileSystem,
        silentLogger()
      );

      const error = (await parser.parseDescriptor(TEST_CONTEXT, descriptor('a.py', { sizeBytes: 13 })))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(FileTooLargeError);
      expect(error).toMatchObject({ path: 'a.py', size: 13, max: 4 });
      expect(fileSystem.readCalls).toEqual([]);
    });

    it('should apply parseOptions.maxBytes to the bytes read', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/a.py': 'value = 12345' });
      const parser = new UniversalParser(
        registry,
        { maxFileSize: 100, parseOptions: { collectSymbols: true, collectComments: true, maxBytes: 4 } },
        fileSystem,
        silentLogger()
      );

      const error = (await parser.parseDescriptor(TEST_CONTEXT, descriptor('a.py')))._unsafeUnwrapErr();

      expect(error).toMatchObject({ code: 'FILE_TOO_LARGE', size: 13, max: 4 });
    });

    it('should pass the policy parse options to the capsule', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/README.md': '# Title' });
      const parser = new UniversalParser(
        registry,
        { parseOptions: { collectSymbols: false, collectComments: false } },
        fileSystem,
        silentLogger()
      );

      const document = (await parser.parseDescriptor(TEST_CONTEXT, descriptor('README.md')))._unsafeUnwrap();

      expect(document.symbols).toEqual([]);
      expect(document.metadata.additional.headings).toBe(1);
    });
  });

  describe('parseFile', () => {
    it('should describe the file from its stat', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/src/a.py': 'pass' });
      const parser = new UniversalParser(registry, {}, fileSystem, silentLogger());

      const document = (await parser.parseFile(TEST_CONTEXT, 'src/a.py'))._unsafeUnwrap();

      expect(document.descriptor).toEqual({
        path: 'src/a.py',
        kind: 'source_file',
        sizeBytes: 4,
        lastModified: new Date(0),
      });
      expect(fileSystem.statCalls).toEqual(['/project/src/a.py']);
    });

    it('should classify manifests', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/setup.py': 'pass' });
      const parser = new UniversalParser(registry, {}, fileSystem, silentLogger());

      const document = (await parser.parseFile(TEST_CONTEXT, 'setup.py'))._unsafeUnwrap();

      expect(document.descriptor.kind).toBe('manifest');
    });

    it('should turn a failed stat into an IoError', async () => {
      const parser = new UniversalParser(registry, {}, new MemoryFileSystem(), silentLogger());

      const error = (await parser.parseFile(TEST_CONTEXT, 'missing.py'))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(IoError);
      expect(error).toMatchObject({ path: 'missing.py', operation: 'stat', recoverable: true });
    });
  });

  describe('batches', () => {
    const files = { '/project/a.py': 'a', '/project/b.py': 'b' };
    const batch = [descriptor('a.py'), descriptor('missing.py'), descriptor('b.py')];

    it('should stop at the first failure', async () => {
      const fileSystem = new MemoryFileSystem(files);
      const parser = new UniversalParser(registry, {}, fileSystem, silentLogger());

      const result = await parser.parseDescriptors(TEST_CONTEXT, batch);

      expect(result._unsafeUnwrapErr()).toMatchObject({ code: 'IO_ERROR', operation: 'read', path: 'missing.py' });
      expect(fileSystem.readCalls).toEqual(['/project/a.py', '/project/missing.py']);
    });

    it('should return every document when all succeed', async () => {
      const parser = new UniversalParser(registry, {}, new MemoryFileSystem(files), silentLogger());

      const documents = (
        await parser.parseDescriptors(TEST_CONTEXT, [descriptor('a.py'), descriptor('b.py')])
      )._unsafeUnwrap();

      expect(documents.map((document) => document.descriptor.path)).toEqual(['a.py', 'b.py']);
    });

    it('should keep one result per descriptor when settled', async () => {
      const parser = new UniversalParser(registry, {}, new MemoryFileSystem(files), silentLogger());

      const results = await parser.parseDescriptorsSettled(TEST_CONTEXT, batch);

      expect(results.map((result) => result.isOk())).toEqual([true, false, true]);
    });
  });

  describe('policy', () => {
    it('should freeze the merged policy', () => {
      const parser = new UniversalParser(registry, { includeHidden: true }, new MemoryFileSystem(), silentLogger());

      expect(Object.isFrozen(parser.policy)).toBe(true);
      expect(parser.policy).toEqual({ ...DEFAULT_POLICY, includeHidden: true });
    });

    it('should derive a new parser with withPolicy', async () => {
      const fileSystem = new MemoryFileSystem({ '/project/a.py': 'abc' });
      const parser = new UniversalParser(registry, {}, fileSystem, silentLogger());
      const strict = parser.withPolicy({ maxFileSize: 2 });

      expect(strict.policy.maxFileSize).toBe(2);
      expect(parser.policy.maxFileSize).toBe(DEFAULT_CONFIG.maxFileSize);
      expect((await strict.parseDescriptor(TEST_CONTEXT, descriptor('a.py', { sizeBytes: 3 }))).isErr()).toBe(true);
      expect((await parser.parseDescriptor(TEST_CONTEXT, descriptor('a.py', { sizeBytes: 3 }))).isOk()).toBe(true);
    });

    it('should build a policy from configuration', () => {
      const policy = policyFromConfig({ ...DEFAULT_CONFIG, maxFileSize: 5, includeHidden: true });

      expect(policy.maxFileSize).toBe(5);
      expect(policy.includeHidden).toBe(true);
      expect(policy.parseOptions).toEqual({ collectSymbols: true, collectComments: true });
    });
  });
});
