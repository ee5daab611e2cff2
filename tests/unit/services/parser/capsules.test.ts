/**
 * Unit Tests for the built-in capsules
 */

import { describe, it, expect } from 'vitest';
import {
  builtinCapsules,
  MarkdownCapsule,
  PlainTextCapsule,
  TreeSitterCapsule,
} from '../../../../src/services/parser/capsules/index.js';
import { CapsuleFailureError } from '../../../../src/lib/errors/ParserErrors.js';
import { err } from '../../../../src/lib/result-types.js';
import { ALL_OPTIONS, TEST_CONTEXT, descriptor, languageDefinition } from '../../../helpers/parser-test-helper.js';

describe('builtinCapsules', () => {
  it('should register Tree-sitter languages, then Markdown, then plain text', () => {
    const ids = builtinCapsules()
      ._unsafeUnwrap()
      .map((capsule) => capsule.info().id);

    expect(ids).toEqual(['javascript', 'typescript', 'tsx', 'python', 'go', 'rust', 'java', 'markdown', 'plaintext']);
  });
});

describe('TreeSitterCapsule', () => {
  const capsule = new TreeSitterCapsule(languageDefinition('typescript'));

  it('should expose its language info', () => {
    expect(capsule.info()).toEqual({
      id: 'typescript',
      displayName: 'TypeScript',
      extensions: ['ts', 'mts', 'cts'],
      aliases: ['ts'],
    });
  });

  it('should match by extension or hint', () => {
    expect(capsule.matches(descriptor('src/app.ts'))).toBe(true);
    expect(capsule.matches(descriptor('src/APP.MTS'))).toBe(true);
    expect(capsule.matches(descriptor('script', { language: 'ts' }))).toBe(true);
    expect(capsule.matches(descriptor('src/app.tsx'))).toBe(false);
  });

  it('should fill document metadata and stats', () => {
    const source = 'const a = 1;\n';
    const document = capsule
      .parse({ root: '/repo', workspaceName: 'demo', vcsHead: 'abc123' }, descriptor('a.ts'), source, ALL_OPTIONS)
      ._unsafeUnwrap();

    expect(document.metadata.parserVersion).toBe('0.1.0');
    expect(document.metadata.additional).toEqual({
      language: 'typescript',
      lineCount: 1,
      workspaceName: 'demo',
      vcsHead: 'abc123',
      grammar: 'typescript',
    });
    expect(document.stats.byteLength).toBe(13);
    expect(document.stats.totalNodes).toBeGreaterThan(document.stats.totalTokens);
    expect(document.stats.durationMs).toBeGreaterThanOrEqual(0);
    expect(document.diagnostics).toEqual([]);
  });

  it('should parse an empty source', () => {
    const document = capsule.parse(TEST_CONTEXT, descriptor('empty.ts'), '', ALL_OPTIONS)._unsafeUnwrap();

    expect(document.stats.byteLength).toBe(0);
    expect(document.symbols).toEqual([]);
    expect(document.metadata.additional.lineCount).toBe(0);
  });

  it('should keep parsing past syntax errors', () => {
    const document = capsule
      .parse(TEST_CONTEXT, descriptor('broken.ts'), 'function ok() {}\nclass {{\n', ALL_OPTIONS)
      ._unsafeUnwrap();

    expect(document.diagnostics.length).toBeGreaterThan(0);
    expect(document.symbols[0]).toMatchObject({ name: 'ok', kind: 'function' });
  });

  it('should reject sources above maxBytes before parsing', () => {
    const error = capsule
      .parse(TEST_CONTEXT, descriptor('a.ts'), 'const a = 1;', { ...ALL_OPTIONS, maxBytes: 4 })
      ._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(CapsuleFailureError);
    expect(error).toMatchObject({ language: 'typescript', kind: 'too_large' });
  });

  it('should report a grammar that cannot be loaded', () => {
    const unavailable = new TreeSitterCapsule(languageDefinition('go'), (grammarId) =>
      err(new CapsuleFailureError(grammarId, 'tree_sitter', 'not installed'))
    );

    const error = unavailable.parse(TEST_CONTEXT, descriptor('main.go'), 'package main', ALL_OPTIONS)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(CapsuleFailureError);
    expect(error).toMatchObject({ kind: 'tree_sitter', message: '[go] tree_sitter failure: not installed' });
  });
});

describe('MarkdownCapsule', () => {
  const capsule = new MarkdownCapsule();
  const source = ['# Title', '', '```', '# not heading', '```', '', '## Sub ##', ''].join('\n');

  it('should extract headings outside fenced code', () => {
    const document = capsule.parse(TEST_CONTEXT, descriptor('README.md'), source, ALL_OPTIONS)._unsafeUnwrap();

    expect(document.symbols.map(({ name, kind }) => ({ name, kind }))).toEqual([
      { name: 'Title', kind: 'heading' },
      { name: 'Sub', kind: 'heading' },
    ]);
    expect(document.symbols[1].span).toEqual({
      startLine: 7,
      startColumn: 0,
      endLine: 7,
      endColumn: 9,
      startByte: 32,
      endByte: 41,
    });
  });

  it('should count headings, code blocks and words', () => {
    const document = capsule.parse(TEST_CONTEXT, descriptor('README.md'), source, ALL_OPTIONS)._unsafeUnwrap();

    expect(document.metadata.additional.headings).toBe(2);
    expect(document.metadata.additional.codeBlocks).toBe(1);
    expect(document.stats.totalNodes).toBe(3);
    expect(document.stats.totalTokens).toBe(10);
  });

  it('should match markdown extensions', () => {
    expect(capsule.matches(descriptor('docs/guide.markdown'))).toBe(true);
    expect(capsule.matches(descriptor('notes.txt'))).toBe(false);
  });
});

describe('PlainTextCapsule', () => {
  const capsule = new PlainTextCapsule();

  it('should accept source and configuration files but not manifests', () => {
    expect(capsule.matches(descriptor('LICENSE'))).toBe(true);
    expect(capsule.matches(descriptor('settings.ini', { kind: 'configuration' }))).toBe(true);
    expect(capsule.matches(descriptor('package.json', { kind: 'manifest' }))).toBe(false);
    expect(capsule.matches(descriptor('notes.txt', { kind: 'generated' }))).toBe(true);
  });

  it('should report statistics only', () => {
    const document = capsule.parse(TEST_CONTEXT, descriptor('notes.txt'), 'a b\nc', ALL_OPTIONS)._unsafeUnwrap();

    expect(document.symbols).toEqual([]);
    expect(document.stats).toMatchObject({ byteLength: 5, totalNodes: 0, totalTokens: 3 });
    expect(document.metadata.additional.lineCount).toBe(2);
  });
});
