/**
 * Source Kind Classification
 *
 * Decides from a file name alone whether a file is a package manifest,
 * configuration, generated output or ordinary source.
 */

import path from 'path';
import type { SourceKind } from '../../models/Language.js';
import { extensionOf } from '../../models/Language.js';

const MANIFEST_FILES = new Set([
  'package.json',
  'cargo.toml',
  'go.mod',
  'mix.exs',
  'rebar.config',
  'pyproject.toml',
  'setup.py',
  'setup.cfg',
  'requirements.txt',
  'pipfile',
  'pom.xml',
  'build.gradle',
  'build.gradle.kts',
  'gemfile',
  'composer.json',
]);

const GENERATED_PATTERNS: RegExp[] = [
  /\.min\.(js|css)$/,
  /\.pb\.go$/,
  /_pb2(_grpc)?\.py$/,
  /\.generated\.[^.]+$/,
  /\.g\.dart$/,
  /^(package-lock\.json|yarn\.lock|pnpm-lock\.yaml|cargo\.lock|go\.sum|mix\.lock|poetry\.lock)$/,
];

const CONFIGURATION_EXTENSIONS = new Set([
  'json',
  'jsonc',
  'yaml',
  'yml',
  'toml',
  'ini',
  'cfg',
  'conf',
  'xml',
  'properties',
  'env',
]);

export function classifySource(filePath: string): SourceKind {
  const base = path.basename(filePath.replace(/\\/g, '/')).toLowerCase();

  if (MANIFEST_FILES.has(base)) {
    return 'manifest';
  }
  if (GENERATED_PATTERNS.some((pattern) => pattern.test(base))) {
    return 'generated';
  }

  const extension = extensionOf(base);
  if (extension !== undefined && CONFIGURATION_EXTENSIONS.has(extension)) {
    return 'configuration';
  }
  return 'source_file';
}
