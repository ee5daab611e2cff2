/**
 * Source Discovery
 *
 * Ignore-aware synchronous walk of a directory tree producing
 * SourceDescriptors. Per-entry I/O errors are logged and skipped; only an
 * unreadable root fails the walk.
 */

import { readdirSync, realpathSync, statSync, type Dirent, type Stats } from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import { IgnoreRules } from './IgnoreRules.js';
import { classifySource } from './SourceClassifier.js';
import type { SourceDescriptor } from '../../models/Language.js';
import { IoError, toError } from '../../lib/errors/ParserErrors.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { DEFAULT_CONFIG, type CoreConfig } from '../../lib/env-config.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';

export interface DiscoveryOptions {
  followSymlinks: boolean;
  includeHidden: boolean;
  /** Files larger than this (bytes) are skipped */
  maxFileSize: number;
  /** Honour .gitignore and .polyglotignore at the root */
  respectIgnoreFiles: boolean;
  /** Glob patterns (relative to the root); when set, only matching files are kept */
  include?: string[];
}

export const DEFAULT_DISCOVERY_OPTIONS: DiscoveryOptions = {
  followSymlinks: DEFAULT_CONFIG.followSymlinks,
  includeHidden: DEFAULT_CONFIG.includeHidden,
  maxFileSize: DEFAULT_CONFIG.maxFileSize,
  respectIgnoreFiles: DEFAULT_CONFIG.respectIgnoreFiles,
};

export type SkipReason = 'ignored' | 'hidden' | 'too_large' | 'symlink' | 'not_included' | 'io_error';

export interface SkippedEntry {
  /** Path relative to the root, with forward slashes */
  path: string;
  reason: SkipReason;
}

export interface DiscoveryResult {
  /** Descriptors sorted by path; paths are relative to the root */
  descriptors: SourceDescriptor[];
  skipped: SkippedEntry[];
}

export function discoveryOptionsFromConfig(config: CoreConfig): DiscoveryOptions {
  return {
    followSymlinks: config.followSymlinks,
    includeHidden: config.includeHidden,
    maxFileSize: config.maxFileSize,
    respectIgnoreFiles: config.respectIgnoreFiles,
  };
}

/**
 * Walk `root` and describe every file that passes the policy
 */
export function discoverSources(
  root: string,
  options: DiscoveryOptions = DEFAULT_DISCOVERY_OPTIONS,
  log: Logger = defaultLogger
): Result<DiscoveryResult, IoError> {
  const rootPath = path.resolve(root);

  let rootStats: Stats;
  try {
    rootStats = statSync(rootPath);
  } catch (error) {
    return err(new IoError(rootPath, 'stat', toError(error)));
  }
  if (!rootStats.isDirectory()) {
    return err(new IoError(rootPath, 'walk', new Error('not a directory')));
  }

  const walker = new DiscoveryWalk(rootPath, options, log);
  walker.walkDirectory(rootPath);

  return ok({
    descriptors: walker.descriptors.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
    skipped: walker.skipped,
  });
}

class DiscoveryWalk {
  readonly descriptors: SourceDescriptor[] = [];
  readonly skipped: SkippedEntry[] = [];
  private readonly ignoreRules: IgnoreRules;
  private readonly visitedDirectories = new Set<string>();

  constructor(
    private readonly rootPath: string,
    private readonly options: DiscoveryOptions,
    private readonly log: Logger
  ) {
    this.ignoreRules = new IgnoreRules(rootPath, options.respectIgnoreFiles, log);
  }

  walkDirectory(dirPath: string): void {
    // Symlinked directories can form cycles
    try {
      const real = realpathSync(dirPath);
      if (this.visitedDirectories.has(real)) {
        return;
      }
      this.visitedDirectories.add(real);
    } catch (error) {
      this.skip(this.relative(dirPath), 'io_error', error);
      return;
    }

    let entries: Dirent[];
    try {
      entries = readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
      this.skip(this.relative(dirPath), 'io_error', error);
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      const relativePath = this.relative(fullPath);

      if (entry.name === '.git' || entry.name === 'node_modules') {
        continue;
      }

      if (!this.options.includeHidden && entry.name.startsWith('.')) {
        this.skip(relativePath, 'hidden');
        continue;
      }

      if (entry.isDirectory()) {
        if (this.ignoreRules.isIgnored(relativePath, true)) {
          this.skip(relativePath, 'ignored');
          continue;
        }
        this.walkDirectory(fullPath);
      } else if (entry.isFile()) {
        this.visitFile(fullPath, relativePath);
      } else if (entry.isSymbolicLink()) {
        if (!this.options.followSymlinks) {
          this.skip(relativePath, 'symlink');
          continue;
        }
        try {
          const stats = statSync(fullPath);
          if (stats.isDirectory()) {
            if (this.ignoreRules.isIgnored(relativePath, true)) {
              this.skip(relativePath, 'ignored');
              continue;
            }
            this.walkDirectory(fullPath);
          } else if (stats.isFile()) {
            this.visitFile(fullPath, relativePath);
          }
        } catch (error) {
          // Broken symlink
          this.skip(relativePath, 'io_error', error);
        }
      }
    }
  }

  private visitFile(fullPath: string, relativePath: string): void {
    if (this.ignoreRules.isIgnored(relativePath)) {
      this.skip(relativePath, 'ignored');
      return;
    }

    const include = this.options.include;
    if (include && include.length > 0 && !include.some((pattern) => minimatch(relativePath, pattern, { dot: true }))) {
      this.skip(relativePath, 'not_included');
      return;
    }

    let stats: Stats;
    try {
      stats = statSync(fullPath);
    } catch (error) {
      this.skip(relativePath, 'io_error', error);
      return;
    }

    if (stats.size > this.options.maxFileSize) {
      this.skip(relativePath, 'too_large');
      return;
    }

    this.descriptors.push({
      path: relativePath,
      kind: classifySource(relativePath),
      sizeBytes: stats.size,
      lastModified: stats.mtime,
    });
  }

  private skip(relativePath: string, reason: SkipReason, error?: unknown): void {
    this.skipped.push({ path: relativePath, reason });
    this.log.logDiscoverySkip(relativePath, reason, error === undefined ? undefined : toError(error));
  }

  private relative(fullPath: string): string {
    return path.relative(this.rootPath, fullPath).split(path.sep).join('/');
  }
}
