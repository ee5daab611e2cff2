import { default as ignore, Ignore } from 'ignore';
import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';

/** Project-specific ignore file, read next to .gitignore */
export const PROJECT_IGNORE_FILE = '.polyglotignore';

/** Directories that are never walked */
export const ALWAYS_SKIPPED = ['.git/', 'node_modules/'];

/**
 * Ignore rules for a discovery root: fixed skips, then .gitignore and the
 * project ignore file when enabled
 */
export class IgnoreRules {
  private ig: Ignore;

  constructor(
    private readonly rootPath: string,
    respectIgnoreFiles: boolean,
    private readonly log: Logger = defaultLogger
  ) {
    this.ig = ignore.default();
    this.ig.add(ALWAYS_SKIPPED);

    if (respectIgnoreFiles) {
      this.loadFile('.gitignore');
      this.loadFile(PROJECT_IGNORE_FILE);
    }
  }

  private loadFile(fileName: string): void {
    const filePath = path.join(this.rootPath, fileName);
    if (!existsSync(filePath)) {
      return;
    }

    try {
      const patterns = readFileSync(filePath, 'utf-8')
        .split('\n')
        .map(line => line.trim())
        .filter(line => line && !line.startsWith('#'));

      if (patterns.length > 0) {
        this.ig.add(patterns);
      }
    } catch (error) {
      // Continue without this file
      this.log.logDiscoverySkip(filePath, 'unreadable ignore file', error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Check a path relative to the root
   *
   * @param relativePath - The path relative to the root directory
   * @param isDirectory - Directories are matched with a trailing slash so "dir/" patterns apply
   */
  isIgnored(relativePath: string, isDirectory = false): boolean {
    // Normalize path separators for cross-platform compatibility
    const normalizedPath = relativePath.replace(/\\/g, '/');
    return this.ig.ignores(isDirectory ? `${normalizedPath}/` : normalizedPath);
  }

  /**
   * Add patterns at runtime
   */
  addPatterns(patterns: string[]): void {
    this.ig.add(patterns);
  }
}
