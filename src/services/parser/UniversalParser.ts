/**
 * Universal Parser
 *
 * Front door for parsing files: applies the size policy against filesystem
 * metadata, reads and decodes content, and delegates to the registry.
 * Holds only the shared registry, the policy and the filesystem.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { ParserRegistry } from './ParserRegistry.js';
import type { SourceDescriptor } from '../../models/Language.js';
import {
  DEFAULT_PARSE_OPTIONS,
  type ParseContext,
  type ParseOptions,
  type ParsedDocument,
} from '../../models/ParsedDocument.js';
import {
  CapsuleFailureError,
  FileTooLargeError,
  IoError,
  toError,
  type ParserError,
} from '../../lib/errors/ParserErrors.js';
import { Result, ok, err, tryAsync } from '../../lib/result-types.js';
import type { CoreConfig } from '../../lib/env-config.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';
import {
  DEFAULT_DISCOVERY_OPTIONS,
  discoverSources,
  discoveryOptionsFromConfig,
  type DiscoveryOptions,
} from '../discovery/SourceDiscovery.js';
import { classifySource } from '../discovery/SourceClassifier.js';

/**
 * Metadata the parser needs from a stat call
 */
export interface FileStat {
  size: number;
  mtime: Date;
  isFile(): boolean;
}

/**
 * Filesystem collaborator
 */
export interface FileSystem {
  stat(filePath: string): Promise<FileStat>;
  readFile(filePath: string): Promise<Uint8Array>;
}

export const nodeFileSystem: FileSystem = {
  stat: (filePath) => fs.stat(filePath),
  readFile: (filePath) => fs.readFile(filePath),
};

/**
 * Size limit, discovery switches and per-call parse options
 */
export interface ParserPolicy extends DiscoveryOptions {
  parseOptions: ParseOptions;
}

export const DEFAULT_POLICY: ParserPolicy = {
  ...DEFAULT_DISCOVERY_OPTIONS,
  parseOptions: DEFAULT_PARSE_OPTIONS,
};

export function policyFromConfig(config: CoreConfig): ParserPolicy {
  return { ...discoveryOptionsFromConfig(config), parseOptions: DEFAULT_PARSE_OPTIONS };
}

export class UniversalParser {
  readonly policy: Readonly<ParserPolicy>;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(
    private readonly registry: ParserRegistry,
    policy: Partial<ParserPolicy> = {},
    private readonly fileSystem: FileSystem = nodeFileSystem,
    private readonly log: Logger = defaultLogger
  ) {
    this.policy = Object.freeze({ ...DEFAULT_POLICY, ...policy });
  }

  /**
   * Copy of this parser with part of the policy replaced
   */
  withPolicy(policy: Partial<ParserPolicy>): UniversalParser {
    return new UniversalParser(this.registry, { ...this.policy, ...policy }, this.fileSystem, this.log);
  }

  /**
   * Stat a path, describe it and parse it
   */
  async parseFile(context: ParseContext, filePath: string): Promise<Result<ParsedDocument, ParserError>> {
    const absolutePath = this.resolve(context, filePath);

    const statResult = await tryAsync(
      () => this.fileSystem.stat(absolutePath),
      (error) => new IoError(filePath, 'stat', toError(error))
    );
    if (statResult.isErr()) {
      return this.logFailure(filePath, err(statResult.error));
    }

    const stat = statResult.value;
    if (!stat.isFile()) {
      return this.logFailure(filePath, err(new IoError(filePath, 'read', new Error('not a regular file'))));
    }

    const descriptor: SourceDescriptor = {
      path: filePath,
      kind: classifySource(filePath),
      sizeBytes: stat.size,
      lastModified: stat.mtime,
    };

    return this.parseDescriptor(context, descriptor);
  }

  /**
   * Check the size policy, read UTF-8 content and parse it. Files above
   * maxFileSize or parseOptions.maxBytes are rejected before any content is
   * read.
   */
  async parseDescriptor(
    context: ParseContext,
    descriptor: SourceDescriptor
  ): Promise<Result<ParsedDocument, ParserError>> {
    const limit = this.sizeLimit();
    if (descriptor.sizeBytes > limit) {
      return this.logFailure(descriptor.path, err(new FileTooLargeError(descriptor.path, descriptor.sizeBytes, limit)));
    }

    const read = await tryAsync(
      () => this.fileSystem.readFile(this.resolve(context, descriptor.path)),
      (error) => new IoError(descriptor.path, 'read', toError(error))
    );
    if (read.isErr()) {
      return this.logFailure(descriptor.path, err(read.error));
    }

    const bytes = read.value;

    // The file may have grown since it was described
    if (bytes.byteLength > limit) {
      return this.logFailure(descriptor.path, err(new FileTooLargeError(descriptor.path, bytes.byteLength, limit)));
    }

    let source: string;
    try {
      source = this.decoder.decode(bytes);
    } catch (error) {
      const language = this.registry.detectLanguage(descriptor)?.info().id ?? 'unknown';
      return this.logFailure(
        descriptor.path,
        err(new CapsuleFailureError(language, 'utf8', `${descriptor.path} is not valid UTF-8: ${toError(error).message}`))
      );
    }

    return this.logFailure(descriptor.path, this.registry.parse(context, descriptor, source, this.policy.parseOptions));
  }

  /**
   * Parse descriptors one after another; the first failure aborts the batch
   */
  async parseDescriptors(
    context: ParseContext,
    descriptors: readonly SourceDescriptor[]
  ): Promise<Result<ParsedDocument[], ParserError>> {
    const documents: ParsedDocument[] = [];

    for (const descriptor of descriptors) {
      const result = await this.parseDescriptor(context, descriptor);
      if (result.isErr()) {
        return err(result.error);
      }
      documents.push(result.value);
    }

    return ok(documents);
  }

  /**
   * Parse every descriptor, keeping one result per input
   */
  async parseDescriptorsSettled(
    context: ParseContext,
    descriptors: readonly SourceDescriptor[]
  ): Promise<Result<ParsedDocument, ParserError>[]> {
    const results: Result<ParsedDocument, ParserError>[] = [];
    for (const descriptor of descriptors) {
      results.push(await this.parseDescriptor(context, descriptor));
    }
    return results;
  }

  /**
   * Discover the files under context.root and parse the ones a capsule
   * accepts, fail-fast
   */
  async parseTree(context: ParseContext): Promise<Result<ParsedDocument[], ParserError>> {
    const discovered = discoverSources(context.root, this.policy, this.log);
    if (discovered.isErr()) {
      return this.logFailure(context.root, err(discovered.error));
    }

    const parseable = discovered.value.descriptors.filter((descriptor) => {
      if (this.registry.detectLanguage(descriptor)) {
        return true;
      }
      this.log.debug('No capsule for discovered file', { path: descriptor.path, kind: descriptor.kind });
      return false;
    });

    return this.parseDescriptors(context, parseable);
  }

  private sizeLimit(): number {
    const { maxFileSize, parseOptions } = this.policy;
    return Math.min(maxFileSize, parseOptions.maxBytes ?? Infinity);
  }

  private resolve(context: ParseContext, filePath: string): string {
    return path.isAbsolute(filePath) ? filePath : path.join(context.root, filePath);
  }

  /**
   * Log a failed result and pass it through
   */
  private logFailure<T>(filePath: string, result: Result<T, ParserError>): Result<T, ParserError> {
    if (result.isErr()) {
      this.log.logParseFailure(filePath, { code: result.error.code, message: result.error.message });
    }
    return result;
  }
}
