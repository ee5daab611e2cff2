/**
 * Parser Registry
 *
 * Immutable mapping from languages and extensions to capsules. Built once by
 * ParserRegistryBuilder and shared read-only afterwards.
 */

import type { LanguageCapsule } from './LanguageCapsule.js';
import type { LanguageId, LanguageInfo, SourceDescriptor } from '../../models/Language.js';
import { extensionOf } from '../../models/Language.js';
import type { ParseContext, ParseOptions, ParsedDocument } from '../../models/ParsedDocument.js';
import {
  InternalError,
  NoMatchingCapsuleError,
  UnknownLanguageError,
  type ParserError,
} from '../../lib/errors/ParserErrors.js';
import { Result, ok, err } from '../../lib/result-types.js';

/**
 * Accumulates capsule registrations; build() is one-shot
 */
export class ParserRegistryBuilder {
  private readonly capsules: LanguageCapsule[] = [];
  private readonly ids = new Set<LanguageId>();
  private built = false;

  /**
   * Register a capsule. Registration order is the disambiguation order for
   * shared extensions and for the fallback chain.
   */
  registerCapsule(capsule: LanguageCapsule): Result<ParserRegistryBuilder, ParserError> {
    if (this.built) {
      return err(new InternalError('Cannot register a capsule after build()'));
    }

    const { id } = capsule.info();
    if (this.ids.has(id)) {
      return err(new InternalError(`Capsule already registered for language: ${id}`));
    }

    this.ids.add(id);
    this.capsules.push(capsule);
    return ok(this);
  }

  /**
   * Register several capsules, stopping at the first rejection
   */
  registerAll(capsules: readonly LanguageCapsule[]): Result<ParserRegistryBuilder, ParserError> {
    let result: Result<ParserRegistryBuilder, ParserError> = ok(this);
    for (const capsule of capsules) {
      result = result.andThen((builder) => builder.registerCapsule(capsule));
    }
    return result;
  }

  /**
   * Freeze the registrations into a registry
   */
  build(): Result<ParserRegistry, ParserError> {
    if (this.built) {
      return err(new InternalError('ParserRegistryBuilder.build() already called'));
    }
    this.built = true;
    return ok(new ParserRegistry(this.capsules));
  }
}

export class ParserRegistry {
  private readonly capsules: readonly LanguageCapsule[];
  private readonly byId = new Map<LanguageId, LanguageCapsule>();
  private readonly byAlias = new Map<string, LanguageCapsule>();
  private readonly byExtension = new Map<string, readonly LanguageId[]>();

  constructor(capsules: readonly LanguageCapsule[]) {
    this.capsules = Object.freeze([...capsules]);

    const extensionIndex = new Map<string, LanguageId[]>();
    for (const capsule of this.capsules) {
      const info = capsule.info();
      this.byId.set(info.id, capsule);

      for (const alias of info.aliases) {
        // First registration wins
        if (!this.byAlias.has(alias)) {
          this.byAlias.set(alias, capsule);
        }
      }

      for (const extension of info.extensions) {
        const ids = extensionIndex.get(extension) ?? [];
        ids.push(info.id);
        extensionIndex.set(extension, ids);
      }
    }

    for (const [extension, ids] of extensionIndex) {
      this.byExtension.set(extension, Object.freeze(ids));
    }
  }

  /**
   * Resolve a descriptor: language hint, then extension candidates, then the
   * fallback chain. Returns undefined when nothing accepts it.
   */
  detectLanguage(descriptor: SourceDescriptor): LanguageCapsule | undefined {
    if (descriptor.language !== undefined) {
      const hinted = this.lookup(descriptor.language);
      if (hinted) {
        return hinted;
      }
    }

    const extension = extensionOf(descriptor.path);
    if (extension !== undefined) {
      for (const id of this.byExtension.get(extension) ?? []) {
        const capsule = this.byId.get(id);
        if (capsule && capsule.matches(descriptor)) {
          return capsule;
        }
      }
    }

    return this.capsules.find((capsule) => capsule.matches(descriptor));
  }

  /**
   * Parse through the resolved capsule. Capsule errors are returned as-is.
   */
  parse(
    context: ParseContext,
    descriptor: SourceDescriptor,
    source: string,
    options: ParseOptions
  ): Result<ParsedDocument, ParserError> {
    const capsule = this.detectLanguage(descriptor);
    if (!capsule) {
      return err(new NoMatchingCapsuleError(descriptor.path));
    }
    return capsule.parse(context, descriptor, source, options);
  }

  /**
   * Look up a capsule by id or alias
   */
  capsuleFor(idOrAlias: string): Result<LanguageCapsule, UnknownLanguageError> {
    const capsule = this.lookup(idOrAlias);
    return capsule ? ok(capsule) : err(new UnknownLanguageError(idOrAlias));
  }

  /**
   * Metadata of every registered capsule, in registration order
   */
  languages(): LanguageInfo[] {
    return this.capsules.map((capsule) => capsule.info());
  }

  supportsExtension(extension: string): boolean {
    return this.byExtension.has(extension.replace(/^\./, '').toLowerCase());
  }

  get size(): number {
    return this.capsules.length;
  }

  private lookup(idOrAlias: string): LanguageCapsule | undefined {
    const key = idOrAlias.toLowerCase();
    return this.byId.get(key) ?? this.byAlias.get(key);
  }
}
