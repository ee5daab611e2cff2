/**
 * Language Capsule Contract
 *
 * A capsule is one self-contained language implementation: static metadata,
 * a cheap I/O-free predicate and a parse function. The registry dispatches to
 * capsules only through this interface.
 */

import type { LanguageInfo, SourceDescriptor } from '../../models/Language.js';
import { extensionOf } from '../../models/Language.js';
import type { ParseContext, ParseOptions, ParsedDocument } from '../../models/ParsedDocument.js';
import type { ParserError } from '../../lib/errors/ParserErrors.js';
import type { Result } from '../../lib/result-types.js';

export interface LanguageCapsule {
  /** Stable metadata; must return the same value on every call */
  info(): LanguageInfo;

  /** Whether this capsule accepts the descriptor (no I/O) */
  matches(descriptor: SourceDescriptor): boolean;

  /** Parse already-decoded source into a document */
  parse(
    context: ParseContext,
    descriptor: SourceDescriptor,
    source: string,
    options: ParseOptions
  ): Result<ParsedDocument, ParserError>;
}

/**
 * True when the descriptor's language hint names this capsule by id or alias
 */
export function hintMatches(info: LanguageInfo, descriptor: SourceDescriptor): boolean {
  if (descriptor.language === undefined) {
    return false;
  }
  const hint = descriptor.language.toLowerCase();
  return hint === info.id || info.aliases.includes(hint);
}

/**
 * Default predicate: language hint, then file extension
 */
export function matchesByInfo(info: LanguageInfo, descriptor: SourceDescriptor): boolean {
  if (hintMatches(info, descriptor)) {
    return true;
  }
  const extension = extensionOf(descriptor.path);
  return extension !== undefined && info.extensions.includes(extension);
}
