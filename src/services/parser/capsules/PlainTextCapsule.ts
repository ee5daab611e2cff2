/**
 * Plain-text Capsule
 *
 * Tail of the fallback chain: accepts any source or configuration file and
 * reports statistics only.
 */

import type { LanguageCapsule } from '../LanguageCapsule.js';
import { matchesByInfo } from '../LanguageCapsule.js';
import { ParsedDocumentBuilder } from '../ParsedDocumentBuilder.js';
import { checkMaxBytes } from './limits.js';
import type { LanguageInfo, SourceDescriptor } from '../../../models/Language.js';
import type { ParseContext, ParseOptions, ParsedDocument } from '../../../models/ParsedDocument.js';
import type { ParserError } from '../../../lib/errors/ParserErrors.js';
import type { Result } from '../../../lib/result-types.js';

const PLAIN_TEXT_INFO: LanguageInfo = Object.freeze({
  id: 'plaintext',
  displayName: 'Plain Text',
  extensions: Object.freeze(['txt', 'text']),
  aliases: Object.freeze(['text', 'plain']),
});

export class PlainTextCapsule implements LanguageCapsule {
  info(): LanguageInfo {
    return PLAIN_TEXT_INFO;
  }

  matches(descriptor: SourceDescriptor): boolean {
    return (
      matchesByInfo(PLAIN_TEXT_INFO, descriptor) ||
      descriptor.kind === 'source_file' ||
      descriptor.kind === 'configuration'
    );
  }

  parse(
    context: ParseContext,
    descriptor: SourceDescriptor,
    source: string,
    options: ParseOptions
  ): Result<ParsedDocument, ParserError> {
    return checkMaxBytes(PLAIN_TEXT_INFO.id, source, options).map(() => {
      const builder = new ParsedDocumentBuilder(descriptor, context, PLAIN_TEXT_INFO.id);
      const words = source.split(/\s+/).filter((word) => word.length > 0).length;
      builder.setTreeStats(0, words);
      return builder.build(source);
    });
  }
}
