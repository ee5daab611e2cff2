/**
 * Markdown Capsule
 *
 * Line-based: ATX headings become heading symbols, fenced code blocks are
 * counted. Nothing inside a fence is treated as a heading.
 */

import type { LanguageCapsule } from '../LanguageCapsule.js';
import { matchesByInfo } from '../LanguageCapsule.js';
import { ParsedDocumentBuilder } from '../ParsedDocumentBuilder.js';
import { checkMaxBytes } from './limits.js';
import type { LanguageInfo, SourceDescriptor } from '../../../models/Language.js';
import type { ParseContext, ParseOptions, ParsedDocument } from '../../../models/ParsedDocument.js';
import type { ParserError } from '../../../lib/errors/ParserErrors.js';
import type { Result } from '../../../lib/result-types.js';

const HEADING_PATTERN = /^ {0,3}(#{1,6})\s+(.*?)\s*#*\s*$/;
const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;

const MARKDOWN_INFO: LanguageInfo = Object.freeze({
  id: 'markdown',
  displayName: 'Markdown',
  extensions: Object.freeze(['md', 'markdown', 'mdx']),
  aliases: Object.freeze(['md']),
});

export class MarkdownCapsule implements LanguageCapsule {
  info(): LanguageInfo {
    return MARKDOWN_INFO;
  }

  matches(descriptor: SourceDescriptor): boolean {
    return matchesByInfo(MARKDOWN_INFO, descriptor);
  }

  parse(
    context: ParseContext,
    descriptor: SourceDescriptor,
    source: string,
    options: ParseOptions
  ): Result<ParsedDocument, ParserError> {
    return checkMaxBytes(MARKDOWN_INFO.id, source, options).map(() => {
      const builder = new ParsedDocumentBuilder(descriptor, context, MARKDOWN_INFO.id);
      const lines = source.split('\n');

      let headings = 0;
      let codeBlocks = 0;
      let openFence: string | undefined;
      let byteOffset = 0;

      lines.forEach((line, index) => {
        const lineBytes = Buffer.byteLength(line, 'utf-8');
        const fence = line.match(FENCE_PATTERN);

        if (openFence !== undefined) {
          if (fence && fence[1][0] === openFence[0] && fence[1].length >= openFence.length) {
            openFence = undefined;
          }
        } else if (fence) {
          openFence = fence[1];
          codeBlocks++;
        } else {
          const heading = line.match(HEADING_PATTERN);
          if (heading) {
            headings++;
            if (options.collectSymbols) {
              builder.addSymbol({
                name: heading[2],
                kind: 'heading',
                span: {
                  startLine: index + 1,
                  startColumn: 0,
                  endLine: index + 1,
                  endColumn: line.length,
                  startByte: byteOffset,
                  endByte: byteOffset + lineBytes,
                },
              });
            }
          }
        }

        byteOffset += lineBytes + 1;
      });

      const words = source.split(/\s+/).filter((word) => word.length > 0).length;
      builder.setTreeStats(headings + codeBlocks, words);

      return builder.build(source, { headings, codeBlocks });
    });
  }
}
