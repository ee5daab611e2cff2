/**
 * Tree-sitter Capsule
 *
 * One generic capsule configured per language by a TreeSitterLanguageDefinition.
 */

import type { LanguageCapsule } from '../LanguageCapsule.js';
import { matchesByInfo } from '../LanguageCapsule.js';
import type { TreeSitterLanguageDefinition } from '../language-definitions.js';
import { loadGrammar, type Grammar } from '../LanguageLoader.js';
import { TreeSitterParser } from '../TreeSitterParser.js';
import { ParsedDocumentBuilder } from '../ParsedDocumentBuilder.js';
import { extractSymbols } from '../SymbolExtractor.js';
import { extractComments } from '../CommentExtractor.js';
import { checkMaxBytes } from './limits.js';
import type { LanguageInfo, SourceDescriptor } from '../../../models/Language.js';
import type { ParseContext, ParseOptions, ParsedDocument } from '../../../models/ParsedDocument.js';
import type { CapsuleFailureError, ParserError } from '../../../lib/errors/ParserErrors.js';
import type { Result } from '../../../lib/result-types.js';

export type GrammarLoader = (grammarId: string) => Result<Grammar, CapsuleFailureError>;

export class TreeSitterCapsule implements LanguageCapsule {
  private readonly languageInfo: LanguageInfo;

  constructor(
    private readonly definition: TreeSitterLanguageDefinition,
    private readonly grammarLoader: GrammarLoader = loadGrammar
  ) {
    this.languageInfo = Object.freeze({
      id: definition.id,
      displayName: definition.displayName,
      extensions: Object.freeze([...definition.extensions]),
      aliases: Object.freeze([...definition.aliases]),
    });
  }

  info(): LanguageInfo {
    return this.languageInfo;
  }

  matches(descriptor: SourceDescriptor): boolean {
    return matchesByInfo(this.languageInfo, descriptor);
  }

  parse(
    context: ParseContext,
    descriptor: SourceDescriptor,
    source: string,
    options: ParseOptions
  ): Result<ParsedDocument, ParserError> {
    const { id, grammar } = this.definition;

    return checkMaxBytes(id, source, options)
      .andThen(() => this.grammarLoader(grammar))
      .andThen((loaded) => {
        const parser = new TreeSitterParser(id);
        return parser.setLanguage(loaded).andThen(() => parser.parse(source)).map((tree) => ({ parser, tree }));
      })
      .map(({ parser, tree }) => {
        const builder = new ParsedDocumentBuilder(descriptor, context, id);

        if (options.collectSymbols) {
          extractSymbols(tree, this.definition, builder);
        }
        if (options.collectComments) {
          extractComments(tree, this.definition, builder);
        }
        for (const diagnostic of parser.extractDiagnostics(tree, source)) {
          builder.addDiagnostic(diagnostic);
        }

        const stats = parser.collectStats(tree);
        builder.setTreeStats(stats.totalNodes, stats.totalTokens);

        return builder.build(source, { grammar });
      });
  }
}
