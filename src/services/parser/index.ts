/**
 * Parser Module
 *
 * Capsule registry, built-in capsules and the universal parser.
 */

import { ParserRegistryBuilder, type ParserRegistry } from './ParserRegistry.js';
import { builtinCapsules } from './capsules/index.js';
import type { ParserError } from '../../lib/errors/ParserErrors.js';
import type { ConfigError } from '../../lib/env-config.js';
import type { Result } from '../../lib/result-types.js';

export type { LanguageCapsule } from './LanguageCapsule.js';
export { hintMatches, matchesByInfo } from './LanguageCapsule.js';
export { ParserRegistry, ParserRegistryBuilder } from './ParserRegistry.js';
export {
  UniversalParser,
  nodeFileSystem,
  policyFromConfig,
  DEFAULT_POLICY,
  type FileStat,
  type FileSystem,
  type ParserPolicy,
} from './UniversalParser.js';
export { builtinCapsules, TreeSitterCapsule, MarkdownCapsule, PlainTextCapsule, type GrammarLoader } from './capsules/index.js';
export { loadGrammar, knownGrammars, type Grammar } from './LanguageLoader.js';
export {
  loadLanguageDefinitions,
  TreeSitterLanguageDefinitionSchema,
  type TreeSitterLanguageDefinition,
} from './language-definitions.js';
export { ParsedDocumentBuilder, PARSER_VERSION, countSourceLines } from './ParsedDocumentBuilder.js';

/**
 * Registry holding every built-in capsule
 */
export function createDefaultRegistry(): Result<ParserRegistry, ParserError | ConfigError> {
  return builtinCapsules().andThen((capsules) =>
    new ParserRegistryBuilder().registerAll(capsules).andThen((builder) => builder.build())
  );
}
