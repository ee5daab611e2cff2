/**
 * Built-in Capsules
 */

import type { LanguageCapsule } from '../LanguageCapsule.js';
import { loadLanguageDefinitions } from '../language-definitions.js';
import { TreeSitterCapsule } from './TreeSitterCapsule.js';
import { MarkdownCapsule } from './MarkdownCapsule.js';
import { PlainTextCapsule } from './PlainTextCapsule.js';
import type { ConfigError } from '../../../lib/env-config.js';
import type { Result } from '../../../lib/result-types.js';

export { TreeSitterCapsule, type GrammarLoader } from './TreeSitterCapsule.js';
export { MarkdownCapsule } from './MarkdownCapsule.js';
export { PlainTextCapsule } from './PlainTextCapsule.js';

/**
 * Built-in capsules in registration order: the Tree-sitter languages, then
 * Markdown, then plain text as the tail of the fallback chain
 */
export function builtinCapsules(): Result<LanguageCapsule[], ConfigError> {
  return loadLanguageDefinitions().map((definitions): LanguageCapsule[] => [
    ...definitions.map((definition) => new TreeSitterCapsule(definition)),
    new MarkdownCapsule(),
    new PlainTextCapsule(),
  ]);
}
