/**
 * Tree-sitter Language Definitions
 *
 * Declarative per-language configuration read from
 * data/tree-sitter-languages.json: grammar id, file extensions and the node
 * kinds that become symbols, classes, enums and comments.
 */

import { z } from 'zod';
import { loadDataFile } from '../../lib/data-files.js';
import type { ConfigError } from '../../lib/env-config.js';
import type { Result } from '../../lib/result-types.js';

const SymbolKindSchema = z.enum(['function', 'method', 'class', 'interface', 'enum', 'type', 'module']);

export const TreeSitterLanguageDefinitionSchema = z.object({
  id: z.string().min(1).regex(/^[a-z0-9_+-]+$/, 'ids are lower-case'),
  displayName: z.string().min(1),
  grammar: z.string().min(1),
  extensions: z.array(z.string().regex(/^[a-z0-9]+$/, 'extensions are lower-case, without dot')).min(1),
  aliases: z.array(z.string()).default([]),
  /** Node kind -> symbol kind */
  symbols: z.record(SymbolKindSchema),
  /** Node kinds that also produce a ClassDefinition */
  classKinds: z.array(z.string()).default([]),
  /** Child node kinds holding base classes or implemented types */
  baseKinds: z.array(z.string()).default([]),
  enumKinds: z.array(z.string()).default([]),
  enumVariantKinds: z.array(z.string()).default([]),
  /** Node kinds whose nested functions are reported as methods */
  containerKinds: z.array(z.string()).default([]),
  /** Container kind -> field holding its name, when it is not "name" */
  containerNameFields: z.record(z.string()).default({}),
  commentKinds: z.array(z.string()).default([]),
  /** First string statement of a module, class or function body is a docstring */
  stringDocstrings: z.boolean().default(false),
});

export type TreeSitterLanguageDefinition = z.infer<typeof TreeSitterLanguageDefinitionSchema>;

const LanguageDefinitionFileSchema = z
  .object({
    languages: z.array(TreeSitterLanguageDefinitionSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.languages.forEach((language, index) => {
      if (seen.has(language.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['languages', index, 'id'],
          message: `Duplicate language id: ${language.id}`,
        });
      }
      seen.add(language.id);
    });
  });

export const LANGUAGE_DEFINITIONS_FILE = 'tree-sitter-languages.json';

/**
 * Read and validate the bundled language definitions
 */
export function loadLanguageDefinitions(): Result<TreeSitterLanguageDefinition[], ConfigError> {
  return loadDataFile(LANGUAGE_DEFINITIONS_FILE, LanguageDefinitionFileSchema).map((file) => file.languages);
}
