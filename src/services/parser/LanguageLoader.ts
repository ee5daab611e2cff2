/**
 * Grammar Loading
 *
 * Loads Tree-sitter grammars from their npm packages on first use and caches
 * them. Grammars are opaque objects handed straight to the parser.
 */

import { createRequire } from 'module';
import { CapsuleFailureError } from '../../lib/errors/ParserErrors.js';
import { Result, ok, err } from '../../lib/result-types.js';

/**
 * Opaque Tree-sitter language object
 */
export type Grammar = object;

interface GrammarPackage {
  module: string;
  /** Named export for packages that bundle several grammars */
  property?: string;
}

const GRAMMAR_PACKAGES: Record<string, GrammarPackage> = {
  javascript: { module: 'tree-sitter-javascript' },
  typescript: { module: 'tree-sitter-typescript', property: 'typescript' },
  tsx: { module: 'tree-sitter-typescript', property: 'tsx' },
  python: { module: 'tree-sitter-python' },
  go: { module: 'tree-sitter-go' },
  rust: { module: 'tree-sitter-rust' },
  java: { module: 'tree-sitter-java' },
  elixir: { module: 'tree-sitter-elixir' },
};

const requireGrammar = createRequire(import.meta.url);

// Grammar cache to avoid reloading
const grammarCache = new Map<string, Grammar>();

/**
 * Grammar ids with a known npm package
 */
export function knownGrammars(): string[] {
  return Object.keys(GRAMMAR_PACKAGES);
}

/**
 * Load the Tree-sitter grammar registered under a grammar id
 */
export function loadGrammar(grammarId: string): Result<Grammar, CapsuleFailureError> {
  const cached = grammarCache.get(grammarId);
  if (cached) {
    return ok(cached);
  }

  const pkg = GRAMMAR_PACKAGES[grammarId];
  if (!pkg) {
    return err(new CapsuleFailureError(grammarId, 'tree_sitter', `No grammar package known for ${grammarId}`));
  }

  let loaded: unknown;
  try {
    loaded = requireGrammar(pkg.module);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return err(
      new CapsuleFailureError(
        grammarId,
        'tree_sitter',
        `Failed to load ${pkg.module}: ${errorMessage}. Ensure the grammar package is installed.`
      )
    );
  }

  const grammar: unknown =
    pkg.property !== undefined && typeof loaded === 'object' && loaded !== null
      ? Reflect.get(loaded, pkg.property)
      : loaded;

  if (typeof grammar !== 'object' || grammar === null) {
    return err(new CapsuleFailureError(grammarId, 'tree_sitter', `${pkg.module} did not export a grammar`));
  }

  grammarCache.set(grammarId, grammar);
  return ok(grammar);
}
