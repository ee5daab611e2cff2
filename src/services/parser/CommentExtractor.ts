/**
 * Comment Extraction
 *
 * Extracts comments and docstrings from a Tree-sitter parse tree. Handles
 * line comments, block comments, doc comments (/** and ///) and Python-style
 * string docstrings.
 */

import type Parser from 'tree-sitter';
import type { ParsedDocumentBuilder } from './ParsedDocumentBuilder.js';
import type { TreeSitterLanguageDefinition } from './language-definitions.js';
import type { DocstringKind } from '../../models/ParsedDocument.js';
import { extractSpan, extractSymbolName } from './SymbolExtractor.js';

const DOCSTRING_BODY_TYPES = new Set(['block', 'module']);

/**
 * Check if a string node is a docstring (first statement of a module or of
 * a function or class body)
 */
function isDocstring(node: Parser.SyntaxNode): boolean {
  if (node.type !== 'string') return false;

  const parent = node.parent;
  if (!parent || parent.type !== 'expression_statement' || parent.namedChildCount !== 1) {
    return false;
  }

  const body = parent.parent;
  if (!body || !DOCSTRING_BODY_TYPES.has(body.type)) {
    return false;
  }

  const first = body.namedChildren.find((child) => child.type !== 'comment');
  return first !== undefined && first.startIndex === parent.startIndex;
}

/**
 * Determine comment kind from its delimiters
 */
export function classifyComment(text: string): DocstringKind {
  if (text.startsWith('/**') && !text.startsWith('/**/')) {
    return 'doc';
  }
  if (text.startsWith('///') || text.startsWith('//!')) {
    return 'doc';
  }
  if (text.startsWith('/*')) {
    return 'block';
  }
  return 'line';
}

/**
 * Extract comment text (without delimiters)
 */
export function stripCommentDelimiters(text: string): string {
  if (text.startsWith('/**')) {
    return stripBlockMargins(text.slice(3, -2));
  } else if (text.startsWith('/*')) {
    return stripBlockMargins(text.slice(2, -2));
  } else if (text.startsWith('///') || text.startsWith('//!')) {
    return text.slice(3).trim();
  } else if (text.startsWith('//')) {
    return text.slice(2).trim();
  } else if (text.startsWith('#')) {
    return text.slice(1).trim();
  }
  return text.trim();
}

/**
 * Remove the leading "*" column of block comments
 */
function stripBlockMargins(body: string): string {
  return body
    .split('\n')
    .map((line) => line.replace(/^\s*\*?\s?/, '').trimEnd())
    .join('\n')
    .trim();
}

/**
 * Strip string prefixes and quotes from a docstring literal
 */
export function stripDocstringQuotes(text: string): string {
  const unprefixed = text.replace(/^[rRuUbBfF]{0,2}/, '');
  for (const quote of ['"""', "'''", '"', "'"]) {
    if (unprefixed.startsWith(quote) && unprefixed.endsWith(quote) && unprefixed.length >= quote.length * 2) {
      return unprefixed.slice(quote.length, -quote.length).trim();
    }
  }
  return unprefixed.trim();
}

/**
 * Extract comments from a parsed tree into the builder
 *
 * Doc comments are associated with symbols later by the builder; docstrings
 * are owned by the definition whose body they open.
 */
export function extractComments(
  tree: Parser.Tree,
  definition: TreeSitterLanguageDefinition,
  builder: ParsedDocumentBuilder
): void {
  const stack: Parser.SyntaxNode[] = [tree.rootNode];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (definition.commentKinds.includes(node.type)) {
      const text = node.text;
      builder.addDocstring({
        text: stripCommentDelimiters(text),
        kind: classifyComment(text),
        span: extractSpan(node),
      });
      continue;
    }

    if (definition.stringDocstrings && isDocstring(node)) {
      const body = node.parent?.parent;
      const owner = body && body.type !== 'module' && body.parent ? extractSymbolName(body.parent) : undefined;
      const docstring = {
        text: stripDocstringQuotes(node.text),
        kind: 'docstring' as const,
        span: extractSpan(node),
      };
      builder.addDocstring(owner !== undefined ? { ...docstring, owner } : docstring);
      continue;
    }

    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}
