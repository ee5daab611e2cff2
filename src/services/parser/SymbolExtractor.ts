/**
 * Symbol Extraction Logic
 *
 * Extracts symbols, classes and enums from a Tree-sitter parse tree, driven
 * by the node kinds of a language definition.
 */

import type Parser from 'tree-sitter';
import type { ParsedDocumentBuilder } from './ParsedDocumentBuilder.js';
import type { TreeSitterLanguageDefinition } from './language-definitions.js';
import type { Span, SymbolKind } from '../../models/ParsedDocument.js';

/** Node kinds that name a base class or implemented type */
const BASE_NAME_NODE_TYPES = new Set([
  'identifier',
  'type_identifier',
  'attribute',
  'member_expression',
  'nested_identifier',
  'scoped_type_identifier',
  'generic_type',
]);

const NAME_NODE_TYPES = new Set(['identifier', 'type_identifier', 'property_identifier', 'field_identifier']);

/**
 * Extract location span from a Tree-sitter node
 */
export function extractSpan(node: Parser.SyntaxNode): Span {
  return {
    startLine: node.startPosition.row + 1, // 1-indexed
    startColumn: node.startPosition.column, // 0-indexed
    endLine: node.endPosition.row + 1, // 1-indexed
    endColumn: node.endPosition.column, // 0-indexed
    startByte: node.startIndex,
    endByte: node.endIndex,
  };
}

/**
 * Extract symbol name from a Tree-sitter node
 */
export function extractSymbolName(node: Parser.SyntaxNode, field = 'name'): string {
  // Use field name if available (more reliable)
  const nameNode = node.childForFieldName(field);
  if (nameNode) {
    return nameNode.text;
  }

  const identifierChild = node.namedChildren.find((child) => NAME_NODE_TYPES.has(child.type));
  return identifierChild ? identifierChild.text : '<anonymous>';
}

/**
 * Name of the nearest enclosing container, unless a function sits in between
 */
function findContainer(node: Parser.SyntaxNode, definition: TreeSitterLanguageDefinition): string | undefined {
  let current = node.parent;

  while (current) {
    if (definition.containerKinds.includes(current.type)) {
      return extractSymbolName(current, definition.containerNameFields[current.type] ?? 'name');
    }
    const kind = definition.symbols[current.type];
    if (kind === 'function' || kind === 'method') {
      return undefined;
    }
    current = current.parent;
  }

  return undefined;
}

/**
 * Base classes and implemented types, as written
 */
function extractBases(node: Parser.SyntaxNode, definition: TreeSitterLanguageDefinition): string[] {
  const bases: string[] = [];

  const collect = (current: Parser.SyntaxNode): void => {
    // metaclass=... and similar
    if (current.type === 'keyword_argument') {
      return;
    }
    if (BASE_NAME_NODE_TYPES.has(current.type)) {
      bases.push(current.text);
      return;
    }
    for (const child of current.namedChildren) {
      collect(child);
    }
  };

  for (const child of node.namedChildren) {
    if (definition.baseKinds.includes(child.type)) {
      collect(child);
    }
  }

  return bases;
}

function extractVariants(node: Parser.SyntaxNode, definition: TreeSitterLanguageDefinition): string[] {
  const variants: string[] = [];

  const collect = (current: Parser.SyntaxNode): void => {
    for (const child of current.namedChildren) {
      if (definition.enumVariantKinds.includes(child.type)) {
        // A bare variant is itself the name leaf
        variants.push(NAME_NODE_TYPES.has(child.type) ? child.text : extractSymbolName(child));
      } else if (!definition.enumKinds.includes(child.type)) {
        collect(child);
      }
    }
  };

  collect(node);
  return variants;
}

/**
 * Extract symbols from a parsed tree into the builder
 */
export function extractSymbols(
  tree: Parser.Tree,
  definition: TreeSitterLanguageDefinition,
  builder: ParsedDocumentBuilder
): void {
  const stack: Parser.SyntaxNode[] = [tree.rootNode];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    const kind = definition.symbols[node.type];
    if (kind !== undefined) {
      const name = extractSymbolName(node);
      const span = extractSpan(node);
      const container = findContainer(node, definition);
      const symbolKind: SymbolKind = kind === 'function' && container !== undefined ? 'method' : kind;

      builder.addSymbol(container !== undefined ? { name, kind: symbolKind, span, container } : { name, kind: symbolKind, span });

      if (definition.classKinds.includes(node.type)) {
        builder.addClass(name, span, extractBases(node, definition));
      }
    }

    if (definition.enumKinds.includes(node.type)) {
      builder.addEnum({
        name: extractSymbolName(node),
        span: extractSpan(node),
        variants: extractVariants(node, definition),
      });
    }

    // Push in reverse so symbols come out in document order
    const children = node.namedChildren;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}
