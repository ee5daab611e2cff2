/**
 * Tree-sitter Parser Wrapper
 *
 * Wraps the Tree-sitter parser: grammar configuration, parsing with a buffer
 * sized to the source, syntax-error diagnostics and tree statistics.
 */

import Parser from 'tree-sitter';
import type { Grammar } from './LanguageLoader.js';
import type { Diagnostic } from '../../models/ParsedDocument.js';
import { CapsuleFailureError } from '../../lib/errors/ParserErrors.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { extractSpan } from './SymbolExtractor.js';

export interface TreeStats {
  /** Every node, named or anonymous */
  totalNodes: number;
  /** Leaf nodes */
  totalTokens: number;
}

export class TreeSitterParser {
  private parser: Parser;

  constructor(private readonly language: string) {
    this.parser = new Parser();
  }

  /**
   * Set the language grammar for parsing
   */
  setLanguage(grammar: Grammar): Result<void, CapsuleFailureError> {
    try {
      this.parser.setLanguage(grammar);
      return ok(undefined);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return err(new CapsuleFailureError(this.language, 'tree_sitter', `Incompatible grammar: ${errorMessage}`));
    }
  }

  /**
   * Parse source code into a syntax tree
   */
  parse(source: string): Result<Parser.Tree, CapsuleFailureError> {
    // 64KB for files < 32KB, otherwise double the source size
    const bufferSize = source.length < 32768 ? 65536 : source.length * 2;

    try {
      const tree = this.parser.parse(source, undefined, { bufferSize });
      if (!tree) {
        return err(new CapsuleFailureError(this.language, 'parse', 'Parser returned null tree'));
      }
      return ok(tree);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return err(new CapsuleFailureError(this.language, 'parse', errorMessage));
    }
  }

  /**
   * Report ERROR and MISSING nodes as diagnostics
   */
  extractDiagnostics(tree: Parser.Tree, source: string): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    if (!tree.rootNode.hasError) {
      return diagnostics;
    }

    const stack: Parser.SyntaxNode[] = [tree.rootNode];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      if (node.type === 'ERROR') {
        diagnostics.push({
          message: this.extractErrorMessage(node, source),
          severity: 'error',
          code: 'syntax_error',
          span: extractSpan(node),
        });
        continue;
      }

      if (node.isMissing) {
        diagnostics.push({
          message: `Missing ${node.type} at line ${node.startPosition.row + 1}, column ${node.startPosition.column}`,
          severity: 'error',
          code: 'missing_node',
          span: extractSpan(node),
        });
        continue;
      }

      if (node.hasError) {
        // Keep document order when popping
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push(node.children[i]);
        }
      }
    }

    return diagnostics;
  }

  /**
   * Count nodes and leaves without recursion
   */
  collectStats(tree: Parser.Tree): TreeStats {
    let totalNodes = 0;
    let totalTokens = 0;

    const cursor = tree.walk();
    let descending = true;
    for (;;) {
      if (descending) {
        totalNodes++;
        if (cursor.gotoFirstChild()) {
          continue;
        }
        totalTokens++;
      }
      if (cursor.gotoNextSibling()) {
        descending = true;
        continue;
      }
      if (!cursor.gotoParent()) {
        break;
      }
      descending = false;
    }

    return { totalNodes, totalTokens };
  }

  private extractErrorMessage(node: Parser.SyntaxNode, source: string): string {
    const errorText = source.substring(node.startIndex, node.endIndex);
    const preview = errorText.length > 50 ? `${errorText.substring(0, 50)}...` : errorText;

    return `Syntax error at line ${node.startPosition.row + 1}, column ${node.startPosition.column}: unexpected "${preview}"`;
  }
}
