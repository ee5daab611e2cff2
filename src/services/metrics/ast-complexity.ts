/**
 * Generic AST Complexity Engine
 *
 * One tree walk for every language. Languages differ only in which node
 * kinds count as branches, exits and short-circuit boolean operators.
 */

import Parser from 'tree-sitter';
import type { ComplexityMetrics } from '../../models/Metrics.js';
import { CapsuleFailureError, toError } from '../../lib/errors/ParserErrors.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { loadGrammar, type Grammar } from '../parser/LanguageLoader.js';

/**
 * The part of a syntax node the walk needs
 */
export interface WalkableNode {
  type: string;
  namedChildren: readonly WalkableNode[];
}

/**
 * Anything that turns source text into a tree of named nodes
 */
export interface SourceGrammar {
  readonly name: string;
  parse(source: string): { rootNode: WalkableNode };
}

export type NodeKinds = ReadonlySet<string> | readonly string[];

/** Result for sources that cannot be analyzed */
export const NEUTRAL_COMPLEXITY: Readonly<ComplexityMetrics> = Object.freeze({
  cyclomatic: 1,
  cognitive: 0,
  nestingDepth: 0,
  exitPoints: 0,
});

/**
 * Tree-sitter grammar adapter
 */
export class TreeSitterGrammar implements SourceGrammar {
  private readonly parser = new Parser();

  constructor(
    readonly name: string,
    grammar: Grammar
  ) {
    this.parser.setLanguage(grammar);
  }

  parse(source: string): Parser.Tree {
    // 64KB for files < 32KB, otherwise double the source size
    const bufferSize = source.length < 32768 ? 65536 : source.length * 2;
    return this.parser.parse(source, undefined, { bufferSize });
  }
}

/**
 * Load a Tree-sitter grammar by id and wrap it for the engine
 */
export function treeSitterGrammar(grammarId: string): Result<SourceGrammar, CapsuleFailureError> {
  return loadGrammar(grammarId).andThen((grammar) => {
    try {
      return ok(new TreeSitterGrammar(grammarId, grammar));
    } catch (error) {
      return err(new CapsuleFailureError(grammarId, 'tree_sitter', toError(error).message));
    }
  });
}

function toSet(kinds: NodeKinds): ReadonlySet<string> {
  return kinds instanceof Set ? kinds : new Set(kinds);
}

/**
 * Walk the tree and score it; fails when there is no grammar or it throws
 */
export function tryAstComplexity(
  source: string,
  grammar: SourceGrammar | undefined,
  branchKinds: NodeKinds,
  exitKinds: NodeKinds,
  booleanKinds: NodeKinds
): Result<ComplexityMetrics, CapsuleFailureError> {
  if (!grammar) {
    return err(new CapsuleFailureError('unknown', 'tree_sitter', 'No grammar available'));
  }

  let root: WalkableNode;
  try {
    root = grammar.parse(source).rootNode;
  } catch (error) {
    return err(new CapsuleFailureError(grammar.name, 'parse', toError(error).message));
  }

  const branches = toSet(branchKinds);
  const exits = toSet(exitKinds);
  const booleans = toSet(booleanKinds);

  let cyclomatic = 1;
  let cognitive = 0;
  let nestingDepth = 0;
  let exitPoints = 0;

  const stack: Array<[WalkableNode, number]> = [[root, 0]];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const [node, depth] = entry;

    if (branches.has(node.type)) {
      cyclomatic += 1;
      cognitive += 1 + depth;
      nestingDepth = Math.max(nestingDepth, depth);
    }
    if (exits.has(node.type)) {
      exitPoints += 1;
    }
    if (booleans.has(node.type)) {
      cognitive += 1;
    }

    for (const child of node.namedChildren) {
      stack.push([child, depth + 1]);
    }
  }

  return ok({ cyclomatic: Math.max(1, cyclomatic), cognitive, nestingDepth, exitPoints });
}

/**
 * Complexity of `source`; never fails. Without a usable grammar the result
 * is exactly NEUTRAL_COMPLEXITY.
 */
export function astComplexity(
  source: string,
  grammar: SourceGrammar | undefined,
  branchKinds: NodeKinds,
  exitKinds: NodeKinds,
  booleanKinds: NodeKinds
): ComplexityMetrics {
  return tryAstComplexity(source, grammar, branchKinds, exitKinds, booleanKinds).unwrapOr({ ...NEUTRAL_COMPLEXITY });
}
