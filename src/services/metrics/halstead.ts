/**
 * Halstead Estimator
 *
 * Lexical approximation: operators and operands are found by regular
 * expression, not from the syntax tree. Accuracy is bounded by the quality
 * of the per-language patterns.
 */

import type { HalsteadMetrics } from '../../models/Metrics.js';

export type TokenPattern = RegExp | string;

function globalPattern(pattern: TokenPattern): RegExp {
  if (typeof pattern === 'string') {
    return new RegExp(pattern, 'g');
  }
  return pattern.flags.includes('g') ? new RegExp(pattern.source, pattern.flags) : new RegExp(pattern.source, `${pattern.flags}g`);
}

/**
 * Every non-empty match of `pattern` in `source`
 */
export function scanTokens(source: string, pattern: TokenPattern): string[] {
  const tokens: string[] = [];
  for (const match of source.matchAll(globalPattern(pattern))) {
    if (match[0].length > 0) {
      tokens.push(match[0]);
    }
  }
  return tokens;
}

export function halsteadEstimate(
  source: string,
  operatorPattern: TokenPattern,
  identifierPattern: TokenPattern,
  keywords: Iterable<string>
): HalsteadMetrics {
  const reserved = new Set(keywords);

  const operators = scanTokens(source, operatorPattern);
  const operands = scanTokens(source, identifierPattern).filter((token) => !reserved.has(token));

  const totalOperators = operators.length;
  const totalOperands = operands.length;
  const uniqueOperators = new Set(operators).size;
  const uniqueOperands = new Set(operands).size;

  const length = totalOperators + totalOperands;
  const vocabulary = uniqueOperators + uniqueOperands;
  const volume = vocabulary > 1 ? length * Math.log2(vocabulary) : 0;
  const difficulty = uniqueOperands > 0 ? (uniqueOperators / 2) * (totalOperands / uniqueOperands) : 0;

  return {
    totalOperators,
    totalOperands,
    uniqueOperators,
    uniqueOperands,
    volume,
    difficulty,
    effort: difficulty * volume,
  };
}
