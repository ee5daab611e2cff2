import type { LineCounts } from '../../models/Metrics.js';

/**
 * Count total, blank and comment lines. A comment line is one whose trimmed
 * text starts with one of `commentPrefixes`; a trailing newline does not
 * start a new line.
 */
export function countLines(source: string, commentPrefixes: readonly string[]): LineCounts {
  if (source.length === 0) {
    return { total: 0, blank: 0, comment: 0, source: 0 };
  }

  const lines = source.split(/\r?\n/);
  if (source.endsWith('\n')) {
    lines.pop();
  }

  let blank = 0;
  let comment = 0;
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      blank++;
    } else if (commentPrefixes.some((prefix) => trimmed.startsWith(prefix))) {
      comment++;
    }
  }

  return {
    total: lines.length,
    blank,
    comment,
    source: lines.length - blank - comment,
  };
}
