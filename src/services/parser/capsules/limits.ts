import type { ParseOptions } from '../../../models/ParsedDocument.js';
import { CapsuleFailureError } from '../../../lib/errors/ParserErrors.js';
import { Result, ok, err } from '../../../lib/result-types.js';

/**
 * Enforce ParseOptions.maxBytes before any parsing work
 */
export function checkMaxBytes(language: string, source: string, options: ParseOptions): Result<void, CapsuleFailureError> {
  if (options.maxBytes === undefined) {
    return ok(undefined);
  }
  const size = Buffer.byteLength(source, 'utf-8');
  if (size > options.maxBytes) {
    return err(new CapsuleFailureError(language, 'too_large', `Source is ${size} bytes, limit is ${options.maxBytes}`));
  }
  return ok(undefined);
}
