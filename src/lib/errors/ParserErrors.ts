/**
 * Base error class for parsing-related errors
 */
export abstract class ParserError extends Error {
  public readonly code: ParserErrorCode;
  public readonly recoverable: boolean;

  constructor(message: string, code: ParserErrorCode, recoverable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ParserErrorCode =
  | 'UNKNOWN_LANGUAGE'
  | 'NO_MATCHING_CAPSULE'
  | 'IO_ERROR'
  | 'FILE_TOO_LARGE'
  | 'CAPSULE_FAILURE'
  | 'INTERNAL_ERROR';

/**
 * What went wrong inside a capsule
 */
export type CapsuleFailureKind =
  | 'parse'
  | 'tree_sitter'
  | 'query'
  | 'invalid_ast'
  | 'utf8'
  | 'json'
  | 'unsupported'
  | 'too_large'
  | 'unknown';

/**
 * No capsule is registered under the requested id or alias
 */
export class UnknownLanguageError extends ParserError {
  public readonly language: string;

  constructor(language: string) {
    super(`Unknown language: ${language}`, 'UNKNOWN_LANGUAGE');
    this.language = language;
  }
}

/**
 * Neither hint, extension nor fallback chain resolved a capsule
 */
export class NoMatchingCapsuleError extends ParserError {
  public readonly path: string;

  constructor(path: string) {
    super(`No capsule matches ${path}`, 'NO_MATCHING_CAPSULE');
    this.path = path;
  }
}

/**
 * Filesystem access failed
 */
export class IoError extends ParserError {
  public readonly path: string;
  public readonly operation: string;
  public readonly originalError?: Error;

  constructor(path: string, operation: string, originalError?: Error) {
    const message = `Failed to ${operation} ${path}${originalError ? ` - ${originalError.message}` : ''}`;
    super(message, 'IO_ERROR', true);
    this.path = path;
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * File exceeds the configured size policy
 */
export class FileTooLargeError extends ParserError {
  public readonly path: string;
  public readonly size: number;
  public readonly max: number;

  constructor(path: string, size: number, max: number) {
    super(`File ${path} is ${size} bytes, exceeding the ${max} byte limit`, 'FILE_TOO_LARGE');
    this.path = path;
    this.size = size;
    this.max = max;
  }
}

/**
 * A language capsule could not produce a document
 */
export class CapsuleFailureError extends ParserError {
  public readonly language: string;
  public readonly kind: CapsuleFailureKind;

  constructor(language: string, kind: CapsuleFailureKind, message: string) {
    super(`[${language}] ${kind} failure: ${message}`, 'CAPSULE_FAILURE', kind === 'tree_sitter');
    this.language = language;
    this.kind = kind;
  }
}

/**
 * Broken internal invariant (e.g. registering after build)
 */
export class InternalError extends ParserError {
  constructor(message: string) {
    super(message, 'INTERNAL_ERROR');
  }
}

/**
 * Wrap an unknown thrown value as an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
