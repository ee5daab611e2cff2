/**
 * Language and Source Descriptor Models
 *
 * Identity of a language capsule and the metadata-only description of a
 * source file handed to the registry.
 */

/**
 * Stable language identifier (e.g. "python", "tsx")
 */
export type LanguageId = string;

/**
 * Static metadata describing a language capsule
 */
export interface LanguageInfo {
  /** Unique language identifier */
  id: LanguageId;
  /** Human-readable name (e.g. "TypeScript") */
  displayName: string;
  /** File extensions without the leading dot, lower-case */
  extensions: readonly string[];
  /** Alternative names accepted as a language hint */
  aliases: readonly string[];
}

/**
 * What role a file plays in a repository
 */
export type SourceKind = 'source_file' | 'manifest' | 'configuration' | 'generated';

/**
 * Metadata-only description of a file to parse
 */
export interface SourceDescriptor {
  /** Path to the file (absolute, or relative to the parse root) */
  path: string;
  /** Explicit language hint, bypassing extension detection */
  language?: string;
  kind: SourceKind;
  /** Size from filesystem metadata */
  sizeBytes: number;
  lastModified?: Date;
}

/**
 * Lower-case extension of a path without the dot, or undefined
 */
export function extensionOf(filePath: string): string | undefined {
  const base = filePath.replace(/\\/g, '/').split('/').pop() ?? '';
  const match = base.toLowerCase().match(/\.([^.]+)$/);
  // ".gitignore" style dotfiles have no extension
  if (!match || match.index === 0) {
    return undefined;
  }
  return match[1];
}
