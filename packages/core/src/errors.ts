import type { ZodIssue } from 'zod';

/** Malformed caller input: empty series, mismatched weights, non-object value. */
export class AlignInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AlignInputError';
  }
}

/**
 * The manifest document could not be read or does not match the manifest
 * schema. Structural problems in well-typed bands are reported by
 * validateManifest instead.
 */
export class ManifestLoadError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ManifestLoadError';
  }
}

/** One line per zod issue: `path: message`. */
export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}
