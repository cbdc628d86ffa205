/**
 * Fatal build errors. Anything degradable never gets here.
 */

export type BuildErrorKind = 'environment' | 'structure' | 'conversion' | 'collision';

export class BuildError extends Error {
  readonly kind: BuildErrorKind;
  readonly path?: string;

  constructor(kind: BuildErrorKind, message: string, path?: string) {
    super(message);
    this.name = 'BuildError';
    this.kind = kind;
    this.path = path;
  }
}

/**
 * Errors from fs may come from another realm under test runners, so check
 * the shape rather than the prototype
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
