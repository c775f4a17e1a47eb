export type ExtractionErrorKind =
  | 'UnsupportedFormat'
  | 'BlockNotFound'
  | 'MalformedLine'
  | 'EmptyBlock'
  | 'IOFailure';

/**
 * A file-scoped extraction failure.
 * Locators and the line parser throw it without a path; the pipeline attaches one.
 */
export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly path?: string;

  constructor(kind: ExtractionErrorKind, message: string, path?: string) {
    super(message);
    this.name = 'ExtractionError';
    this.kind = kind;
    this.path = path;
  }

  withPath(path: string): ExtractionError {
    return new ExtractionError(this.kind, this.message, path);
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}
