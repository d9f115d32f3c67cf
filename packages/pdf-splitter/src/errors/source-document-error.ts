/**
 * Why a source document could not be used
 */
export type SourceDocumentErrorCode = 'not-found' | 'unreadable' | 'closed';

/**
 * SourceDocumentError
 *
 * Fatal pre-condition failure: the batch never starts.
 */
export class SourceDocumentError extends Error {
  constructor(
    message: string,
    public readonly code: SourceDocumentErrorCode,
    public readonly sourcePath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'SourceDocumentError';
  }

  static notFound(sourcePath: string): SourceDocumentError {
    return new SourceDocumentError(
      `Source document not found: ${sourcePath}`,
      'not-found',
      sourcePath,
    );
  }

  static unreadable(sourcePath: string, error: unknown): SourceDocumentError {
    const reason = error instanceof Error ? error.message : String(error);
    return new SourceDocumentError(
      `Source document is not readable: ${sourcePath}: ${reason}`,
      'unreadable',
      sourcePath,
      { cause: error },
    );
  }

  static closed(sourcePath: string): SourceDocumentError {
    return new SourceDocumentError(
      `Source document is closed: ${sourcePath}`,
      'closed',
      sourcePath,
    );
  }
}
