/**
 * PageRoutingError
 *
 * Raised when a routed document cannot be materialized. The batch treats it
 * as systemic and stops.
 */
export class PageRoutingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PageRoutingError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PageRoutingError from unknown error with context
   */
  static fromError(context: string, error: unknown): PageRoutingError {
    if (error instanceof PageRoutingError) {
      return error;
    }
    return new PageRoutingError(
      `${context}: ${PageRoutingError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
