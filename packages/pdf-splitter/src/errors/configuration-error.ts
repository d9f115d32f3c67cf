import type { ZodError } from 'zod';

/**
 * ConfigurationError
 *
 * Thrown when processing options or a settings file fail validation.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }

  /**
   * Create ConfigurationError listing every zod issue as `path: message`
   */
  static fromZodError(context: string, error: ZodError): ConfigurationError {
    const details = error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return new ConfigurationError(`${context}: ${details}`, { cause: error });
  }
}
