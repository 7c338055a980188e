/**
 * CliUsageError
 *
 * Raised for command line arguments that do not parse or validate.
 */
export class CliUsageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CliUsageError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create CliUsageError from unknown error with context
   */
  static fromError(context: string, error: unknown): CliUsageError {
    return new CliUsageError(
      `${context}: ${CliUsageError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
