/**
 * WatermarkError
 *
 * Raised when an overlay request is invalid or a document cannot be
 * watermarked.
 */
export class WatermarkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WatermarkError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create WatermarkError from unknown error with context
   */
  static fromError(context: string, error: unknown): WatermarkError {
    if (error instanceof WatermarkError) {
      return new WatermarkError(`${context}: ${error.message}`, {
        cause: error.cause ?? error,
      });
    }
    return new WatermarkError(
      `${context}: ${WatermarkError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
