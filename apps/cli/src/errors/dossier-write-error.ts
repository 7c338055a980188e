/**
 * DossierWriteError
 *
 * Raised when the finished dossier cannot be written to disk. The partial
 * file is removed before it propagates.
 */
export class DossierWriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DossierWriteError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create DossierWriteError from unknown error with context
   */
  static fromError(context: string, error: unknown): DossierWriteError {
    return new DossierWriteError(
      `${context}: ${DossierWriteError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
