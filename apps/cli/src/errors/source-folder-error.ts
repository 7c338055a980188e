/**
 * SourceFolderError
 *
 * Raised when the source folder or one of its group folders cannot be
 * listed.
 */
export class SourceFolderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SourceFolderError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create SourceFolderError from unknown error with context
   */
  static fromError(context: string, error: unknown): SourceFolderError {
    return new SourceFolderError(
      `${context}: ${SourceFolderError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
