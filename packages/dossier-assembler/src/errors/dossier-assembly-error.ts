/**
 * DossierAssemblyError
 *
 * Raised when the dossier cannot be put together: nothing to assemble, or a
 * part that no longer parses.
 */
export class DossierAssemblyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DossierAssemblyError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create DossierAssemblyError from unknown error with context
   */
  static fromError(context: string, error: unknown): DossierAssemblyError {
    return new DossierAssemblyError(
      `${context}: ${DossierAssemblyError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
